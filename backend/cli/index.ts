#!/usr/bin/env node
// backend/cli/index.ts
import { runCli } from "./run.js";

runCli(process.argv.slice(2), { input: process.stdin, output: process.stdout, errorOutput: process.stderr })
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err) => {
        console.error("[cli] fatal:", err);
        process.exit(1);
    });
