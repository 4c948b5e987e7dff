#!/usr/bin/env node
import { runCli } from "./src/cli.js";
import { errorMessage } from "./utils.js";

runCli()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error) => {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
    });
