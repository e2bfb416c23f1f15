#!/usr/bin/env node
/**
 * bun-spec-reporter command line entry point
 */

import { run } from './cli/program.js';

run(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error(error);
        process.exitCode = 1;
    });
