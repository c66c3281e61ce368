#!/usr/bin/env node

/**
 * @file index.ts
 * @module index
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview CLI entry point for browsing the Git command reference.
 */

/**
 * @example
 * ```bash
 * # Interactive browser over ./comandos.csv
 * gitref
 *
 * # Essential commands mentioning "commit"
 * gitref list --tier essenciais --search commit
 *
 * # Details of the first intermediate command, as JSON
 * gitref show 0 --tier intermediarios --format json
 * ```
 */

import { createProgram, describeError } from './cli.js';

/**
 * CLI entry point.
 *
 * Parses the command line and runs the matching subcommand. Load errors
 * stop the program before anything else is rendered.
 */
async function main() {
    await createProgram().parseAsync();
}

main().catch((error: unknown) => {
    console.error(describeError(error));
    process.exitCode = 1;
});
