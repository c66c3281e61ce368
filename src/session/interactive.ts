/**
 * @file interactive.ts
 * @module session/interactive
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Readline loop driving a browser session.
 */

import * as readline from 'node:readline';

import { formatPage } from '../presenter/formatters.js';
import type { BrowserSession } from './browser-session.js';
import { executeCommand, SESSION_HELP } from './commands.js';

/**
 * Streams the interactive session reads from and writes to.
 */
export interface SessionIO {
    input: NodeJS.ReadableStream;
    output: NodeJS.WritableStream;
}

/**
 * Run the interactive browser until the user quits or input ends.
 *
 * Prints the initial page, then handles one command per line.
 */
export async function runInteractive(
    session: BrowserSession,
    io: SessionIO = { input: process.stdin, output: process.stdout }
): Promise<void> {
    const rl = readline.createInterface({
        input: io.input,
        output: io.output,
        terminal: false,
    });

    const print = (text: string) => {
        if (text) {
            io.output.write(`${text}\n`);
        }
    };

    print(formatPage(session.view()));
    print(`\n${SESSION_HELP}`);

    try {
        for await (const line of rl) {
            const result = executeCommand(session, line);
            print(result.output);
            if (result.quit) {
                break;
            }
        }
    } finally {
        rl.close();
    }
}
