/**
 * @file config.ts
 * @module config
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Defaults for the command-line options and data file resolution.
 */

import { resolve } from 'node:path';

import type { OutputFormat } from './presenter/formatters.js';
import type { TierKey } from './catalog/types.js';

/**
 * Dataset file name, looked up in the working directory.
 */
export const DEFAULT_DATA_FILE = 'comandos.csv';

/**
 * Bucket selected when no tier is given (first entry of the dropdown).
 */
export const DEFAULT_TIER: TierKey = 'essenciais';

export const DEFAULT_FORMAT: OutputFormat = 'simple';

/**
 * Resolve the dataset path against the working directory at start.
 *
 * @param file - Path from --file, if given
 * @param cwd - Directory relative paths are resolved against
 */
export function resolveDataPath(file: string = DEFAULT_DATA_FILE, cwd: string = process.cwd()): string {
    return resolve(cwd, file);
}
