/**
 * @file options.ts
 * @module shared/options
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Parsing helpers for numeric option and argument values.
 */

import { OptionError } from './errors.js';

/**
 * Parse a non-negative integer from user input.
 *
 * @param value - Raw text, e.g. an argument or option value
 * @param name - Name used in the error message
 * @throws OptionError when the text is not a whole number
 */
export function parseNonNegativeInteger(value: string, name: string): number {
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) {
        throw new OptionError(`${name} must be a non-negative integer, got "${value}"`);
    }
    return parseInt(trimmed, 10);
}
