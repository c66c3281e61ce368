/**
 * @file loader.ts
 * @module catalog/loader
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Loads the command dataset from CSV, validates it and orders it by rank.
 */

import { existsSync, readFileSync } from 'node:fs';

import { parse } from 'csv-parse/sync';
import { z } from 'zod';

import { LoadError } from '../shared/errors.js';
import type { Catalog, CommandEntry } from './types.js';

/**
 * Columns every dataset must carry, in the dataset's own naming.
 */
export const REQUIRED_COLUMNS = [
    'comando',
    'descrição',
    'ordem_importância',
    'como_pode_ser_usado',
] as const;

/**
 * Separator between usage examples inside `como_pode_ser_usado`.
 */
export const USAGE_SEPARATOR = ', ';

const recordsSchema = z.array(z.array(z.string()));

const rowSchema = z.object({
    comando: z.string().trim().min(1, 'must not be empty'),
    'descrição': z.string().trim(),
    'ordem_importância': z
        .string()
        .trim()
        .regex(/^\d+$/, 'must be an integer')
        .transform(Number)
        .refine(Number.isSafeInteger, 'must be a safe integer')
        .refine(rank => rank >= 1, 'must be at least 1'),
    'como_pode_ser_usado': z.string(),
});

/**
 * Split the raw usage field into individual examples, dropping blanks.
 */
export function splitUsageExamples(raw: string): string[] {
    return raw
        .split(USAGE_SEPARATOR)
        .map(example => example.trim())
        .filter(example => example.length > 0);
}

/**
 * Tokenize CSV text into rows of fields.
 *
 * @throws LoadError ParseError when the text is not well-formed CSV
 */
function tokenize(content: string, source: string): string[][] {
    let records: unknown;
    try {
        records = parse(content, {
            bom: true,
            skip_empty_lines: true,
        });
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new LoadError('ParseError', source, `Could not parse ${source}: ${reason}`, { cause: error });
    }

    const checked = recordsSchema.safeParse(records);
    if (!checked.success) {
        throw new LoadError('ParseError', source, `Could not parse ${source}: unexpected record shape`);
    }
    return checked.data;
}

/**
 * Parse dataset text into a rank-ordered catalog.
 *
 * The sort is stable, so entries sharing a rank keep their file order.
 *
 * @param content - CSV text with a header row
 * @param source - Name used in error messages (usually the file path)
 * @returns Frozen entries sorted ascending by rank
 * @throws LoadError SchemaInvalid or ParseError
 */
export function parseCatalog(content: string, source = '<input>'): Catalog {
    const [header, ...rows] = tokenize(content, source);

    if (!header) {
        throw new LoadError('SchemaInvalid', source, `${source} is empty: no header row found`);
    }

    const columns = header.map(column => column.trim());
    const missing = REQUIRED_COLUMNS.filter(column => !columns.includes(column));
    if (missing.length > 0) {
        throw new LoadError(
            'SchemaInvalid',
            source,
            `${source} is missing required column(s): ${missing.join(', ')}`
        );
    }

    const entries: CommandEntry[] = rows.map((fields, rowIndex) => {
        const record = Object.fromEntries(columns.map((column, i) => [column, fields[i] ?? '']));
        const result = rowSchema.safeParse(record);

        if (!result.success) {
            const issue = result.error.issues[0];
            const field = issue.path.join('.');
            throw new LoadError(
                'SchemaInvalid',
                source,
                `${source}, row ${rowIndex + 1}, field "${field}": ${issue.message}`
            );
        }

        const row = result.data;
        return Object.freeze({
            name: row.comando,
            description: row['descrição'],
            rank: row['ordem_importância'],
            usageExamples: Object.freeze(splitUsageExamples(row['como_pode_ser_usado'])),
        });
    });

    return Object.freeze([...entries].sort((a, b) => a.rank - b.rank));
}

/**
 * Load the dataset from a file.
 *
 * @param filePath - Path to the CSV file
 * @returns Frozen entries sorted ascending by rank
 * @throws LoadError FileNotFound, SchemaInvalid or ParseError; no partial dataset is returned
 */
export function loadCatalog(filePath: string): Catalog {
    if (!existsSync(filePath)) {
        throw new LoadError('FileNotFound', filePath, `File not found: ${filePath}`);
    }

    let content: string;
    try {
        content = readFileSync(filePath, 'utf-8');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new LoadError('ParseError', filePath, `Could not read ${filePath}: ${reason}`, { cause: error });
    }

    return parseCatalog(content, filePath);
}
