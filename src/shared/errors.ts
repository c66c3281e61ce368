/**
 * @file errors.ts
 * @module shared/errors
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Error types raised while loading, selecting and parsing options.
 */

/**
 * Failure categories of the loader. All of them are fatal at start.
 */
export type LoadErrorKind = 'FileNotFound' | 'SchemaInvalid' | 'ParseError';

/**
 * Error thrown when the command dataset cannot be loaded.
 */
export class LoadError extends Error {
    readonly kind: LoadErrorKind;
    /** Path or label of the source being loaded */
    readonly source: string;

    constructor(kind: LoadErrorKind, source: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'LoadError';
        this.kind = kind;
        this.source = source;
    }
}

/**
 * Error thrown when an index outside the reduced set is selected.
 */
export class SelectionError extends Error {
    readonly index: number;
    readonly size: number;

    constructor(index: number, size: number) {
        super(
            size === 0
                ? `No entry to select: the filtered list is empty (got index ${index})`
                : `Index ${index} is out of range (0-${size - 1})`
        );
        this.name = 'SelectionError';
        this.index = index;
        this.size = size;
    }
}

/**
 * Error thrown when a command-line or session option has an invalid value.
 */
export class OptionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'OptionError';
    }
}
