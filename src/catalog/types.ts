/**
 * @file types.ts
 * @module catalog/types
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Types shared by the loader, filter and presenter stages.
 */

/**
 * One Git command as read from the dataset.
 */
export interface CommandEntry {
    /** Command as typed, e.g. "git commit" */
    readonly name: string;
    /** Free-text explanation of what the command does */
    readonly description: string;
    /** Importance rank, 1 = most important; used for ordering and bucketing */
    readonly rank: number;
    /** Usage examples in file order */
    readonly usageExamples: readonly string[];
}

/**
 * Loaded, rank-ordered dataset. Never mutated after load.
 */
export type Catalog = readonly CommandEntry[];

/**
 * Keys of the importance buckets offered by the tier dropdown.
 */
export type TierKey =
    | 'essenciais'
    | 'intermediarios'
    | 'avancados'
    | 'tecnicos'
    | 'especificos'
    | 'todos';

/**
 * Importance bucket with an inclusive rank range.
 */
export interface ImportanceTier {
    key: TierKey;
    /** Label shown in the dropdown */
    label: string;
    minRank: number;
    maxRank: number;
    /** Badge colour for entries in this tier (absent for the catch-all bucket) */
    color?: string;
}

/**
 * Criteria applied by the filter stage.
 */
export interface FilterCriteria {
    minRank: number;
    maxRank: number;
    /** Raw search text; empty matches everything */
    search: string;
}
