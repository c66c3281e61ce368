/**
 * @file presenter.ts
 * @module presenter/presenter
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview View models for the selection list, entry details and statistics.
 */

import { IMPORTANCE_TIERS, tierForRank } from '../catalog/tiers.js';
import type { Catalog, CommandEntry, ImportanceTier } from '../catalog/types.js';
import { SelectionError } from '../shared/errors.js';

/**
 * Number of description characters kept in a selection label.
 */
export const LABEL_DESCRIPTION_LENGTH = 50;

/**
 * Notice shown when the filters leave nothing to select.
 */
export const NO_MATCHES_MESSAGE = 'Nenhum comando encontrado com os filtros aplicados.';

/**
 * One option of the selection dropdown.
 */
export interface SelectionOption {
    /** Position in the reduced set */
    index: number;
    label: string;
}

/**
 * Selection dropdown state: either options to pick from, or the
 * informational empty state.
 */
export type SelectionList =
    | { status: 'ready'; options: SelectionOption[] }
    | { status: 'empty'; message: string };

/**
 * Everything shown for the selected entry.
 */
export interface EntryDetails {
    name: string;
    description: string;
    rank: number;
    /** Badge tier derived from the rank */
    tier: ImportanceTier;
    usageExamples: readonly string[];
}

/**
 * Entry counts per importance band over the full dataset.
 */
export interface ImportanceDistribution {
    /** rank <= 10 */
    essential: number;
    /** 10 < rank <= 30 */
    intermediate: number;
    /** rank > 30 */
    advanced: number;
}

/**
 * Statistics panel contents.
 */
export interface CatalogStatistics {
    total: number;
    filtered: number;
    distribution: ImportanceDistribution;
}

/**
 * Complete state of one rendered page of the browser.
 */
export interface PageView {
    tier: ImportanceTier;
    search: string;
    list: SelectionList;
    /** Position of the selected entry in the reduced set */
    selectedIndex: number | null;
    details: EntryDetails | null;
    statistics: CatalogStatistics;
}

/**
 * Format the dropdown label of an entry: `#001 - git init - <description>...`.
 * The description is cut by code point.
 */
export function formatEntryLabel(entry: CommandEntry): string {
    const rank = String(entry.rank).padStart(3, '0');
    const description = Array.from(entry.description).slice(0, LABEL_DESCRIPTION_LENGTH).join('');
    return `#${rank} - ${entry.name} - ${description}...`;
}

/**
 * Build the selection dropdown for a reduced set.
 */
export function buildSelectionList(reduced: Catalog): SelectionList {
    if (reduced.length === 0) {
        return { status: 'empty', message: NO_MATCHES_MESSAGE };
    }

    return {
        status: 'ready',
        options: reduced.map((entry, index) => ({ index, label: formatEntryLabel(entry) })),
    };
}

/**
 * Pick an entry of the reduced set by position.
 *
 * @param reduced - The filtered entries the labels were built from
 * @param index - Zero-based position, `0 <= index < reduced.length`
 * @throws SelectionError when the index is not a valid position
 */
export function selectEntry(reduced: Catalog, index: number): EntryDetails {
    if (!Number.isInteger(index) || index < 0 || index >= reduced.length) {
        throw new SelectionError(index, reduced.length);
    }

    const entry = reduced[index];
    return {
        name: entry.name,
        description: entry.description,
        rank: entry.rank,
        tier: tierForRank(entry.rank),
        usageExamples: entry.usageExamples,
    };
}

/**
 * Count entries per importance band. The three counts always add up to
 * the number of entries.
 */
export function countByImportance(entries: Catalog): ImportanceDistribution {
    const distribution: ImportanceDistribution = { essential: 0, intermediate: 0, advanced: 0 };

    for (const entry of entries) {
        if (entry.rank <= 10) {
            distribution.essential++;
        } else if (entry.rank <= 30) {
            distribution.intermediate++;
        } else {
            distribution.advanced++;
        }
    }

    return distribution;
}

/**
 * Compute the statistics panel. The distribution is always taken over
 * the full dataset, not the reduced one.
 */
export function computeStatistics(full: Catalog, reduced: Catalog): CatalogStatistics {
    return {
        total: full.length,
        filtered: reduced.length,
        distribution: countByImportance(full),
    };
}

/**
 * Number of entries in each dropdown bucket, in dropdown order.
 */
export function countPerTier(entries: Catalog): Array<{ tier: ImportanceTier; count: number }> {
    return IMPORTANCE_TIERS.map(tier => ({
        tier,
        count: entries.filter(entry => entry.rank >= tier.minRank && entry.rank <= tier.maxRank).length,
    }));
}
