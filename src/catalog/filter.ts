/**
 * @file filter.ts
 * @module catalog/filter
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Rank-range and keyword filtering over a loaded catalog.
 */

import { getTier } from './tiers.js';
import type { Catalog, CommandEntry, FilterCriteria } from './types.js';

/**
 * Normalize raw search input for matching.
 */
export function normalizeSearch(search: string): string {
    return search.trim().toLowerCase();
}

/**
 * Check whether an entry contains the (already normalized) term in its
 * name or description, ignoring case. An empty term matches everything.
 */
export function matchesSearch(entry: CommandEntry, term: string): boolean {
    if (!term) {
        return true;
    }
    return entry.name.toLowerCase().includes(term) || entry.description.toLowerCase().includes(term);
}

/**
 * Reduce a catalog to the entries inside the rank range that match the
 * search term. Input order is preserved; an empty result is valid.
 *
 * @example
 * ```typescript
 * filterEntries(catalog, { minRank: 1, maxRank: 10, search: 'commit' });
 * ```
 */
export function filterEntries(entries: Catalog, criteria: FilterCriteria): Catalog {
    const term = normalizeSearch(criteria.search);

    return entries.filter(
        entry =>
            entry.rank >= criteria.minRank &&
            entry.rank <= criteria.maxRank &&
            matchesSearch(entry, term)
    );
}

/**
 * Build filter criteria from a tier key (or label) and a search term.
 */
export function criteriaForTier(tierKey: string, search = ''): FilterCriteria {
    const tier = getTier(tierKey);
    return { minRank: tier.minRank, maxRank: tier.maxRank, search };
}

/**
 * Tell whether the criteria leave every entry of the catalog in place,
 * i.e. no filter is effectively applied.
 */
export function isUnfiltered(entries: Catalog, criteria: FilterCriteria): boolean {
    return filterEntries(entries, criteria).length === entries.length;
}
