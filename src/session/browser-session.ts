/**
 * @file browser-session.ts
 * @module session/browser-session
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Stateful shell over the pure load/filter/present stages.
 */

import { DEFAULT_TIER } from '../config.js';
import { criteriaForTier, filterEntries } from '../catalog/filter.js';
import { getTier } from '../catalog/tiers.js';
import type { Catalog, FilterCriteria, ImportanceTier } from '../catalog/types.js';
import {
    buildSelectionList,
    computeStatistics,
    selectEntry,
    type PageView,
} from '../presenter/presenter.js';

/**
 * Selection state: nothing selected, or one position of the reduced set.
 */
export type SelectionState =
    | { state: 'none' }
    | { state: 'selected'; index: number };

/**
 * One user's browsing session.
 *
 * Holds the loaded catalog, the current filters and the current selection.
 * Every call to {@link view} recomputes filtering and presentation from
 * scratch; the catalog itself is never modified.
 *
 * @example
 * ```typescript
 * const session = new BrowserSession(loadCatalog('comandos.csv'));
 * session.setSearch('commit');
 * session.select(0);
 * console.log(formatPage(session.view()));
 * ```
 */
export class BrowserSession {
    private tier: ImportanceTier;
    private search = '';
    private selection: SelectionState = { state: 'none' };

    constructor(private readonly catalog: Catalog, tierKey: string = DEFAULT_TIER) {
        this.tier = getTier(tierKey);
    }

    /**
     * Switch the importance bucket. Clears the selection.
     *
     * @throws OptionError for an unknown bucket
     */
    setTier(tierKey: string): void {
        this.tier = getTier(tierKey);
        this.selection = { state: 'none' };
    }

    /**
     * Replace the search term. Clears the selection.
     */
    setSearch(search: string): void {
        this.search = search;
        this.selection = { state: 'none' };
    }

    /**
     * Select a position of the current reduced set, replacing any prior selection.
     *
     * @throws SelectionError when the index is out of range; the prior selection is kept
     */
    select(index: number): void {
        selectEntry(this.reduced(), index);
        this.selection = { state: 'selected', index };
    }

    clearSelection(): void {
        this.selection = { state: 'none' };
    }

    getSelection(): SelectionState {
        return this.selection;
    }

    getCatalog(): Catalog {
        return this.catalog;
    }

    getCriteria(): FilterCriteria {
        return criteriaForTier(this.tier.key, this.search);
    }

    /**
     * Entries remaining under the current filters.
     */
    reduced(): Catalog {
        return filterEntries(this.catalog, this.getCriteria());
    }

    /**
     * Compute the full page state.
     */
    view(): PageView {
        const reduced = this.reduced();
        const selectedIndex = this.selection.state === 'selected' ? this.selection.index : null;

        return {
            tier: this.tier,
            search: this.search,
            list: buildSelectionList(reduced),
            selectedIndex,
            details: selectedIndex === null ? null : selectEntry(reduced, selectedIndex),
            statistics: computeStatistics(this.catalog, reduced),
        };
    }
}
