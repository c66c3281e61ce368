/**
 * @file tiers.ts
 * @module catalog/tiers
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Importance buckets: dropdown ranges, badge tiers and lookup helpers.
 */

import { OptionError } from '../shared/errors.js';
import type { ImportanceTier } from './types.js';

/**
 * Highest rank covered by the fixed buckets.
 */
export const MAX_RANK = 157;

/**
 * Buckets in dropdown order. The last one covers every rank.
 */
export const IMPORTANCE_TIERS: readonly ImportanceTier[] = [
    { key: 'essenciais', label: 'Essenciais (1-10)', minRank: 1, maxRank: 10, color: '#E74C3C' },
    { key: 'intermediarios', label: 'Intermediários (11-30)', minRank: 11, maxRank: 30, color: '#F39C12' },
    { key: 'avancados', label: 'Avançados (31-60)', minRank: 31, maxRank: 60, color: '#3498DB' },
    { key: 'tecnicos', label: 'Técnicos (61-100)', minRank: 61, maxRank: 100, color: '#27AE60' },
    { key: 'especificos', label: 'Específicos (101-157)', minRank: 101, maxRank: MAX_RANK, color: '#8E44AD' },
    { key: 'todos', label: 'Todos os comandos', minRank: 1, maxRank: MAX_RANK },
];

/**
 * Look up a bucket by key or by its exact label.
 *
 * @throws OptionError when nothing matches
 */
export function getTier(keyOrLabel: string): ImportanceTier {
    const wanted = keyOrLabel.trim().toLowerCase();
    const tier = IMPORTANCE_TIERS.find(
        t => t.key === wanted || t.label.toLowerCase() === wanted
    );
    if (!tier) {
        const keys = IMPORTANCE_TIERS.map(t => t.key).join(', ');
        throw new OptionError(`Unknown tier "${keyOrLabel}". Expected one of: ${keys}`);
    }
    return tier;
}

/**
 * Badge tier of a rank, by upper bound. Ranks past the last bucket
 * still count as Específicos.
 */
export function tierForRank(rank: number): ImportanceTier {
    const badges = IMPORTANCE_TIERS.filter(t => t.color !== undefined);
    return badges.find(t => rank <= t.maxRank) ?? badges[badges.length - 1];
}
