/**
 * @file tiers.test.ts
 * @module tests/unit/catalog/tiers
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Unit tests for importance bucket lookup.
 */

import { getTier, IMPORTANCE_TIERS, tierForRank } from '../../../src/catalog/tiers.js';
import { OptionError } from '../../../src/shared/errors.js';

describe('IMPORTANCE_TIERS', () => {
  it('should list the buckets in dropdown order', () => {
    expect(IMPORTANCE_TIERS.map(t => t.key)).toEqual([
      'essenciais',
      'intermediarios',
      'avancados',
      'tecnicos',
      'especificos',
      'todos',
    ]);
  });

  it('should cover ranks 1-157 without gaps in the first five buckets', () => {
    const bands = IMPORTANCE_TIERS.slice(0, 5);
    for (let i = 1; i < bands.length; i++) {
      expect(bands[i].minRank).toBe(bands[i - 1].maxRank + 1);
    }
    expect(bands[0].minRank).toBe(1);
    expect(bands[4].maxRank).toBe(157);
  });
});

describe('getTier', () => {
  it('should find a tier by key', () => {
    expect(getTier('avancados').label).toBe('Avançados (31-60)');
  });

  it('should find a tier by label, ignoring case', () => {
    expect(getTier('todos os comandos').key).toBe('todos');
  });

  it('should throw OptionError for an unknown tier', () => {
    expect(() => getTier('basicos')).toThrow(OptionError);
    expect(() => getTier('basicos')).toThrow(
      'Unknown tier "basicos". Expected one of: essenciais, intermediarios, avancados, tecnicos, especificos, todos'
    );
  });
});

describe('tierForRank', () => {
  it.each([
    { rank: 1, key: 'essenciais', color: '#E74C3C' },
    { rank: 10, key: 'essenciais', color: '#E74C3C' },
    { rank: 11, key: 'intermediarios', color: '#F39C12' },
    { rank: 30, key: 'intermediarios', color: '#F39C12' },
    { rank: 60, key: 'avancados', color: '#3498DB' },
    { rank: 100, key: 'tecnicos', color: '#27AE60' },
    { rank: 101, key: 'especificos', color: '#8E44AD' },
    { rank: 500, key: 'especificos', color: '#8E44AD' },
  ])('should give rank $rank the $key badge', ({ rank, key, color }) => {
    const tier = tierForRank(rank);

    expect(tier.key).toBe(key);
    expect(tier.color).toBe(color);
  });
});
