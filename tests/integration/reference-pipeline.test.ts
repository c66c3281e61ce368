/**
 * @file reference-pipeline.test.ts
 * @module tests/integration/reference-pipeline
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Load, filter and present the bundled command dataset end to end.
 */

import { filterEntries } from '../../src/catalog/filter.js';
import { loadCatalog } from '../../src/catalog/loader.js';
import { IMPORTANCE_TIERS } from '../../src/catalog/tiers.js';
import { computeStatistics, countPerTier, selectEntry } from '../../src/presenter/presenter.js';
import { BrowserSession } from '../../src/session/browser-session.js';
import { executeCommand } from '../../src/session/commands.js';
import { BUNDLED_CSV_PATH } from '../setup.js';

describe('Reference Pipeline Integration', () => {
  const catalog = loadCatalog(BUNDLED_CSV_PATH);

  it('should load all 157 commands', () => {
    expect(catalog).toHaveLength(157);
  });

  it('should order commands by non-decreasing rank', () => {
    for (let i = 1; i < catalog.length; i++) {
      expect(catalog[i].rank).toBeGreaterThanOrEqual(catalog[i - 1].rank);
    }
  });

  it('should return the full dataset for ranks 1-157 without search', () => {
    expect(filterEntries(catalog, { minRank: 1, maxRank: 157, search: '' })).toEqual(catalog);
  });

  it('should return exactly the commands mentioning "commit" in name or description', () => {
    const result = filterEntries(catalog, { minRank: 1, maxRank: 157, search: 'commit' });
    const mentions = (name: string, description: string) =>
      name.toLowerCase().includes('commit') || description.toLowerCase().includes('commit');

    expect(result).toHaveLength(47);
    expect(result.every(e => mentions(e.name, e.description))).toBe(true);
    expect(catalog.filter(e => !result.includes(e)).some(e => mentions(e.name, e.description))).toBe(false);
  });

  it('should keep the essential commands in the first tier', () => {
    const result = filterEntries(catalog, { minRank: 1, maxRank: 10, search: '' });

    expect(result.map(e => e.name)).toEqual([
      'git init',
      'git clone',
      'git status',
      'git add',
      'git commit',
      'git push',
      'git pull',
      'git log',
      'git branch',
      'git checkout',
    ]);
  });

  it('should split usage examples into separate items', () => {
    const commit = selectEntry(catalog, 4);

    expect(commit.name).toBe('git commit');
    expect(commit.usageExamples).toEqual([
      'git commit -m "mensagem"',
      'git commit -am "mensagem"',
      'git commit --amend',
    ]);
  });

  it('should give distribution counts that add up to the total', () => {
    const statistics = computeStatistics(catalog, catalog);
    const { essential, intermediate, advanced } = statistics.distribution;

    expect(statistics.distribution).toEqual({ essential: 10, intermediate: 20, advanced: 127 });
    expect(essential + intermediate + advanced).toBe(statistics.total);
  });

  it('should count every bucket', () => {
    expect(countPerTier(catalog).map(item => item.count)).toEqual([10, 20, 30, 40, 57, 157]);
    expect(IMPORTANCE_TIERS).toHaveLength(6);
  });

  it('should browse from search to selection in a session', () => {
    const session = new BrowserSession(catalog, 'todos');
    executeCommand(session, 'search stash');
    const output = executeCommand(session, 'select 0').output.split('\n');

    expect(session.reduced()).toHaveLength(8);
    expect(output).toContain('> [0] #019 - git stash - Guarda temporariamente alterações não commitadas...');
    expect(output).toContain('  $ git stash pop');
  });
});
