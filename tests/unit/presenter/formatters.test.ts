/**
 * @file formatters.test.ts
 * @module tests/unit/presenter/formatters
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Unit tests for terminal output formatting.
 */

import {
  formatDetails,
  formatSelectionList,
  formatStatistics,
  formatTierList,
  isOutputFormat,
} from '../../../src/presenter/formatters.js';
import { countPerTier, NO_MATCHES_MESSAGE, selectEntry } from '../../../src/presenter/presenter.js';
import { entry, exampleCatalog } from '../../setup.js';

const ALL = { minRank: 1, maxRank: 157, search: '' };

describe('formatSelectionList', () => {
  it('should format simple output with one indexed label per line', () => {
    expect(formatSelectionList(exampleCatalog(), 'simple', ALL)).toBe(
      [
        '  [0] #001 - git init - Create an empty repository...',
        '  [1] #005 - git commit - Record changes to the repository...',
        '  [2] #050 - git rebase - Reapply commits on top of another base tip...',
      ].join('\n')
    );
  });

  it('should format a table with index, rank, command and description columns', () => {
    const lines = formatSelectionList([entry(1, 'git init', 'Create an empty repository')], 'table', ALL).split('\n');

    expect(lines).toHaveLength(3);
    expect(lines[0].trimEnd()).toBe('Index | Rank | Command  | Description');
    expect(lines[1]).toBe(`${'-'.repeat(5)}-+-${'-'.repeat(4)}-+-${'-'.repeat(8)}-+-${'-'.repeat(26)}`);
    expect(lines[2]).toBe('0     | 1    | git init | Create an empty repository');
  });

  it('should format JSON with the criteria and the results', () => {
    const output = JSON.parse(formatSelectionList(exampleCatalog().slice(0, 1), 'json', ALL));

    expect(output).toEqual({
      criteria: ALL,
      total: 1,
      results: [
        {
          index: 0,
          rank: 1,
          name: 'git init',
          description: 'Create an empty repository',
          usageExamples: ['git init', 'git init --bare'],
        },
      ],
    });
  });

  it('should show the no-matches notice for an empty list', () => {
    expect(formatSelectionList([], 'simple', ALL)).toBe(NO_MATCHES_MESSAGE);
    expect(formatSelectionList([], 'table', ALL)).toBe(NO_MATCHES_MESSAGE);
  });

  it('should return an empty result array in JSON for an empty list', () => {
    const output = JSON.parse(formatSelectionList([], 'json', ALL));

    expect(output.total).toBe(0);
    expect(output.results).toEqual([]);
  });
});

describe('formatDetails', () => {
  const details = selectEntry(exampleCatalog(), 1);

  it('should render every usage example on its own line', () => {
    expect(formatDetails(details, 'simple')).toBe(
      [
        'git commit',
        'Importância: #5 - Essenciais (1-10)',
        '',
        'Descrição:',
        '  Record changes to the repository',
        '',
        'Como usar:',
        '  $ git commit -m "msg"',
      ].join('\n')
    );
  });

  it('should mark entries without usage examples', () => {
    const bare = selectEntry([entry(40, 'git gc', 'Cleanup')], 0);

    expect(formatDetails(bare, 'simple').split('\n').slice(-2)).toEqual(['Como usar:', '  (sem exemplos)']);
  });

  it('should render field/value rows in table format', () => {
    expect(formatDetails(details, 'table')).toBe(
      [
        'Comando     | git commit',
        'Importância | #5 - Essenciais (1-10)',
        'Descrição   | Record changes to the repository',
        'Exemplo 1   | git commit -m "msg"',
      ].join('\n')
    );
  });

  it('should include the tier key and badge colour in JSON', () => {
    expect(JSON.parse(formatDetails(details, 'json'))).toEqual({
      name: 'git commit',
      description: 'Record changes to the repository',
      rank: 5,
      tier: 'essenciais',
      color: '#E74C3C',
      usageExamples: ['git commit -m "msg"'],
    });
  });
});

describe('formatStatistics', () => {
  const statistics = { total: 157, filtered: 4, distribution: { essential: 10, intermediate: 20, advanced: 127 } };

  it('should list totals and the distribution', () => {
    expect(formatStatistics(statistics, 'simple')).toBe(
      [
        'Estatísticas:',
        '  Total de Comandos: 157',
        '  Comandos Filtrados: 4',
        'Distribuição:',
        '  - Essenciais: 10',
        '  - Intermediários: 20',
        '  - Avançados: 127',
      ].join('\n')
    );
  });

  it('should serialize the statistics object in JSON', () => {
    expect(JSON.parse(formatStatistics(statistics, 'json'))).toEqual(statistics);
  });
});

describe('formatTierList', () => {
  it('should align keys and show counts', () => {
    const lines = formatTierList(countPerTier(exampleCatalog())).split('\n');

    expect(lines[0]).toBe('Níveis de Importância:');
    expect(lines[1]).toBe('  essenciais      Essenciais (1-10) (2)');
    expect(lines[6]).toBe('  todos           Todos os comandos (3)');
  });
});

describe('isOutputFormat', () => {
  it('should accept the three supported formats only', () => {
    expect(['simple', 'table', 'json', 'xml'].map(isOutputFormat)).toEqual([true, true, true, false]);
  });
});
