/**
 * @file formatters.ts
 * @module presenter/formatters
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Terminal output formatters for lists, details, statistics and full pages.
 */

import type { Catalog, FilterCriteria, ImportanceTier } from '../catalog/types.js';
import {
    buildSelectionList,
    NO_MATCHES_MESSAGE,
    type CatalogStatistics,
    type EntryDetails,
    type PageView,
    type SelectionList,
} from './presenter.js';

/**
 * Output format type.
 */
export type OutputFormat = 'simple' | 'table' | 'json';

/**
 * Narrow an arbitrary string to an output format.
 */
export function isOutputFormat(value: string): value is OutputFormat {
    return value === 'simple' || value === 'table' || value === 'json';
}

/**
 * Truncate text to a width, marking the cut with an ellipsis.
 */
function truncate(text: string, width: number): string {
    return text.length > width ? text.substring(0, width - 3) + '...' : text;
}

/**
 * Format the selectable list of a reduced set.
 *
 * @param reduced - Filtered entries
 * @param format - Output format
 * @param criteria - Criteria that produced the list (echoed in JSON output)
 * @returns Formatted string output
 */
export function formatSelectionList(
    reduced: Catalog,
    format: OutputFormat,
    criteria: FilterCriteria
): string {
    switch (format) {
        case 'json':
            return formatListJson(reduced, criteria);
        case 'table':
            return formatListTable(reduced);
        case 'simple':
        default:
            return formatListSimple(buildSelectionList(reduced));
    }
}

/**
 * Format the list as one label per line, prefixed with its index.
 */
function formatListSimple(list: SelectionList, selectedIndex: number | null = null): string {
    if (list.status === 'empty') {
        return list.message;
    }

    return list.options
        .map(option => {
            const marker = option.index === selectedIndex ? '>' : ' ';
            return `${marker} [${option.index}] ${option.label}`;
        })
        .join('\n');
}

/**
 * Format the list as a table.
 */
function formatListTable(reduced: Catalog): string {
    if (reduced.length === 0) {
        return NO_MATCHES_MESSAGE;
    }

    // Calculate column widths
    const indexWidth = Math.max(5, String(reduced.length - 1).length);
    const rankWidth = 4;
    const nameWidth = Math.min(30, Math.max(7, ...reduced.map(e => e.name.length)));
    const descriptionWidth = Math.min(60, Math.max(9, ...reduced.map(e => e.description.length)));

    const header = [
        'Index'.padEnd(indexWidth),
        'Rank'.padEnd(rankWidth),
        'Command'.padEnd(nameWidth),
        'Description'.padEnd(descriptionWidth),
    ].join(' | ');

    const separator = [
        '-'.repeat(indexWidth),
        '-'.repeat(rankWidth),
        '-'.repeat(nameWidth),
        '-'.repeat(descriptionWidth),
    ].join('-+-');

    const rows = reduced.map((entry, index) =>
        [
            String(index).padEnd(indexWidth),
            String(entry.rank).padEnd(rankWidth),
            truncate(entry.name, nameWidth).padEnd(nameWidth),
            truncate(entry.description, descriptionWidth).padEnd(descriptionWidth),
        ].join(' | ')
    );

    return [header, separator, ...rows].join('\n');
}

/**
 * Format the list as JSON.
 */
function formatListJson(reduced: Catalog, criteria: FilterCriteria): string {
    const output = {
        criteria,
        total: reduced.length,
        results: reduced.map((entry, index) => ({
            index,
            rank: entry.rank,
            name: entry.name,
            description: entry.description,
            usageExamples: entry.usageExamples,
        })),
    };

    return JSON.stringify(output, null, 2);
}

/**
 * Format the details of a selected entry.
 */
export function formatDetails(details: EntryDetails, format: OutputFormat): string {
    switch (format) {
        case 'json':
            return JSON.stringify(
                {
                    name: details.name,
                    description: details.description,
                    rank: details.rank,
                    tier: details.tier.key,
                    color: details.tier.color,
                    usageExamples: details.usageExamples,
                },
                null,
                2
            );
        case 'table': {
            const rows: Array<[string, string]> = [
                ['Comando', details.name],
                ['Importância', `#${details.rank} - ${details.tier.label}`],
                ['Descrição', details.description],
                ...details.usageExamples.map((example, i): [string, string] => [`Exemplo ${i + 1}`, example]),
            ];
            const width = Math.max(...rows.map(([field]) => field.length));
            return rows.map(([field, value]) => `${field.padEnd(width)} | ${value}`).join('\n');
        }
        case 'simple':
        default:
            return formatDetailsSimple(details);
    }
}

/**
 * Format details as a text block, one usage example per line.
 */
function formatDetailsSimple(details: EntryDetails): string {
    const lines = [
        details.name,
        `Importância: #${details.rank} - ${details.tier.label}`,
        '',
        'Descrição:',
        `  ${details.description}`,
        '',
        'Como usar:',
    ];

    if (details.usageExamples.length === 0) {
        lines.push('  (sem exemplos)');
    }
    for (const example of details.usageExamples) {
        lines.push(`  $ ${example}`);
    }

    return lines.join('\n');
}

/**
 * Format the statistics panel.
 */
export function formatStatistics(statistics: CatalogStatistics, format: OutputFormat): string {
    if (format === 'json') {
        return JSON.stringify(statistics, null, 2);
    }

    const { distribution } = statistics;
    return [
        'Estatísticas:',
        `  Total de Comandos: ${statistics.total}`,
        `  Comandos Filtrados: ${statistics.filtered}`,
        'Distribuição:',
        `  - Essenciais: ${distribution.essential}`,
        `  - Intermediários: ${distribution.intermediate}`,
        `  - Avançados: ${distribution.advanced}`,
    ].join('\n');
}

/**
 * Format the bucket list with the number of entries in each bucket.
 */
export function formatTierList(items: Array<{ tier: ImportanceTier; count: number }>): string {
    const keyWidth = Math.max(...items.map(item => item.tier.key.length));
    const lines = ['Níveis de Importância:'];
    for (const item of items) {
        lines.push(`  ${item.tier.key.padEnd(keyWidth)}  ${item.tier.label} (${item.count})`);
    }
    return lines.join('\n');
}

/**
 * Header lines of the browser page.
 */
export const PAGE_HEADER = ['=== GitApp ===', 'Referência de Comandos Git'];

/**
 * Shown instead of details while nothing is selected.
 */
export const WELCOME_MESSAGE = [
    'Bem-vindo ao GitApp!',
    'Selecione um comando na lista acima para ver detalhes e exemplos de uso.',
    'Dica: use "tier" e "search" para encontrar comandos.',
];

/**
 * Render a complete browser page as plain text.
 */
export function formatPage(view: PageView): string {
    const search = view.search.trim() ? `"${view.search.trim()}"` : '(nenhuma)';
    const sections: string[] = [
        PAGE_HEADER.join('\n'),
        `Nível de Importância: ${view.tier.label} | Busca: ${search}`,
    ];

    if (view.list.status === 'empty') {
        sections.push(view.list.message);
    } else {
        sections.push(`Selecione um Comando:\n${formatListSimple(view.list, view.selectedIndex)}`);
    }

    sections.push(view.details ? formatDetailsSimple(view.details) : WELCOME_MESSAGE.join('\n'));
    sections.push(formatStatistics(view.statistics, 'simple'));
    sections.push(`---\nGitApp: o seu app de comandos Git\n${view.statistics.total} comandos Git disponíveis`);

    return sections.join('\n\n');
}
