/**
 * @file cli.ts
 * @module cli
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Commander program: list, show, stats, tiers and the interactive browser.
 */

import { Command } from 'commander';

import { DEFAULT_DATA_FILE, DEFAULT_FORMAT, DEFAULT_TIER, resolveDataPath } from './config.js';
import { filterEntries, isUnfiltered } from './catalog/filter.js';
import { loadCatalog } from './catalog/loader.js';
import { getTier } from './catalog/tiers.js';
import type { Catalog, FilterCriteria } from './catalog/types.js';
import {
    formatDetails,
    formatSelectionList,
    formatStatistics,
    formatTierList,
    isOutputFormat,
    type OutputFormat,
} from './presenter/formatters.js';
import { computeStatistics, countPerTier, selectEntry } from './presenter/presenter.js';
import { BrowserSession } from './session/browser-session.js';
import { runInteractive } from './session/interactive.js';
import { LoadError, OptionError, SelectionError } from './shared/errors.js';
import { parseNonNegativeInteger } from './shared/options.js';

/**
 * Options available to every subcommand.
 */
type GlobalOptions = {
    /** Dataset path, relative to the working directory */
    file: string;
    /** Enable verbose output */
    verbose?: boolean;
};

/**
 * Options of the interactive browser.
 */
type SessionOptions = GlobalOptions & {
    tier: string;
    search: string;
};

/**
 * Filter options shared by list, show and stats.
 */
type FilterOptions = SessionOptions & {
    minRank?: string;
    maxRank?: string;
    format: string;
};

/**
 * Load the dataset named by the global options.
 *
 * @throws LoadError when the dataset cannot be loaded
 */
function loadFromOptions(options: GlobalOptions): Catalog {
    const dataPath = resolveDataPath(options.file);
    if (options.verbose) {
        console.error(`Loading commands from ${dataPath}`);
    }

    const catalog = loadCatalog(dataPath);
    if (options.verbose) {
        console.error(`Loaded ${catalog.length} commands`);
    }
    return catalog;
}

/**
 * Build filter criteria from the tier and the optional explicit rank bounds.
 */
function buildCriteria(options: FilterOptions): FilterCriteria {
    const tier = getTier(options.tier);
    const criteria: FilterCriteria = {
        minRank: options.minRank !== undefined ? parseNonNegativeInteger(options.minRank, 'Minimum rank') : tier.minRank,
        maxRank: options.maxRank !== undefined ? parseNonNegativeInteger(options.maxRank, 'Maximum rank') : tier.maxRank,
        search: options.search,
    };

    if (options.verbose) {
        console.error(`Filter: ranks ${criteria.minRank}-${criteria.maxRank}, search "${criteria.search}"`);
    }
    return criteria;
}

function parseFormat(value: string): OutputFormat {
    if (!isOutputFormat(value)) {
        throw new OptionError(`Unknown format "${value}". Expected one of: simple, table, json`);
    }
    return value;
}

/**
 * Attach the tier and search options, which the interactive browser can also change.
 */
function withSessionOptions(command: Command): Command {
    return command
        .option('-t, --tier <tier>', 'Importance tier (essenciais, intermediarios, avancados, tecnicos, especificos, todos)', DEFAULT_TIER)
        .option('-s, --search <term>', 'Case-insensitive text to find in command name or description', '');
}

/**
 * Attach the filter and output options to a one-shot subcommand.
 */
function withFilterOptions(command: Command): Command {
    return withSessionOptions(command)
        .option('--min-rank <n>', 'Lowest rank to include (overrides the tier range)')
        .option('--max-rank <n>', 'Highest rank to include (overrides the tier range)')
        .option('--format <fmt>', 'Output format: simple, table, json', DEFAULT_FORMAT);
}

/**
 * List the commands matching the filters.
 */
function listCommands(_options: FilterOptions, command: Command): void {
    const options = command.optsWithGlobals<FilterOptions>();
    const format = parseFormat(options.format);
    const catalog = loadFromOptions(options);
    const criteria = buildCriteria(options);
    const reduced = filterEntries(catalog, criteria);

    if (options.verbose) {
        console.error(
            isUnfiltered(catalog, criteria)
                ? 'No filters applied'
                : `${reduced.length} of ${catalog.length} commands match`
        );
    }
    console.log(formatSelectionList(reduced, format, criteria));
}

/**
 * Show the details of one command of the filtered list.
 *
 * @param index - Zero-based position in the filtered list
 */
function showCommand(index: string, _options: FilterOptions, command: Command): void {
    const options = command.optsWithGlobals<FilterOptions>();
    const format = parseFormat(options.format);
    const position = parseNonNegativeInteger(index, 'Index');
    const catalog = loadFromOptions(options);
    const reduced = filterEntries(catalog, buildCriteria(options));

    console.log(formatDetails(selectEntry(reduced, position), format));
}

/**
 * Print totals and the importance distribution.
 */
function showStatistics(_options: FilterOptions, command: Command): void {
    const options = command.optsWithGlobals<FilterOptions>();
    const format = parseFormat(options.format);
    const catalog = loadFromOptions(options);
    const reduced = filterEntries(catalog, buildCriteria(options));

    console.log(formatStatistics(computeStatistics(catalog, reduced), format));
}

/**
 * List the importance tiers with the number of commands in each.
 */
function listTiers(_options: GlobalOptions, command: Command): void {
    const options = command.optsWithGlobals<GlobalOptions>();
    const catalog = loadFromOptions(options);

    console.log(formatTierList(countPerTier(catalog)));
}

/**
 * Start the interactive browser.
 */
async function browse(_options: SessionOptions, command: Command): Promise<void> {
    const options = command.optsWithGlobals<SessionOptions>();
    const catalog = loadFromOptions(options);
    const session = new BrowserSession(catalog, options.tier);
    if (options.search) {
        session.setSearch(options.search);
    }

    await runInteractive(session);
}

/**
 * Create the commander program with all subcommands.
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name('gitref')
        .description('Browse a reference of Git commands by importance and keyword')
        .version('1.0.0')
        .option('-f, --file <path>', 'Path to the commands CSV file', DEFAULT_DATA_FILE)
        .option('-v, --verbose', 'Enable verbose output');

    withFilterOptions(
        program.command('list').description('List the commands matching the filters')
    ).action(listCommands);

    withFilterOptions(
        program
            .command('show')
            .description('Show the details of one command of the filtered list')
            .argument('<index>', 'Position in the filtered list (as printed by list)')
    ).action(showCommand);

    withFilterOptions(
        program.command('stats').description('Show command totals and importance distribution')
    ).action(showStatistics);

    program
        .command('tiers')
        .description('List the importance tiers with their command counts')
        .action(listTiers);

    withSessionOptions(
        program.command('browse', { isDefault: true }).description('Browse the commands interactively')
    ).action(browse);

    return program;
}

/**
 * Turn an error into the message shown to the user.
 */
export function describeError(error: unknown): string {
    if (error instanceof LoadError) {
        switch (error.kind) {
            case 'FileNotFound':
                return `Erro: Arquivo '${error.source}' não encontrado.`;
            case 'SchemaInvalid':
                return `Erro: Estrutura do CSV inválida. ${error.message}`;
            case 'ParseError':
                return `Erro ao carregar dados: ${error.message}`;
        }
    }
    if (error instanceof OptionError || error instanceof SelectionError) {
        return `Error: ${error.message}`;
    }
    return `Error: ${error instanceof Error ? error.message : String(error)}`;
}
