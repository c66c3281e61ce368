/**
 * @file commands.ts
 * @module session/commands
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Line commands understood by the interactive browser.
 */

import { formatPage, formatStatistics, formatTierList } from '../presenter/formatters.js';
import { countPerTier } from '../presenter/presenter.js';
import { OptionError, SelectionError } from '../shared/errors.js';
import { parseNonNegativeInteger } from '../shared/options.js';
import type { BrowserSession } from './browser-session.js';

/**
 * Outcome of one line of input.
 */
export interface CommandResult {
    /** Text to print */
    output: string;
    /** True when the session should end */
    quit: boolean;
}

/**
 * Help text of the interactive session.
 */
export const SESSION_HELP = `Comandos:
  tier <nível>      Filtrar por nível (essenciais, intermediarios, avancados, tecnicos, especificos, todos)
  search [texto]    Buscar no nome ou na descrição (sem texto limpa a busca)
  select <n>        Mostrar os detalhes do comando n da lista
  clear             Limpar a seleção
  list              Mostrar a página atual
  stats             Mostrar as estatísticas
  tiers             Listar os níveis com o número de comandos
  help              Mostrar esta ajuda
  quit              Sair`;

function page(session: BrowserSession): CommandResult {
    return { output: formatPage(session.view()), quit: false };
}

/**
 * Execute one line of input against a session.
 *
 * Invalid input is reported in the output and leaves the session as it was.
 *
 * @param session - Session to act on
 * @param line - Raw input line, e.g. `search commit`
 */
export function executeCommand(session: BrowserSession, line: string): CommandResult {
    const trimmed = line.trim();
    const spaceIndex = trimmed.indexOf(' ');
    const command = (spaceIndex === -1 ? trimmed : trimmed.substring(0, spaceIndex)).toLowerCase();
    const argument = spaceIndex === -1 ? '' : trimmed.substring(spaceIndex + 1).trim();

    try {
        switch (command) {
            case '':
            case 'list':
                return page(session);
            case 'tier':
                if (!argument) {
                    return { output: 'Uso: tier <nível>', quit: false };
                }
                session.setTier(argument);
                return page(session);
            case 'search':
                session.setSearch(argument);
                return page(session);
            case 'select':
                session.select(parseNonNegativeInteger(argument, 'Index'));
                return page(session);
            case 'clear':
                session.clearSelection();
                return page(session);
            case 'stats': {
                const view = session.view();
                return { output: formatStatistics(view.statistics, 'simple'), quit: false };
            }
            case 'tiers':
                return { output: formatTierList(countPerTier(session.getCatalog())), quit: false };
            case 'help':
                return { output: SESSION_HELP, quit: false };
            case 'quit':
            case 'exit':
                return { output: '', quit: true };
            default:
                return { output: `Comando desconhecido: ${command}. Digite "help" para ajuda.`, quit: false };
        }
    } catch (error) {
        if (error instanceof OptionError || error instanceof SelectionError) {
            return { output: `Error: ${error.message}`, quit: false };
        }
        throw error;
    }
}
