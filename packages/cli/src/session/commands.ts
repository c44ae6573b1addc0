/**
 * Interactive session command parsing.
 *
 * Commands are pure data; applying a facet or search command yields new
 * criteria and never mutates the previous ones.
 */

import { COLUMNS, type FilterCriteria } from '@award-explorer/shared';

export type FacetKey = 'pools' | 'domains' | 'naics' | 'sins';

export const FACET_ALIASES: Readonly<Record<string, FacetKey>> = {
    pool: 'pools',
    domain: 'domains',
    naics: 'naics',
    sin: 'sins',
};

/**
 * Column a facet filters on.
 */
export const FACET_COLUMNS: Readonly<Record<FacetKey, string>> = {
    pools: COLUMNS.POOL,
    domains: COLUMNS.DOMAIN,
    naics: COLUMNS.NAICS,
    sins: COLUMNS.SIN,
};

export type SessionCommand =
    | { kind: 'search'; text: string }
    | { kind: 'facet'; facet: FacetKey; values: string[] }
    | { kind: 'clear'; facet?: FacetKey | 'search' }
    | { kind: 'show' }
    | { kind: 'charts' }
    | { kind: 'options'; column: string }
    | { kind: 'export'; path: string }
    | { kind: 'reload' }
    | { kind: 'help' }
    | { kind: 'quit' }
    | { kind: 'unknown'; input: string; reason: string };

export const HELP_LINES = [
    'search <text>                 free-text search (empty clears)',
    'pool|domain|naics|sin <v, v>  select facet values (none clears)',
    'clear [facet|search]          clear one selection or all',
    'show                          metrics and table preview',
    'charts                        vendors per pool, top NAICS, domains',
    'options <field>               list the values a field takes',
    'export <path>                 write .csv or .xlsx',
    'reload                        re-read the workbook file',
    'help                          this list',
    'quit                          leave the session',
];

/**
 * Parse one input line. Blank lines yield null.
 */
export function parseCommand(line: string): SessionCommand | null {
    const trimmed = line.trim();
    if (trimmed === '') return null;

    const space = trimmed.search(/\s/);
    const word = (space === -1 ? trimmed : trimmed.slice(0, space)).toLowerCase();
    const rest = space === -1 ? '' : trimmed.slice(space + 1).trim();

    const facet = FACET_ALIASES[word];
    if (facet) {
        return { kind: 'facet', facet, values: splitValues(rest) };
    }

    switch (word) {
        case 'search':
            return { kind: 'search', text: rest };
        case 'clear': {
            if (rest === '') return { kind: 'clear' };
            const target = rest.toLowerCase();
            if (target === 'search') return { kind: 'clear', facet: 'search' };
            const cleared = FACET_ALIASES[target];
            return cleared
                ? { kind: 'clear', facet: cleared }
                : { kind: 'unknown', input: trimmed, reason: `Unknown facet "${rest}"` };
        }
        case 'show':
            return { kind: 'show' };
        case 'charts':
            return { kind: 'charts' };
        case 'options': {
            if (rest === '') return { kind: 'unknown', input: trimmed, reason: 'options needs a field name' };
            const aliased = FACET_ALIASES[rest.toLowerCase()];
            return { kind: 'options', column: aliased ? FACET_COLUMNS[aliased] : rest };
        }
        case 'export':
            return rest === ''
                ? { kind: 'unknown', input: trimmed, reason: 'export needs a path' }
                : { kind: 'export', path: rest };
        case 'reload':
            return { kind: 'reload' };
        case 'help':
        case '?':
            return { kind: 'help' };
        case 'quit':
        case 'exit':
            return { kind: 'quit' };
        default:
            return { kind: 'unknown', input: trimmed, reason: `Unknown command "${word}"` };
    }
}

/**
 * Apply a search, facet or clear command. Other commands leave criteria as they are.
 */
export function applyCommand(criteria: FilterCriteria, command: SessionCommand): FilterCriteria {
    switch (command.kind) {
        case 'search':
            return { ...criteria, search: command.text };
        case 'facet':
            return withFacet(criteria, command.facet, command.values);
        case 'clear':
            if (command.facet === undefined) {
                return { search: '', pools: [], domains: [], naics: [], sins: [] };
            }
            if (command.facet === 'search') {
                return { ...criteria, search: '' };
            }
            return withFacet(criteria, command.facet, []);
        default:
            return criteria;
    }
}

/**
 * One-line description of the active selections.
 */
export function describeCriteria(criteria: FilterCriteria): string {
    const parts: string[] = [];
    if (criteria.search.trim() !== '') parts.push(`search="${criteria.search.trim()}"`);
    for (const [alias, key] of Object.entries(FACET_ALIASES)) {
        const values = criteria[key];
        if (values.length > 0) parts.push(`${alias}=${values.join(', ')}`);
    }
    return parts.length === 0 ? 'no filters' : parts.join('; ');
}

function withFacet(criteria: FilterCriteria, facet: FacetKey, values: string[]): FilterCriteria {
    const next = { ...criteria };
    next[facet] = values;
    return next;
}

function splitValues(text: string): string[] {
    const values: string[] = [];
    for (const part of text.split(',')) {
        const value = part.trim();
        if (value !== '' && !values.includes(value)) values.push(value);
    }
    return values;
}
