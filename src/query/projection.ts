import type { Binding, TriplePattern, TripleTemplate } from '../types/terms.js';
import type { SelectResult, SolutionModifiers } from '../types/query.js';
import { DEFAULTS } from '../types/options.js';
import { Graph } from '../graph/graph.js';
import { renderTerm } from '../graph/term.js';
import { instantiate } from './evaluator.js';

/**
 * Tabulate rows for the requested variables, in the requested order.
 * Unbound cells carry the 'N/A' sentinel.
 */
export function projectSelect(
    variables: readonly string[],
    rows: readonly Binding[],
    modifiers: SolutionModifiers = {}
): SelectResult {
    let table = rows.map(row => variables.map(name => {
        const term = row.get(name);
        return term ? renderTerm(term) : DEFAULTS.notApplicable;
    }));

    if (modifiers.distinct) {
        const seen = new Set<string>();
        table = table.filter(cells => {
            const key = JSON.stringify(cells);
            if (seen.has(key)) return false;
            seen.add(key);
            return true;
        });
    }

    const offset = modifiers.offset ?? 0;
    const end = modifiers.limit !== undefined ? offset + modifiers.limit : undefined;
    table = table.slice(offset, end);

    return { form: 'select', headers: [...variables], rows: table };
}

export function projectAsk(rows: readonly Binding[]): boolean {
    return rows.length > 0;
}

/**
 * Instantiate every template for every row; templates with unbound variables are skipped.
 */
export function projectConstruct(templates: readonly TripleTemplate[], rows: readonly Binding[]): Graph {
    const graph = new Graph();
    for (const row of rows) {
        for (const template of templates) {
            const t = instantiate(template, row);
            if (t) graph.add(t);
        }
    }
    return graph;
}

/**
 * DESCRIBE returns the triples that satisfied the pattern list, i.e. CONSTRUCT
 * with the pattern list as its own template.
 */
export function projectDescribe(patterns: readonly TriplePattern[], rows: readonly Binding[]): Graph {
    return projectConstruct(patterns, rows);
}
