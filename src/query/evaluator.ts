/**
 * Basic graph pattern evaluation.
 *
 * Patterns are joined left to right: every row produced so far is extended
 * by the triples matching the next pattern after substituting the row's
 * bindings. Rows whose bindings disagree with a matched triple are dropped.
 */

import type { Binding, GroundTerm, Term, Triple, TriplePattern, TripleTemplate } from '../types/terms.js';
import { Graph } from '../graph/graph.js';
import { termEquals } from '../graph/term.js';

/**
 * Replace a variable by its bound term, if bound
 */
export function substitute(term: Term, binding: Binding): Term {
    if (term.kind === 'variable') {
        return binding.get(term.name) ?? term;
    }
    return term;
}

function fixed(term: Term): GroundTerm | undefined {
    return term.kind === 'variable' ? undefined : term;
}

/**
 * Extend a row with the bindings a matched triple gives the pattern's variables.
 * Returns undefined when a variable would be bound to two different terms.
 */
function extend(binding: Binding, pattern: TriplePattern, triple: Triple): Binding | undefined {
    const next = new Map(binding);
    const positions: Array<[Term, GroundTerm]> = [
        [pattern.subject, triple.subject],
        [pattern.predicate, triple.predicate],
        [pattern.object, triple.object],
    ];

    for (const [term, value] of positions) {
        if (term.kind !== 'variable') continue;
        const bound = next.get(term.name);
        if (bound === undefined) {
            next.set(term.name, value);
        } else if (!termEquals(bound, value)) {
            return undefined;
        }
    }
    return next;
}

function matchPattern(graph: Graph, pattern: TriplePattern, binding: Binding): Binding[] {
    const s = substitute(pattern.subject, binding);
    const p = substitute(pattern.predicate, binding);
    const o = substitute(pattern.object, binding);

    const rows: Binding[] = [];
    for (const triple of graph.match(fixed(s), fixed(p), fixed(o))) {
        const row = extend(binding, { subject: s, predicate: p, object: o }, triple);
        if (row) rows.push(row);
    }
    return rows;
}

/**
 * Evaluate an ordered list of triple patterns against a graph.
 * An empty pattern list yields a single empty row.
 */
export function evaluate(graph: Graph, patterns: readonly TriplePattern[]): Binding[] {
    let rows: Binding[] = [new Map()];
    for (const pattern of patterns) {
        const next: Binding[] = [];
        for (const row of rows) {
            next.push(...matchPattern(graph, pattern, row));
        }
        rows = next;
        if (rows.length === 0) break;
    }
    return rows;
}

/**
 * Instantiate a template with a row. Returns undefined if any variable is unbound.
 */
export function instantiate(template: TripleTemplate, binding: Binding): Triple | undefined {
    const s = fixed(substitute(template.subject, binding));
    const p = fixed(substitute(template.predicate, binding));
    const o = fixed(substitute(template.object, binding));
    if (!s || !p || !o) {
        return undefined;
    }
    return { subject: s, predicate: p, object: o };
}
