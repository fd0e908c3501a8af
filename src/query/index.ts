/**
 * Query entry point: parse, evaluate, project.
 */

import type { ParsedQuery, QueryForm, QueryResult, SolutionModifiers } from '../types/query.js';
import type { Binding } from '../types/terms.js';
import { QUERY_FORMS } from '../types/query.js';
import { createQueryEvaluationError } from '../types/errors.js';
import { Graph } from '../graph/graph.js';
import { Namespaces } from '../graph/namespaces.js';
import { evaluate } from './evaluator.js';
import { parseQuery } from './parser.js';
import { projectAsk, projectConstruct, projectDescribe, projectSelect } from './projection.js';

export { QueryParser, parseQuery } from './parser.js';
export { evaluate, instantiate, substitute } from './evaluator.js';
export { projectAsk, projectConstruct, projectDescribe, projectSelect } from './projection.js';

/**
 * Normalize a requested form ('SELECT', 'ask', ...). Throws QUERY_EVALUATION_ERROR.
 */
export function toQueryForm(form: string): QueryForm {
    const normalized = form.trim().toLowerCase();
    const match = QUERY_FORMS.find(f => f === normalized);
    if (!match) {
        throw createQueryEvaluationError(`Unsupported query form '${form}'`, { form });
    }
    return match;
}

function sliceRows(rows: Binding[], modifiers: SolutionModifiers): Binding[] {
    const offset = modifiers.offset ?? 0;
    const end = modifiers.limit !== undefined ? offset + modifiers.limit : undefined;
    return rows.slice(offset, end);
}

/**
 * Evaluate an already parsed query
 */
export function executeQuery(graph: Graph, query: ParsedQuery): QueryResult {
    const rows = evaluate(graph, query.where);

    switch (query.form) {
        case 'select':
            return projectSelect(query.variables, rows, query.modifiers);
        case 'ask':
            return { form: 'ask', value: projectAsk(rows) };
        case 'construct':
            return { form: 'construct', graph: projectConstruct(query.template, sliceRows(rows, query.modifiers)) };
        case 'describe':
            return { form: 'describe', graph: projectDescribe(query.where, sliceRows(rows, query.modifiers)) };
    }
}

/**
 * Run query text against a graph.
 * When a form is requested it must match the form the text declares.
 */
export function runQuery(
    graph: Graph,
    queryText: string,
    form?: QueryForm | string,
    namespaces: Namespaces = new Namespaces()
): QueryResult {
    const requested = form !== undefined ? toQueryForm(form) : undefined;
    const query = parseQuery(queryText, namespaces);

    if (requested && requested !== query.form) {
        throw createQueryEvaluationError(
            `Requested form ${requested.toUpperCase()} does not match the query's ${query.form.toUpperCase()} form`,
            { requested, declared: query.form }
        );
    }
    return executeQuery(graph, query);
}
