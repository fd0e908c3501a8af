import type { QueryResponse } from '../types/index.js';
import type { ServerContainer } from '../container.js';
import { parseGraph } from '../io/turtle.js';
import { parseRuleMode } from '../rules/engine.js';
import { buildQueryResponse } from '../utils/response.js';
import { parseArgs, runQueryArgsSchema } from './schemas.js';

/**
 * Apply the requested rule tier to the data, then answer the query
 */
export async function runQueryHandler(args: unknown, container: ServerContainer): Promise<QueryResponse> {
    const { data, data_format, query, form, rule_mode, rules, verbosity } = parseArgs(runQueryArgsSchema, args);
    const start = Date.now();

    const graph = parseGraph(data, { format: data_format });
    const application = container.reasoner.applyRules(graph, parseRuleMode(rule_mode, rules));
    const result = container.reasoner.runQuery(application.graph, query, form);

    return buildQueryResponse(result, application, {
        inputTriples: graph.size,
        derivedTriples: application.derived,
        timeMs: Date.now() - start,
    }, verbosity);
}
