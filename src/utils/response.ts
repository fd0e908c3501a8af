import type {
    DetailedQueryResponse,
    DetailedRulesResponse,
    MinimalQueryResponse,
    MinimalRulesResponse,
    QueryResponse,
    QueryResult,
    ResponseStatistics,
    RuleApplication,
    RulesResponse,
    SerializedQueryResult,
    StandardQueryResponse,
    StandardRulesResponse,
    Verbosity,
} from '../types/index.js';
import { serializeGraph } from '../io/turtle.js';

export function serializeQueryResult(result: QueryResult): SerializedQueryResult {
    switch (result.form) {
        case 'select':
            return { headers: result.headers, rows: result.rows };
        case 'ask':
            return result.value;
        case 'construct':
        case 'describe':
            return serializeGraph(result.graph);
    }
}

function summarize(result: QueryResult): string {
    switch (result.form) {
        case 'select':
            return `${result.rows.length} row(s)`;
        case 'ask':
            return result.value ? 'Pattern matched' : 'No match';
        case 'construct':
        case 'describe':
            return `${result.graph.size} triple(s)`;
    }
}

/**
 * Build response based on verbosity level
 */
export function buildQueryResponse(
    result: QueryResult,
    application: RuleApplication,
    statistics: ResponseStatistics,
    verbosity: Verbosity = 'standard'
): QueryResponse {
    const minimal: MinimalQueryResponse = {
        success: true,
        form: result.form,
        result: serializeQueryResult(result),
    };
    if (verbosity === 'minimal') {
        return minimal;
    }

    const standard: StandardQueryResponse = {
        ...minimal,
        message: summarize(result),
        ...(application.diagnostics.length > 0 && { diagnostics: application.diagnostics }),
    };
    if (verbosity === 'standard') {
        return standard;
    }

    const detailed: DetailedQueryResponse = {
        ...standard,
        steps: application.steps,
        statistics,
    };
    return detailed;
}

export function buildRulesResponse(
    application: RuleApplication,
    statistics: ResponseStatistics,
    verbosity: Verbosity = 'standard'
): RulesResponse {
    const minimal: MinimalRulesResponse = {
        success: true,
        triples: serializeGraph(application.graph),
    };
    if (verbosity === 'minimal') {
        return minimal;
    }

    const standard: StandardRulesResponse = {
        ...minimal,
        message: `Derived ${application.derived} new triple(s)`,
        derived: application.derived,
        ...(application.diagnostics.length > 0 && { diagnostics: application.diagnostics }),
    };
    if (verbosity === 'standard') {
        return standard;
    }

    const detailed: DetailedRulesResponse = {
        ...standard,
        steps: application.steps,
        statistics,
    };
    return detailed;
}
