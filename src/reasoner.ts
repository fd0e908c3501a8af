/**
 * GraphReasoner - apply rule tiers to a graph, then query the result.
 */

import type { QueryForm, QueryResult } from './types/query.js';
import type { RuleApplication, RuleDiagnostic, RuleMode } from './types/rules.js';
import type { ReasonerConfig } from './types/options.js';
import { Graph } from './graph/graph.js';
import { Namespaces } from './graph/namespaces.js';
import { runQuery } from './query/index.js';
import { RuleEngine } from './rules/engine.js';
import { Logger, createLogger, silentLogger } from './utils/logger.js';

export interface ReasonOptions {
    /** Rule tiers applied in order before the query runs */
    modes?: readonly RuleMode[];
    query: string;
    form?: QueryForm | string;
}

export interface ReasonStatistics {
    inputTriples: number;
    derivedTriples: number;
    timeMs: number;
}

export interface ReasonResult {
    result: QueryResult;
    /** Graph the query ran against */
    graph: Graph;
    diagnostics: RuleDiagnostic[];
    statistics: ReasonStatistics;
}

function isModeList(modes: RuleMode | readonly RuleMode[]): modes is readonly RuleMode[] {
    return Array.isArray(modes);
}

export class GraphReasoner {
    readonly namespaces: Namespaces;
    private readonly engine: RuleEngine;
    private readonly logger: Logger;

    constructor(config: Partial<ReasonerConfig> = {}, logger?: Logger) {
        this.namespaces = new Namespaces({
            defaultNamespace: config.defaultNamespace,
            prefixes: config.prefixes,
        });
        this.logger = logger ?? (config.verbose ? createLogger('reasoner', { verbose: true }) : silentLogger);
        this.engine = new RuleEngine({
            namespaces: this.namespaces,
            recommendation: config.recommendation,
            logger: this.logger,
        });
    }

    applyRules(graph: Graph, modes: RuleMode | readonly RuleMode[]): RuleApplication {
        return isModeList(modes) ? this.engine.applyAll(graph, modes) : this.engine.apply(graph, modes);
    }

    runQuery(graph: Graph, queryText: string, form?: QueryForm | string): QueryResult {
        return runQuery(graph, queryText, form, this.namespaces);
    }

    reason(graph: Graph, options: ReasonOptions): ReasonResult {
        const start = Date.now();
        const applied = this.engine.applyAll(graph, options.modes ?? []);
        const result = this.runQuery(applied.graph, options.query, options.form);
        this.logger.debug(`Answered ${result.form} query`, { triples: applied.graph.size });

        return {
            result,
            graph: applied.graph,
            diagnostics: applied.diagnostics,
            statistics: {
                inputTriples: graph.size,
                derivedTriples: applied.derived,
                timeMs: Date.now() - start,
            },
        };
    }
}

export function createGraphReasoner(config?: Partial<ReasonerConfig>, logger?: Logger): GraphReasoner {
    return new GraphReasoner(config, logger);
}
