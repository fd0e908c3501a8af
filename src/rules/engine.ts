/**
 * Rule Engine
 *
 * Dispatches a RuleMode to its tier. The caller's graph is never modified:
 * every application works on a copy and returns the enriched copy.
 */

import type { RuleApplication, RuleMode, RuleModeKind } from '../types/rules.js';
import type { RecommendationStrategy, RuleEngineOptions } from '../types/options.js';
import { DEFAULTS } from '../types/options.js';
import { createInvalidArgumentError } from '../types/errors.js';
import { Graph } from '../graph/graph.js';
import { Namespaces } from '../graph/namespaces.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { BASIC_STEPS, advancedSteps, runPipeline } from './library.js';
import { applyHeuristicRules } from './heuristic.js';
import { applyDeclarativeRules } from './declarative.js';
import { LibraryVocabulary, libraryVocabulary } from './vocabulary.js';

export const RULE_MODE_KINDS: readonly RuleModeKind[] = ['none', 'basic', 'advanced', 'custom', 'declarative'];

export interface RuleEngineConfig extends RuleEngineOptions {
    /** Prebuilt prefix table; takes precedence over defaultNamespace/prefixes */
    namespaces?: Namespaces;
    logger?: Logger;
}

export class RuleEngine {
    readonly namespaces: Namespaces;
    private readonly vocab: LibraryVocabulary;
    private readonly recommendation: RecommendationStrategy;
    private readonly logger: Logger;

    constructor(config: RuleEngineConfig = {}) {
        this.namespaces = config.namespaces ?? new Namespaces(config);
        this.vocab = libraryVocabulary(this.namespaces);
        this.recommendation = config.recommendation ?? DEFAULTS.recommendation;
        this.logger = config.logger ?? silentLogger;
    }

    /**
     * Apply one rule tier to a copy of the graph
     */
    apply(input: Graph, mode: RuleMode): RuleApplication {
        this.logger.debug(`Applying ${mode.kind} rules`, { triples: input.size });
        const result = this.dispatch(input, mode);
        this.logger.info(`${mode.kind} rules derived ${result.derived} triples`, {
            steps: result.steps.map(s => `${s.name}=${s.derived}`).join(', '),
            skipped: result.diagnostics.length,
        });
        return result;
    }

    private dispatch(input: Graph, mode: RuleMode): RuleApplication {
        switch (mode.kind) {
            case 'none':
                return { graph: input.copy(), derived: 0, steps: [], diagnostics: [] };

            case 'basic':
            case 'advanced': {
                const graph = input.copy();
                const steps = runPipeline(
                    graph,
                    mode.kind === 'basic' ? BASIC_STEPS : advancedSteps(this.recommendation),
                    this.vocab
                );
                return { graph, derived: graph.size - input.size, steps, diagnostics: [] };
            }

            case 'custom': {
                const graph = input.copy();
                const report = applyHeuristicRules(graph, mode.text, this.vocab);
                this.logger.debug('Heuristic rules processed', {
                    recognized: report.recognized,
                    ignored: report.ignored,
                });
                return {
                    graph,
                    derived: graph.size - input.size,
                    steps: [{ name: 'custom', derived: report.derived }],
                    diagnostics: [],
                };
            }

            case 'declarative': {
                const { graph, report } = applyDeclarativeRules(input, mode.text, this.namespaces, this.logger);
                return {
                    graph,
                    derived: graph.size - input.size,
                    steps: [{ name: 'declarative', derived: report.derived }],
                    diagnostics: report.outcomes.flatMap(o => o.status === 'skipped' ? [o] : []),
                };
            }
        }
    }

    /**
     * Apply several tiers in sequence, each on the previous tier's output
     */
    applyAll(input: Graph, modes: readonly RuleMode[]): RuleApplication {
        let graph = input;
        const steps: RuleApplication['steps'] = [];
        const diagnostics: RuleApplication['diagnostics'] = [];
        for (const mode of modes) {
            const result = this.apply(graph, mode);
            graph = result.graph;
            steps.push(...result.steps);
            diagnostics.push(...result.diagnostics);
        }
        const output = graph === input ? input.copy() : graph;
        return { graph: output, derived: output.size - input.size, steps, diagnostics };
    }
}

export function createRuleEngine(config?: RuleEngineConfig): RuleEngine {
    return new RuleEngine(config);
}

/**
 * Apply a single tier with a throwaway engine
 */
export function applyRules(graph: Graph, mode: RuleMode, config?: RuleEngineConfig): RuleApplication {
    return new RuleEngine(config).apply(graph, mode);
}

function isRuleModeKind(kind: string): kind is RuleModeKind {
    return RULE_MODE_KINDS.some(k => k === kind);
}

/**
 * Build a RuleMode from its name and optional rule text (CLI and tool arguments)
 */
export function parseRuleMode(kind: string, text?: string): RuleMode {
    if (!isRuleModeKind(kind)) {
        throw createInvalidArgumentError(
            `Unknown rule mode '${kind}'. Expected one of: ${RULE_MODE_KINDS.join(', ')}`,
            { mode: kind }
        );
    }
    switch (kind) {
        case 'none':
        case 'basic':
        case 'advanced':
            return { kind };
        case 'custom':
        case 'declarative':
            if (text === undefined) {
                throw createInvalidArgumentError(`Rule mode '${kind}' needs rule text`, { mode: kind });
            }
            return { kind, text };
    }
}
