import type { CheckRulesResponse, RulesResponse } from '../types/index.js';
import type { ServerContainer } from '../container.js';
import { parseGraph } from '../io/turtle.js';
import { checkRules } from '../rules/declarative.js';
import { parseRuleMode } from '../rules/engine.js';
import { buildRulesResponse } from '../utils/response.js';
import { applyRulesArgsSchema, checkRulesArgsSchema, parseArgs } from './schemas.js';

export async function applyRulesHandler(args: unknown, container: ServerContainer): Promise<RulesResponse> {
    const { data, data_format, rule_mode, rules, verbosity } = parseArgs(applyRulesArgsSchema, args);
    const start = Date.now();

    const graph = parseGraph(data, { format: data_format });
    const application = container.reasoner.applyRules(graph, parseRuleMode(rule_mode, rules));

    return buildRulesResponse(application, {
        inputTriples: graph.size,
        derivedTriples: application.derived,
        timeMs: Date.now() - start,
    }, verbosity);
}

/**
 * Validate declarative rule text line by line without applying it
 */
export async function checkRulesHandler(args: unknown, container: ServerContainer): Promise<CheckRulesResponse> {
    const { rules } = parseArgs(checkRulesArgsSchema, args);
    const checks = checkRules(rules, container.reasoner.namespaces);
    return { valid: checks.every(c => c.valid), rules: checks };
}
