/**
 * Declarative rule tier (`antecedent => consequent`, one rule per line).
 *
 * Rules run in order against a running graph that starts as a copy of the
 * input. Each rule's antecedent is evaluated once against the running graph,
 * all consequent instantiations are collected, then merged: a rule never sees
 * its own output, later rules do. A failing line is skipped and reported;
 * the batch carries on.
 */

import type { DeclarativeBatchReport, Rule, RuleOutcome } from '../types/rules.js';
import type { Triple } from '../types/terms.js';
import type { RuleCheck } from '../types/responses.js';
import { isReasonerException, serializeReasonerError } from '../types/errors.js';
import { Graph } from '../graph/graph.js';
import { Namespaces } from '../graph/namespaces.js';
import { evaluate, instantiate } from '../query/evaluator.js';
import { isPrefixDirective, parsePrefixDirective, parseRule, splitRuleLines } from './parser.js';
import { Logger, silentLogger } from '../utils/logger.js';

/**
 * Instantiate a rule's consequent for every solution of its antecedent
 */
export function fireRule(graph: Graph, rule: Rule): Triple[] {
    const derived: Triple[] = [];
    for (const row of evaluate(graph, rule.antecedent)) {
        for (const template of rule.consequent) {
            const t = instantiate(template, row);
            if (t) derived.push(t);
        }
    }
    return derived;
}

export interface DeclarativeResult {
    graph: Graph;
    report: DeclarativeBatchReport;
}

export function applyDeclarativeRules(
    input: Graph,
    text: string,
    namespaces: Namespaces = new Namespaces(),
    logger: Logger = silentLogger
): DeclarativeResult {
    const graph = input.copy();
    // Directives bind prefixes for the rest of this batch only
    let scope = namespaces;
    const outcomes: RuleOutcome[] = [];

    for (const { line, source } of splitRuleLines(text)) {
        try {
            const directive = parsePrefixDirective(source);
            if (directive) {
                scope = scope.extend({ [directive[0]]: directive[1] });
                continue;
            }

            const rule = parseRule(source, scope);
            const derived = graph.addAll(fireRule(graph, rule));
            outcomes.push({ status: 'applied', line, source, derived });
        } catch (e) {
            if (!isReasonerException(e)) {
                throw e;
            }
            logger.warn(`Skipping rule on line ${line}: ${e.message}`, { rule: source });
            outcomes.push({ status: 'skipped', line, source, error: serializeReasonerError(e.error) });
        }
    }

    const applied = outcomes.filter(o => o.status === 'applied');
    return {
        graph,
        report: {
            outcomes,
            applied: applied.length,
            skipped: outcomes.length - applied.length,
            derived: applied.reduce((sum, o) => sum + (o.status === 'applied' ? o.derived : 0), 0),
        },
    };
}

/**
 * Parse every line of a batch without applying anything
 */
export function checkRules(text: string, namespaces: Namespaces = new Namespaces()): RuleCheck[] {
    let scope = namespaces;
    const checks: RuleCheck[] = [];

    for (const { line, source } of splitRuleLines(text)) {
        const kind = isPrefixDirective(source) ? 'prefix' : 'rule';
        try {
            const directive = parsePrefixDirective(source);
            if (directive) {
                scope = scope.extend({ [directive[0]]: directive[1] });
            } else {
                parseRule(source, scope);
            }
            checks.push({ line, source, kind, valid: true });
        } catch (e) {
            if (!isReasonerException(e)) {
                throw e;
            }
            checks.push({ line, source, kind, valid: false, error: serializeReasonerError(e.error) });
        }
    }
    return checks;
}
