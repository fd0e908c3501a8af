/**
 * Textual heuristic rules ("custom" tier).
 *
 * A minimal keyword matcher, not a rule interpreter.
 * A line is recognized when it has the shape `IF <condition> THEN <action>`
 * or `<condition> => <action>`. The only implemented combination is a
 * condition mentioning `hasAuthor` with an action mentioning `wrote`, which
 * runs the author-inversion derivation. Any broader rule language belongs to
 * the declarative tier.
 *
 * Failure is all-or-nothing: every line is checked before the graph is
 * touched, and one malformed recognized line aborts the batch.
 */

import type { HeuristicBatchReport } from '../types/rules.js';
import { createRuleSyntaxError } from '../types/errors.js';
import { Graph } from '../graph/graph.js';
import { authorInversion, runPipeline } from './library.js';
import { splitRuleLines } from './parser.js';
import type { LibraryVocabulary } from './vocabulary.js';

const IF_THEN = /^IF\s+(.*?)\s+THEN(?:\s+(.*))?$/i;

const CONDITION_KEYWORD = 'hasAuthor';
const ACTION_KEYWORD = 'wrote';

export interface HeuristicRule {
    line: number;
    condition: string;
    action: string;
}

/**
 * Recognize one line. Returns undefined for lines that do not have a rule shape.
 */
export function parseHeuristicLine(source: string, line: number = 1): HeuristicRule | undefined {
    let condition: string;
    let action: string;

    const ifThen = IF_THEN.exec(source);
    if (ifThen) {
        condition = ifThen[1].trim();
        action = (ifThen[2] ?? '').trim();
    } else if (source.includes('=>')) {
        const parts = source.split('=>');
        if (parts.length !== 2) {
            throw createRuleSyntaxError(
                "Rule must contain exactly one '=>'",
                source,
                source.indexOf('=>', source.indexOf('=>') + 2),
                { line }
            );
        }
        condition = parts[0].trim();
        action = parts[1].trim();
    } else if (source.includes(CONDITION_KEYWORD) && source.includes(ACTION_KEYWORD)) {
        throw createRuleSyntaxError(
            "Missing separator between condition and action - use 'IF ... THEN ...' or '=>'",
            source,
            undefined,
            { line }
        );
    } else {
        return undefined;
    }

    if (!condition || !action) {
        throw createRuleSyntaxError(
            `Rule has an empty ${condition ? 'action' : 'condition'}`,
            source,
            undefined,
            { line }
        );
    }
    return { line, condition, action };
}

export function triggersAuthorInversion(rule: HeuristicRule): boolean {
    return rule.condition.includes(CONDITION_KEYWORD) && rule.action.includes(ACTION_KEYWORD);
}

/**
 * Apply heuristic rule text to a working graph. Throws RULE_SYNTAX_ERROR before
 * any change when a recognized line is malformed.
 */
export function applyHeuristicRules(graph: Graph, text: string, vocab: LibraryVocabulary): HeuristicBatchReport {
    const lines = splitRuleLines(text);
    const rules: HeuristicRule[] = [];
    for (const { line, source } of lines) {
        const rule = parseHeuristicLine(source, line);
        if (rule) rules.push(rule);
    }

    const triggered: string[] = [];
    let derived = 0;
    if (rules.some(triggersAuthorInversion)) {
        for (const report of runPipeline(graph, [authorInversion], vocab)) {
            triggered.push(report.name);
            derived += report.derived;
        }
    }

    return {
        recognized: rules.length,
        ignored: lines.length - rules.length,
        triggered,
        derived,
    };
}
