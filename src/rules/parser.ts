import type { Token } from '../types/parser.js';
import type { Rule } from '../types/rules.js';
import type { TriplePattern } from '../types/terms.js';
import { createRuleSyntaxError } from '../types/errors.js';
import { Namespaces } from '../graph/namespaces.js';
import { pattern } from '../graph/term.js';
import { tokenize } from '../parser/tokenizer.js';
import { describeToken, isTermToken, tokenToTerm } from '../parser/terms.js';

/**
 * Parser for one declarative rule line
 *
 * Grammar:
 *   rule    = side '=>' side '.'?
 *   side    = '{' clauses '}' | clauses
 *   clauses = (clause ('.' clause)* '.'?)?
 *   clause  = term term term
 *
 * Every bare word resolves against the default namespace, 'a' included.
 * Write rdf:type in full.
 */
export class RuleParser {
    private tokens: Token[];
    private input: string;
    private namespaces: Namespaces;

    constructor(tokens: Token[], input: string, namespaces: Namespaces) {
        this.tokens = tokens;
        this.input = input;
        this.namespaces = namespaces;
    }

    parse(): Rule {
        const arrows = this.tokens.filter(t => t.type === 'ARROW');
        if (arrows.length === 0) {
            throw createRuleSyntaxError("Rule must contain exactly one '=>'", this.input, undefined, { arrows: 0 });
        }
        if (arrows.length > 1) {
            throw createRuleSyntaxError(
                "Rule must contain exactly one '=>'",
                this.input,
                arrows[1].position,
                { arrows: arrows.length }
            );
        }

        const arrowIndex = this.tokens.indexOf(arrows[0]);
        const body = this.tokens.filter(t => t.type !== 'EOF');

        return {
            antecedent: this.parseSide(body.slice(0, arrowIndex)),
            consequent: this.parseSide(body.slice(arrowIndex + 1)),
            source: this.input.trim(),
        };
    }

    private parseSide(tokens: Token[]): TriplePattern[] {
        let side = tokens;
        while (side.length > 0 && side[side.length - 1].type === 'DOT') {
            side = side.slice(0, -1);
        }

        if (side.length > 0 && side[0].type === 'LBRACE') {
            const last = side[side.length - 1];
            if (last.type !== 'RBRACE') {
                throw createRuleSyntaxError("Unbalanced braces - missing closing '}'", this.input, side[0].position);
            }
            side = side.slice(1, -1);
        }

        const clauses: Token[][] = [[]];
        for (const token of side) {
            if (token.type === 'DOT') {
                clauses.push([]);
            } else if (isTermToken(token)) {
                clauses[clauses.length - 1].push(token);
            } else {
                throw createRuleSyntaxError(`Unexpected ${describeToken(token)}`, this.input, token.position);
            }
        }

        return clauses
            .filter(clause => clause.length > 0)
            .map(clause => this.parseClause(clause));
    }

    private parseClause(clause: Token[]): TriplePattern {
        if (clause.length !== 3) {
            throw createRuleSyntaxError(
                `Clause must have exactly three terms (subject predicate object), got ${clause.length}`,
                this.input,
                clause[0].position,
                { terms: clause.length }
            );
        }
        const ctx = {
            namespaces: this.namespaces,
            input: this.input,
            code: 'RULE_SYNTAX_ERROR' as const,
            allowBare: true,
            typeShorthand: false,
        };
        const [s, p, o] = clause.map(token => tokenToTerm(token, ctx));
        return pattern(s, p, o);
    }
}

/**
 * Parse a single rule line
 */
export function parseRule(text: string, namespaces: Namespaces = new Namespaces()): Rule {
    const tokens = tokenize(text, 'RULE_SYNTAX_ERROR');
    return new RuleParser(tokens, text, namespaces).parse();
}

export interface RuleLine {
    /** 1-based line number in the batch text */
    line: number;
    source: string;
}

/**
 * Non-blank, non-comment lines of a rule batch
 */
export function splitRuleLines(text: string): RuleLine[] {
    return text.split(/\r?\n/)
        .map((source, index) => ({ line: index + 1, source: source.trim() }))
        .filter(l => l.source.length > 0 && !l.source.startsWith('#'));
}

const PREFIX_DIRECTIVE = /^(@prefix|prefix)\s/i;
const PREFIX_DIRECTIVE_FORM = /^(?:@prefix|prefix)\s+([A-Za-z][\w-]*)?:\s*<([^<>\s]*)>\s*\.?$/i;

export function isPrefixDirective(source: string): boolean {
    return PREFIX_DIRECTIVE.test(source);
}

/**
 * Parse an `@prefix p: <iri> .` or `PREFIX p: <iri>` line.
 * Returns undefined for lines that are not directives.
 */
export function parsePrefixDirective(source: string): [string, string] | undefined {
    if (!isPrefixDirective(source)) {
        return undefined;
    }
    const match = PREFIX_DIRECTIVE_FORM.exec(source);
    if (!match) {
        throw createRuleSyntaxError('Malformed prefix directive, expected \'@prefix p: <iri> .\'', source, 0);
    }
    return [match[1] ?? '', match[2]];
}

export interface ParsedRuleLine extends RuleLine {
    rule: Rule;
}

/**
 * Parse a whole batch, honouring prefix directives. Throws on the first bad line.
 */
export function parseRuleBatch(text: string, namespaces: Namespaces = new Namespaces()): ParsedRuleLine[] {
    let scope = namespaces;
    const rules: ParsedRuleLine[] = [];
    for (const { line, source } of splitRuleLines(text)) {
        const directive = parsePrefixDirective(source);
        if (directive) {
            scope = scope.extend({ [directive[0]]: directive[1] });
        } else {
            rules.push({ line, source, rule: parseRule(source, scope) });
        }
    }
    return rules;
}
