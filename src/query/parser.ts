import type { Token, TokenType } from '../types/parser.js';
import type { ParsedQuery, SolutionModifiers } from '../types/query.js';
import type { Term, TriplePattern } from '../types/terms.js';
import { createQuerySyntaxError } from '../types/errors.js';
import { Namespaces } from '../graph/namespaces.js';
import { pattern, patternVariables } from '../graph/term.js';
import { tokenize } from '../parser/tokenizer.js';
import { describeToken, isTermToken, tokenToTerm } from '../parser/terms.js';

const UNSUPPORTED = new Set(['FILTER', 'OPTIONAL', 'UNION', 'MINUS', 'BIND', 'VALUES', 'GRAPH', 'SERVICE']);

/**
 * Parser for the supported query subset
 *
 * Grammar (EBNF-ish, keywords case-insensitive):
 *   query       = prologue form modifiers EOF
 *   prologue    = ('PREFIX' NAME IRI)*
 *   form        = 'SELECT' 'DISTINCT'? ('*' | VARIABLE+) body
 *               | 'ASK' body
 *               | 'CONSTRUCT' (group body | 'WHERE' group)
 *               | 'DESCRIBE' ('*' | term+) body
 *   body        = 'WHERE'? group | triples
 *   group       = '{' triples '}'
 *   triples     = subject predObjList ('.' subject predObjList)* '.'?
 *   predObjList = verb objectList (';' verb objectList)* ';'?
 *   objectList  = object (',' object)*
 *   modifiers   = ('LIMIT' NUMBER | 'OFFSET' NUMBER)*
 */
export class QueryParser {
    private tokens: Token[];
    private input: string;
    private namespaces: Namespaces;
    private pos: number = 0;

    constructor(tokens: Token[], input: string, namespaces: Namespaces) {
        this.tokens = tokens;
        this.input = input;
        this.namespaces = namespaces;
    }

    parse(): ParsedQuery {
        this.parsePrologue();
        const query = this.parseForm();
        this.parseModifiers(query.modifiers);

        if (this.current().type !== 'EOF') {
            throw this.error(`Unexpected ${describeToken(this.current())}`);
        }
        return query;
    }

    private current(): Token {
        return this.tokens[this.pos] || { type: 'EOF', value: '', position: this.input.length };
    }

    private advance(): Token {
        const token = this.current();
        if (token.type !== 'EOF') this.pos++;
        return token;
    }

    private expect(type: TokenType, what: string): Token {
        if (this.current().type !== type) {
            throw this.error(`Expected ${what} but got ${describeToken(this.current())}`);
        }
        return this.advance();
    }

    private isKeyword(word: string): boolean {
        const token = this.current();
        return token.type === 'NAME' && token.value.toUpperCase() === word;
    }

    private error(message: string, token: Token = this.current(), details?: Record<string, unknown>) {
        return createQuerySyntaxError(message, this.input, token.position, details);
    }

    private parsePrologue(): void {
        while (this.isKeyword('PREFIX')) {
            this.advance();
            const name = this.expect('NAME', 'a prefix name');
            if (!/^[A-Za-z][\w-]*:$|^:$/.test(name.value)) {
                throw this.error(`Invalid prefix declaration '${name.value}'`, name);
            }
            const target = this.expect('IRI', 'an IRI in angle brackets');
            this.namespaces = this.namespaces.extend({ [name.value.slice(0, -1)]: target.value.slice(1, -1) });
        }
    }

    private parseForm(): ParsedQuery {
        const keyword = this.current();
        const form = keyword.type === 'NAME' ? keyword.value.toLowerCase() : '';
        const modifiers: SolutionModifiers = {};

        switch (form) {
            case 'select': {
                this.advance();
                if (this.isKeyword('DISTINCT')) {
                    this.advance();
                    modifiers.distinct = true;
                }
                let star = false;
                const variables: string[] = [];
                if (this.current().type === 'STAR') {
                    this.advance();
                    star = true;
                } else {
                    while (this.current().type === 'VARIABLE') {
                        variables.push(this.advance().value);
                    }
                    if (variables.length === 0) {
                        throw this.error("SELECT needs '*' or at least one variable");
                    }
                }
                const where = this.parseBody();
                return { form: 'select', variables: star ? patternVariables(where) : variables, where, modifiers };
            }
            case 'ask': {
                this.advance();
                return { form: 'ask', where: this.parseBody(), modifiers };
            }
            case 'construct': {
                this.advance();
                if (this.isKeyword('WHERE')) {
                    this.advance();
                    const where = this.parseGroup();
                    return { form: 'construct', template: where, where, modifiers };
                }
                if (this.current().type !== 'LBRACE') {
                    throw this.error("CONSTRUCT needs a '{ template }' or 'WHERE { pattern }'");
                }
                const template = this.parseGroup();
                return { form: 'construct', template, where: this.parseBody(), modifiers };
            }
            case 'describe': {
                this.advance();
                // Targets are checked but not used: the result is always the matched pattern triples
                let targets = 0;
                if (this.current().type === 'STAR') {
                    this.advance();
                } else {
                    while (isTermToken(this.current()) && !this.isKeyword('WHERE')) {
                        this.parseTerm();
                        targets++;
                    }
                    if (targets === 0) {
                        throw this.error("DESCRIBE needs '*' or at least one resource");
                    }
                }
                if (this.current().type === 'EOF') {
                    throw this.error('DESCRIBE needs a WHERE pattern');
                }
                return { form: 'describe', where: this.parseBody(), modifiers };
            }
            default:
                throw this.error(`Expected SELECT, ASK, CONSTRUCT or DESCRIBE but got ${describeToken(keyword)}`);
        }
    }

    private parseBody(): TriplePattern[] {
        if (this.isKeyword('WHERE')) {
            this.advance();
            return this.parseGroup();
        }
        if (this.current().type === 'LBRACE') {
            return this.parseGroup();
        }
        const start = this.current();
        const patterns = this.parseTriples(token => token.type === 'EOF' || this.isModifier());
        if (patterns.length === 0) {
            throw this.error('Expected a graph pattern', start);
        }
        return patterns;
    }

    private parseGroup(): TriplePattern[] {
        this.expect('LBRACE', "'{'");
        const patterns = this.parseTriples(token => token.type === 'RBRACE' || token.type === 'EOF');
        if (this.current().type !== 'RBRACE') {
            throw this.error("Unbalanced braces - missing closing '}'");
        }
        this.advance();
        return patterns;
    }

    private isModifier(): boolean {
        return this.isKeyword('LIMIT') || this.isKeyword('OFFSET');
    }

    private parseTriples(atEnd: (token: Token) => boolean): TriplePattern[] {
        const patterns: TriplePattern[] = [];

        while (!atEnd(this.current())) {
            if (this.current().type === 'DOT') {
                this.advance();
                continue;
            }
            const token = this.current();
            if (token.type === 'NAME' && UNSUPPORTED.has(token.value.toUpperCase())) {
                throw this.error(`${token.value.toUpperCase()} is not supported`, token);
            }

            const subject = this.parseTerm();
            this.parsePredicateObjectList(subject, patterns);

            if (!atEnd(this.current()) && this.current().type !== 'DOT') {
                throw this.error(`Expected '.' after a triple pattern but got ${describeToken(this.current())}`);
            }
        }
        return patterns;
    }

    private parsePredicateObjectList(subject: Term, patterns: TriplePattern[]): void {
        for (; ;) {
            const predicate = this.parseTerm();
            patterns.push(pattern(subject, predicate, this.parseTerm()));
            while (this.current().type === 'COMMA') {
                this.advance();
                patterns.push(pattern(subject, predicate, this.parseTerm()));
            }
            if (this.current().type !== 'SEMICOLON') {
                return;
            }
            this.advance();
            if (!isTermToken(this.current())) {
                return;
            }
        }
    }

    private parseTerm(): Term {
        const token = this.current();
        if (!isTermToken(token)) {
            throw this.error(
                `Triple pattern has fewer than three terms: expected a term but got ${describeToken(token)}`,
                token
            );
        }
        if (token.type === 'NAME' && token.value !== 'a' && !token.value.includes(':')) {
            throw this.error(`Unexpected word '${token.value}' - use a prefixed name or an <IRI>`, token);
        }
        this.advance();
        return tokenToTerm(token, {
            namespaces: this.namespaces,
            input: this.input,
            code: 'QUERY_SYNTAX_ERROR',
            allowBare: false,
            typeShorthand: true,
        });
    }

    private parseModifiers(modifiers: SolutionModifiers): void {
        while (this.isModifier()) {
            const keyword = this.advance().value.toUpperCase();
            const value = this.expect('NUMBER', `a number after ${keyword}`);
            const n = Number(value.value);
            if (!Number.isInteger(n)) {
                throw this.error(`${keyword} must be a whole number`, value);
            }
            if (keyword === 'LIMIT') modifiers.limit = n;
            else modifiers.offset = n;
        }
    }
}

/**
 * Parse query text. Query PREFIX declarations extend the given namespaces.
 */
export function parseQuery(text: string, namespaces: Namespaces = new Namespaces()): ParsedQuery {
    const tokens = tokenize(text, 'QUERY_SYNTAX_ERROR');
    return new QueryParser(tokens, text, namespaces).parse();
}
