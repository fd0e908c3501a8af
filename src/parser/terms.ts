import type { Token } from '../types/parser.js';
import type { Term } from '../types/terms.js';
import { RDF_NS, XSD_NS } from '../types/options.js';
import { createSyntaxError, isReasonerException } from '../types/errors.js';
import { Namespaces } from '../graph/namespaces.js';
import { iri, literal, variable } from '../graph/term.js';

export interface TermContext {
    namespaces: Namespaces;
    input: string;
    code: 'RULE_SYNTAX_ERROR' | 'QUERY_SYNTAX_ERROR';
    /** Bare words resolve against the default namespace (rules only) */
    allowBare: boolean;
    /** The word 'a' stands for rdf:type (query text only) */
    typeShorthand: boolean;
}

/**
 * Convert a single term token into a Term.
 * Unresolved prefixes surface as the context's syntax error code with `details.prefix`.
 */
export function tokenToTerm(token: Token, ctx: TermContext): Term {
    try {
        switch (token.type) {
            case 'VARIABLE':
                return variable(token.value);
            case 'IRI':
                return iri(token.value.slice(1, -1));
            case 'NUMBER':
                return literal(token.value, {
                    datatype: XSD_NS + (token.value.includes('.') ? 'decimal' : 'integer'),
                });
            case 'LITERAL':
                if (token.language !== undefined) {
                    return literal(token.value, { language: token.language });
                }
                if (token.datatype !== undefined) {
                    return literal(token.value, {
                        datatype: ctx.namespaces.resolveToken(token.datatype).value,
                    });
                }
                return literal(token.value);
            case 'NAME':
                if (ctx.typeShorthand && token.value === 'a') {
                    return iri(RDF_NS + 'type');
                }
                return ctx.namespaces.resolveToken(token.value, { allowBare: ctx.allowBare });
            default:
                throw createSyntaxError(
                    ctx.code,
                    `Expected a term but got ${describeToken(token)}`,
                    ctx.input,
                    token.position
                );
        }
    } catch (e) {
        if (isReasonerException(e, 'UNRESOLVED_PREFIX')) {
            throw createSyntaxError(ctx.code, e.message, ctx.input, token.position, e.error.details);
        }
        throw e;
    }
}

export function isTermToken(token: Token): boolean {
    return token.type === 'VARIABLE'
        || token.type === 'IRI'
        || token.type === 'NAME'
        || token.type === 'LITERAL'
        || token.type === 'NUMBER';
}

export function describeToken(token: Token): string {
    if (token.type === 'EOF') return 'end of input';
    if (token.type === 'VARIABLE') return `'?${token.value}'`;
    if (token.type === 'LITERAL') return `literal "${token.value}"`;
    return `'${token.value}'`;
}
