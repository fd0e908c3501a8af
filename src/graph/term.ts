/**
 * Term constructors, equality and rendering.
 */

import type {
    BlankNodeTerm,
    GroundTerm,
    IriTerm,
    LiteralTerm,
    Term,
    Triple,
    TriplePattern,
    VariableTerm,
} from '../types/terms.js';
import { createInvalidTermError } from '../types/errors.js';

const VARIABLE_NAME = /^[A-Za-z0-9_]+$/;

export function iri(value: string): IriTerm {
    return { kind: 'iri', value };
}

export function blankNode(id: string): BlankNodeTerm {
    return { kind: 'blank', id };
}

export function literal(value: string, options: { datatype?: string; language?: string } = {}): LiteralTerm {
    const { datatype, language } = options;
    if (datatype !== undefined && language !== undefined) {
        throw createInvalidTermError(
            `Literal "${value}" cannot have both a datatype and a language tag`,
            { datatype, language }
        );
    }
    const term: LiteralTerm = { kind: 'literal', value };
    if (datatype !== undefined) term.datatype = datatype;
    if (language !== undefined) term.language = language;
    return term;
}

export function variable(name: string): VariableTerm {
    if (!VARIABLE_NAME.test(name)) {
        throw createInvalidTermError(`Invalid variable name '${name}'`, { name });
    }
    return { kind: 'variable', name };
}

export function isVariable(term: Term): term is VariableTerm {
    return term.kind === 'variable';
}

export function isGround(term: Term): term is GroundTerm {
    return term.kind !== 'variable';
}

/**
 * Structural equality. Literals are equal iff value, datatype and language all match.
 */
export function termEquals(a: Term, b: Term): boolean {
    switch (a.kind) {
        case 'iri':
            return b.kind === 'iri' && a.value === b.value;
        case 'blank':
            return b.kind === 'blank' && a.id === b.id;
        case 'variable':
            return b.kind === 'variable' && a.name === b.name;
        case 'literal':
            return b.kind === 'literal'
                && a.value === b.value
                && a.datatype === b.datatype
                && a.language === b.language;
    }
}

function escapeLexical(value: string): string {
    return value
        .replace(/\\/g, '\\\\')
        .replace(/"/g, '\\"')
        .replace(/\n/g, '\\n')
        .replace(/\r/g, '\\r');
}

/**
 * Canonical key of a term (N-Triples style). Injective: equal keys iff equal terms.
 */
export function termKey(term: Term): string {
    switch (term.kind) {
        case 'iri':
            return `<${term.value}>`;
        case 'blank':
            return `_:${term.id}`;
        case 'variable':
            return `?${term.name}`;
        case 'literal': {
            const lexical = `"${escapeLexical(term.value)}"`;
            if (term.language !== undefined) return `${lexical}@${term.language}`;
            if (term.datatype !== undefined) return `${lexical}^^<${term.datatype}>`;
            return lexical;
        }
    }
}

/**
 * Textual rendering used in SELECT rows: an IRI is its string, a literal its lexical value.
 */
export function renderTerm(term: Term): string {
    switch (term.kind) {
        case 'iri':
            return term.value;
        case 'literal':
            return term.value;
        case 'blank':
            return `_:${term.id}`;
        case 'variable':
            return `?${term.name}`;
    }
}

export function tripleKey(triple: Triple | TriplePattern): string {
    return `${termKey(triple.subject)} ${termKey(triple.predicate)} ${termKey(triple.object)}`;
}

export function triple(subject: GroundTerm, predicate: GroundTerm, object: GroundTerm): Triple {
    return { subject, predicate, object };
}

export function pattern(subject: Term, predicate: Term, object: Term): TriplePattern {
    return { subject, predicate, object };
}

/**
 * Variable names of a pattern list, in order of first appearance
 */
export function patternVariables(patterns: readonly TriplePattern[]): string[] {
    const seen = new Set<string>();
    for (const p of patterns) {
        for (const term of [p.subject, p.predicate, p.object]) {
            if (term.kind === 'variable') seen.add(term.name);
        }
    }
    return [...seen];
}
