/**
 * Term and Triple Types
 */

export interface IriTerm {
    kind: 'iri';
    value: string;
}

export interface BlankNodeTerm {
    kind: 'blank';
    id: string;
}

export interface LiteralTerm {
    kind: 'literal';
    value: string;
    datatype?: string;   // full datatype IRI
    language?: string;   // language tag, mutually exclusive with datatype
}

/** Only legal inside patterns and templates, never inside a stored triple */
export interface VariableTerm {
    kind: 'variable';
    name: string;
}

export type Term = IriTerm | BlankNodeTerm | LiteralTerm | VariableTerm;

export type TermKind = Term['kind'];

export type GroundTerm = Exclude<Term, VariableTerm>;

export interface Triple {
    subject: GroundTerm;
    predicate: GroundTerm;
    object: GroundTerm;
}

export interface TriplePattern {
    subject: Term;
    predicate: Term;
    object: Term;
}

/**
 * Producing-side pattern of a rule or CONSTRUCT query.
 * Every variable must be bound by the matching side, or the instantiation is skipped.
 */
export type TripleTemplate = TriplePattern;

/**
 * Variable name -> bound term. Rows returned by evaluation bind every
 * variable of the evaluated pattern list.
 */
export type Binding = ReadonlyMap<string, GroundTerm>;
