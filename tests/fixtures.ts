/**
 * Shared test fixtures: the small library graph most tests start from.
 */
import { Graph } from '../src/graph/graph.js';
import { iri, triple } from '../src/graph/term.js';
import type { GroundTerm, IriTerm, Triple } from '../src/types/terms.js';
import { DEFAULTS, RDF_NS } from '../src/types/options.js';

export const EX = DEFAULTS.defaultNamespace;

/** Term in the default namespace, e.g. ex('Book1') */
export function ex(localName: string): IriTerm {
    return iri(EX + localName);
}

export const RDF_TYPE = iri(RDF_NS + 'type');

export function t(s: string, p: string, o: string): Triple {
    return triple(ex(s), ex(p), ex(o));
}

// === Library graph ===
export const LIBRARY_TRIPLES: Triple[] = [
    t('Book1', 'hasAuthor', 'Alice'),
    t('Book2', 'hasAuthor', 'Alice'),
    t('Book1', 'hasGenre', 'SciFi'),
    t('Book2', 'hasGenre', 'SciFi'),
    t('Loan1', 'borrowedBy', 'Bob'),
    t('Loan2', 'borrowedBy', 'Bob'),
];

export function libraryGraph(): Graph {
    return new Graph(LIBRARY_TRIPLES);
}

export const LIBRARY_TURTLE = `@prefix ex: <${EX}> .
ex:Book1 ex:hasAuthor ex:Alice ; ex:hasGenre ex:SciFi .
ex:Book2 ex:hasAuthor ex:Alice ; ex:hasGenre ex:SciFi .
ex:Loan1 ex:borrowedBy ex:Bob .
ex:Loan2 ex:borrowedBy ex:Bob .
`;

// === Assertion Helpers ===
export function expectTriple(graph: Graph, s: GroundTerm, p: GroundTerm, o: GroundTerm) {
    expect(graph.has(triple(s, p, o))).toBe(true);
}

export function expectNoTriple(graph: Graph, s: GroundTerm, p: GroundTerm, o: GroundTerm) {
    expect(graph.has(triple(s, p, o))).toBe(false);
}

/** Rows as a sorted list of strings, for order-insensitive comparison */
export function sortedRows(rows: string[][]): string[] {
    return rows.map(r => r.join('|')).sort();
}
