/**
 * Graph I/O: Turtle / N-Triples / N3 in through n3, N-Triples out.
 */

import fs from 'fs/promises';
import path from 'path';
import { Parser } from 'n3';
import type { Quad, Term as N3Term } from 'n3';
import type { GroundTerm, Triple } from '../types/terms.js';
import { RDF_NS, XSD_NS } from '../types/options.js';
import {
    createExtractionError,
    createSourceUnavailableError,
    isReasonerException,
} from '../types/errors.js';
import { Graph } from '../graph/graph.js';
import { blankNode, iri, literal, triple, tripleKey } from '../graph/term.js';

export type GraphFormat = 'Turtle' | 'N-Triples' | 'N3' | 'N-Quads' | 'TriG';

export interface ParseGraphOptions {
    format?: GraphFormat;
    baseIri?: string;
}

const EXTENSION_FORMATS: Record<string, GraphFormat> = {
    '.ttl': 'Turtle',
    '.nt': 'N-Triples',
    '.n3': 'N3',
    '.nq': 'N-Quads',
    '.trig': 'TriG',
};

/** Datatypes that mark a plain literal */
const PLAIN_DATATYPES = new Set([XSD_NS + 'string', RDF_NS + 'langString']);

export function formatForPath(file: string): GraphFormat {
    return EXTENSION_FORMATS[path.extname(file).toLowerCase()] ?? 'Turtle';
}

/**
 * Convert an n3 term. Variables and quoted graphs are not data and are rejected.
 */
export function fromN3Term(term: N3Term): GroundTerm {
    switch (term.termType) {
        case 'NamedNode':
            return iri(term.value);
        case 'BlankNode':
            return blankNode(term.value);
        case 'Literal':
            if (term.language) {
                return literal(term.value, { language: term.language });
            }
            return PLAIN_DATATYPES.has(term.datatype.value)
                ? literal(term.value)
                : literal(term.value, { datatype: term.datatype.value });
        default:
            throw createExtractionError(`unsupported ${term.termType} term '${term.value}'`, {
                termType: term.termType,
            });
    }
}

function fromQuad(quad: Quad): Triple {
    // Named-graph component is dropped
    return triple(fromN3Term(quad.subject), fromN3Term(quad.predicate), fromN3Term(quad.object));
}

/**
 * Parse RDF text into a Graph. Throws EXTRACTION_FAILED.
 */
export function parseGraph(text: string, options: ParseGraphOptions = {}): Graph {
    const parser = new Parser({
        format: options.format ?? 'Turtle',
        ...(options.baseIri && { baseIRI: options.baseIri }),
    });

    let quads: Quad[];
    try {
        quads = parser.parse(text);
    } catch (e) {
        throw createExtractionError(e instanceof Error ? e.message : String(e), {
            format: options.format ?? 'Turtle',
        });
    }
    return new Graph(quads.map(fromQuad));
}

/**
 * Read and parse a local graph file; the format follows the file extension.
 */
export async function readGraphFile(file: string, options: ParseGraphOptions = {}): Promise<Graph> {
    let text: string;
    try {
        text = await fs.readFile(file, 'utf-8');
    } catch (e) {
        throw createSourceUnavailableError(file, e instanceof Error ? e.message : String(e));
    }

    try {
        return parseGraph(text, { format: formatForPath(file), ...options });
    } catch (e) {
        if (isReasonerException(e, 'EXTRACTION_FAILED')) {
            e.error.details = { ...e.error.details, source: file };
        }
        throw e;
    }
}

/**
 * Serialize as N-Triples, one line per triple.
 * Derived triples may hold a literal in any position; it is written as is.
 */
export function serializeGraph(graph: Graph): string {
    return graph.toArray().map(t => `${tripleKey(t)} .\n`).join('');
}
