/**
 * Tests for query parsing and runQuery
 */

import { runQuery, parseQuery, toQueryForm } from '../src/query/index.js';
import { Graph } from '../src/graph/graph.js';
import { Namespaces } from '../src/graph/namespaces.js';
import { literal, pattern, triple, variable } from '../src/graph/term.js';
import { ReasonerError, isReasonerException } from '../src/types/errors.js';
import type { QueryResult } from '../src/types/query.js';
import { XSD_NS } from '../src/types/options.js';
import { EX, RDF_TYPE, ex, libraryGraph, sortedRows, t } from './fixtures.js';

function select(result: QueryResult) {
    if (result.form !== 'select') throw new Error(`expected a select result, got ${result.form}`);
    return result;
}

function ask(result: QueryResult): boolean {
    if (result.form !== 'ask') throw new Error(`expected an ask result, got ${result.form}`);
    return result.value;
}

function graphOf(result: QueryResult): Graph {
    if (result.form !== 'construct' && result.form !== 'describe') {
        throw new Error(`expected a graph result, got ${result.form}`);
    }
    return result.graph;
}

function queryError(text: string, form?: string): ReasonerError {
    try {
        runQuery(libraryGraph(), text, form);
    } catch (e) {
        if (isReasonerException(e)) return e.error;
        throw e;
    }
    throw new Error(`expected '${text}' to fail`);
}

describe('SELECT', () => {
    test('binds authors to books', () => {
        const result = select(runQuery(libraryGraph(), 'SELECT ?b ?a WHERE { ?b ex:hasAuthor ?a }'));
        expect(result.headers).toEqual(['b', 'a']);
        expect(sortedRows(result.rows)).toEqual([
            `${EX}Book1|${EX}Alice`,
            `${EX}Book2|${EX}Alice`,
        ]);
    });

    test('SELECT * lists variables in order of appearance', () => {
        const result = select(runQuery(libraryGraph(), 'SELECT * WHERE { ?b ex:hasGenre ?g . ?b ex:hasAuthor ?a }'));
        expect(result.headers).toEqual(['b', 'g', 'a']);
        expect(result.rows).toHaveLength(2);
    });

    test('DISTINCT, LIMIT and OFFSET', () => {
        const graph = libraryGraph();
        expect(select(runQuery(graph, 'SELECT ?a WHERE { ?b ex:hasAuthor ?a }')).rows).toHaveLength(2);
        expect(select(runQuery(graph, 'select distinct ?a where { ?b ex:hasAuthor ?a }')).rows).toEqual([[EX + 'Alice']]);
        expect(select(runQuery(graph, 'SELECT ?b WHERE { ?b ex:hasAuthor ?a } LIMIT 1')).rows).toHaveLength(1);
        expect(select(runQuery(graph, 'SELECT ?b WHERE { ?b ex:hasAuthor ?a } OFFSET 2')).rows).toEqual([]);
    });

    test('variables not in the pattern are N/A', () => {
        const result = select(runQuery(libraryGraph(), 'SELECT ?b ?missing WHERE { ?b ex:hasAuthor ex:Alice }'));
        expect(sortedRows(result.rows)).toEqual([`${EX}Book1|N/A`, `${EX}Book2|N/A`]);
    });

    test('PREFIX declarations extend the namespace table', () => {
        const result = select(runQuery(
            libraryGraph(),
            `PREFIX lib: <${EX}>\nSELECT DISTINCT ?m WHERE { ?l lib:borrowedBy ?m }`
        ));
        expect(result.rows).toEqual([[EX + 'Bob']]);
    });

    test('full IRIs in angle brackets', () => {
        const result = select(runQuery(libraryGraph(), `SELECT ?b WHERE { ?b <${EX}hasGenre> <${EX}SciFi> }`));
        expect(result.rows).toHaveLength(2);
    });

    test('object lists with a comma must all match', () => {
        const graph = libraryGraph();
        graph.add(t('Book1', 'hasGenre', 'Fantasy'));
        const result = select(runQuery(graph, 'SELECT ?b WHERE { ?b ex:hasGenre ex:SciFi , ex:Fantasy }'));
        expect(result.rows).toEqual([[EX + 'Book1']]);
    });

    test('typed literals and numbers', () => {
        const graph = new Graph([
            triple(ex('Book1'), ex('pages'), literal('300', { datatype: XSD_NS + 'integer' })),
            triple(ex('Book1'), ex('title'), literal('Dune', { language: 'en' })),
        ]);
        expect(select(runQuery(graph, 'SELECT ?p WHERE { ex:Book1 ex:pages ?p }')).rows).toEqual([['300']]);
        expect(ask(runQuery(graph, 'ASK { ex:Book1 ex:pages 300 }'))).toBe(true);
        expect(ask(runQuery(graph, 'ASK { ex:Book1 ex:title "Dune"@en }'))).toBe(true);
        expect(ask(runQuery(graph, 'ASK { ex:Book1 ex:title "Dune" }'))).toBe(false);
    });
});

describe('ASK', () => {
    test('matching and non-matching patterns', () => {
        expect(ask(runQuery(libraryGraph(), 'ASK { ex:Book1 ex:hasGenre ex:SciFi }'))).toBe(true);
        expect(ask(runQuery(libraryGraph(), 'ASK { ex:Book1 ex:hasGenre ex:Fantasy }'))).toBe(false);
    });

    test('bare triples without braces', () => {
        expect(ask(runQuery(libraryGraph(), 'ASK ex:Book1 ex:hasGenre ex:SciFi'))).toBe(true);
    });

    test('predicate lists with a semicolon', () => {
        expect(ask(runQuery(libraryGraph(), 'ASK { ex:Book1 ex:hasAuthor ex:Alice ; ex:hasGenre ex:SciFi ; }'))).toBe(true);
    });

    test("'a' is rdf:type", () => {
        const graph = new Graph([triple(ex('Book1'), RDF_TYPE, ex('Book'))]);
        expect(ask(runQuery(graph, 'ASK { ex:Book1 a ex:Book }'))).toBe(true);
    });
});

describe('CONSTRUCT and DESCRIBE', () => {
    test('construct instantiates the template', () => {
        const graph = graphOf(runQuery(libraryGraph(), 'CONSTRUCT { ?a ex:wrote ?b } WHERE { ?b ex:hasAuthor ?a }'));
        expect(graph.size).toBe(2);
        expect(graph.has(t('Alice', 'wrote', 'Book1'))).toBe(true);
        expect(graph.has(t('Alice', 'wrote', 'Book2'))).toBe(true);
    });

    test('CONSTRUCT WHERE uses the pattern as template', () => {
        const graph = graphOf(runQuery(libraryGraph(), 'CONSTRUCT WHERE { ?b ex:hasGenre ex:SciFi }'));
        expect(graph.toArray()).toEqual([t('Book1', 'hasGenre', 'SciFi'), t('Book2', 'hasGenre', 'SciFi')]);
    });

    test('construct LIMIT applies to solutions', () => {
        const graph = graphOf(runQuery(libraryGraph(), 'CONSTRUCT { ?a ex:wrote ?b } WHERE { ?b ex:hasAuthor ?a } LIMIT 1'));
        expect(graph.toArray()).toEqual([t('Alice', 'wrote', 'Book1')]);
    });

    test('describe returns the matched triples', () => {
        const result = runQuery(libraryGraph(), 'DESCRIBE ?b WHERE { ?b ex:hasAuthor ex:Alice . ?b ex:hasGenre ?g }');
        expect(result.form).toBe('describe');
        const graph = graphOf(result);
        expect(graph.size).toBe(4);
        expect(graph.has(t('Book2', 'hasGenre', 'SciFi'))).toBe(true);
    });
});

describe('requested form', () => {
    test('case-insensitive match is accepted', () => {
        expect(runQuery(libraryGraph(), 'ASK { ?b ex:hasAuthor ?a }', 'ASK').form).toBe('ask');
    });

    test('mismatch is an evaluation error', () => {
        const error = queryError('ASK { ?b ex:hasAuthor ?a }', 'select');
        expect(error.code).toBe('QUERY_EVALUATION_ERROR');
        expect(error.message).toBe("Requested form SELECT does not match the query's ASK form");
        expect(error.details).toEqual({ requested: 'select', declared: 'ask' });
    });

    test('unknown form is an evaluation error', () => {
        const error = queryError('ASK { ?b ex:hasAuthor ?a }', 'update');
        expect(error.code).toBe('QUERY_EVALUATION_ERROR');
        expect(error.message).toBe("Unsupported query form 'update'");
    });

    test('toQueryForm normalizes names', () => {
        expect(toQueryForm(' Construct ')).toBe('construct');
    });
});

describe('query syntax errors', () => {
    const cases: Array<[string, string]> = [
        ['SELECT ?x WHERE { ?x dc:title ?t }', "Prefix 'dc:' is not declared"],
        ['SELECT ?x WHERE { ?x ex:hasAuthor }', "Triple pattern has fewer than three terms: expected a term but got '}'"],
        ['SELECT ?x WHERE { ?x ex:hasAuthor ?y', "Unbalanced braces - missing closing '}'"],
        ['SELECT ?x WHERE { OPTIONAL { ?x ex:hasAuthor ?y } }', 'OPTIONAL is not supported'],
        ['SELECT ?x WHERE { ?x hasAuthor ?y }', "Unexpected word 'hasAuthor' - use a prefixed name or an <IRI>"],
        ['ex:Book1 ex:hasAuthor ?a', "Expected SELECT, ASK, CONSTRUCT or DESCRIBE but got 'ex:Book1'"],
        ['ASK { ex:Book1 ex:hasAuthor ex:Alice } }', "Unexpected '}'"],
        ['SELECT ?b WHERE { ?b ex:hasAuthor ?a } LIMIT 1.5', 'LIMIT must be a whole number'],
        ['SELECT WHERE { ?b ex:hasAuthor ?a }', "SELECT needs '*' or at least one variable"],
        ['DESCRIBE ex:Book1', 'DESCRIBE needs a WHERE pattern'],
    ];

    test.each(cases)('%s', (text, message) => {
        const error = queryError(text);
        expect(error.code).toBe('QUERY_SYNTAX_ERROR');
        expect(error.message).toBe(message);
    });

    test('undeclared prefix keeps the prefix and a span', () => {
        const error = queryError('SELECT ?x WHERE { ?x dc:title ?t }');
        expect(error.details).toEqual({ prefix: 'dc' });
        expect(error.span).toEqual({ start: 21, end: 22, line: 1, col: 22 });
    });

    test('missing WHERE braces gets a suggestion', () => {
        const error = queryError('SELECT ?x WHERE ?x ex:hasAuthor');
        expect(error.suggestion).toBe("Wrap the triple patterns in '{ }' after WHERE");
    });
});

describe('parseQuery', () => {
    test('returns the parsed structure', () => {
        const query = parseQuery('SELECT DISTINCT ?b WHERE { ?b ex:hasAuthor ?a } LIMIT 5 OFFSET 1');
        expect(query).toEqual({
            form: 'select',
            variables: ['b'],
            where: [pattern(variable('b'), ex('hasAuthor'), variable('a'))],
            modifiers: { distinct: true, limit: 5, offset: 1 },
        });
    });

    test('uses the given namespaces for the ex prefix', () => {
        const query = parseQuery('ASK { ?s ex:p ?o }', new Namespaces({ defaultNamespace: 'http://example.com/shop#' }));
        expect(query.where[0].predicate).toEqual({ kind: 'iri', value: 'http://example.com/shop#p' });
    });
});
