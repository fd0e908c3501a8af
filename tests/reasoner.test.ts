/**
 * Tests for the GraphReasoner facade
 */

import { GraphReasoner, createGraphReasoner } from '../src/reasoner.js';
import { Graph } from '../src/graph/graph.js';
import { iri, triple } from '../src/graph/term.js';
import { EX, libraryGraph } from './fixtures.js';

describe('GraphReasoner', () => {
    test('applies rules, then answers the query', () => {
        const reasoner = createGraphReasoner();
        const { result, diagnostics, statistics } = reasoner.reason(libraryGraph(), {
            modes: [{ kind: 'basic' }],
            query: 'SELECT ?c WHERE { ex:Bob a ?c }',
        });

        expect(result).toEqual({ form: 'select', headers: ['c'], rows: [[EX + 'FrequentBorrower']] });
        expect(diagnostics).toEqual([]);
        expect(statistics.inputTriples).toBe(6);
        expect(statistics.derivedTriples).toBe(5);
        expect(statistics.timeMs).toBeGreaterThanOrEqual(0);
    });

    test('without rules the query sees the input only', () => {
        const { result } = new GraphReasoner().reason(libraryGraph(), {
            query: 'ASK { ex:Alice ex:wrote ?b }',
            form: 'ask',
        });
        expect(result).toEqual({ form: 'ask', value: false });
    });

    test('diagnostics from skipped declarative rules are returned', () => {
        const { diagnostics, graph } = new GraphReasoner().reason(libraryGraph(), {
            modes: [{ kind: 'declarative', text: '?b ex:hasAuthor ?a =>> ?a ex:wrote ?b\n?b ex:hasAuthor ?a => ?a ex:wrote ?b' }],
            query: 'ASK { ex:Alice ex:wrote ex:Book1 }',
        });
        expect(diagnostics.map(d => d.line)).toEqual([1]);
        expect(graph.size).toBe(8);
    });

    test('accepts one mode or a list', () => {
        const reasoner = new GraphReasoner();
        expect(reasoner.applyRules(libraryGraph(), { kind: 'basic' }).derived).toBe(5);
        expect(reasoner.applyRules(libraryGraph(), [{ kind: 'basic' }, { kind: 'none' }]).derived).toBe(5);
    });

    test('configured prefixes apply to queries and rules', () => {
        const reasoner = new GraphReasoner({ prefixes: { lib: EX } });
        const result = reasoner.runQuery(libraryGraph(), 'ASK { lib:Book1 lib:hasGenre lib:SciFi }');
        expect(result).toEqual({ form: 'ask', value: true });

        const applied = reasoner.applyRules(libraryGraph(), {
            kind: 'declarative',
            text: '?b lib:hasAuthor ?a => ?a lib:wrote ?b',
        });
        expect(applied.derived).toBe(2);
    });

    test('configured default namespace drives the fixed rules', () => {
        const shop = 'http://example.com/shop#';
        const input = new Graph([triple(iri(shop + 'Item1'), iri(shop + 'hasAuthor'), iri(shop + 'Eve'))]);
        const reasoner = new GraphReasoner({ defaultNamespace: shop });
        const { result } = reasoner.reason(input, {
            modes: [{ kind: 'basic' }],
            query: 'SELECT ?w WHERE { ?a ex:wrote ?w }',
        });
        expect(result).toEqual({ form: 'select', headers: ['w'], rows: [[shop + 'Item1']] });
    });

    test('query errors propagate', () => {
        expect(() => new GraphReasoner().runQuery(libraryGraph(), 'SELECT ?b WHERE { ?b ex:hasAuthor }'))
            .toThrow("Triple pattern has fewer than three terms: expected a term but got '}'");
    });
});
