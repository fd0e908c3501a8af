/**
 * Tests for rule mode dispatch and composition
 */

import { RuleEngine, createRuleEngine, parseRuleMode, RULE_MODE_KINDS } from '../src/rules/engine.js';
import { isReasonerException } from '../src/types/errors.js';
import type { Logger } from '../src/utils/logger.js';
import { RDF_TYPE, ex, expectTriple, libraryGraph } from './fixtures.js';

describe('RuleEngine', () => {
    test("'none' returns an equal copy", () => {
        const input = libraryGraph();
        const result = createRuleEngine().apply(input, { kind: 'none' });
        expect(result.graph).not.toBe(input);
        expect(result.graph.toArray()).toEqual(input.toArray());
        expect(result.derived).toBe(0);
        expect(result.steps).toEqual([]);
    });

    test('applyAll runs tiers on each previous output', () => {
        const engine = new RuleEngine();
        const result = engine.applyAll(libraryGraph(), [
            { kind: 'basic' },
            { kind: 'declarative', text: '?a ex:wrote ?b . ?b ex:relatedTo ?c => ?a ex:mayWrite ?c\nno arrow here' },
        ]);

        expectTriple(result.graph, ex('Alice'), ex('mayWrite'), ex('Book2'));
        expect(result.derived).toBe(7);
        expect(result.steps.map(s => s.name)).toEqual([
            'author-inversion',
            'genre-co-membership',
            'frequent-borrower',
            'declarative',
        ]);
        expect(result.diagnostics).toHaveLength(1);
        expect(result.diagnostics[0].line).toBe(2);
    });

    test('applyAll with no tiers copies the graph', () => {
        const input = libraryGraph();
        const result = new RuleEngine().applyAll(input, []);
        expect(result.graph).not.toBe(input);
        expect(result.graph.size).toBe(6);
        expect(result.derived).toBe(0);
    });

    test('tiers only add triples, so order of composition keeps the input', () => {
        const input = libraryGraph();
        const result = new RuleEngine().applyAll(input, [
            { kind: 'custom', text: 'IF hasAuthor THEN wrote' },
            { kind: 'basic' },
        ]);
        for (const triple of input) {
            expect(result.graph.has(triple)).toBe(true);
        }
        expectTriple(result.graph, ex('Bob'), RDF_TYPE, ex('FrequentBorrower'));
        expect(result.derived).toBe(5);
    });

    test('logs the outcome of each tier', () => {
        const logger = {
            debug: jest.fn(),
            info: jest.fn(),
            warn: jest.fn(),
            error: jest.fn(),
        } satisfies Logger;
        new RuleEngine({ logger }).apply(libraryGraph(), { kind: 'basic' });

        expect(logger.debug).toHaveBeenCalledWith('Applying basic rules', { triples: 6 });
        expect(logger.info).toHaveBeenCalledWith('basic rules derived 5 triples', {
            steps: 'author-inversion=2, genre-co-membership=2, frequent-borrower=1',
            skipped: 0,
        });
    });
});

describe('parseRuleMode', () => {
    test('modes without text', () => {
        expect(parseRuleMode('none')).toEqual({ kind: 'none' });
        expect(parseRuleMode('advanced', 'ignored')).toEqual({ kind: 'advanced' });
    });

    test('modes with text', () => {
        expect(parseRuleMode('declarative', 'a b c => d e f')).toEqual({ kind: 'declarative', text: 'a b c => d e f' });
    });

    test('unknown mode', () => {
        expect(() => parseRuleMode('fixpoint')).toThrow(
            `Unknown rule mode 'fixpoint'. Expected one of: ${RULE_MODE_KINDS.join(', ')}`
        );
    });

    test('custom needs text', () => {
        try {
            parseRuleMode('custom');
            throw new Error('expected parseRuleMode to fail');
        } catch (e) {
            expect(isReasonerException(e, 'INVALID_ARGUMENT')).toBe(true);
            expect(e instanceof Error && e.message).toBe("Rule mode 'custom' needs rule text");
        }
    });
});
