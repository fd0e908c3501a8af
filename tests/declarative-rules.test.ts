/**
 * Tests for the declarative rule tier
 */

import { applyDeclarativeRules, checkRules, fireRule } from '../src/rules/declarative.js';
import { parseRule } from '../src/rules/parser.js';
import { Graph } from '../src/graph/graph.js';
import { Namespaces } from '../src/graph/namespaces.js';
import type { Logger } from '../src/utils/logger.js';
import { RDF_TYPE, ex, expectNoTriple, expectTriple, libraryGraph, t } from './fixtures.js';

const WROTE_RULE = '?x ex:hasAuthor ?y => ?y ex:wrote ?x';

function mockLogger() {
    const logger = {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    };
    return logger satisfies Logger;
}

describe('fireRule', () => {
    test('instantiates the consequent per solution', () => {
        expect(fireRule(libraryGraph(), parseRule(WROTE_RULE))).toEqual([
            t('Alice', 'wrote', 'Book1'),
            t('Alice', 'wrote', 'Book2'),
        ]);
    });

    test('unconditional rule fires once', () => {
        expect(fireRule(new Graph(), parseRule('=> ex:Library ex:opens ex:Monday'))).toEqual([
            t('Library', 'opens', 'Monday'),
        ]);
    });
});

describe('applyDeclarativeRules', () => {
    test('derives two triples, then nothing on re-application', () => {
        const first = applyDeclarativeRules(libraryGraph(), WROTE_RULE);
        expect(first.report.derived).toBe(2);
        expect(first.graph.size).toBe(8);

        const second = applyDeclarativeRules(first.graph, WROTE_RULE);
        expect(second.report.derived).toBe(0);
        expect(second.graph.size).toBe(8);
    });

    test('a malformed line is skipped and the valid one still applies', () => {
        const { graph, report } = applyDeclarativeRules(
            libraryGraph(),
            `ex:Book1 ex:hasGenre ex:SciFi\n${WROTE_RULE}`
        );

        expectTriple(graph, ex('Alice'), ex('wrote'), ex('Book1'));
        expect(report.applied).toBe(1);
        expect(report.skipped).toBe(1);
        expect(report.outcomes[0]).toMatchObject({
            status: 'skipped',
            line: 1,
            source: 'ex:Book1 ex:hasGenre ex:SciFi',
            error: { code: 'RULE_SYNTAX_ERROR', message: "Rule must contain exactly one '=>'" },
        });
        expect(report.outcomes[1]).toEqual({ status: 'applied', line: 2, source: WROTE_RULE, derived: 2 });
    });

    test('the input graph is left untouched and contained in the output', () => {
        const input = libraryGraph();
        const { graph } = applyDeclarativeRules(input, `${WROTE_RULE}\n?b ex:hasGenre ?g => ?g ex:genreOf ?b`);
        expect(input.size).toBe(6);
        for (const triple of input) {
            expect(graph.has(triple)).toBe(true);
        }
    });

    test('later rules see earlier derivations', () => {
        const { graph, report } = applyDeclarativeRules(
            libraryGraph(),
            `${WROTE_RULE}\n?a ex:wrote ?b => ?a rdf:type ex:Author`
        );
        expectTriple(graph, ex('Alice'), RDF_TYPE, ex('Author'));
        expect(report.outcomes.map(o => o.status === 'applied' ? o.derived : -1)).toEqual([2, 1]);
    });

    test('a rule does not see its own output in the same pass', () => {
        const chain = new Graph([
            t('A', 'relatedTo', 'B'),
            t('B', 'relatedTo', 'C'),
            t('C', 'relatedTo', 'D'),
        ]);
        const rule = '?a ex:relatedTo ?b . ?b ex:relatedTo ?c => ?a ex:relatedTo ?c';

        const first = applyDeclarativeRules(chain, rule);
        expectTriple(first.graph, ex('A'), ex('relatedTo'), ex('C'));
        expectTriple(first.graph, ex('B'), ex('relatedTo'), ex('D'));
        expectNoTriple(first.graph, ex('A'), ex('relatedTo'), ex('D'));

        const second = applyDeclarativeRules(first.graph, rule);
        expectTriple(second.graph, ex('A'), ex('relatedTo'), ex('D'));
    });

    test('prefix directives bind for the rest of the batch', () => {
        const { report } = applyDeclarativeRules(
            libraryGraph(),
            '@prefix lib: <http://example.org/library#> .\n?b lib:hasAuthor ?a => ?a lib:wrote ?b'
        );
        expect(report.outcomes).toEqual([
            { status: 'applied', line: 2, source: '?b lib:hasAuthor ?a => ?a lib:wrote ?b', derived: 2 },
        ]);
    });

    test('bare words use the default namespace', () => {
        const { report } = applyDeclarativeRules(libraryGraph(), '?b hasAuthor ?a => ?a wrote ?b');
        expect(report.derived).toBe(2);
    });

    test('custom default namespace', () => {
        const ns = new Namespaces({ defaultNamespace: 'http://example.com/shop#' });
        const { report } = applyDeclarativeRules(libraryGraph(), '?b hasAuthor ?a => ?a wrote ?b', ns);
        expect(report.derived).toBe(0);
    });

    test('an undeclared prefix skips the rule and logs a warning', () => {
        const logger = mockLogger();
        const source = '?b dc:creator ?a => ?a ex:wrote ?b';
        const { report } = applyDeclarativeRules(libraryGraph(), source, new Namespaces(), logger);

        expect(report.outcomes[0]).toMatchObject({
            status: 'skipped',
            error: { code: 'RULE_SYNTAX_ERROR', message: "Prefix 'dc:' is not declared", details: { prefix: 'dc' } },
        });
        expect(logger.warn).toHaveBeenCalledWith(
            "Skipping rule on line 1: Prefix 'dc:' is not declared",
            { rule: source }
        );
    });

    test('comments and blank lines are not rules', () => {
        const { report } = applyDeclarativeRules(libraryGraph(), `# authorship\n\n${WROTE_RULE}`);
        expect(report.outcomes).toHaveLength(1);
        expect(report.outcomes[0].line).toBe(3);
    });
});

describe('checkRules', () => {
    test('reports each line without applying', () => {
        const checks = checkRules('PREFIX dc: <http://purl.org/dc/terms/>\n?b dc:creator ?a => ?a ex:wrote ?b\n?b ex:p => ?b ex:q ?b');
        expect(checks.map(c => [c.line, c.kind, c.valid])).toEqual([
            [1, 'prefix', true],
            [2, 'rule', true],
            [3, 'rule', false],
        ]);
        expect(checks[2].error?.message).toBe('Clause must have exactly three terms (subject predicate object), got 2');
    });

    test('malformed prefix directive', () => {
        const [check] = checkRules('@prefix dc <http://purl.org/dc/terms/> .');
        expect(check.kind).toBe('prefix');
        expect(check.valid).toBe(false);
        expect(check.error?.message).toBe("Malformed prefix directive, expected '@prefix p: <iri> .'");
    });
});
