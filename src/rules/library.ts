/**
 * Fixed library-domain rule sets ("basic" and "advanced").
 *
 * Each set is a pipeline of named derivation steps run once, in order. A step
 * reads the graph as it stands when the step starts and its output is merged
 * before the next step runs, so later steps see earlier derivations.
 */

import type { GroundTerm, Triple } from '../types/terms.js';
import type { StepReport } from '../types/rules.js';
import type { RecommendationStrategy } from '../types/options.js';
import { Graph } from '../graph/graph.js';
import { termEquals, termKey, triple } from '../graph/term.js';
import type { LibraryVocabulary } from './vocabulary.js';

export interface DerivationStep {
    readonly name: string;
    derive(graph: Graph, vocab: LibraryVocabulary): Triple[];
}

/**
 * Group `subject -> object` pairs by object, deduplicating subjects
 */
function groupSubjectsByObject(pairs: Array<[GroundTerm, GroundTerm]>): Array<[GroundTerm, GroundTerm[]]> {
    const groups = new Map<string, { key: GroundTerm; members: Map<string, GroundTerm> }>();
    for (const [subject, object] of pairs) {
        const k = termKey(object);
        let group = groups.get(k);
        if (!group) {
            group = { key: object, members: new Map() };
            groups.set(k, group);
        }
        group.members.set(termKey(subject), subject);
    }
    return [...groups.values()].map(g => [g.key, [...g.members.values()]]);
}

export const authorInversion: DerivationStep = {
    name: 'author-inversion',
    derive: (graph, v) =>
        graph.subjectObjects(v.hasAuthor).map(([book, author]) => triple(author, v.wrote, book)),
};

export const genreCoMembership: DerivationStep = {
    name: 'genre-co-membership',
    derive: (graph, v) => {
        const derived: Triple[] = [];
        for (const [, books] of groupSubjectsByObject(graph.subjectObjects(v.hasGenre))) {
            for (const first of books) {
                for (const second of books) {
                    if (!termEquals(first, second)) {
                        derived.push(triple(first, v.relatedTo, second));
                    }
                }
            }
        }
        return derived;
    },
};

export const frequentBorrower: DerivationStep = {
    name: 'frequent-borrower',
    derive: (graph, v) =>
        groupSubjectsByObject(graph.subjectObjects(v.borrowedBy))
            .filter(([, loans]) => loans.length > 1)
            .map(([member]) => triple(member, v.type, v.FrequentBorrower)),
};

export const authorExpertise: DerivationStep = {
    name: 'author-expertise',
    derive: (graph, v) => {
        const derived: Triple[] = [];
        for (const book of graph.subjects(v.type, v.Book)) {
            const genres = graph.objects(book, v.hasGenre);
            for (const author of graph.objects(book, v.hasAuthor)) {
                for (const genre of genres) {
                    derived.push(triple(author, v.hasExpertise, genre));
                }
            }
        }
        return derived;
    },
};

/**
 * Recommend every book in a genre the target prefers
 */
export const preferenceRecommendation: DerivationStep = {
    name: 'recommendation',
    derive: (graph, v) => {
        const derived: Triple[] = [];
        for (const [target, genre] of graph.subjectObjects(v.prefersGenre)) {
            for (const book of graph.subjects(v.hasGenre, genre)) {
                derived.push(triple(book, v.recommendedFor, target));
            }
        }
        return derived;
    },
};

/**
 * Recommend to each borrower every book sharing a genre with a book on one of their loans.
 * A loan's books are the loan's objects that carry a genre.
 */
export const loanHistoryRecommendation: DerivationStep = {
    name: 'recommendation',
    derive: (graph, v) => {
        const derived: Triple[] = [];
        for (const loan of graph.subjects(v.type, v.Loan)) {
            const members = graph.objects(loan, v.borrowedBy);
            const genres = graph.match(loan)
                .flatMap(t => t.object.kind === 'literal' ? [] : graph.objects(t.object, v.hasGenre));
            for (const genre of genres) {
                for (const book of graph.subjects(v.hasGenre, genre)) {
                    for (const member of members) {
                        derived.push(triple(book, v.recommendedFor, member));
                    }
                }
            }
        }
        return derived;
    },
};

export const BASIC_STEPS: readonly DerivationStep[] = [
    authorInversion,
    genreCoMembership,
    frequentBorrower,
];

export function advancedSteps(strategy: RecommendationStrategy = 'preference'): DerivationStep[] {
    return [
        ...BASIC_STEPS,
        authorExpertise,
        strategy === 'loan-history' ? loanHistoryRecommendation : preferenceRecommendation,
    ];
}

/**
 * Run steps in order against the graph, adding each step's output before the next starts.
 */
export function runPipeline(
    graph: Graph,
    steps: readonly DerivationStep[],
    vocab: LibraryVocabulary
): StepReport[] {
    return steps.map(step => ({
        name: step.name,
        derived: graph.addAll(step.derive(graph, vocab)),
    }));
}
