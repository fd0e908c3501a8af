/**
 * Rule Types
 */

import type { TriplePattern, TripleTemplate } from './terms.js';
import type { ReasonerError } from './errors.js';
import type { Graph } from '../graph/graph.js';

export interface Rule {
    antecedent: TriplePattern[];
    consequent: TripleTemplate[];
    /** Original rule text */
    source: string;
}

/**
 * Which rule tier to apply. Adding a tier means adding a variant.
 */
export type RuleMode =
    | { kind: 'none' }
    | { kind: 'basic' }
    | { kind: 'advanced' }
    | { kind: 'custom'; text: string }
    | { kind: 'declarative'; text: string };

export type RuleModeKind = RuleMode['kind'];

/**
 * Outcome of a single declarative rule line
 */
export type RuleOutcome =
    | { status: 'applied'; line: number; source: string; derived: number }
    | { status: 'skipped'; line: number; source: string; error: ReasonerError };

export type RuleDiagnostic = Extract<RuleOutcome, { status: 'skipped' }>;

export interface DeclarativeBatchReport {
    outcomes: RuleOutcome[];
    applied: number;
    skipped: number;
    derived: number;
}

export interface HeuristicBatchReport {
    recognized: number;
    ignored: number;
    /** Names of the derivations that fired */
    triggered: string[];
    derived: number;
}

export interface StepReport {
    /** Derivation step or tier name */
    name: string;
    derived: number;
}

export interface RuleApplication {
    graph: Graph;
    /** Number of triples added over the input */
    derived: number;
    steps: StepReport[];
    diagnostics: RuleDiagnostic[];
}
