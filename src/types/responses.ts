/**
 * Response types for the graph-reasoner tools
 */

import type { QueryForm } from './query.js';
import type { ReasonerError } from './errors.js';
import type { RuleDiagnostic, StepReport } from './rules.js';

/**
 * Verbosity level for responses
 */
export type Verbosity = 'minimal' | 'standard' | 'detailed';

/**
 * Query answer in JSON form: a table, a boolean, or N-Triples text
 */
export type SerializedQueryResult =
    | { headers: string[]; rows: string[][] }
    | boolean
    | string;

export interface ResponseStatistics {
    inputTriples: number;
    derivedTriples: number;
    timeMs: number;
}

/**
 * Minimal response - form and answer only
 */
export interface MinimalQueryResponse {
    success: boolean;
    form: QueryForm;
    result: SerializedQueryResult;
}

/**
 * Standard response - adds a summary and skipped-rule diagnostics
 */
export interface StandardQueryResponse extends MinimalQueryResponse {
    message: string;
    diagnostics?: RuleDiagnostic[];
}

/**
 * Detailed response - adds rule steps and timing
 */
export interface DetailedQueryResponse extends StandardQueryResponse {
    steps: StepReport[];
    statistics: ResponseStatistics;
}

export type QueryResponse = MinimalQueryResponse | StandardQueryResponse | DetailedQueryResponse;

export interface MinimalRulesResponse {
    success: boolean;
    /** Enriched graph as N-Triples */
    triples: string;
}

export interface StandardRulesResponse extends MinimalRulesResponse {
    message: string;
    derived: number;
    diagnostics?: RuleDiagnostic[];
}

export interface DetailedRulesResponse extends StandardRulesResponse {
    steps: StepReport[];
    statistics: ResponseStatistics;
}

export type RulesResponse = MinimalRulesResponse | StandardRulesResponse | DetailedRulesResponse;

/**
 * Validation of a single rule line
 */
export interface RuleCheck {
    line: number;
    source: string;
    kind: 'rule' | 'prefix';
    valid: boolean;
    error?: ReasonerError;
}

export interface CheckRulesResponse {
    valid: boolean;
    rules: RuleCheck[];
}
