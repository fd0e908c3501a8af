/**
 * Query Types
 */

import type { TriplePattern, TripleTemplate } from './terms.js';
import type { Graph } from '../graph/graph.js';

export type QueryForm = 'select' | 'ask' | 'construct' | 'describe';

export const QUERY_FORMS: readonly QueryForm[] = ['select', 'ask', 'construct', 'describe'];

export interface SolutionModifiers {
    distinct?: boolean;
    limit?: number;
    offset?: number;
}

export type ParsedQuery =
    | { form: 'select'; variables: string[]; where: TriplePattern[]; modifiers: SolutionModifiers }
    | { form: 'ask'; where: TriplePattern[]; modifiers: SolutionModifiers }
    | { form: 'construct'; template: TripleTemplate[]; where: TriplePattern[]; modifiers: SolutionModifiers }
    | { form: 'describe'; where: TriplePattern[]; modifiers: SolutionModifiers };

export interface SelectResult {
    form: 'select';
    headers: string[];
    rows: string[][];
}

export interface AskResult {
    form: 'ask';
    value: boolean;
}

export interface GraphResult {
    form: 'construct' | 'describe';
    graph: Graph;
}

export type QueryResult = SelectResult | AskResult | GraphResult;
