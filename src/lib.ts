/**
 * graph-reasoner - Library Entry Point
 *
 * This file should NOT import @modelcontextprotocol/sdk or any other
 * server-specific dependencies.
 */

// Data model
export { Graph } from './graph/graph.js';
export { Namespaces, looksLikeAbsoluteIri } from './graph/namespaces.js';
export {
    iri,
    blankNode,
    literal,
    variable,
    isVariable,
    isGround,
    termEquals,
    termKey,
    renderTerm,
    triple,
    pattern,
    patternVariables,
} from './graph/term.js';

// Parsing
export { Tokenizer, tokenize } from './parser/index.js';
export { RuleParser, parseRule, parseRuleBatch, splitRuleLines, parsePrefixDirective } from './rules/parser.js';

// Query engine
export {
    QueryParser,
    parseQuery,
    evaluate,
    instantiate,
    substitute,
    projectSelect,
    projectAsk,
    projectConstruct,
    projectDescribe,
    executeQuery,
    runQuery,
    toQueryForm,
} from './query/index.js';

// Rule engine
export {
    RuleEngine,
    createRuleEngine,
    applyRules,
    parseRuleMode,
    RULE_MODE_KINDS,
    applyDeclarativeRules,
    applyHeuristicRules,
    checkRules,
} from './rules/index.js';
export type { RuleEngineConfig, DerivationStep, LibraryVocabulary } from './rules/index.js';

// Facade
export { GraphReasoner, createGraphReasoner } from './reasoner.js';
export type { ReasonOptions, ReasonResult, ReasonStatistics } from './reasoner.js';

// I/O
export { parseGraph, readGraphFile, serializeGraph, formatForPath } from './io/turtle.js';
export type { GraphFormat, ParseGraphOptions } from './io/turtle.js';

// Configuration and logging
export { loadConfig } from './config.js';
export { createLogger, silentLogger } from './utils/logger.js';
export type { Logger, LoggerOptions } from './utils/logger.js';

// Types and Interfaces
export * from './types/index.js';
