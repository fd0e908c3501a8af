/**
 * Shared type definitions for graph-reasoner
 */

// Re-export error types
export {
    ReasonerException,
    isReasonerException,
    getSuggestion,
    createSyntaxError,
    createRuleSyntaxError,
    createQuerySyntaxError,
    createQueryEvaluationError,
    createUnresolvedPrefixError,
    createInvalidTermError,
    createInvalidArgumentError,
    createSourceUnavailableError,
    createExtractionError,
    serializeReasonerError,
} from './errors.js';

export type {
    ReasonerErrorCode,
    ErrorSpan,
    ReasonerError,
} from './errors.js';

// Re-export term types
export type {
    IriTerm,
    BlankNodeTerm,
    LiteralTerm,
    VariableTerm,
    Term,
    TermKind,
    GroundTerm,
    Triple,
    TriplePattern,
    TripleTemplate,
    Binding,
} from './terms.js';

// Re-export parser types
export type {
    TokenType,
    Token,
} from './parser.js';

// Re-export query types
export { QUERY_FORMS } from './query.js';
export type {
    QueryForm,
    SolutionModifiers,
    ParsedQuery,
    SelectResult,
    AskResult,
    GraphResult,
    QueryResult,
} from './query.js';

// Re-export rule types
export type {
    Rule,
    RuleMode,
    RuleModeKind,
    RuleOutcome,
    RuleDiagnostic,
    DeclarativeBatchReport,
    HeuristicBatchReport,
    StepReport,
    RuleApplication,
} from './rules.js';

// Re-export options
export {
    DEFAULTS,
    RDF_NS,
    RDFS_NS,
    XSD_NS,
    OWL_NS,
} from './options.js';

export type {
    RecommendationStrategy,
    NamespaceOptions,
    RuleEngineOptions,
    ReasonerConfig,
} from './options.js';

// Re-export response types
export type {
    Verbosity,
    SerializedQueryResult,
    ResponseStatistics,
    MinimalQueryResponse,
    StandardQueryResponse,
    DetailedQueryResponse,
    QueryResponse,
    MinimalRulesResponse,
    StandardRulesResponse,
    DetailedRulesResponse,
    RulesResponse,
    RuleCheck,
    CheckRulesResponse,
} from './responses.js';
