/**
 * Structured Error System for graph-reasoner
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for reasoning and query operations
 */
export type ReasonerErrorCode =
    | 'RULE_SYNTAX_ERROR'       // Malformed declarative or heuristic rule text
    | 'QUERY_SYNTAX_ERROR'      // Malformed query text or pattern arity
    | 'QUERY_EVALUATION_ERROR'  // Unsupported or mismatched query form
    | 'UNRESOLVED_PREFIX'       // Compact identifier with an undeclared prefix
    | 'INVALID_TERM'            // Term constructed with contradictory parts
    | 'INVALID_ARGUMENT'        // Bad configuration or tool argument
    | 'SOURCE_UNAVAILABLE'      // Graph source could not be read
    | 'EXTRACTION_FAILED';      // Graph source could not be parsed into triples

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
    start: number;
    end: number;
    line?: number;
    col?: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface ReasonerError {
    code: ReasonerErrorCode;
    message: string;
    span?: ErrorSpan;
    suggestion?: string;
    context?: string;          // The offending rule line or query text
    details?: Record<string, unknown>;
}

/**
 * Exception class wrapping ReasonerError for throw/catch patterns
 */
export class ReasonerException extends Error {
    public readonly error: ReasonerError;

    constructor(error: ReasonerError) {
        super(error.message);
        this.name = 'ReasonerException';
        this.error = error;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, ReasonerException);
        }
    }

    get code(): ReasonerErrorCode {
        return this.error.code;
    }

    toJSON(): ReasonerError {
        return this.error;
    }
}

/**
 * Type guard for a ReasonerException, optionally of a given code
 */
export function isReasonerException(value: unknown, code?: ReasonerErrorCode): value is ReasonerException {
    return value instanceof ReasonerException && (code === undefined || value.error.code === code);
}

/**
 * Common syntax mistakes in rule and query text and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
    pattern: RegExp;
    suggestion: string;
}> = [
        {
            pattern: /=>.*=>/,
            suggestion: "A rule may contain only one '=>' - split it into separate lines",
        },
        {
            pattern: /\{[^}]*$/,
            suggestion: "Unbalanced braces - missing closing '}'",
        },
        {
            pattern: /^[^{]*\}/,
            suggestion: "Unbalanced braces - missing opening '{'",
        },
        {
            pattern: /(^|\s)\?(\s|$)/,
            suggestion: "A variable needs a name after '?' (e.g. '?x')",
        },
        {
            pattern: /^\s*(select|ask|construct|describe)\b[^{]*$/i,
            suggestion: "Wrap the triple patterns in '{ }' after WHERE",
        },
        {
            pattern: /^(?!.*=>)(?!\s*(prefix|select|ask|construct|describe)\b).*\?[A-Za-z_]/i,
            suggestion: "Rules need an '=>' between the condition and the conclusion",
        },
    ];

/**
 * Get a suggestion for a syntax error based on the input
 */
export function getSuggestion(input: string): string | undefined {
    for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
        if (pattern.test(input)) {
            return suggestion;
        }
    }
    return undefined;
}

/**
 * Create a syntax error of the given code, with optional span and suggestion
 */
export function createSyntaxError(
    code: 'RULE_SYNTAX_ERROR' | 'QUERY_SYNTAX_ERROR',
    message: string,
    input: string,
    position?: number,
    details?: Record<string, unknown>
): ReasonerException {
    const span = position !== undefined && position >= 0 ? {
        start: position,
        end: position + 1,
        line: getLineNumber(input, position),
        col: getColumnNumber(input, position),
    } : undefined;

    return new ReasonerException({
        code,
        message,
        span,
        suggestion: getSuggestion(input),
        context: input,
        details,
    });
}

export function createRuleSyntaxError(
    message: string,
    input: string,
    position?: number,
    details?: Record<string, unknown>
): ReasonerException {
    return createSyntaxError('RULE_SYNTAX_ERROR', message, input, position, details);
}

export function createQuerySyntaxError(
    message: string,
    input: string,
    position?: number,
    details?: Record<string, unknown>
): ReasonerException {
    return createSyntaxError('QUERY_SYNTAX_ERROR', message, input, position, details);
}

/**
 * Create a query evaluation error (unsupported or mismatched form)
 */
export function createQueryEvaluationError(
    message: string,
    details?: Record<string, unknown>
): ReasonerException {
    return new ReasonerException({
        code: 'QUERY_EVALUATION_ERROR',
        message,
        suggestion: 'Use one of SELECT, ASK, CONSTRUCT or DESCRIBE and make the requested form match the query text',
        details,
    });
}

/**
 * Create an unresolved prefix error
 */
export function createUnresolvedPrefixError(prefix: string, token: string): ReasonerException {
    return new ReasonerException({
        code: 'UNRESOLVED_PREFIX',
        message: `Prefix '${prefix}:' is not declared`,
        suggestion: `Declare it (e.g. 'PREFIX ${prefix}: <http://example.org/>') or write the full IRI in angle brackets`,
        context: token,
        details: { prefix },
    });
}

/**
 * Create an invalid term error
 */
export function createInvalidTermError(message: string, details?: Record<string, unknown>): ReasonerException {
    return new ReasonerException({
        code: 'INVALID_TERM',
        message,
        details,
    });
}

/**
 * Create an invalid argument error (configuration, tool input)
 */
export function createInvalidArgumentError(message: string, details?: Record<string, unknown>): ReasonerException {
    return new ReasonerException({
        code: 'INVALID_ARGUMENT',
        message,
        details,
    });
}

/**
 * Create a source unavailable error
 */
export function createSourceUnavailableError(source: string, cause: string): ReasonerException {
    return new ReasonerException({
        code: 'SOURCE_UNAVAILABLE',
        message: `Could not read graph source '${source}': ${cause}`,
        suggestion: 'Check that the file exists and is readable',
        details: { source },
    });
}

/**
 * Create an extraction failure error
 */
export function createExtractionError(message: string, details?: Record<string, unknown>): ReasonerException {
    return new ReasonerException({
        code: 'EXTRACTION_FAILED',
        message: `Could not extract triples: ${message}`,
        suggestion: 'Check that the data is valid Turtle, N-Triples or N3',
        details,
    });
}

/**
 * Get line number from position in string
 */
function getLineNumber(input: string, position: number): number {
    const lines = input.substring(0, position).split('\n');
    return lines.length;
}

/**
 * Get column number from position in string
 */
function getColumnNumber(input: string, position: number): number {
    const lastNewline = input.lastIndexOf('\n', position - 1);
    return position - lastNewline;
}

/**
 * Serialize a ReasonerError for JSON output
 */
export function serializeReasonerError(error: ReasonerError): ReasonerError {
    return {
        code: error.code,
        message: error.message,
        ...(error.span && { span: error.span }),
        ...(error.suggestion && { suggestion: error.suggestion }),
        ...(error.context && { context: error.context }),
        ...(error.details && { details: error.details }),
    };
}
