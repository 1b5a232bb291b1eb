/**
 * Error taxonomy and SQLSTATE classification.
 *
 * Build-time errors (extraction, embedding) abort the build. Query-time errors
 * that the repair loop can act on (syntax, generation parse, repairable
 * execution failures) stay inside the loop; infrastructure failures and
 * policy violations do not.
 */

export type ErrorType =
	| "config"
	| "extraction"
	| "embedding"
	| "generation"
	| "generation_parse"
	| "syntax"
	| "execution"
	| "policy"
	| "knowledge_base"
	| "timeout"
	| "cancelled"

export class Text2SQLError extends Error {
	constructor(
		public type: ErrorType,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "Text2SQLError"
	}
}

export class ConfigError extends Text2SQLError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("config", message, false, context)
		this.name = "ConfigError"
	}
}

/** Metadata source unreachable or schema unreadable. Fatal to the build run. */
export class ExtractionError extends Text2SQLError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("extraction", message, false, context)
		this.name = "ExtractionError"
	}
}

/** Transport or model failure of the embedding service. Never defaulted to a zero vector. */
export class EmbeddingServiceError extends Text2SQLError {
	constructor(message: string, recoverable: boolean = true, context?: Record<string, unknown>) {
		super("embedding", message, recoverable, context)
		this.name = "EmbeddingServiceError"
	}
}

/** Transport failure or timeout of the language model service. */
export class LanguageModelError extends Text2SQLError {
	constructor(
		message: string,
		public timedOut: boolean = false,
		context?: Record<string, unknown>,
	) {
		super(timedOut ? "timeout" : "generation", message, timedOut, context)
		this.name = "LanguageModelError"
	}
}

/** Model output contained no single SQL statement. Consumes one attempt as a syntax failure. */
export class GenerationParseError extends Text2SQLError {
	constructor(
		message: string,
		public rawOutput: string,
	) {
		super("generation_parse", message, true, { raw_output_chars: rawOutput.length })
		this.name = "GenerationParseError"
	}
}

export class SqlSyntaxError extends Text2SQLError {
	constructor(
		message: string,
		public offset: number | null,
	) {
		super("syntax", message, true, { offset })
		this.name = "SqlSyntaxError"
	}
}

/**
 * Execution error classification
 *
 * - infra_failure: connection, pool, resource errors (never retried)
 * - query_timeout: statement or call timeout (retried, counts against budget)
 * - validation_block: permission or unsupported feature (never retried)
 * - sql_error: SQL error the model can repair
 * - unknown: unclassified, repaired like an sql_error
 */
export type ExecutionErrorClass =
	| "infra_failure"
	| "query_timeout"
	| "validation_block"
	| "sql_error"
	| "unknown"

export class ExecutionError extends Text2SQLError {
	constructor(
		message: string,
		public sqlstate: string | null,
		public position: number | null,
		public errorClass: ExecutionErrorClass,
		context?: Record<string, unknown>,
	) {
		super(
			errorClass === "query_timeout" ? "timeout" : "execution",
			message,
			errorClass === "sql_error" || errorClass === "query_timeout" || errorClass === "unknown",
			{ sqlstate, position, error_class: errorClass, ...context },
		)
		this.name = "ExecutionError"
	}
}

/** Generated statement is not a read query. Fixed policy, never sent back for repair. */
export class PolicyViolationError extends Text2SQLError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("policy", message, false, context)
		this.name = "PolicyViolationError"
	}
}

export class KnowledgeBaseError extends Text2SQLError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("knowledge_base", message, false, context)
		this.name = "KnowledgeBaseError"
	}
}

export class QueryCancelledError extends Text2SQLError {
	constructor(stage: string) {
		super("cancelled", `Query cancelled before ${stage}`, false, { stage })
		this.name = "QueryCancelledError"
	}
}

// ============================================================================
// SQLSTATE classification
// ============================================================================

export const SQLSTATE_CLASSIFICATION = {
	infrastructure: [
		"08", // Connection exception
		"53", // Insufficient resources
		"54", // Program limit exceeded
		"58", // System error
		"F0", // Config file error
		"XX", // Internal error
	],

	failFast: [
		"0A", // Feature not supported
		"25006", // Read-only transaction (write attempted)
		"42501", // Insufficient privilege
	],

	timeout: [
		"57014", // Query canceled (statement_timeout)
	],

	repairable: [
		"42601", // Syntax error
		"42P01", // Undefined table
		"42703", // Undefined column
		"42P09", // Ambiguous alias
		"42702", // Ambiguous column
		"42P10", // Invalid column reference
		"42804", // Datatype mismatch
		"42883", // Undefined function
		"42803", // Grouping error
		"22", // Data exception (e.g., division by zero)
	],
}

function matchesClass(sqlstate: string, codes: string[]): boolean {
	if (codes.includes(sqlstate)) return true
	return codes.some((prefix) => prefix.length === 2 && sqlstate.startsWith(prefix))
}

export function isInfrastructureError(sqlstate: string): boolean {
	return matchesClass(sqlstate, SQLSTATE_CLASSIFICATION.infrastructure)
}

export function isTimeoutError(sqlstate: string): boolean {
	return SQLSTATE_CLASSIFICATION.timeout.includes(sqlstate)
}

export function isRepairableError(sqlstate: string): boolean {
	return matchesClass(sqlstate, SQLSTATE_CLASSIFICATION.repairable)
}

export function isFailFastError(sqlstate: string): boolean {
	return matchesClass(sqlstate, SQLSTATE_CLASSIFICATION.failFast)
}

export function classifySqlstate(sqlstate: string | null): ExecutionErrorClass {
	if (!sqlstate) return "unknown"
	if (isInfrastructureError(sqlstate)) return "infra_failure"
	if (isTimeoutError(sqlstate)) return "query_timeout"
	if (isRepairableError(sqlstate)) return "sql_error"
	if (isFailFastError(sqlstate)) return "validation_block"
	return "unknown"
}

/**
 * Repair hint for an SQLSTATE, included in repair prompts.
 */
export function getSQLSTATEHint(sqlstate: string | null): string {
	const hints: Record<string, string> = {
		"42601": "Fix SQL syntax based on the error position",
		"42P01": "Use a table name from the schema context",
		"42703": "Use a column name that exists in the schema context",
		"42702": "Qualify the ambiguous column with its table alias",
		"42P09": "Use distinct table aliases",
		"42P10": "Add a table qualifier to the column reference",
		"42804": "Fix the datatype mismatch in the comparison",
		"42883": "Use a function that exists in this dialect or cast the arguments",
		"42803": "Add the column to GROUP BY or wrap it in an aggregate",
		"22012": "Avoid division by zero with NULLIF or CASE",
		"57014": "The query timed out; simplify it or add filters",
	}
	if (sqlstate && hints[sqlstate]) return hints[sqlstate]
	return "Review the error message and fix the SQL"
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
