/**
 * Shared types for the RAG text-to-SQL pipeline
 *
 * Defines types for:
 * - Extracted schema metadata (tables, columns, foreign keys)
 * - Business rules
 * - Knowledge chunks and retrieval results
 * - SQL candidates, validation outcomes and query results
 */

import type { SqlDialect } from "./config/loadConfig.js"

export type { SqlDialect }

// ============================================================================
// Schema Metadata
// ============================================================================

export interface ColumnMetadata {
	name: string
	data_type: string
	nullable: boolean
	comment: string | null
}

export interface ForeignKeyRef {
	column: string
	referenced_table: string
	referenced_column: string
}

/**
 * One table of an extraction snapshot. Snapshots are replaced wholesale by
 * the next extraction, never merged.
 */
export interface TableMetadata {
	table_name: string
	/** Ordered by ordinal position */
	columns: ColumnMetadata[]
	primary_key: string[]
	foreign_keys: ForeignKeyRef[]
	comment: string | null
	/** Approximate row count when the source knows it */
	row_estimate?: number | null
}

// ============================================================================
// Business Rules
// ============================================================================

export type RuleKind = "term" | "metric" | "enum_value" | "calculation"

/** "general" or a table name */
export type RuleScope = string

export const GENERAL_SCOPE = "general"

export interface BusinessRule {
	scope: RuleScope
	kind: RuleKind
	/** Term, metric name, or column name (for enum_value) */
	key: string
	/** Natural-language definition or SQL expression fragment */
	value: string
}

// ============================================================================
// Knowledge Chunks
// ============================================================================

export type ChunkKind = "table" | "column" | "rules"

export type ChunkMetadataValue = string | number | boolean | null | string[]

export interface ChunkMetadata {
	kind: ChunkKind
	table_name: string | null
	[key: string]: ChunkMetadataValue
}

/** Chunk as rendered by the chunker, before embedding */
export interface ChunkDraft {
	id: string
	source_table: string | null
	text: string
	metadata: ChunkMetadata
}

export interface KnowledgeChunk extends ChunkDraft {
	embedding: number[]
}

export interface ScoredChunk {
	chunk: KnowledgeChunk
	score: number
}

/** Equality filter over chunk metadata */
export type ChunkFilter = Partial<Record<string, ChunkMetadataValue>>

export interface RetrievedChunk extends ScoredChunk {
	/** Forced in by an explicit entity mention */
	pinned: boolean
}

/** Ordered, deduplicated by chunk id; pinned chunks first */
export interface RetrievedContext {
	chunks: RetrievedChunk[]
	/** Names the analyzer matched verbatim */
	pinned_tables: string[]
}

// ============================================================================
// Query Analysis
// ============================================================================

export type AggregationHint = "sum" | "avg" | "max" | "min" | "count"

export type QueryIntent =
	| "aggregation"
	| "ranking"
	| "trend"
	| "proportion"
	| "extreme"
	| "average"
	| "simple"

export interface TimeRange {
	/** Matched expression, e.g. "本月" or "last week" */
	expression: string
	/** Inclusive start date, YYYY-MM-DD */
	start: string
	/** Exclusive end date, YYYY-MM-DD */
	end: string
}

export interface EntityMention {
	table_name: string
	column_name: string | null
	/** Text that matched in the question */
	matched: string
}

export interface QueryAnalysis {
	question: string
	entities: EntityMention[]
	/** Business-rule keys mentioned verbatim */
	rule_keys: string[]
	time_range: TimeRange | null
	aggregation: AggregationHint | null
	intent: QueryIntent
	dimensions: string[]
	/** Question plus extracted hints, used as a second retrieval query */
	search_text: string
}

// ============================================================================
// Candidates and Outcomes
// ============================================================================

export interface SQLCandidate {
	raw_output: string
	/** null when nothing SQL-shaped could be isolated */
	sql: string | null
	dialect: SqlDialect
	attempt: number
}

export interface SyntaxErrorOutcome {
	kind: "syntax_error"
	message: string
	offset: number | null
	line?: number | null
	column?: number | null
}

export interface ExecutionErrorOutcome {
	kind: "execution_error"
	message: string
	sqlstate: string | null
	position: number | null
	timed_out: boolean
}

export interface PolicyViolationOutcome {
	kind: "policy_violation"
	message: string
	statement_type: string | null
}

export interface SuccessOutcome {
	kind: "success"
	executed: boolean
	rows: Record<string, unknown>[]
	row_count: number
	fields: string[]
}

export type ValidationOutcome =
	| SyntaxErrorOutcome
	| ExecutionErrorOutcome
	| PolicyViolationOutcome
	| SuccessOutcome

export interface AttemptRecord {
	candidate: SQLCandidate
	outcome: ValidationOutcome
}

export type QueryOutcome = ValidationOutcome["kind"] | "cancelled"

export interface IntermediateArtifacts {
	analysis: QueryAnalysis
	retrieved: { id: string; source_table: string | null; score: number; pinned: boolean }[]
	prompts: string[]
	candidates: AttemptRecord[]
}

export interface QueryResult {
	query_id: string
	question: string
	/** null when no attempt produced extractable SQL */
	sql: string | null
	outcome: QueryOutcome
	attempts: number
	/** Last failure when outcome is not success */
	error: string | null
	rows?: Record<string, unknown>[]
	row_count?: number
	tables_used: string[]
	latency_ms: number
	intermediate?: IntermediateArtifacts
}
