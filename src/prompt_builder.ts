/**
 * Prompt Builder
 *
 * Two modes:
 * - initial: instructions, dialect, schema context, business rules, worked
 *   examples, query hints, question, output contract
 * - repair: all of the above plus the latest failed candidate and its
 *   structured error, with an instruction to fix only that issue
 *
 * Only the most recent (candidate, outcome) pair is rendered; earlier
 * attempts stay in the returned history but never re-enter the prompt.
 */

import type { BusinessRuleStore } from "./business_rules.js"
import { getSQLSTATEHint } from "./errors.js"
import { renderExample, selectExamples, type FewShotSet } from "./few_shot_examples.js"
import type {
	AttemptRecord,
	BusinessRule,
	QueryAnalysis,
	RetrievedChunk,
	RetrievedContext,
	SqlDialect,
	ValidationOutcome,
} from "./schema_types.js"

// ============================================================================
// Types
// ============================================================================

export type PromptMode = "initial" | "repair"

export interface PromptInput {
	question: string
	context: RetrievedContext
	rules: BusinessRuleStore
	history: AttemptRecord[]
	dialect: SqlDialect
	analysis?: QueryAnalysis
}

export interface PromptOptions {
	/** Budget for the concatenated chunk texts and examples */
	maxContextChars: number
	fewShot?: { set: FewShotSet; max: number }
}

export interface BuiltPrompt {
	mode: PromptMode
	text: string
	included_chunk_ids: string[]
	dropped_chunk_ids: string[]
}

const DIALECT_NAMES: Record<SqlDialect, string> = {
	postgresql: "PostgreSQL",
	mysql: "MySQL",
	mariadb: "MariaDB",
	sqlite: "SQLite",
	mssql: "SQL Server (T-SQL)",
	bigquery: "BigQuery",
}

const RAW_OUTPUT_PREVIEW_CHARS = 500

// ============================================================================
// Context Budget
// ============================================================================

/**
 * Drop the lowest-relevance non-pinned chunks until the texts fit. Pinned
 * chunks stay even when they alone exceed the budget.
 */
export function fitContext(
	chunks: RetrievedChunk[],
	maxChars: number,
): { included: RetrievedChunk[]; dropped: RetrievedChunk[] } {
	const size = (list: RetrievedChunk[]) => list.reduce((sum, c) => sum + c.chunk.text.length, 0)

	const included = [...chunks]
	const dropped: RetrievedChunk[] = []
	while (size(included) > maxChars) {
		let victim = -1
		for (let i = 0; i < included.length; i++) {
			const c = included[i]
			if (c.pinned) continue
			if (victim < 0) {
				victim = i
				continue
			}
			const v = included[victim]
			if (c.score < v.score || (c.score === v.score && c.chunk.id > v.chunk.id)) victim = i
		}
		if (victim < 0) break
		dropped.push(...included.splice(victim, 1))
	}
	return { included, dropped }
}

/**
 * Selected examples, rendered, that fit in what the chunks leave of the
 * budget. Examples never displace a chunk.
 */
export function fitExamples(question: string, included: RetrievedChunk[], options: PromptOptions): string[] {
	if (!options.fewShot) return []
	const tables = new Set(included.flatMap((c) => (c.chunk.source_table ? [c.chunk.source_table] : [])))
	const chosen = selectExamples(question, tables.size, options.fewShot.set, options.fewShot.max)
	let remaining = options.maxContextChars - included.reduce((sum, c) => sum + c.chunk.text.length, 0)
	const rendered: string[] = []
	for (const example of chosen) {
		const text = renderExample(example, rendered.length + 1)
		if (text.length > remaining) break
		remaining -= text.length
		rendered.push(text)
	}
	return rendered
}

// ============================================================================
// Error Rendering
// ============================================================================

/**
 * The line containing `offset` with a caret under the offending character.
 */
export function caretExcerpt(sql: string, offset: number): string {
	const clamped = Math.max(0, Math.min(offset, sql.length))
	const lineStart = sql.lastIndexOf("\n", clamped - 1) + 1
	const lineEndRaw = sql.indexOf("\n", clamped)
	const lineEnd = lineEndRaw === -1 ? sql.length : lineEndRaw
	const line = sql.slice(lineStart, lineEnd)
	return `${line}\n${" ".repeat(clamped - lineStart)}^`
}

/** 1-based line and column of a 0-based offset */
export function lineAndColumn(sql: string, offset: number): { line: number; column: number } {
	const before = sql.slice(0, Math.max(0, Math.min(offset, sql.length)))
	const lines = before.split("\n")
	return { line: lines.length, column: lines[lines.length - 1].length + 1 }
}

export function describeOutcome(outcome: ValidationOutcome, sql: string | null): string[] {
	const lines: string[] = []
	switch (outcome.kind) {
		case "syntax_error": {
			if (sql !== null && outcome.offset !== null) {
				const { line, column } =
					outcome.line != null && outcome.column != null
						? { line: outcome.line, column: outcome.column }
						: lineAndColumn(sql, outcome.offset)
				lines.push(`Syntax error at offset ${outcome.offset} (line ${line}, column ${column}): ${outcome.message}`)
				lines.push("```")
				lines.push(caretExcerpt(sql, outcome.offset))
				lines.push("```")
			} else {
				lines.push(`Syntax error: ${outcome.message}`)
			}
			break
		}
		case "execution_error": {
			const state = outcome.sqlstate ? ` [SQLSTATE ${outcome.sqlstate}]` : ""
			lines.push(`Execution error${state}: ${outcome.message}`)
			if (sql !== null && outcome.position !== null) {
				// Engine positions are 1-based
				lines.push("```")
				lines.push(caretExcerpt(sql, outcome.position - 1))
				lines.push("```")
			}
			lines.push(`Hint: ${outcome.timed_out ? getSQLSTATEHint("57014") : getSQLSTATEHint(outcome.sqlstate)}`)
			break
		}
		case "policy_violation":
			lines.push(`Rejected: ${outcome.message}`)
			break
		case "success":
			break
	}
	return lines
}

// ============================================================================
// Sections
// ============================================================================

function formatRule(rule: BusinessRule): string {
	return `- [${rule.kind}] ${rule.key}: ${rule.value}`
}

/**
 * General rules plus any rule whose key the question mentions, whatever its scope.
 */
export function selectRules(rules: BusinessRuleStore, analysis?: QueryAnalysis): BusinessRule[] {
	const selected = rules.general()
	const mentioned = new Set(analysis?.rule_keys ?? [])
	for (const rule of rules.all()) {
		if (rule.scope !== "general" && mentioned.has(rule.key)) selected.push(rule)
	}
	return selected
}

function hintLines(analysis: QueryAnalysis): string[] {
	const lines: string[] = []
	if (analysis.time_range) {
		const t = analysis.time_range
		lines.push(`- Time range "${t.expression}": from ${t.start} (inclusive) to ${t.end} (exclusive)`)
	}
	if (analysis.aggregation) lines.push(`- Aggregation: ${analysis.aggregation.toUpperCase()}`)
	if (analysis.dimensions.length > 0) lines.push(`- Group by: ${analysis.dimensions.join(", ")}`)
	if (analysis.intent !== "simple") lines.push(`- Intent: ${analysis.intent}`)
	const named = analysis.entities.map((e) => (e.column_name ? `${e.table_name}.${e.column_name}` : e.table_name))
	if (named.length > 0) lines.push(`- Mentioned: ${[...new Set(named)].join(", ")}`)
	return lines
}

// ============================================================================
// Builder
// ============================================================================

export function buildPrompt(input: PromptInput, options: PromptOptions): BuiltPrompt {
	const dialect = DIALECT_NAMES[input.dialect]
	const latest = input.history.length > 0 ? input.history[input.history.length - 1] : null
	const mode: PromptMode = latest && latest.outcome.kind !== "success" ? "repair" : "initial"
	const { included, dropped } = fitContext(input.context.chunks, options.maxContextChars)

	const sections: string[] = []

	sections.push(
		[
			`You are an expert ${dialect} engineer. Write one SQL query that answers the user's question.`,
			"Rules:",
			"1. Use only the tables and columns in the schema context. Never invent names.",
			"2. Join tables through the relationships listed in the context.",
			"3. Apply the business definitions below exactly as written.",
			"4. The query must be read-only: a single SELECT (or WITH ... SELECT) statement.",
		].join("\n"),
	)

	sections.push(`## Dialect\n${dialect}`)

	sections.push(
		included.length > 0
			? `## Schema Context\n\n${included.map((c) => c.chunk.text).join("\n\n---\n\n")}`
			: "## Schema Context\n\n(no matching schema found)",
	)

	const rules = selectRules(input.rules, input.analysis)
	if (rules.length > 0) {
		sections.push(`## Business Rules\n${rules.map(formatRule).join("\n")}`)
	}

	const examples = fitExamples(input.question, included, options)
	if (examples.length > 0) {
		sections.push(`## Examples\n\n${examples.join("\n\n")}`)
	}

	if (input.analysis) {
		const hints = hintLines(input.analysis)
		if (hints.length > 0) sections.push(`## Query Hints\n${hints.join("\n")}`)
	}

	sections.push(`## Question\n${input.question}`)

	if (mode === "repair" && latest) {
		const candidate = latest.candidate
		const shown = candidate.sql ?? candidate.raw_output.slice(0, RAW_OUTPUT_PREVIEW_CHARS)
		const repair = [
			`## Previous Attempt ${candidate.attempt} Failed`,
			candidate.sql !== null ? "```sql" : "```",
			shown,
			"```",
			...describeOutcome(latest.outcome, candidate.sql),
			"",
			"Fix only the issue identified above. Keep everything else in the query unchanged.",
		]
		sections.push(repair.join("\n"))
	}

	sections.push(
		[
			"## SQL Query",
			`Return exactly one ${dialect} statement inside a single \`\`\`sql fenced block. Do not include any other statements.`,
		].join("\n"),
	)

	return {
		mode,
		text: sections.join("\n\n"),
		included_chunk_ids: included.map((c) => c.chunk.id),
		dropped_chunk_ids: dropped.map((c) => c.chunk.id),
	}
}
