/**
 * SQL Generator
 *
 * One language-model call per generate(); retries belong to the repair loop.
 * The raw output may mix prose and SQL, so extraction is a tagged result:
 * - fenced:    exactly one SQL-shaped ```sql block
 * - keyword:   no fence, exactly one statement found by a leading-keyword scan
 * - none:      nothing SQL-shaped
 * - ambiguous: more than one distinct statement; never guessed
 */

import { GenerationParseError, QueryCancelledError } from "./errors.js"
import type { Logger } from "./logger.js"
import type { LanguageModel } from "./ollama_client.js"
import type { SQLCandidate, SqlDialect } from "./schema_types.js"

export type SqlExtraction =
	| { kind: "fenced"; sql: string }
	| { kind: "keyword"; sql: string }
	| { kind: "none" }
	| { kind: "ambiguous"; candidates: string[] }

const STATEMENT_START =
	/^(SELECT|WITH|INSERT|UPDATE|DELETE|MERGE|UPSERT|REPLACE|CREATE|DROP|ALTER|TRUNCATE|GRANT|REVOKE|EXPLAIN|SHOW|VALUES|CALL|COPY)\b/i

// ============================================================================
// Extraction
// ============================================================================

/** Drop leading comment lines and blank lines */
function stripLeadingComments(text: string): string {
	let rest = text.trimStart()
	for (;;) {
		if (rest.startsWith("--")) {
			const nl = rest.indexOf("\n")
			rest = nl === -1 ? "" : rest.slice(nl + 1).trimStart()
		} else if (rest.startsWith("/*")) {
			const end = rest.indexOf("*/")
			rest = end === -1 ? "" : rest.slice(end + 2).trimStart()
		} else {
			return rest
		}
	}
}

function isSqlShaped(text: string): boolean {
	return STATEMENT_START.test(stripLeadingComments(text))
}

/** Trim whitespace and trailing semicolons */
export function normalizeStatement(sql: string): string {
	return sql.trim().replace(/(\s*;)+$/, "").trim()
}

function fencedBlocks(raw: string): { lang: string; body: string }[] {
	const blocks: { lang: string; body: string }[] = []
	const re = /```[ \t]*([A-Za-z0-9_-]*)[^\n]*\n([\s\S]*?)(?:```|$)/g
	for (const m of raw.matchAll(re)) {
		blocks.push({ lang: m[1].toLowerCase(), body: m[2] })
	}
	return blocks
}

/**
 * Statements that begin a line with a statement keyword. Each runs to the
 * first semicolon, the first blank line, or the end of the text.
 */
function keywordStatements(raw: string): string[] {
	const statements: string[] = []
	const lines = raw.split("\n")
	let i = 0
	while (i < lines.length) {
		if (!STATEMENT_START.test(lines[i].trimStart())) {
			i++
			continue
		}
		const parts: string[] = []
		while (i < lines.length && lines[i].trim() !== "") {
			const line = lines[i]
			const semi = line.indexOf(";")
			if (semi >= 0) {
				parts.push(line.slice(0, semi))
				i++
				break
			}
			parts.push(line)
			i++
		}
		statements.push(normalizeStatement(parts.join("\n")))
	}
	return statements
}

function distinct(statements: string[]): string[] {
	const seen = new Map<string, string>()
	for (const s of statements) {
		const key = s.replace(/\s+/g, " ").toLowerCase()
		if (!seen.has(key)) seen.set(key, s)
	}
	return [...seen.values()]
}

export function extractSql(raw: string): SqlExtraction {
	const blocks = fencedBlocks(raw).filter((b) => isSqlShaped(b.body))
	if (blocks.length > 0) {
		const tagged = blocks.filter((b) => b.lang === "sql" || b.lang === "postgresql" || b.lang === "mysql")
		const chosen = distinct((tagged.length > 0 ? tagged : blocks).map((b) => normalizeStatement(b.body)))
		if (chosen.length === 1) return { kind: "fenced", sql: chosen[0] }
		return { kind: "ambiguous", candidates: chosen }
	}

	const statements = distinct(keywordStatements(raw).filter((s) => s.length > 0))
	if (statements.length === 1) return { kind: "keyword", sql: statements[0] }
	if (statements.length > 1) return { kind: "ambiguous", candidates: statements }
	return { kind: "none" }
}

// ============================================================================
// Generator
// ============================================================================

export interface SqlGeneratorConfig {
	dialect: SqlDialect
	temperature: number
	maxTokens: number
	timeoutMs: number
}

export class SqlGenerator {
	constructor(
		private llm: LanguageModel,
		private config: SqlGeneratorConfig,
		private logger: Logger,
	) {}

	/**
	 * Throws GenerationParseError when no single statement can be isolated;
	 * LanguageModelError (including timeouts) propagates from the model.
	 */
	async generate(prompt: string, attempt: number, signal?: AbortSignal, queryId?: string): Promise<SQLCandidate> {
		if (signal?.aborted) throw new QueryCancelledError("generate")
		const startTime = Date.now()

		const raw = await this.llm.generate(prompt, {
			temperature: this.config.temperature,
			maxTokens: this.config.maxTokens,
			timeoutMs: this.config.timeoutMs,
		})

		const extraction = extractSql(raw)
		this.logger.info("SQL generated", {
			query_id: queryId,
			attempt,
			extraction: extraction.kind,
			latency_ms: Date.now() - startTime,
		})

		switch (extraction.kind) {
			case "fenced":
			case "keyword":
				return { raw_output: raw, sql: extraction.sql, dialect: this.config.dialect, attempt }
			case "ambiguous":
				throw new GenerationParseError(
					`Model output contains ${extraction.candidates.length} different SQL statements`,
					raw,
				)
			case "none":
				throw new GenerationParseError("Model output contains no SQL statement", raw)
		}
	}
}
