/**
 * Query Analyzer
 *
 * Extracts structured hints from a natural-language question before
 * retrieval:
 * - Explicit entity mentions (table names, table.column, unique column names,
 *   documented table aliases from comments)
 * - Business-rule keys mentioned verbatim
 * - Time range (relative expressions and explicit dates)
 * - Aggregation hint and intent
 * - Group-by dimension hints
 * - An enhanced search string for hybrid retrieval
 *
 * Pure and deterministic given (question, vocabulary, now).
 */

import * as fs from "fs"
import { z } from "zod"
import type { BusinessRuleStore } from "./business_rules.js"
import { getVocabulary, resolveDataFile, type Vocabulary } from "./schema_embedder.js"
import type {
	AggregationHint,
	EntityMention,
	QueryAnalysis,
	QueryIntent,
	TableMetadata,
	TimeRange,
} from "./schema_types.js"

// ============================================================================
// Vocabulary
// ============================================================================

export interface AnalyzerTable {
	table_name: string
	columns: string[]
	/** Names the table is documented under, e.g. "订单" from the comment "订单表" */
	aliases: string[]
}

export interface AnalyzerVocabulary {
	tables: AnalyzerTable[]
	rule_keys: string[]
}

/**
 * First segment of a non-ASCII table comment, with and without a trailing 表.
 */
export function commentAliases(comment: string | null): string[] {
	if (!comment) return []
	const head = comment.trim().split(/[，,。.;；:：(（\s]/)[0]
	if (head.length < 2 || isAscii(head)) return []
	const aliases = [head]
	if (head.endsWith("表") && head.length > 2) aliases.push(head.slice(0, -1))
	return aliases
}

export function buildAnalyzerVocabulary(tables: readonly TableMetadata[], rules: BusinessRuleStore): AnalyzerVocabulary {
	const ruleKeys = new Set<string>()
	for (const rule of rules.all()) {
		// enum_value keys are column names, already covered by entity matching
		if (rule.kind !== "enum_value") ruleKeys.add(rule.key)
	}
	return {
		tables: tables.map((t) => ({
			table_name: t.table_name,
			columns: t.columns.map((c) => c.name),
			aliases: commentAliases(t.comment),
		})),
		rule_keys: [...ruleKeys].sort(),
	}
}

// ============================================================================
// Keyword Patterns
// ============================================================================

const AGGREGATIONS = ["sum", "avg", "max", "min", "count"] as const satisfies readonly AggregationHint[]

const patternsSchema = z.object({
	aggregation: z.object({
		sum: z.array(z.string()),
		avg: z.array(z.string()),
		max: z.array(z.string()),
		min: z.array(z.string()),
		count: z.array(z.string()),
	}),
	intent: z.array(
		z.object({
			intent: z.enum(["aggregation", "ranking", "trend", "proportion", "extreme", "average", "simple"]),
			keywords: z.array(z.string()),
		}),
	),
	dimension_markers: z.array(z.string()),
	dimension_stops: z.array(z.string()),
})

type QueryPatterns = z.infer<typeof patternsSchema>

let _patterns: QueryPatterns | null = null

export function getQueryPatterns(): QueryPatterns {
	if (!_patterns) {
		const raw: unknown = JSON.parse(fs.readFileSync(resolveDataFile("query_patterns.json"), "utf-8"))
		_patterns = patternsSchema.parse(raw)
	}
	return _patterns
}

function isAscii(text: string): boolean {
	return /^[\x00-\x7f]+$/.test(text)
}

function escapeRegex(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * Index of the first occurrence of a keyword, or -1. ASCII keywords match
 * case-insensitively on identifier boundaries; others match as substrings.
 */
export function findKeyword(text: string, keyword: string): number {
	if (keyword.length === 0) return -1
	if (isAscii(keyword)) {
		const re = new RegExp(`(?<![A-Za-z0-9_])${escapeRegex(keyword)}(?![A-Za-z0-9_])`, "i")
		const match = re.exec(text)
		return match ? match.index : -1
	}
	return text.indexOf(keyword)
}

// ============================================================================
// Entities
// ============================================================================

function extractEntities(question: string, vocabulary: AnalyzerVocabulary): EntityMention[] {
	const found: { mention: EntityMention; index: number }[] = []
	const seen = new Set<string>()
	const add = (mention: EntityMention, index: number) => {
		const key = `${mention.table_name}.${mention.column_name ?? ""}`
		if (seen.has(key)) return
		seen.add(key)
		found.push({ mention, index })
	}

	const columnOwners = new Map<string, string[]>()
	for (const table of vocabulary.tables) {
		for (const column of table.columns) {
			const key = column.toLowerCase()
			columnOwners.set(key, [...(columnOwners.get(key) ?? []), table.table_name])
		}
	}

	for (const table of vocabulary.tables) {
		// Qualified table.column
		for (const column of table.columns) {
			const qualified = `${table.table_name}.${column}`
			const index = findKeyword(question, qualified)
			if (index >= 0) {
				add({ table_name: table.table_name, column_name: column, matched: question.slice(index, index + qualified.length) }, index)
			}
		}

		const index = findKeyword(question, table.table_name)
		if (index >= 0) {
			add({ table_name: table.table_name, column_name: null, matched: question.slice(index, index + table.table_name.length) }, index)
		}

		for (const alias of table.aliases) {
			const aliasIndex = findKeyword(question, alias)
			if (aliasIndex >= 0) {
				add({ table_name: table.table_name, column_name: null, matched: alias }, aliasIndex)
				break
			}
		}
	}

	// Bare column names count only when exactly one table has them
	for (const [column, owners] of columnOwners) {
		if (owners.length !== 1) continue
		const index = findKeyword(question, column)
		if (index < 0) continue
		const table = vocabulary.tables.find((t) => t.table_name === owners[0])
		const original = table?.columns.find((c) => c.toLowerCase() === column) ?? column
		add({ table_name: owners[0], column_name: original, matched: question.slice(index, index + column.length) }, index)
	}

	return found
		.sort((a, b) => a.index - b.index || a.mention.table_name.localeCompare(b.mention.table_name))
		.map((f) => f.mention)
}

function extractRuleKeys(question: string, ruleKeys: string[]): string[] {
	return ruleKeys
		.map((key) => ({ key, index: findKeyword(question, key) }))
		.filter((k) => k.index >= 0)
		.sort((a, b) => a.index - b.index)
		.map((k) => k.key)
}

// ============================================================================
// Time Range
// ============================================================================

function day(y: number, m: number, d: number): Date {
	return new Date(y, m, d)
}

function addDays(date: Date, days: number): Date {
	return day(date.getFullYear(), date.getMonth(), date.getDate() + days)
}

export function formatDate(date: Date): string {
	const y = date.getFullYear()
	const m = String(date.getMonth() + 1).padStart(2, "0")
	const d = String(date.getDate()).padStart(2, "0")
	return `${y}-${m}-${d}`
}

function startOfWeek(today: Date): Date {
	// Monday
	const offset = (today.getDay() + 6) % 7
	return addDays(today, -offset)
}

type RangeResolver = (today: Date, match: RegExpExecArray) => [Date, Date]

const RELATIVE_TIME: { pattern: RegExp; resolve: RangeResolver }[] = [
	{
		pattern: /(?:最近|近|过去)(\d+)天|\b(?:last|past) (\d+) days\b/i,
		resolve: (today, m) => {
			const n = Number(m[1] ?? m[2])
			return [addDays(today, 1 - n), addDays(today, 1)]
		},
	},
	{ pattern: /今天|今日|\btoday\b/i, resolve: (today) => [today, addDays(today, 1)] },
	{ pattern: /昨天|昨日|\byesterday\b/i, resolve: (today) => [addDays(today, -1), today] },
	{
		pattern: /本周|这周|\bthis week\b/i,
		resolve: (today) => {
			const monday = startOfWeek(today)
			return [monday, addDays(monday, 7)]
		},
	},
	{
		pattern: /上周|上个星期|\blast week\b/i,
		resolve: (today) => {
			const monday = startOfWeek(today)
			return [addDays(monday, -7), monday]
		},
	},
	{
		pattern: /本月|这个月|\bthis month\b/i,
		resolve: (today) => [day(today.getFullYear(), today.getMonth(), 1), day(today.getFullYear(), today.getMonth() + 1, 1)],
	},
	{
		pattern: /上月|上个月|\blast month\b/i,
		resolve: (today) => [day(today.getFullYear(), today.getMonth() - 1, 1), day(today.getFullYear(), today.getMonth(), 1)],
	},
	{
		pattern: /今年|\bthis year\b/i,
		resolve: (today) => [day(today.getFullYear(), 0, 1), day(today.getFullYear() + 1, 0, 1)],
	},
	{
		pattern: /去年|\blast year\b/i,
		resolve: (today) => [day(today.getFullYear() - 1, 0, 1), day(today.getFullYear(), 0, 1)],
	},
]

const EXPLICIT_DATE = /(\d{4})[-/](\d{1,2})[-/](\d{1,2})|(\d{4})年(\d{1,2})月(?:(\d{1,2})[日号])?/g

interface ExplicitDate {
	text: string
	start: Date
	/** Exclusive */
	end: Date
}

function validDate(y: number, m: number, d: number): Date | null {
	const date = day(y, m - 1, d)
	return date.getFullYear() === y && date.getMonth() === m - 1 && date.getDate() === d ? date : null
}

function extractExplicitDates(question: string): ExplicitDate[] {
	const dates: ExplicitDate[] = []
	for (const m of question.matchAll(EXPLICIT_DATE)) {
		if (m[1] !== undefined) {
			const date = validDate(Number(m[1]), Number(m[2]), Number(m[3]))
			if (date) dates.push({ text: m[0], start: date, end: addDays(date, 1) })
		} else if (m[6] !== undefined) {
			const date = validDate(Number(m[4]), Number(m[5]), Number(m[6]))
			if (date) dates.push({ text: m[0], start: date, end: addDays(date, 1) })
		} else {
			const first = validDate(Number(m[4]), Number(m[5]), 1)
			if (first) dates.push({ text: m[0], start: first, end: day(first.getFullYear(), first.getMonth() + 1, 1) })
		}
	}
	return dates
}

/**
 * Explicit dates win over relative expressions. Two or more explicit dates
 * span from the first start to the last end.
 */
export function extractTimeRange(question: string, now: Date): TimeRange | null {
	const dates = extractExplicitDates(question)
	if (dates.length > 0) {
		const first = dates[0]
		const last = dates[dates.length - 1]
		return {
			expression: dates.map((d) => d.text).join(" ~ "),
			start: formatDate(first.start),
			end: formatDate(last.end),
		}
	}

	const today = day(now.getFullYear(), now.getMonth(), now.getDate())
	let best: { index: number; range: TimeRange } | null = null
	for (const { pattern, resolve } of RELATIVE_TIME) {
		const match = pattern.exec(question)
		if (!match || (best && best.index <= match.index)) continue
		const [start, end] = resolve(today, match)
		best = { index: match.index, range: { expression: match[0], start: formatDate(start), end: formatDate(end) } }
	}
	return best ? best.range : null
}

// ============================================================================
// Aggregation, Intent, Dimensions
// ============================================================================

export function detectAggregation(question: string, patterns: QueryPatterns = getQueryPatterns()): AggregationHint | null {
	for (const hint of AGGREGATIONS) {
		if (patterns.aggregation[hint].some((kw) => findKeyword(question, kw) >= 0)) return hint
	}
	return null
}

export function classifyIntent(question: string, patterns: QueryPatterns = getQueryPatterns()): QueryIntent {
	for (const entry of patterns.intent) {
		if (entry.keywords.some((kw) => findKeyword(question, kw) >= 0)) return entry.intent
	}
	return "simple"
}

function isWordChar(ch: string): boolean {
	return /[\p{L}\p{N}_]/u.test(ch)
}

export function extractDimensions(question: string, patterns: QueryPatterns = getQueryPatterns()): string[] {
	const markers = [...patterns.dimension_markers].sort((a, b) => b.length - a.length)
	const stops = [
		...patterns.dimension_stops,
		...Object.values(patterns.aggregation).flat().filter((kw) => !isAscii(kw)),
	]
	const dimensions: string[] = []

	let i = 0
	while (i < question.length) {
		const marker = markers.find((m) => {
			if (!question.startsWith(m, i) && !(isAscii(m) && question.slice(i, i + m.length).toLowerCase() === m)) return false
			if (!isAscii(m)) return true
			const before = i === 0 ? "" : question[i - 1]
			const after = question[i + m.length] ?? ""
			return !/[A-Za-z0-9_]/.test(before) && /\s/.test(after)
		})
		if (!marker) {
			i++
			continue
		}

		let j = i + marker.length
		let value = ""
		if (isAscii(marker)) {
			const word = /^\s+([A-Za-z_][A-Za-z0-9_]*)/.exec(question.slice(j))
			if (word) {
				value = word[1]
				j += word[0].length
			}
		} else {
			while (j < question.length && isWordChar(question[j]) && !stops.some((s) => question.startsWith(s, j))) {
				value += question[j]
				j++
			}
		}
		if (value && !dimensions.includes(value)) dimensions.push(value)
		i = Math.max(j, i + marker.length)
	}
	return dimensions
}

// ============================================================================
// Search Text
// ============================================================================

/**
 * Table names whose vocabulary synonyms occur in the question (e.g. 订单 for
 * a table containing "order"). Used to enrich the search string only.
 */
function synonymTables(question: string, tables: AnalyzerTable[], vocabulary: Vocabulary): string[] {
	const names: string[] = []
	for (const table of tables) {
		const lower = table.table_name.toLowerCase()
		const hit = vocabulary.table_synonyms.some(
			(entry) =>
				entry.contains !== undefined &&
				lower.includes(entry.contains) &&
				entry.synonyms.some((s) => question.includes(s)),
		)
		if (hit) names.push(table.table_name)
	}
	return names
}

function buildSearchText(question: string, hints: string[]): string {
	const unique = [...new Set(hints)]
	return unique.length > 0 ? `${question} (${unique.join(", ")})` : question
}

// ============================================================================
// Entry Point
// ============================================================================

export function analyze(question: string, vocabulary: AnalyzerVocabulary, now: Date = new Date()): QueryAnalysis {
	const text = question.trim()
	const entities = extractEntities(text, vocabulary)
	const ruleKeys = extractRuleKeys(text, vocabulary.rule_keys)
	const aggregation = detectAggregation(text)
	const dimensions = extractDimensions(text)

	const hints = [
		...entities.map((e) => (e.column_name ? `${e.table_name}.${e.column_name}` : e.table_name)),
		...synonymTables(text, vocabulary.tables, getVocabulary()),
		...ruleKeys,
		...dimensions,
		...(aggregation ? [aggregation.toUpperCase()] : []),
	]

	return {
		question: text,
		entities,
		rule_keys: ruleKeys,
		time_range: extractTimeRange(text, now),
		aggregation,
		intent: classifyIntent(text),
		dimensions,
		search_text: buildSearchText(text, hints),
	}
}
