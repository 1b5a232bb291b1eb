/**
 * Few-Shot Examples
 *
 * Worked question/SQL pairs shown to the model when the question looks
 * like one of them: an aggregation, a multi-table join, a time filter or
 * a ranking. The set lives in data/few_shot_examples.json unless the
 * config points elsewhere.
 */

import * as fs from "fs"
import { z } from "zod"
import { ConfigError, errorMessage } from "./errors.js"
import { resolveDataFile } from "./schema_embedder.js"

// ============================================================================
// Types
// ============================================================================

const exampleSchema = z.object({
	question: z.string().min(1),
	sql: z.string().min(1),
	note: z.string().default(""),
})

const fewShotSetSchema = z.object({
	signals: z.object({
		aggregation: z.array(z.string().min(1)),
		time_filter: z.array(z.string().min(1)),
		ranking: z.array(z.string().min(1)),
	}),
	examples: z.array(exampleSchema),
})

export type FewShotExample = z.infer<typeof exampleSchema>
export type FewShotSet = z.infer<typeof fewShotSetSchema>

export interface QuestionShape {
	aggregation: boolean
	join: boolean
	time_filter: boolean
	ranking: boolean
}

// ============================================================================
// Loading
// ============================================================================

let _bundled: FewShotSet | null = null

/**
 * Read an example set. Without a path the bundled set is used (and cached).
 */
export function loadFewShotSet(filePath?: string | null): FewShotSet {
	if (!filePath && _bundled) return _bundled
	const target = filePath || resolveDataFile("few_shot_examples.json")
	let raw: unknown
	try {
		raw = JSON.parse(fs.readFileSync(target, "utf-8"))
	} catch (error) {
		throw new ConfigError(`Cannot read few-shot examples ${target}: ${errorMessage(error)}`)
	}
	const parsed = fewShotSetSchema.safeParse(raw)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		throw new ConfigError(`Invalid few-shot examples ${target} at ${issue.path.join(".")}: ${issue.message}`)
	}
	if (!filePath) _bundled = parsed.data
	return parsed.data
}

// ============================================================================
// Selection
// ============================================================================

function mentionsAny(question: string, words: string[]): boolean {
	const lower = question.toLowerCase()
	return words.some((w) => lower.includes(w.toLowerCase()))
}

export function describeQuestion(question: string, tableCount: number, set: FewShotSet): QuestionShape {
	return {
		aggregation: mentionsAny(question, set.signals.aggregation),
		join: tableCount > 1,
		time_filter: mentionsAny(question, set.signals.time_filter),
		ranking: mentionsAny(question, set.signals.ranking),
	}
}

function demonstrates(example: FewShotExample, shape: QuestionShape): boolean {
	const sql = example.sql.toUpperCase()
	if (shape.aggregation && sql.includes("SUM(")) return true
	if (shape.join && sql.includes("JOIN")) return true
	if (shape.time_filter && sql.includes("WHERE")) return true
	if (shape.ranking && sql.includes("ORDER BY") && sql.includes("LIMIT")) return true
	return false
}

/**
 * Examples whose SQL shows a construct the question calls for, in file
 * order, at most `max` of them.
 */
export function selectExamples(
	question: string,
	tableCount: number,
	set: FewShotSet,
	max: number,
): FewShotExample[] {
	if (max <= 0) return []
	const shape = describeQuestion(question, tableCount, set)
	return set.examples.filter((e) => demonstrates(e, shape)).slice(0, max)
}

export function renderExample(example: FewShotExample, index: number): string {
	const lines = [`Example ${index}: ${example.question}`, "```sql", example.sql, "```"]
	if (example.note) lines.push(`Note: ${example.note}`)
	return lines.join("\n")
}
