/**
 * Schema Chunker
 *
 * Renders extracted metadata plus business rules into self-contained,
 * retrievable documents:
 * 1. One chunk per table (id `table:<name>`): purpose, columns, relationships,
 *    applicable business rules, enum glosses, synonyms and DDL
 * 2. Optionally one chunk per column (id `column:<table>.<column>`)
 * 3. One cross-table chunk for general business rules (id `rules:general`)
 *
 * Output is a pure function of (tables, rules, options): same input, same ids
 * and text. Embedding happens later, in the builder.
 */

import crypto from "crypto"
import * as fs from "fs"
import { fileURLToPath } from "url"
import { z } from "zod"
import type { BusinessRuleStore } from "./business_rules.js"
import type { BusinessRule, ChunkDraft, ColumnMetadata, TableMetadata } from "./schema_types.js"

// ============================================================================
// Types
// ============================================================================

export type ChunkGranularity = "table" | "table_and_columns"

export interface ChunkerOptions {
	granularity: ChunkGranularity
	/** Include a CREATE TABLE rendering in table chunks */
	includeDdl?: boolean
}

export const GENERAL_RULES_CHUNK_ID = "rules:general"

export function tableChunkId(tableName: string): string {
	return `table:${tableName}`
}

export function columnChunkId(tableName: string, columnName: string): string {
	return `column:${tableName}.${columnName}`
}

// ============================================================================
// Vocabulary
// ============================================================================

const synonymEntry = z
	.object({
		contains: z.string().optional(),
		suffix: z.string().optional(),
		synonyms: z.array(z.string()),
	})
	.refine((e) => e.contains !== undefined || e.suffix !== undefined, "needs contains or suffix")

const vocabularySchema = z.object({
	abbreviations: z.record(z.string()),
	table_synonyms: z.array(synonymEntry),
	column_synonyms: z.array(synonymEntry),
})

export type Vocabulary = z.infer<typeof vocabularySchema>
type SynonymEntry = z.infer<typeof synonymEntry>

/** Locate a file under data/ from both src/ and the compiled dist/src/. */
export function resolveDataFile(name: string): string {
	const candidates = [new URL(`../data/${name}`, import.meta.url), new URL(`../../data/${name}`, import.meta.url)]
	for (const candidate of candidates) {
		const filePath = fileURLToPath(candidate)
		if (fs.existsSync(filePath)) return filePath
	}
	return fileURLToPath(candidates[0])
}

let _vocabulary: Vocabulary | null = null

export function getVocabulary(): Vocabulary {
	if (!_vocabulary) {
		const raw: unknown = JSON.parse(fs.readFileSync(resolveDataFile("vocabulary.json"), "utf-8"))
		_vocabulary = vocabularySchema.parse(raw)
	}
	return _vocabulary
}

function entryMatches(entry: SynonymEntry, name: string): boolean {
	const lower = name.toLowerCase()
	if (entry.contains !== undefined && lower.includes(entry.contains)) return true
	if (entry.suffix !== undefined && lower.endsWith(entry.suffix)) return true
	return false
}

function collectSynonyms(entries: SynonymEntry[], name: string): string[] {
	const out: string[] = []
	for (const entry of entries) {
		if (!entryMatches(entry, name)) continue
		for (const s of entry.synonyms) {
			if (!out.includes(s)) out.push(s)
		}
	}
	return out
}

// ============================================================================
// Gloss Inference
// ============================================================================

/**
 * Expand abbreviations in a snake_case name
 */
export function expandName(name: string, abbreviations: Record<string, string>): string {
	return name
		.split("_")
		.filter((w) => w.length > 0)
		.map((word) => abbreviations[word.toLowerCase()] ?? word.toLowerCase())
		.join(" ")
}

/**
 * Parse enum glosses out of a column comment, e.g. "状态: 1=成功, 2=失败"
 */
export function extractEnumGloss(comment: string | null): string | null {
	if (!comment) return null
	const matches = [...comment.matchAll(/(\d+)\s*=\s*([^,，;；\s]+)/g)]
	if (matches.length === 0) return null
	return matches.map((m) => `${m[1]} means '${m[2]}'`).join(", ")
}

function mentionsIdentifier(text: string, identifier: string): boolean {
	const escaped = identifier.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
	return new RegExp(`(^|[^A-Za-z0-9_])${escaped}($|[^A-Za-z0-9_])`, "i").test(text)
}

/**
 * General rules that apply to a table: the rule's key or value names the
 * table or one of its columns.
 */
function generalRulesForTable(table: TableMetadata, rules: BusinessRuleStore): BusinessRule[] {
	const names = [table.table_name, ...table.columns.map((c) => c.name)]
	return rules.general().filter((rule) => names.some((n) => mentionsIdentifier(`${rule.key} ${rule.value}`, n)))
}

// ============================================================================
// Rendering
// ============================================================================

interface TableContext {
	/** Column name -> referenced table.column */
	outgoing: Map<string, string>
	/** Incoming references: "<table>.<column>" -> "<this table>.<column>" */
	incoming: { from: string; to: string }[]
}

function buildRelationshipIndex(tables: TableMetadata[]): Map<string, TableContext> {
	const index = new Map<string, TableContext>()
	for (const table of tables) {
		index.set(table.table_name, { outgoing: new Map(), incoming: [] })
	}
	for (const table of tables) {
		const ctx = index.get(table.table_name)
		if (!ctx) continue
		for (const fk of table.foreign_keys) {
			ctx.outgoing.set(fk.column, `${fk.referenced_table}.${fk.referenced_column}`)
			const target = index.get(fk.referenced_table)
			if (target && fk.referenced_table !== table.table_name) {
				target.incoming.push({
					from: `${table.table_name}.${fk.column}`,
					to: `${fk.referenced_table}.${fk.referenced_column}`,
				})
			}
		}
	}
	for (const ctx of index.values()) {
		ctx.incoming.sort((a, b) => (a.from < b.from ? -1 : a.from > b.from ? 1 : 0))
	}
	return index
}

function tablePurpose(table: TableMetadata, tableRules: BusinessRule[], vocabulary: Vocabulary): string {
	if (table.comment && table.comment.trim()) return table.comment.trim()
	const described = tableRules.find((r) => r.kind === "term" && r.key === table.table_name)
	if (described) return described.value
	return expandName(table.table_name, vocabulary.abbreviations)
}

function columnLine(col: ColumnMetadata, table: TableMetadata, ctx: TableContext | undefined): string {
	let line = `- ${col.name}: ${col.data_type}${col.nullable ? "" : " NOT NULL"}`
	const tags: string[] = []
	if (table.primary_key.includes(col.name)) tags.push("PK")
	const ref = ctx?.outgoing.get(col.name)
	if (ref) tags.push(`FK -> ${ref}`)
	if (tags.length > 0) line += ` [${tags.join(", ")}]`
	if (col.comment && col.comment.trim()) line += ` - ${col.comment.trim()}`
	return line
}

/**
 * Render CREATE TABLE for a table
 */
export function renderDdl(table: TableMetadata): string {
	const parts = table.columns.map((col) => `    ${col.name} ${col.data_type}${col.nullable ? "" : " NOT NULL"}`)
	if (table.primary_key.length > 0) {
		parts.push(`    PRIMARY KEY (${table.primary_key.join(", ")})`)
	}
	for (const fk of table.foreign_keys) {
		parts.push(`    FOREIGN KEY (${fk.column}) REFERENCES ${fk.referenced_table}(${fk.referenced_column})`)
	}
	return `CREATE TABLE ${table.table_name} (\n${parts.join(",\n")}\n)`
}

function renderRuleSection(title: string, rules: BusinessRule[]): string[] {
	if (rules.length === 0) return []
	return [`## ${title}`, ...rules.map((r) => `- ${r.key}: ${r.value}`)]
}

function renderTableChunk(
	table: TableMetadata,
	ctx: TableContext | undefined,
	rules: BusinessRuleStore,
	vocabulary: Vocabulary,
	includeDdl: boolean,
): ChunkDraft {
	const tableRules = rules.forTable(table.table_name)
	const applicable = [...generalRulesForTable(table, rules), ...tableRules]
	const lines: string[] = []

	lines.push(`# Table: ${table.table_name}`)
	lines.push(`Purpose: ${tablePurpose(table, tableRules, vocabulary)}`)

	const tableSynonyms = collectSynonyms(vocabulary.table_synonyms, table.table_name)
	if (tableSynonyms.length > 0) {
		lines.push(`Also known as: ${tableSynonyms.join(", ")}`)
	}
	if (table.row_estimate !== undefined && table.row_estimate !== null) {
		lines.push(`Approximate rows: ${table.row_estimate}`)
	}

	lines.push("", "## Columns")
	for (const col of table.columns) {
		lines.push(columnLine(col, table, ctx))
	}

	const relationships: string[] = []
	for (const fk of table.foreign_keys) {
		relationships.push(
			`- ${table.table_name}.${fk.column} references ${fk.referenced_table}.${fk.referenced_column} (join ${table.table_name} to ${fk.referenced_table} on ${table.table_name}.${fk.column} = ${fk.referenced_table}.${fk.referenced_column})`,
		)
	}
	for (const ref of ctx?.incoming ?? []) {
		relationships.push(`- ${ref.from} references ${ref.to}`)
	}
	if (relationships.length > 0) {
		lines.push("", "## Relationships", ...relationships)
	}

	const sections = [
		...renderRuleSection("Business terms", applicable.filter((r) => r.kind === "term" && r.key !== table.table_name)),
		...renderRuleSection("Metrics", applicable.filter((r) => r.kind === "metric")),
		...renderRuleSection("Calculations", applicable.filter((r) => r.kind === "calculation")),
	]
	if (sections.length > 0) lines.push("", ...sections)

	const enumLines: string[] = []
	for (const col of table.columns) {
		const fromRule = rules.get(table.table_name, "enum_value", col.name)
		const gloss = fromRule?.value ?? extractEnumGloss(col.comment)
		if (gloss) enumLines.push(`- ${col.name}: ${gloss}`)
	}
	if (enumLines.length > 0) lines.push("", "## Enum values", ...enumLines)

	const synonymLines: string[] = []
	for (const col of table.columns) {
		const syns = collectSynonyms(vocabulary.column_synonyms, col.name)
		if (syns.length > 0) synonymLines.push(`- ${col.name}: ${syns.join(", ")}`)
	}
	if (synonymLines.length > 0) lines.push("", "## Column synonyms", ...synonymLines)

	if (includeDdl) {
		lines.push("", "## DDL", renderDdl(table))
	}

	const text = lines.join("\n")
	return {
		id: tableChunkId(table.table_name),
		source_table: table.table_name,
		text,
		metadata: {
			kind: "table",
			table_name: table.table_name,
			columns: table.columns.map((c) => c.name),
			fingerprint: fingerprint(text),
		},
	}
}

function renderColumnChunk(
	table: TableMetadata,
	col: ColumnMetadata,
	ctx: TableContext | undefined,
	rules: BusinessRuleStore,
	vocabulary: Vocabulary,
): ChunkDraft {
	const lines: string[] = []
	lines.push(`Column: ${table.table_name}.${col.name}`)
	lines.push(`Table: ${table.table_name} (${tablePurpose(table, rules.forTable(table.table_name), vocabulary)})`)
	lines.push(`Type: ${col.data_type}${col.nullable ? ", nullable" : ", not null"}`)
	if (table.primary_key.includes(col.name)) lines.push("Primary key")
	const ref = ctx?.outgoing.get(col.name)
	if (ref) lines.push(`References: ${ref}`)
	lines.push(`Meaning: ${col.comment?.trim() || expandName(col.name, vocabulary.abbreviations)}`)

	const gloss = rules.get(table.table_name, "enum_value", col.name)?.value ?? extractEnumGloss(col.comment)
	if (gloss) lines.push(`Values: ${gloss}`)
	const syns = collectSynonyms(vocabulary.column_synonyms, col.name)
	if (syns.length > 0) lines.push(`Synonyms: ${syns.join(", ")}`)

	const text = lines.join("\n")
	return {
		id: columnChunkId(table.table_name, col.name),
		source_table: table.table_name,
		text,
		metadata: {
			kind: "column",
			table_name: table.table_name,
			column_name: col.name,
			fingerprint: fingerprint(text),
		},
	}
}

function renderGeneralRulesChunk(rules: BusinessRuleStore): ChunkDraft | null {
	const general = rules.general()
	if (general.length === 0) return null
	const lines = [
		"# Business rules and definitions",
		"",
		...renderRuleSection("Business terms", general.filter((r) => r.kind === "term")),
		...renderRuleSection("Metrics", general.filter((r) => r.kind === "metric")),
		...renderRuleSection("Calculations", general.filter((r) => r.kind === "calculation")),
	]
	const text = lines.join("\n")
	return {
		id: GENERAL_RULES_CHUNK_ID,
		source_table: null,
		text,
		metadata: {
			kind: "rules",
			table_name: null,
			fingerprint: fingerprint(text),
		},
	}
}

/**
 * Compute fingerprint for change detection
 */
function fingerprint(text: string): string {
	return crypto.createHash("md5").update(text).digest("hex")
}

// ============================================================================
// Entry Point
// ============================================================================

export function buildChunks(
	tables: readonly TableMetadata[],
	rules: BusinessRuleStore,
	options: ChunkerOptions,
	vocabulary: Vocabulary = getVocabulary(),
): ChunkDraft[] {
	const ordered = [...tables].sort((a, b) => (a.table_name < b.table_name ? -1 : a.table_name > b.table_name ? 1 : 0))
	const relationships = buildRelationshipIndex(ordered)
	const includeDdl = options.includeDdl ?? true
	const chunks: ChunkDraft[] = []

	for (const table of ordered) {
		const ctx = relationships.get(table.table_name)
		chunks.push(renderTableChunk(table, ctx, rules, vocabulary, includeDdl))
		if (options.granularity === "table_and_columns") {
			for (const col of table.columns) {
				chunks.push(renderColumnChunk(table, col, ctx, rules, vocabulary))
			}
		}
	}

	const general = renderGeneralRulesChunk(rules)
	if (general) chunks.push(general)

	return chunks
}
