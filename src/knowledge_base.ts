/**
 * Knowledge Base
 *
 * Owns persisted chunks and their embeddings. Chunk ids are deterministic
 * (derived from table name and chunk kind), so upsert-by-id replaces rather
 * than duplicates on rebuild.
 */

import { z } from "zod"
import { cosineSimilarity } from "./embedder.js"
import { KnowledgeBaseError } from "./errors.js"
import type { ChunkFilter, ChunkMetadataValue, KnowledgeChunk, ScoredChunk } from "./schema_types.js"

export interface ChunkRef {
	id: string
	source_table: string | null
}

export interface KnowledgeBase {
	upsert(chunks: KnowledgeChunk[]): Promise<void>
	/** Remove every chunk whose source_table is the table; returns the count removed */
	delete(tableName: string): Promise<number>
	/** Remove chunks by id; returns the count removed */
	deleteChunks(ids: string[]): Promise<number>
	search(vector: number[], topK: number, filter?: ChunkFilter): Promise<ScoredChunk[]>
	get(ids: string[]): Promise<KnowledgeChunk[]>
	listTables(): Promise<string[]>
	listIds(): Promise<ChunkRef[]>
	count(): Promise<number>
	export(): Promise<KnowledgeSnapshot>
	/** Replace the whole contents with the snapshot */
	import(snapshot: KnowledgeSnapshot): Promise<void>
	clear(): Promise<void>
}

// ============================================================================
// Snapshot Format
// ============================================================================

const metadataValue: z.ZodType<ChunkMetadataValue> = z.union([
	z.string(),
	z.number(),
	z.boolean(),
	z.null(),
	z.array(z.string()),
])

const snapshotChunk = z.object({
	id: z.string().min(1),
	source_table: z.string().nullable(),
	text: z.string(),
	embedding: z.array(z.number()).min(1),
	metadata: z
		.object({
			kind: z.enum(["table", "column", "rules"]),
			table_name: z.string().nullable(),
		})
		.catchall(metadataValue),
})

export const knowledgeSnapshotSchema = z
	.object({
		version: z.literal(1),
		embedding_model: z.string(),
		dimensions: z.number().int().nonnegative(),
		exported_at: z.string(),
		chunks: z.array(snapshotChunk),
	})
	.superRefine((snap, ctx) => {
		const seen = new Set<string>()
		snap.chunks.forEach((chunk, i) => {
			if (seen.has(chunk.id)) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["chunks", i, "id"], message: `duplicate chunk id ${chunk.id}` })
			}
			seen.add(chunk.id)
			if (snap.dimensions > 0 && chunk.embedding.length !== snap.dimensions) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["chunks", i, "embedding"],
					message: `expected ${snap.dimensions} dimensions, got ${chunk.embedding.length}`,
				})
			}
		})
	})

export type KnowledgeSnapshot = z.infer<typeof knowledgeSnapshotSchema>

/** Validate an untrusted snapshot (e.g. read from a file). */
export function parseSnapshot(raw: unknown): KnowledgeSnapshot {
	const result = knowledgeSnapshotSchema.safeParse(raw)
	if (!result.success) {
		const issue = result.error.issues[0]
		throw new KnowledgeBaseError(`Invalid knowledge base snapshot at ${issue.path.join(".") || "(root)"}: ${issue.message}`)
	}
	return result.data
}

export function buildSnapshot(chunks: KnowledgeChunk[], embeddingModel: string): KnowledgeSnapshot {
	const sorted = [...chunks].sort((a, b) => compareIds(a.id, b.id))
	return {
		version: 1,
		embedding_model: embeddingModel,
		dimensions: sorted.length > 0 ? sorted[0].embedding.length : 0,
		exported_at: new Date().toISOString(),
		chunks: sorted.map((c) => ({
			id: c.id,
			source_table: c.source_table,
			text: c.text,
			embedding: [...c.embedding],
			metadata: { ...c.metadata },
		})),
	}
}

// ============================================================================
// Ranking Helpers
// ============================================================================

export function compareIds(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0
}

/** Score desc, then chunk id asc */
export function compareScored(a: ScoredChunk, b: ScoredChunk): number {
	if (b.score !== a.score) return b.score - a.score
	return compareIds(a.chunk.id, b.chunk.id)
}

function valuesEqual(a: ChunkMetadataValue | undefined, b: ChunkMetadataValue | undefined): boolean {
	if (Array.isArray(a) && Array.isArray(b)) {
		return a.length === b.length && a.every((v, i) => v === b[i])
	}
	return a === b
}

export function matchesFilter(chunk: KnowledgeChunk, filter?: ChunkFilter): boolean {
	if (!filter) return true
	return Object.entries(filter).every(([key, expected]) => valuesEqual(chunk.metadata[key], expected))
}

/** Frozen copy; vectors and list-valued metadata are copied, never shared. */
function freezeChunk(chunk: KnowledgeChunk): KnowledgeChunk {
	const metadata = { ...chunk.metadata }
	for (const [key, value] of Object.entries(metadata)) {
		if (Array.isArray(value)) metadata[key] = [...value]
	}
	return Object.freeze({
		id: chunk.id,
		source_table: chunk.source_table,
		text: chunk.text,
		embedding: [...chunk.embedding],
		metadata: Object.freeze(metadata),
	})
}

// ============================================================================
// In-Memory Implementation
// ============================================================================

/**
 * Exact cosine search over an id-keyed map. Each chunk is stored as a frozen
 * copy and swapped in whole, so a reader sees either the old or the new
 * version of a chunk.
 */
export class InMemoryKnowledgeBase implements KnowledgeBase {
	private chunks = new Map<string, KnowledgeChunk>()

	constructor(private embeddingModel: string = "unknown") {}

	async upsert(chunks: KnowledgeChunk[]): Promise<void> {
		for (const chunk of chunks) {
			this.chunks.set(chunk.id, freezeChunk(chunk))
		}
	}

	async delete(tableName: string): Promise<number> {
		let removed = 0
		for (const [id, chunk] of this.chunks) {
			if (chunk.source_table === tableName) {
				this.chunks.delete(id)
				removed++
			}
		}
		return removed
	}

	async deleteChunks(ids: string[]): Promise<number> {
		let removed = 0
		for (const id of ids) {
			if (this.chunks.delete(id)) removed++
		}
		return removed
	}

	async search(vector: number[], topK: number, filter?: ChunkFilter): Promise<ScoredChunk[]> {
		if (topK <= 0) return []
		const scored: ScoredChunk[] = []
		for (const chunk of this.chunks.values()) {
			if (!matchesFilter(chunk, filter)) continue
			scored.push({ chunk, score: cosineSimilarity(vector, chunk.embedding) })
		}
		return scored
			.sort(compareScored)
			.slice(0, topK)
			.map((item) => ({ chunk: freezeChunk(item.chunk), score: item.score }))
	}

	async get(ids: string[]): Promise<KnowledgeChunk[]> {
		const out: KnowledgeChunk[] = []
		for (const id of ids) {
			const chunk = this.chunks.get(id)
			if (chunk) out.push(freezeChunk(chunk))
		}
		return out
	}

	async listTables(): Promise<string[]> {
		const tables = new Set<string>()
		for (const chunk of this.chunks.values()) {
			if (chunk.source_table !== null) tables.add(chunk.source_table)
		}
		return [...tables].sort(compareIds)
	}

	async listIds(): Promise<ChunkRef[]> {
		return [...this.chunks.values()]
			.map((c) => ({ id: c.id, source_table: c.source_table }))
			.sort((a, b) => compareIds(a.id, b.id))
	}

	async count(): Promise<number> {
		return this.chunks.size
	}

	async export(): Promise<KnowledgeSnapshot> {
		return buildSnapshot([...this.chunks.values()], this.embeddingModel)
	}

	async import(snapshot: KnowledgeSnapshot): Promise<void> {
		const validated = parseSnapshot(snapshot)
		const next = new Map<string, KnowledgeChunk>()
		for (const chunk of validated.chunks) {
			next.set(chunk.id, freezeChunk(chunk))
		}
		this.chunks = next
	}

	async clear(): Promise<void> {
		this.chunks = new Map()
	}
}
