/**
 * Schema Retriever
 *
 * Flow:
 * 1. Embed the question
 * 2. [Hybrid] Embed the analyzer's enhanced search text as a second query
 * 3. Search the knowledge base for top-K per query, merge by chunk id (max score)
 * 4. Drop candidates below the score threshold
 * 5. Pin chunks of explicitly mentioned tables/columns, fetching them by id
 *    when the search did not return them
 * 6. Order: pinned first, then score desc, chunk id asc
 *
 * Pinned chunks are never filtered by threshold and never cut by top-K.
 */

import { cosineSimilarity, type EmbeddingService } from "./embedder.js"
import { compareScored, type KnowledgeBase } from "./knowledge_base.js"
import type { Logger } from "./logger.js"
import { columnChunkId, tableChunkId } from "./schema_embedder.js"
import type { QueryAnalysis, RetrievedChunk, RetrievedContext, ScoredChunk } from "./schema_types.js"

export interface RetrieverConfig {
	topK: number
	scoreThreshold: number
	/** Also search with the analyzer's enhanced query */
	hybrid: boolean
	/** Force-include chunks of explicitly named tables */
	pinEntities: boolean
}

export interface RetrieveOptions {
	topK?: number
	scoreThreshold?: number
	analysis?: QueryAnalysis
	queryId?: string
}

/** Merge result lists by chunk id, keeping the highest score. */
export function mergeByMaxScore(...lists: ScoredChunk[][]): ScoredChunk[] {
	const best = new Map<string, ScoredChunk>()
	for (const list of lists) {
		for (const item of list) {
			const existing = best.get(item.chunk.id)
			if (!existing || item.score > existing.score) best.set(item.chunk.id, item)
		}
	}
	return [...best.values()].sort(compareScored)
}

/** Chunk ids an analysis pins: the table chunk of every mention, plus column chunks for column mentions. */
export function pinnedChunkIds(analysis: QueryAnalysis): string[] {
	const ids: string[] = []
	for (const entity of analysis.entities) {
		const tableId = tableChunkId(entity.table_name)
		if (!ids.includes(tableId)) ids.push(tableId)
		if (entity.column_name) {
			const columnId = columnChunkId(entity.table_name, entity.column_name)
			if (!ids.includes(columnId)) ids.push(columnId)
		}
	}
	return ids
}

export class SchemaRetriever {
	constructor(
		private kb: KnowledgeBase,
		private embedder: EmbeddingService,
		private config: RetrieverConfig,
		private logger: Logger,
	) {}

	async retrieve(question: string, options: RetrieveOptions = {}): Promise<RetrievedContext> {
		const startTime = Date.now()
		const topK = options.topK ?? this.config.topK
		const threshold = options.scoreThreshold ?? this.config.scoreThreshold
		const analysis = options.analysis

		const questionVector = await this.embedder.embed(question)
		const lists = [await this.kb.search(questionVector, topK)]

		if (this.config.hybrid && analysis && analysis.search_text !== question) {
			const searchVector = await this.embedder.embed(analysis.search_text)
			lists.push(await this.kb.search(searchVector, topK))
		}
		const merged = mergeByMaxScore(...lists)

		// Pinning
		const pinIds = this.config.pinEntities && analysis ? pinnedChunkIds(analysis) : []
		const pinned = new Map<string, RetrievedChunk>()
		for (const item of merged) {
			if (pinIds.includes(item.chunk.id)) pinned.set(item.chunk.id, { ...item, pinned: true })
		}
		const missing = pinIds.filter((id) => !pinned.has(id))
		if (missing.length > 0) {
			for (const chunk of await this.kb.get(missing)) {
				pinned.set(chunk.id, { chunk, score: cosineSimilarity(questionVector, chunk.embedding), pinned: true })
			}
		}

		const pinnedChunks = [...pinned.values()].sort(compareScored)
		const rest: RetrievedChunk[] = merged
			.filter((item) => !pinned.has(item.chunk.id) && item.score >= threshold)
			.slice(0, topK)
			.map((item) => ({ ...item, pinned: false }))

		const pinnedTables = [...new Set((analysis?.entities ?? []).map((e) => e.table_name))]
		const context: RetrievedContext = {
			chunks: [...pinnedChunks, ...rest],
			pinned_tables: this.config.pinEntities ? pinnedTables : [],
		}

		this.logger.info("Retrieved schema context", {
			query_id: options.queryId,
			chunks: context.chunks.map((c) => c.chunk.id),
			pinned: pinnedChunks.map((c) => c.chunk.id),
			below_threshold: merged.filter((item) => item.score < threshold).length,
			latency_ms: Date.now() - startTime,
		})
		return context
	}
}
