/**
 * Knowledge Base Builder
 *
 * Offline path: metadata source -> chunker (+ business rules) -> embedder ->
 * knowledge base.
 *
 * Every chunk is embedded before the first write. An extraction or embedding
 * failure therefore leaves the previous knowledge base untouched. Publishing
 * deletes chunks of tables that disappeared, then upserts the new set.
 */

import type { BusinessRuleStore } from "./business_rules.js"
import type { Embedder } from "./embedder.js"
import type { KnowledgeBase } from "./knowledge_base.js"
import type { Logger } from "./logger.js"
import { buildChunks, type ChunkerOptions } from "./schema_embedder.js"
import type { MetadataSource } from "./schema_introspector.js"
import type { BusinessRule, ChunkDraft, KnowledgeChunk, TableMetadata } from "./schema_types.js"

export interface BuildOptions {
	/** Rebuild even when the knowledge base already has chunks */
	force?: boolean
	/** Rules to use for this build; replaces the builder's current store */
	rules?: BusinessRuleStore
}

export interface BuildReport {
	status: "built" | "skipped"
	tables: number
	chunks: number
	/** Chunk ids written this run */
	upserted: string[]
	/** Tables whose chunks were removed because they no longer exist */
	removed_tables: string[]
	/** Stale chunk ids removed (e.g. rules:general after all general rules went away) */
	removed_chunks: string[]
	/** Chunks that did not come back as their own top-1 match */
	self_match_failures: string[]
	latency_ms: number
}

export interface RuleUpdateReport {
	rule: BusinessRule
	reembedded: string[]
}

function toKnowledgeChunk(draft: ChunkDraft, embedding: number[]): KnowledgeChunk {
	return { ...draft, embedding }
}

export class KnowledgeBaseBuilder {
	private lastTables: readonly TableMetadata[] = []

	constructor(
		private source: MetadataSource,
		private kb: KnowledgeBase,
		private embedder: Embedder,
		private rules: BusinessRuleStore,
		private chunkerOptions: ChunkerOptions,
		private logger: Logger,
	) {}

	get ruleStore(): BusinessRuleStore {
		return this.rules
	}

	/** Most recent extraction snapshot (empty until the first build) */
	get tables(): readonly TableMetadata[] {
		return this.lastTables
	}

	async build(options: BuildOptions = {}): Promise<BuildReport> {
		const startTime = Date.now()
		const force = options.force ?? false

		const existing = await this.kb.count()
		if (!force && existing > 0) {
			this.logger.info("Knowledge base already populated; skipping build", { chunks: existing })
			return {
				status: "skipped",
				tables: 0,
				chunks: existing,
				upserted: [],
				removed_tables: [],
				removed_chunks: [],
				self_match_failures: [],
				latency_ms: Date.now() - startTime,
			}
		}

		const rules = options.rules ?? this.rules

		// Step 1: extract (ExtractionError propagates; nothing written yet)
		const tables = await this.source.extract()
		this.logger.info("Metadata extracted", { tables: tables.length })

		// Step 2: chunk
		const drafts = buildChunks(tables, rules, this.chunkerOptions)

		// Step 3: embed everything before touching the knowledge base
		const vectors = await this.embedder.embedBatch(drafts.map((d) => d.text))
		const chunks = drafts.map((draft, i) => toKnowledgeChunk(draft, vectors[i]))
		this.logger.info("Chunks embedded", { chunks: chunks.length })

		// Step 4: publish. Stale tables first, then upsert.
		const currentTables = new Set(tables.map((t) => t.table_name))
		const previousTables = await this.kb.listTables()
		const removedTables = previousTables.filter((t) => !currentTables.has(t))
		for (const table of removedTables) {
			const removed = await this.kb.delete(table)
			this.logger.info("Removed stale table chunks", { table, chunks: removed })
		}

		// Chunks of surviving tables that are no longer produced (e.g. column chunks after a granularity change)
		const newIds = new Set(chunks.map((c) => c.id))
		const removedChunks = await this.removeOrphans(currentTables, newIds)

		await this.kb.upsert(chunks)

		this.rules = rules
		this.lastTables = tables

		// Step 5: verify
		const selfMatchFailures = await this.verifySelfMatch(chunks)

		const report: BuildReport = {
			status: "built",
			tables: tables.length,
			chunks: chunks.length,
			upserted: chunks.map((c) => c.id),
			removed_tables: removedTables,
			removed_chunks: removedChunks,
			self_match_failures: selfMatchFailures,
			latency_ms: Date.now() - startTime,
		}
		this.logger.info("Knowledge base built", {
			tables: report.tables,
			chunks: report.chunks,
			removed_tables: removedTables.length,
			self_match_failures: selfMatchFailures.length,
			latency_ms: report.latency_ms,
		})
		return report
	}

	/**
	 * Drop chunks that belong to a surviving table (or to no table) but are not
	 * part of the new chunk set, e.g. column chunks after a granularity change.
	 */
	private async removeOrphans(currentTables: Set<string>, newIds: Set<string>): Promise<string[]> {
		const existing = await this.kb.listIds()
		const orphans = existing.filter((e) => !newIds.has(e.id) && (e.source_table === null || currentTables.has(e.source_table)))
		if (orphans.length === 0) return []
		const ids = orphans.map((o) => o.id)
		await this.kb.deleteChunks(ids)
		this.logger.info("Removed orphaned chunks", { ids })
		return ids
	}

	/**
	 * Search with each chunk's own vector; the chunk must come back first.
	 */
	async verifySelfMatch(chunks: KnowledgeChunk[]): Promise<string[]> {
		const failures: string[] = []
		for (const chunk of chunks) {
			const [top] = await this.kb.search(chunk.embedding, 1)
			if (!top || top.chunk.id !== chunk.id) {
				failures.push(chunk.id)
			}
		}
		if (failures.length > 0) {
			this.logger.warn("Self-match verification failed", { chunks: failures })
		}
		return failures
	}

	/**
	 * Add or overwrite a business rule and re-embed only the chunks whose
	 * rendered text changed.
	 */
	async addBusinessRule(rule: BusinessRule): Promise<RuleUpdateReport> {
		const previous = this.rules.get(rule.scope, rule.kind, rule.key.trim())
		this.rules.set(rule)

		if ((await this.kb.count()) === 0) {
			this.logger.info("Business rule stored for the next build", { scope: rule.scope, key: rule.key })
			return { rule, reembedded: [] }
		}

		try {
			if (this.lastTables.length === 0) {
				this.lastTables = await this.source.extract()
			}
			const drafts = buildChunks(this.lastTables, this.rules, this.chunkerOptions)
			const stored = new Map((await this.kb.get(drafts.map((d) => d.id))).map((c) => [c.id, c.text]))
			const changed = drafts.filter((d) => stored.get(d.id) !== d.text)
			if (changed.length === 0) {
				this.logger.info("Business rule added; no chunk text changed", { scope: rule.scope, key: rule.key })
				return { rule, reembedded: [] }
			}

			const vectors = await this.embedder.embedBatch(changed.map((d) => d.text))
			const chunks = changed.map((draft, i) => toKnowledgeChunk(draft, vectors[i]))
			await this.kb.upsert(chunks)

			const ids = chunks.map((c) => c.id)
			this.logger.info("Business rule added", { scope: rule.scope, kind: rule.kind, key: rule.key, reembedded: ids })
			return { rule, reembedded: ids }
		} catch (error) {
			if (previous) {
				this.rules.set(previous)
			} else {
				this.rules.remove(rule.scope, rule.kind, rule.key.trim())
			}
			throw error
		}
	}
}
