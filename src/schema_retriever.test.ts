import { describe, it, expect } from "vitest"
import { InMemoryKnowledgeBase } from "./knowledge_base.js"
import { silentLogger } from "./logger.js"
import { SchemaRetriever, mergeByMaxScore, pinnedChunkIds, type RetrieverConfig } from "./schema_retriever.js"
import type { EntityMention, KnowledgeChunk, QueryAnalysis } from "./schema_types.js"
import { MapEmbeddingService } from "./test_support.js"

function kbChunk(id: string, embedding: number[], sourceTable: string | null): KnowledgeChunk {
	return {
		id,
		source_table: sourceTable,
		text: id,
		embedding,
		metadata: { kind: sourceTable ? "table" : "rules", table_name: sourceTable },
	}
}

function analysisFor(question: string, entities: EntityMention[], searchText = question): QueryAnalysis {
	return {
		question,
		entities,
		rule_keys: [],
		time_range: null,
		aggregation: null,
		intent: "simple",
		dimensions: [],
		search_text: searchText,
	}
}

async function setup(config: Partial<RetrieverConfig> = {}) {
	const kb = new InMemoryKnowledgeBase()
	await kb.upsert([
		kbChunk("table:orders", [1, 0], "orders"),
		kbChunk("table:users", [0, 1], "users"),
		kbChunk("table:products", [0.6, 0.8], "products"),
		kbChunk("rules:general", [0.8, 0.6], null),
	])
	const embedder = new MapEmbeddingService({ q: [1, 0], "q (users)": [0, 1] }, [1, 0])
	const retriever = new SchemaRetriever(
		kb,
		embedder,
		{ topK: 2, scoreThreshold: 0.5, hybrid: false, pinEntities: true, ...config },
		silentLogger,
	)
	return { kb, retriever }
}

const ids = (chunks: { chunk: { id: string } }[]) => chunks.map((c) => c.chunk.id)

describe("SchemaRetriever", () => {
	it("returns the top-K chunks above the threshold", async () => {
		const { retriever } = await setup()
		const context = await retriever.retrieve("q")
		expect(ids(context.chunks)).toEqual(["table:orders", "rules:general"])
		expect(context.chunks.every((c) => !c.pinned)).toBe(true)
		expect(context.pinned_tables).toEqual([])
	})

	it("filters by the score threshold", async () => {
		const { retriever } = await setup({ scoreThreshold: 0.9 })
		expect(ids((await retriever.retrieve("q")).chunks)).toEqual(["table:orders"])
	})

	it("pins mentioned tables even when search missed them", async () => {
		const { retriever } = await setup()
		const analysis = analysisFor("q", [{ table_name: "users", column_name: null, matched: "users" }])

		const context = await retriever.retrieve("q", { analysis })

		expect(ids(context.chunks)).toEqual(["table:users", "table:orders", "rules:general"])
		expect(context.chunks[0]).toMatchObject({ pinned: true, score: 0 })
		expect(context.pinned_tables).toEqual(["users"])
	})

	it("does not pin when pinning is off", async () => {
		const { retriever } = await setup({ pinEntities: false })
		const analysis = analysisFor("q", [{ table_name: "users", column_name: null, matched: "users" }])

		const context = await retriever.retrieve("q", { analysis })

		expect(ids(context.chunks)).toEqual(["table:orders", "rules:general"])
		expect(context.pinned_tables).toEqual([])
	})

	it("merges question and enhanced-query results by max score", async () => {
		const { retriever } = await setup({ hybrid: true, topK: 3 })
		const context = await retriever.retrieve("q", { analysis: analysisFor("q", [], "q (users)") })
		expect(ids(context.chunks)).toEqual(["table:orders", "table:users", "rules:general"])
	})

	it("skips the second search when the enhanced query adds nothing", async () => {
		const { retriever } = await setup({ hybrid: true, topK: 3 })
		const context = await retriever.retrieve("q", { analysis: analysisFor("q", []) })
		expect(ids(context.chunks)).toEqual(["table:orders", "rules:general", "table:products"])
	})

	it("breaks score ties by chunk id", async () => {
		const kb = new InMemoryKnowledgeBase()
		await kb.upsert([kbChunk("table:b", [1, 0], "b"), kbChunk("table:a", [1, 0], "a")])
		const retriever = new SchemaRetriever(
			kb,
			new MapEmbeddingService({}, [1, 0]),
			{ topK: 1, scoreThreshold: 0, hybrid: false, pinEntities: true },
			silentLogger,
		)
		expect(ids((await retriever.retrieve("anything")).chunks)).toEqual(["table:a"])
	})

	it("honors per-call topK", async () => {
		const { retriever } = await setup({ scoreThreshold: 0 })
		expect(ids((await retriever.retrieve("q", { topK: 3 })).chunks)).toEqual([
			"table:orders",
			"rules:general",
			"table:products",
		])
	})
})

describe("mergeByMaxScore", () => {
	it("keeps the highest score per chunk id", () => {
		const a = kbChunk("table:a", [1], "a")
		const b = kbChunk("table:b", [1], "b")
		const merged = mergeByMaxScore(
			[
				{ chunk: a, score: 0.2 },
				{ chunk: b, score: 0.5 },
			],
			[{ chunk: a, score: 0.7 }],
		)
		expect(merged.map((m) => [m.chunk.id, m.score])).toEqual([
			["table:a", 0.7],
			["table:b", 0.5],
		])
	})
})

describe("pinnedChunkIds", () => {
	it("pins the table chunk and the column chunk of column mentions", () => {
		const analysis = analysisFor("q", [
			{ table_name: "orders", column_name: "user_id", matched: "user_id" },
			{ table_name: "orders", column_name: null, matched: "orders" },
		])
		expect(pinnedChunkIds(analysis)).toEqual(["table:orders", "column:orders.user_id"])
	})
})
