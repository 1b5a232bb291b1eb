import { describe, it, expect } from "vitest"
import { BusinessRuleStore } from "./business_rules.js"
import { Embedder, type EmbeddingService } from "./embedder.js"
import { InMemoryKnowledgeBase } from "./knowledge_base.js"
import { KnowledgeBaseBuilder } from "./knowledge_base_builder.js"
import { silentLogger } from "./logger.js"
import type { ChunkGranularity } from "./schema_embedder.js"
import { StaticMetadataSource } from "./schema_introspector.js"
import { HashingEmbeddingService, MapEmbeddingService, sampleTables } from "./test_support.js"

function makeBuilder(
	kb: InMemoryKnowledgeBase,
	service: EmbeddingService,
	granularity: ChunkGranularity = "table",
	rules = new BusinessRuleStore(),
) {
	const embedder = new Embedder(service, { batchSize: 4, concurrency: 2, dimensions: null }, silentLogger)
	return new KnowledgeBaseBuilder(
		new StaticMetadataSource(sampleTables()),
		kb,
		embedder,
		rules,
		{ granularity },
		silentLogger,
	)
}

describe("KnowledgeBaseBuilder.build", () => {
	it("removes column chunks after switching to table granularity", async () => {
		const kb = new InMemoryKnowledgeBase()
		const service = new HashingEmbeddingService(64)
		const first = await makeBuilder(kb, service, "table_and_columns").build()
		expect(first.chunks).toBe(10)

		const report = await makeBuilder(kb, service, "table").build({ force: true })

		expect(report.removed_tables).toEqual([])
		expect(report.removed_chunks).toEqual([
			"column:orders.created_at",
			"column:orders.id",
			"column:orders.order_status",
			"column:orders.payment_amount",
			"column:orders.user_id",
			"column:users.created_at",
			"column:users.id",
			"column:users.user_name",
		])
		expect(await kb.count()).toBe(2)
	})

	it("reports chunks that are not their own best match", async () => {
		const kb = new InMemoryKnowledgeBase()
		const report = await makeBuilder(kb, new MapEmbeddingService({}, [1, 0])).build()
		expect(report.self_match_failures).toEqual(["table:users"])
	})

	it("adopts the rules passed to the build", async () => {
		const builder = makeBuilder(new InMemoryKnowledgeBase(), new HashingEmbeddingService(64))
		const rules = new BusinessRuleStore([{ scope: "general", kind: "metric", key: "GMV", value: "SUM(payment_amount)" }])

		const report = await builder.build({ rules })

		expect(builder.ruleStore).toBe(rules)
		expect(report.upserted).toEqual(["table:orders", "table:users", "rules:general"])
	})

	it("records the extracted tables", async () => {
		const builder = makeBuilder(new InMemoryKnowledgeBase(), new HashingEmbeddingService(64))
		expect(builder.tables).toEqual([])
		await builder.build()
		expect(builder.tables.map((t) => t.table_name)).toEqual(["orders", "users"])
	})
})

describe("KnowledgeBaseBuilder.addBusinessRule", () => {
	it("re-embeds nothing when the rendered text is unchanged", async () => {
		const kb = new InMemoryKnowledgeBase()
		const rules = new BusinessRuleStore([{ scope: "general", kind: "metric", key: "GMV", value: "SUM(payment_amount)" }])
		const builder = makeBuilder(kb, new HashingEmbeddingService(64), "table", rules)
		await builder.build()

		const report = await builder.addBusinessRule({ scope: "general", kind: "metric", key: "GMV", value: "SUM(payment_amount)" })

		expect(report.reembedded).toEqual([])
	})

	it("re-embeds every table a general rule mentions plus the rules chunk", async () => {
		const kb = new InMemoryKnowledgeBase()
		const builder = makeBuilder(kb, new HashingEmbeddingService(64))
		await builder.build()

		const report = await builder.addBusinessRule({ scope: "general", kind: "calculation", key: "注册天数", value: "now() - created_at" })

		expect(report.reembedded).toEqual(["table:orders", "table:users", "rules:general"])
		expect(await kb.count()).toBe(3)
	})

	it("restores the previous rule when re-embedding fails", async () => {
		const kb = new InMemoryKnowledgeBase()
		const service = new HashingEmbeddingService(64)
		const rules = new BusinessRuleStore([{ scope: "orders", kind: "enum_value", key: "order_status", value: "'paid' = 已支付" }])
		const builder = makeBuilder(kb, service, "table", rules)
		await builder.build()
		const before = (await kb.get(["table:orders"]))[0].text

		service.failWith = new Error("embedding service down")
		await expect(
			builder.addBusinessRule({ scope: "orders", kind: "enum_value", key: "order_status", value: "'void' = 已作废" }),
		).rejects.toThrow("embedding service down")

		expect(builder.ruleStore.get("orders", "enum_value", "order_status")?.value).toBe("'paid' = 已支付")
		expect((await kb.get(["table:orders"]))[0].text).toBe(before)
	})

	it("removes a new rule again when re-embedding fails", async () => {
		const kb = new InMemoryKnowledgeBase()
		const service = new HashingEmbeddingService(64)
		const builder = makeBuilder(kb, service)
		await builder.build()

		service.failWith = new Error("embedding service down")
		await expect(
			builder.addBusinessRule({ scope: "users", kind: "term", key: "会员", value: "registered user" }),
		).rejects.toThrow("embedding service down")

		expect(builder.ruleStore.size).toBe(0)
	})
})
