import { describe, it, expect } from "vitest"
import { BusinessRuleStore } from "./business_rules.js"
import {
	buildChunks,
	expandName,
	extractEnumGloss,
	getVocabulary,
	renderDdl,
	type Vocabulary,
} from "./schema_embedder.js"
import type { TableMetadata } from "./schema_types.js"
import { sampleTables } from "./test_support.js"

const vocabulary: Vocabulary = {
	abbreviations: { cust: "customer", addr: "address" },
	table_synonyms: [{ contains: "user", synonyms: ["customer", "member"] }],
	column_synonyms: [{ suffix: "_name", synonyms: ["name"] }],
}

const rules = new BusinessRuleStore([
	{ scope: "general", kind: "metric", key: "GMV", value: "SUM(payment_amount)" },
	{ scope: "users", kind: "term", key: "会员", value: "registered user" },
	{ scope: "orders", kind: "enum_value", key: "order_status", value: "'paid' = 已支付" },
])

describe("buildChunks", () => {
	it("renders one chunk per table plus the general rules", () => {
		const chunks = buildChunks(sampleTables(), rules, { granularity: "table" }, vocabulary)
		expect(chunks.map((c) => c.id)).toEqual(["table:orders", "table:users", "rules:general"])
	})

	it("renders a complete table document", () => {
		const [, users] = buildChunks(sampleTables(), rules, { granularity: "table" }, vocabulary)

		expect(users.text).toBe(
			[
				"# Table: users",
				"Purpose: 用户表",
				"Also known as: customer, member",
				"",
				"## Columns",
				"- id: integer NOT NULL [PK] - 用户ID",
				"- user_name: varchar - 用户名",
				"- created_at: timestamp NOT NULL - 注册时间",
				"",
				"## Relationships",
				"- orders.user_id references users.id",
				"",
				"## Business terms",
				"- 会员: registered user",
				"",
				"## Column synonyms",
				"- user_name: name",
				"",
				"## DDL",
				"CREATE TABLE users (",
				"    id integer NOT NULL,",
				"    user_name varchar,",
				"    created_at timestamp NOT NULL,",
				"    PRIMARY KEY (id)",
				")",
			].join("\n"),
		)
		expect(users.source_table).toBe("users")
		expect(users.metadata).toMatchObject({ kind: "table", table_name: "users", columns: ["id", "user_name", "created_at"] })
	})

	it("includes join paths, matching general rules and enum glosses", () => {
		const [orders] = buildChunks(sampleTables(), rules, { granularity: "table" }, vocabulary)

		expect(orders.text).toContain("- user_id: integer NOT NULL [FK -> users.id] - 下单用户")
		expect(orders.text).toContain(
			"## Relationships\n- orders.user_id references users.id (join orders to users on orders.user_id = users.id)",
		)
		expect(orders.text).toContain("## Metrics\n- GMV: SUM(payment_amount)")
		expect(orders.text).toContain("## Enum values\n- order_status: 'paid' = 已支付")
		expect(orders.text).not.toContain("Also known as")
	})

	it("renders the general rules chunk without a source table", () => {
		const general = buildChunks(sampleTables(), rules, { granularity: "table" }, vocabulary)[2]
		expect(general).toMatchObject({
			id: "rules:general",
			source_table: null,
			text: "# Business rules and definitions\n\n## Metrics\n- GMV: SUM(payment_amount)",
		})
	})

	it("adds column chunks at column granularity", () => {
		const chunks = buildChunks(sampleTables(), rules, { granularity: "table_and_columns" }, vocabulary)

		expect(chunks.map((c) => c.id)).toEqual([
			"table:orders",
			"column:orders.id",
			"column:orders.user_id",
			"column:orders.payment_amount",
			"column:orders.order_status",
			"column:orders.created_at",
			"table:users",
			"column:users.id",
			"column:users.user_name",
			"column:users.created_at",
			"rules:general",
		])
		expect(chunks[2].text).toBe(
			"Column: orders.user_id\nTable: orders (订单表)\nType: integer, not null\nReferences: users.id\nMeaning: 下单用户",
		)
		expect(chunks[4].text).toContain("Values: 'paid' = 已支付")
	})

	it("is deterministic and sorts tables by name", () => {
		const reversed = [...sampleTables()].reverse()
		const a = buildChunks(sampleTables(), rules, { granularity: "table" }, vocabulary)
		const b = buildChunks(reversed, rules, { granularity: "table" }, vocabulary)
		expect(b).toEqual(a)
	})

	it("omits the general chunk and DDL when asked", () => {
		const chunks = buildChunks(sampleTables(), new BusinessRuleStore(), { granularity: "table", includeDdl: false }, vocabulary)
		expect(chunks.map((c) => c.id)).toEqual(["table:orders", "table:users"])
		expect(chunks[0].text).not.toContain("## DDL")
	})

	it("falls back to the expanded table name for the purpose", () => {
		const table: TableMetadata = {
			table_name: "cust_addr",
			comment: null,
			columns: [{ name: "id", data_type: "integer", nullable: false, comment: "类型: 1=家庭, 2=公司" }],
			primary_key: [],
			foreign_keys: [],
		}
		const [chunk] = buildChunks([table], new BusinessRuleStore(), { granularity: "table" }, vocabulary)

		expect(chunk.text).toContain("Purpose: customer address\n")
		expect(chunk.text).toContain("## Enum values\n- id: 1 means '家庭', 2 means '公司'")
	})
})

describe("expandName / extractEnumGloss / renderDdl", () => {
	it("expands abbreviations word by word", () => {
		expect(expandName("Cust_Addr_id", { cust: "customer", addr: "address" })).toBe("customer address id")
	})

	it("parses numbered enum comments", () => {
		expect(extractEnumGloss("状态: 1=成功, 2=失败")).toBe("1 means '成功', 2 means '失败'")
		expect(extractEnumGloss("free text")).toBeNull()
		expect(extractEnumGloss(null)).toBeNull()
	})

	it("renders foreign keys in the DDL", () => {
		expect(renderDdl(sampleTables()[0])).toContain("    FOREIGN KEY (user_id) REFERENCES users(id)\n)")
	})
})

describe("getVocabulary", () => {
	it("loads the bundled vocabulary file", () => {
		const loaded = getVocabulary()
		expect(Object.keys(loaded.abbreviations).length).toBeGreaterThan(0)
		expect(getVocabulary()).toBe(loaded)
	})
})
