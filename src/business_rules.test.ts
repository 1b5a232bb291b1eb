import { describe, it, expect } from "vitest"
import * as fs from "fs"
import * as os from "os"
import * as path from "path"
import { BusinessRuleStore, loadBusinessRules, parseBusinessRulesDocument } from "./business_rules.js"
import { ConfigError } from "./errors.js"

describe("BusinessRuleStore", () => {
	it("overwrites a rule with the same (scope, kind, key)", () => {
		const store = new BusinessRuleStore()
		store.set({ scope: "general", kind: "metric", key: "GMV", value: "SUM(amount)" })
		store.set({ scope: "general", kind: "metric", key: "GMV", value: "SUM(payment_amount)" })
		expect(store.size).toBe(1)
		expect(store.get("general", "metric", "GMV")?.value).toBe("SUM(payment_amount)")
	})

	it("keeps rules with the same key but different kind or scope apart", () => {
		const store = new BusinessRuleStore([
			{ scope: "general", kind: "term", key: "GMV", value: "gross merchandise value" },
			{ scope: "general", kind: "metric", key: "GMV", value: "SUM(payment_amount)" },
			{ scope: "orders", kind: "term", key: "GMV", value: "order level GMV" },
		])
		expect(store.size).toBe(3)
		expect(store.general().map((r) => r.kind)).toEqual(["term", "metric"])
		expect(store.forTable("orders")).toEqual([
			{ scope: "orders", kind: "term", key: "GMV", value: "order level GMV" },
		])
	})

	it("rejects an empty key", () => {
		const store = new BusinessRuleStore()
		expect(() => store.set({ scope: "general", kind: "term", key: "  ", value: "x" })).toThrow(ConfigError)
	})

	it("matches keys verbatim, case-insensitively", () => {
		const store = new BusinessRuleStore([
			{ scope: "general", kind: "metric", key: "GMV", value: "SUM(payment_amount)" },
			{ scope: "general", kind: "term", key: "活跃用户", value: "最近30天内有下单记录的用户" },
		])
		expect(store.matching("本月gmv是多少").map((r) => r.key)).toEqual(["GMV"])
		expect(store.matching("活跃用户有多少").map((r) => r.key)).toEqual(["活跃用户"])
		expect(store.matching("订单数量")).toEqual([])
	})

	it("remove deletes one rule", () => {
		const store = new BusinessRuleStore([{ scope: "general", kind: "term", key: "a", value: "b" }])
		expect(store.remove("general", "term", "a")).toBe(true)
		expect(store.remove("general", "term", "a")).toBe(false)
		expect(store.size).toBe(0)
	})
})

describe("parseBusinessRulesDocument", () => {
	it("maps each section to scoped rules", () => {
		const store = parseBusinessRulesDocument({
			general_terms: { 活跃用户: "最近30天内有下单记录的用户" },
			metrics: { GMV: "SUM(payment_amount)" },
			table_terms: { orders: { 订单: "one row per order" } },
			calculations: { refund_rate: "SUM(refunded) * 1.0 / COUNT(*)" },
			enum_values: { orders: { order_status: "1=paid, 2=refunded" } },
		})
		expect(store.all()).toEqual([
			{ scope: "general", kind: "term", key: "活跃用户", value: "最近30天内有下单记录的用户" },
			{ scope: "general", kind: "metric", key: "GMV", value: "SUM(payment_amount)" },
			{ scope: "general", kind: "calculation", key: "refund_rate", value: "SUM(refunded) * 1.0 / COUNT(*)" },
			{ scope: "orders", kind: "term", key: "订单", value: "one row per order" },
			{ scope: "orders", kind: "enum_value", key: "order_status", value: "1=paid, 2=refunded" },
		])
	})

	it("treats missing sections as empty and stringifies scalars", () => {
		const store = parseBusinessRulesDocument({ metrics: { threshold: 30 } })
		expect(store.all()).toEqual([{ scope: "general", kind: "metric", key: "threshold", value: "30" }])
	})

	it("rejects a malformed section", () => {
		expect(() => parseBusinessRulesDocument({ table_terms: { orders: "not a mapping" } })).toThrow(
			/table_terms\.orders/,
		)
	})
})

describe("loadBusinessRules", () => {
	it("reads YAML and JSON files", () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "text2sql-rules-"))
		try {
			fs.writeFileSync(path.join(dir, "rules.yaml"), "metrics:\n  GMV: SUM(payment_amount)\n")
			fs.writeFileSync(path.join(dir, "rules.json"), JSON.stringify({ general_terms: { GMV: "gross value" } }))
			expect(loadBusinessRules(path.join(dir, "rules.yaml")).get("general", "metric", "GMV")?.value).toBe(
				"SUM(payment_amount)",
			)
			expect(loadBusinessRules(path.join(dir, "rules.json")).get("general", "term", "GMV")?.value).toBe(
				"gross value",
			)
		} finally {
			fs.rmSync(dir, { recursive: true, force: true })
		}
	})

	it("raises ConfigError for a missing file", () => {
		expect(() => loadBusinessRules("/nonexistent/rules.yaml")).toThrow(ConfigError)
	})
})
