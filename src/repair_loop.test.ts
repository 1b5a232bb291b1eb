import { describe, it, expect } from "vitest"
import { BusinessRuleStore } from "./business_rules.js"
import { ExecutionError, LanguageModelError } from "./errors.js"
import { silentLogger } from "./logger.js"
import type { LanguageModel } from "./ollama_client.js"
import { RepairLoop, type RepairLoopConfig } from "./repair_loop.js"
import { toExecutionError } from "./sql_executor.js"
import { SqlGenerator } from "./sql_generator.js"
import { ScriptedExecutor, ScriptedLanguageModel, resultOf, sqlFence } from "./test_support.js"

const BROKEN = "SELECT COUNT(id FROM orders"
const FIXED = "SELECT COUNT(id) FROM orders"

const baseConfig: RepairLoopConfig = {
	maxAttempts: 3,
	execute: true,
	executionTimeoutMs: 1000,
	maxRows: 10,
	maxContextChars: 10000,
	dialect: "postgresql",
}

function makeLoop(llm: LanguageModel, executor: ScriptedExecutor | null, config: Partial<RepairLoopConfig> = {}) {
	const generator = new SqlGenerator(llm, { dialect: "postgresql", temperature: 0, maxTokens: 256, timeoutMs: 1000 }, silentLogger)
	return new RepairLoop(generator, executor, { ...baseConfig, ...config }, silentLogger)
}

const input = {
	question: "how many orders are there",
	context: { chunks: [], pinned_tables: [] },
	rules: new BusinessRuleStore(),
}

describe("RepairLoop", () => {
	it("repairs a syntax error and succeeds on the second attempt", async () => {
		const llm = new ScriptedLanguageModel([sqlFence(BROKEN), sqlFence(FIXED)])
		const executor = new ScriptedExecutor([resultOf([{ count: 42 }])])

		const result = await makeLoop(llm, executor).run(input)

		expect(result.state).toBe("SUCCESS")
		expect(result.attempts).toBe(2)
		expect(result.history.map((h) => h.outcome.kind)).toEqual(["syntax_error", "success"])
		expect(result.history[0].outcome).toEqual({
			kind: "syntax_error",
			message: "Unclosed parenthesis opened at offset 12",
			offset: 12,
			line: 1,
			column: 13,
		})
		expect(result.transitions).toEqual(["GENERATE", "SYNTAX_CHECK", "GENERATE", "SYNTAX_CHECK", "EXECUTE"])
		expect(result.prompts.map((p) => p.mode)).toEqual(["initial", "repair"])
		expect(llm.prompts[1]).toContain("Syntax error at offset 12 (line 1, column 13): Unclosed parenthesis opened at offset 12")
		expect(executor.executed).toEqual([FIXED])
	})

	it("stops after maxAttempts generations", async () => {
		const llm = new ScriptedLanguageModel([sqlFence(BROKEN), sqlFence(BROKEN), sqlFence(BROKEN), sqlFence(FIXED)])
		const executor = new ScriptedExecutor([])

		const result = await makeLoop(llm, executor).run(input)

		expect(result.state).toBe("EXHAUSTED")
		expect(result.attempts).toBe(3)
		expect(llm.calls).toBe(3)
		expect(executor.executed).toEqual([])
		expect(result.prompts[2].text).toContain("## Previous Attempt 2 Failed")
		expect(result.prompts[2].text).not.toContain("Previous Attempt 1")
	})

	it("never generates more than once with maxAttempts 1", async () => {
		const llm = new ScriptedLanguageModel([sqlFence(BROKEN), sqlFence(FIXED)])
		const result = await makeLoop(llm, null, { maxAttempts: 1 }).run(input)
		expect(result.state).toBe("EXHAUSTED")
		expect(llm.calls).toBe(1)
	})

	it("rejects a write statement without repairing or executing it", async () => {
		const llm = new ScriptedLanguageModel([sqlFence("DELETE FROM orders"), sqlFence(FIXED)])
		const executor = new ScriptedExecutor([resultOf([])])

		const result = await makeLoop(llm, executor).run(input)

		expect(result.state).toBe("REJECTED")
		expect(result.attempts).toBe(1)
		expect(result.history[0].outcome).toEqual({
			kind: "policy_violation",
			message: "Only SELECT queries are allowed; got DELETE",
			statement_type: "delete",
		})
		expect(llm.calls).toBe(1)
		expect(executor.executed).toEqual([])
	})

	it("sends a table outside the catalog back for repair before executing", async () => {
		const llm = new ScriptedLanguageModel([sqlFence("SELECT id FROM order_lines"), sqlFence("SELECT id FROM orders")])
		const executor = new ScriptedExecutor([resultOf([{ id: 1 }])])
		const catalog = new Map([["orders", new Set(["id", "total_amount"])]])

		const result = await makeLoop(llm, executor).run({ ...input, catalog })

		expect(result.state).toBe("SUCCESS")
		expect(result.attempts).toBe(2)
		expect(result.history[0].outcome).toEqual({
			kind: "execution_error",
			message: 'Table "order_lines" is not in the knowledge base',
			sqlstate: "42P01",
			position: 16,
			timed_out: false,
		})
		expect(result.transitions).toEqual(["GENERATE", "SYNTAX_CHECK", "GENERATE", "SYNTAX_CHECK", "EXECUTE"])
		expect(llm.prompts[1]).toContain('Execution error [SQLSTATE 42P01]: Table "order_lines" is not in the knowledge base')
		expect(executor.executed).toEqual(["SELECT id FROM orders"])
	})

	it("repairs an execution error with SQLSTATE and position", async () => {
		const llm = new ScriptedLanguageModel([sqlFence("SELECT amount FROM orders"), sqlFence("SELECT payment_amount FROM orders")])
		const executor = new ScriptedExecutor([
			new ExecutionError('column "amount" does not exist', "42703", 8, "sql_error"),
			resultOf([{ payment_amount: 10 }]),
		])

		const result = await makeLoop(llm, executor).run(input)

		expect(result.state).toBe("SUCCESS")
		expect(result.attempts).toBe(2)
		expect(result.history[0].outcome).toEqual({
			kind: "execution_error",
			message: 'column "amount" does not exist',
			sqlstate: "42703",
			position: 8,
			timed_out: false,
		})
		expect(llm.prompts[1]).toContain('Execution error [SQLSTATE 42703]: column "amount" does not exist')
		expect(llm.prompts[1]).toContain("Hint: Use a column name that exists in the schema context")
		expect(result.history[1].outcome).toEqual({
			kind: "success",
			executed: true,
			rows: [{ payment_amount: 10 }],
			row_count: 1,
			fields: ["payment_amount"],
		})
	})

	it("marks statement timeouts and retries them", async () => {
		const llm = new ScriptedLanguageModel([sqlFence(FIXED), sqlFence(FIXED)])
		const executor = new ScriptedExecutor([
			new ExecutionError("canceling statement due to statement timeout", "57014", null, "query_timeout"),
			resultOf([{ count: 1 }]),
		])

		const result = await makeLoop(llm, executor).run(input)

		expect(result.state).toBe("SUCCESS")
		expect(result.history[0].outcome).toMatchObject({ kind: "execution_error", timed_out: true })
	})

	it("propagates infrastructure failures", async () => {
		const llm = new ScriptedLanguageModel([sqlFence(FIXED)])
		const executor = new ScriptedExecutor([
			new ExecutionError("Database unavailable: ECONNRESET", null, null, "infra_failure"),
		])
		await expect(makeLoop(llm, executor).run(input)).rejects.toThrow("Database unavailable: ECONNRESET")
	})

	it("does not spend repair attempts on a dropped connection", async () => {
		const llm = new ScriptedLanguageModel([sqlFence(FIXED), sqlFence(FIXED), sqlFence(FIXED)])
		const executor = new ScriptedExecutor([
			toExecutionError(Object.assign(new Error("read ECONNRESET"), { code: "ECONNRESET" })),
			resultOf([{ count: 1 }]),
		])

		await expect(makeLoop(llm, executor).run(input)).rejects.toMatchObject({
			message: "Database unavailable: read ECONNRESET",
			errorClass: "infra_failure",
		})
		expect(executor.executed).toEqual([FIXED])
		expect(llm.calls).toBe(1)
	})

	it("rejects when the database refuses the statement as a write", async () => {
		const llm = new ScriptedLanguageModel([sqlFence(FIXED)])
		const executor = new ScriptedExecutor([
			new ExecutionError("cannot execute in a read-only transaction", "25006", null, "validation_block"),
		])

		const result = await makeLoop(llm, executor).run(input)

		expect(result.state).toBe("REJECTED")
		expect(result.history[0].outcome).toEqual({
			kind: "policy_violation",
			message: "cannot execute in a read-only transaction",
			statement_type: null,
		})
	})

	it("stops at a successful syntax check in dry-run mode", async () => {
		const llm = new ScriptedLanguageModel([sqlFence(FIXED)])
		const executor = new ScriptedExecutor([])

		const result = await makeLoop(llm, executor).run({ ...input, execute: false })

		expect(result.state).toBe("SUCCESS")
		expect(result.history[0].outcome).toEqual({ kind: "success", executed: false, rows: [], row_count: 0, fields: [] })
		expect(executor.executed).toEqual([])
	})

	it("counts unparseable model output as a syntax failure", async () => {
		const llm = new ScriptedLanguageModel(["I am not sure.", sqlFence(FIXED)])
		const result = await makeLoop(llm, null, { execute: false }).run(input)

		expect(result.state).toBe("SUCCESS")
		expect(result.attempts).toBe(2)
		expect(result.history[0]).toEqual({
			candidate: { raw_output: "I am not sure.", sql: null, dialect: "postgresql", attempt: 1 },
			outcome: { kind: "syntax_error", message: "Model output contains no SQL statement", offset: null },
		})
	})

	it("counts a model timeout as a failed attempt", async () => {
		const llm = new ScriptedLanguageModel([
			new LanguageModelError("Language model request timed out after 1000ms", true),
			sqlFence(FIXED),
		])
		const result = await makeLoop(llm, null, { execute: false }).run(input)

		expect(result.state).toBe("SUCCESS")
		expect(result.history[0].outcome).toEqual({
			kind: "syntax_error",
			message: "Language model request timed out after 1000ms",
			offset: null,
		})
	})

	it("propagates other model failures", async () => {
		const llm = new ScriptedLanguageModel([new LanguageModelError("Cannot reach language model", false)])
		await expect(makeLoop(llm, null).run(input)).rejects.toThrow("Cannot reach language model")
	})

	it("cancels before generating when the signal already fired", async () => {
		const llm = new ScriptedLanguageModel([sqlFence(FIXED)])
		const controller = new AbortController()
		controller.abort()

		const result = await makeLoop(llm, null).run({ ...input, signal: controller.signal })

		expect(result.state).toBe("CANCELLED")
		expect(result.attempts).toBe(0)
		expect(result.transitions).toEqual(["GENERATE"])
		expect(llm.calls).toBe(0)
	})

	it("cancels before executing when the signal fires mid-loop", async () => {
		const controller = new AbortController()
		const llm: LanguageModel = {
			generate: async () => {
				controller.abort()
				return sqlFence(FIXED)
			},
		}
		const executor = new ScriptedExecutor([resultOf([])])

		const result = await makeLoop(llm, executor).run({ ...input, signal: controller.signal })

		expect(result.state).toBe("CANCELLED")
		expect(result.attempts).toBe(1)
		expect(executor.executed).toEqual([])
	})
})
