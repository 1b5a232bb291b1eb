import pg from "pg"
import { describe, it, expect } from "vitest"
import { ExecutionError, QueryCancelledError } from "./errors.js"
import { silentLogger } from "./logger.js"
import { PgSqlExecutor, toExecutionError } from "./sql_executor.js"
import { FakePgPool, pgError, rowsResult } from "./test_support.js"

const options = { timeoutMs: 2500, maxRows: 2 }

describe("PgSqlExecutor", () => {
	it("runs the statement in a read-only transaction and rolls back", async () => {
		const pool = new FakePgPool((text) => (text === "SELECT id FROM orders" ? rowsResult([{ id: 1 }]) : rowsResult([])))
		const executor = new PgSqlExecutor(pool, silentLogger)

		const result = await executor.execute("SELECT id FROM orders", options)

		expect(pool.statements()).toEqual([
			"BEGIN READ ONLY",
			"SET LOCAL statement_timeout = 2500",
			"SELECT id FROM orders",
			"ROLLBACK",
		])
		expect(result).toMatchObject({ rows: [{ id: 1 }], row_count: 1, fields: ["id"], truncated: false })
		expect(pool.released).toEqual([false])
	})

	it("caps rows at maxRows and reports truncation", async () => {
		const pool = new FakePgPool((text) =>
			text.startsWith("SELECT") ? rowsResult([{ id: 1 }, { id: 2 }, { id: 3 }], ["id"]) : rowsResult([]),
		)
		const result = await new PgSqlExecutor(pool, silentLogger).execute("SELECT id FROM orders", options)

		expect(result.rows).toEqual([{ id: 1 }, { id: 2 }])
		expect(result.row_count).toBe(3)
		expect(result.truncated).toBe(true)
	})

	it("maps database errors with SQLSTATE, position and class", async () => {
		const pool = new FakePgPool((text) =>
			text.startsWith("SELECT") ? pgError('column "amount" does not exist', "42703", "8") : rowsResult([]),
		)
		const error = await new PgSqlExecutor(pool, silentLogger)
			.execute("SELECT amount FROM orders", options)
			.catch((e: unknown) => e)

		expect(error).toBeInstanceOf(ExecutionError)
		expect(error).toMatchObject({
			message: 'column "amount" does not exist',
			sqlstate: "42703",
			position: 8,
			errorClass: "sql_error",
		})
		expect(pool.statements()[3]).toBe("ROLLBACK")
		expect(pool.released).toEqual([false])
	})

	it("classifies statement timeouts and read-only refusals", async () => {
		const timeout = toExecutionError(pgError("canceling statement due to statement timeout", "57014"))
		const readOnly = toExecutionError(pgError("cannot execute INSERT in a read-only transaction", "25006"))

		expect(timeout).toMatchObject({ errorClass: "query_timeout", position: null })
		expect(readOnly).toMatchObject({ errorClass: "validation_block", sqlstate: "25006" })
	})

	it("reports connection failures as infrastructure errors", async () => {
		const pool = new FakePgPool()
		pool.connectError = new Error("ECONNREFUSED")

		await expect(new PgSqlExecutor(pool, silentLogger).execute("SELECT 1", options)).rejects.toMatchObject({
			message: "Cannot connect to database: ECONNREFUSED",
			errorClass: "infra_failure",
		})
	})

	it("discards the connection when the rollback fails", async () => {
		const pool = new FakePgPool((text) => (text === "ROLLBACK" ? new Error("connection lost") : rowsResult([])))
		await new PgSqlExecutor(pool, silentLogger).execute("SELECT 1", options)
		expect(pool.released).toEqual([true])
	})

	it("does nothing once cancelled", async () => {
		const pool = new FakePgPool()
		const controller = new AbortController()
		controller.abort()

		await expect(
			new PgSqlExecutor(pool, silentLogger).execute("SELECT 1", { ...options, signal: controller.signal }),
		).rejects.toBeInstanceOf(QueryCancelledError)
		expect(pool.queries).toEqual([])
	})
})

describe("toExecutionError", () => {
	it("treats errors without SQLSTATE as infrastructure failures", () => {
		expect(toExecutionError(new Error("socket hang up"))).toMatchObject({
			message: "Database unavailable: socket hang up",
			sqlstate: null,
			errorClass: "infra_failure",
		})
	})

	it("treats socket error codes as infrastructure failures", () => {
		for (const code of ["ECONNRESET", "EPIPE", "ECONNREFUSED", "ETIMEDOUT"]) {
			const error = toExecutionError(Object.assign(new Error(`read ${code}`), { code }))
			expect(error).toMatchObject({
				message: `Database unavailable: read ${code}`,
				sqlstate: null,
				errorClass: "infra_failure",
				recoverable: false,
			})
		}
	})

	it("recognises the driver's DatabaseError class", () => {
		const error = new pg.DatabaseError('relation "nope" does not exist', 0, "error")
		error.code = "42P01"
		expect(toExecutionError(error)).toMatchObject({ sqlstate: "42P01", errorClass: "sql_error" })
	})
})

describe("PgSqlExecutor connection loss", () => {
	it("reports a dropped connection mid-query as an infrastructure failure", async () => {
		const pool = new FakePgPool((text) =>
			text.startsWith("SELECT") ? Object.assign(new Error("read ECONNRESET"), { code: "ECONNRESET" }) : rowsResult([]),
		)
		await expect(new PgSqlExecutor(pool, silentLogger).execute("SELECT 1", options)).rejects.toMatchObject({
			message: "Database unavailable: read ECONNRESET",
			errorClass: "infra_failure",
		})
	})
})
