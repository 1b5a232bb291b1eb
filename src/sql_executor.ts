/**
 * SQL Executor
 *
 * Runs a validated statement inside a read-only transaction that is always
 * rolled back:
 *   BEGIN READ ONLY; SET LOCAL statement_timeout = N; <sql>; ROLLBACK
 *
 * pg errors are mapped to ExecutionError with SQLSTATE, 1-based position and
 * a classification the repair loop acts on.
 */

import type { PgClientLike, PgPoolLike } from "./db.js"
import { isPgDatabaseError } from "./db.js"
import { ExecutionError, QueryCancelledError, Text2SQLError, classifySqlstate, errorMessage } from "./errors.js"
import type { Logger } from "./logger.js"

export interface ExecuteOptions {
	timeoutMs: number
	maxRows: number
	signal?: AbortSignal
}

export interface ExecutionResult {
	rows: Record<string, unknown>[]
	/** Rows the statement produced, before the maxRows cap */
	row_count: number
	fields: string[]
	truncated: boolean
	latency_ms: number
}

export interface SqlExecutor {
	execute(sql: string, options: ExecuteOptions): Promise<ExecutionResult>
}

/**
 * Map a driver error to ExecutionError. Errors without a SQLSTATE (socket
 * resets, pool exhaustion) are infrastructure failures.
 */
export function toExecutionError(error: unknown): Text2SQLError {
	if (error instanceof Text2SQLError) return error
	if (isPgDatabaseError(error)) {
		const sqlstate = error.code ?? null
		const position = error.position !== undefined && /^\d+$/.test(error.position) ? Number(error.position) : null
		return new ExecutionError(error.message, sqlstate, position, classifySqlstate(sqlstate))
	}
	return new ExecutionError(`Database unavailable: ${errorMessage(error)}`, null, null, "infra_failure")
}

export class PgSqlExecutor implements SqlExecutor {
	constructor(
		private pool: PgPoolLike,
		private logger: Logger,
	) {}

	async execute(sql: string, options: ExecuteOptions): Promise<ExecutionResult> {
		if (options.signal?.aborted) throw new QueryCancelledError("execute")
		const startTime = Date.now()

		let client: PgClientLike
		try {
			client = await this.pool.connect()
		} catch (error) {
			throw new ExecutionError(`Cannot connect to database: ${errorMessage(error)}`, null, null, "infra_failure")
		}

		let rollbackFailed = false
		try {
			await client.query("BEGIN READ ONLY")
			await client.query(`SET LOCAL statement_timeout = ${Math.max(1, Math.floor(options.timeoutMs))}`)
			const result = await client.query(sql)

			const rows = result.rows.slice(0, options.maxRows)
			const fields = result.fields ? result.fields.map((f) => f.name) : Object.keys(rows[0] ?? {})
			const latency = Date.now() - startTime
			this.logger.debug("Query executed", { rows: result.rows.length, latency_ms: latency })
			return {
				rows,
				row_count: result.rows.length,
				fields,
				truncated: result.rows.length > rows.length,
				latency_ms: latency,
			}
		} catch (error) {
			throw toExecutionError(error)
		} finally {
			await client.query("ROLLBACK").catch((rollbackError: unknown) => {
				rollbackFailed = true
				this.logger.warn("Rollback failed; discarding connection", { error: errorMessage(rollbackError) })
			})
			client.release(rollbackFailed)
		}
	}
}
