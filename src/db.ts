/**
 * Postgres connection seam.
 *
 * Components depend on the narrow PgPoolLike interface so tests can hand in
 * a recording fake; production code passes a real pg.Pool.
 */

import pg from "pg"
import type { Text2SQLConfig } from "./config/loadConfig.js"

export interface PgQueryResultLike {
	rows: Record<string, unknown>[]
	rowCount: number | null
	fields?: { name: string }[]
}

export interface PgClientLike {
	query(text: string, values?: unknown[]): Promise<PgQueryResultLike>
	release(err?: Error | boolean): void
}

export interface PgPoolLike {
	connect(): Promise<PgClientLike>
	query(text: string, values?: unknown[]): Promise<PgQueryResultLike>
	end(): Promise<void>
}

export function createPool(db: Text2SQLConfig["database"]): pg.Pool {
	return new pg.Pool({
		host: db.host,
		port: db.port,
		database: db.name,
		user: db.user,
		password: db.password,
		max: 10,
		idleTimeoutMillis: 30000,
	})
}

/** Error shape raised by pg for server-side failures */
export interface PgDatabaseErrorLike {
	message: string
	code?: string
	position?: string
}

/** Five-character SQLSTATE, e.g. 42P01. Node socket codes (ECONNRESET) never match. */
const SQLSTATE_PATTERN = /^[0-9A-Z]{5}$/

/**
 * Server-reported error carrying a SQLSTATE. Socket and pool failures also
 * set `code` (ECONNRESET, EPIPE, ETIMEDOUT) and are not database errors.
 */
export function isPgDatabaseError(error: unknown): error is PgDatabaseErrorLike {
	if (error instanceof pg.DatabaseError) return true
	if (!(error instanceof Error)) return false
	const code: unknown = Reflect.get(error, "code")
	return typeof code === "string" && SQLSTATE_PATTERN.test(code)
}

/** Quote a [schema.]table name that passed config validation. */
export function quoteQualifiedName(name: string): string {
	return name
		.split(".")
		.map((part) => `"${part.replace(/"/g, '""')}"`)
		.join(".")
}
