/**
 * pgvector-backed Knowledge Base
 *
 * One row per chunk, keyed by the deterministic chunk id:
 *   id TEXT PRIMARY KEY, source_table TEXT, text TEXT,
 *   embedding vector(N), metadata JSONB, updated_at TIMESTAMPTZ
 *
 * Upserts are single-statement per chunk (INSERT ... ON CONFLICT DO UPDATE),
 * so concurrent readers see whole chunks only. Snapshot import replaces the
 * table contents inside one transaction.
 */

import { z } from "zod"
import { quoteQualifiedName, type PgClientLike, type PgPoolLike } from "./db.js"
import { KnowledgeBaseError, errorMessage } from "./errors.js"
import {
	buildSnapshot,
	compareScored,
	parseSnapshot,
	type ChunkRef,
	type KnowledgeBase,
	type KnowledgeSnapshot,
} from "./knowledge_base.js"
import type { Logger } from "./logger.js"
import type { ChunkFilter, ChunkMetadata, KnowledgeChunk, ScoredChunk } from "./schema_types.js"

export interface PgVectorKnowledgeBaseOptions {
	/** [schema.]table, validated by the config schema */
	table: string
	dimensions: number
	embeddingModel: string
}

const chunkRow = z.object({
	id: z.string(),
	source_table: z.string().nullable(),
	text: z.string(),
	embedding: z.string(),
	metadata: z
		.object({
			kind: z.enum(["table", "column", "rules"]),
			table_name: z.string().nullable(),
		})
		.catchall(z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(z.string())])),
	score: z.coerce.number().optional(),
})

function toVectorLiteral(vector: number[]): string {
	return `[${vector.join(",")}]`
}

function parseVectorLiteral(literal: string): number[] {
	let raw: unknown
	try {
		raw = JSON.parse(literal)
	} catch {
		raw = null
	}
	const parsed = z.array(z.number()).safeParse(raw)
	if (!parsed.success) {
		throw new KnowledgeBaseError(`Cannot parse stored embedding: ${literal.slice(0, 40)}`)
	}
	return parsed.data
}

function rowToChunk(row: Record<string, unknown>): { chunk: KnowledgeChunk; score: number | undefined } {
	const parsed = chunkRow.safeParse(row)
	if (!parsed.success) {
		throw new KnowledgeBaseError(`Unexpected knowledge base row: ${parsed.error.issues[0].message}`)
	}
	const r = parsed.data
	const metadata: ChunkMetadata = r.metadata
	return {
		chunk: {
			id: r.id,
			source_table: r.source_table,
			text: r.text,
			embedding: parseVectorLiteral(r.embedding),
			metadata,
		},
		score: r.score,
	}
}

export class PgVectorKnowledgeBase implements KnowledgeBase {
	private tableSql: string
	private schemaName: string | null

	constructor(
		private pool: PgPoolLike,
		private options: PgVectorKnowledgeBaseOptions,
		private logger: Logger,
	) {
		this.tableSql = quoteQualifiedName(options.table)
		const parts = options.table.split(".")
		this.schemaName = parts.length === 2 ? parts[0] : null
	}

	/**
	 * Create the extension, schema and table if missing
	 */
	async ensureSchema(): Promise<void> {
		const statements = [
			"CREATE EXTENSION IF NOT EXISTS vector",
			...(this.schemaName ? [`CREATE SCHEMA IF NOT EXISTS ${quoteQualifiedName(this.schemaName)}`] : []),
			`CREATE TABLE IF NOT EXISTS ${this.tableSql} (
				id TEXT PRIMARY KEY,
				source_table TEXT,
				text TEXT NOT NULL,
				embedding vector(${this.options.dimensions}) NOT NULL,
				metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
				updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
			)`,
			`CREATE INDEX IF NOT EXISTS ${quoteQualifiedName(`${this.indexPrefix()}_source_table_idx`)} ON ${this.tableSql} (source_table)`,
		]
		for (const sql of statements) {
			await this.run(sql, [], "ensure schema")
		}
		this.logger.info("Knowledge base table ready", { table: this.options.table, dimensions: this.options.dimensions })
	}

	private indexPrefix(): string {
		return this.options.table.replace(/\./g, "_")
	}

	private async run(sql: string, values: unknown[], what: string, client?: PgClientLike) {
		try {
			return client ? await client.query(sql, values) : await this.pool.query(sql, values)
		} catch (error) {
			throw new KnowledgeBaseError(`Knowledge base ${what} failed: ${errorMessage(error)}`, { table: this.options.table })
		}
	}

	private upsertSql(): string {
		return `
			INSERT INTO ${this.tableSql} (id, source_table, text, embedding, metadata, updated_at)
			VALUES ($1, $2, $3, $4::vector, $5::jsonb, now())
			ON CONFLICT (id) DO UPDATE SET
				source_table = EXCLUDED.source_table,
				text = EXCLUDED.text,
				embedding = EXCLUDED.embedding,
				metadata = EXCLUDED.metadata,
				updated_at = now()
		`
	}

	private upsertValues(chunk: KnowledgeChunk): unknown[] {
		if (chunk.embedding.length !== this.options.dimensions) {
			throw new KnowledgeBaseError(
				`Chunk ${chunk.id} has ${chunk.embedding.length} dimensions, table expects ${this.options.dimensions}`,
			)
		}
		return [chunk.id, chunk.source_table, chunk.text, toVectorLiteral(chunk.embedding), JSON.stringify(chunk.metadata)]
	}

	async upsert(chunks: KnowledgeChunk[]): Promise<void> {
		const sql = this.upsertSql()
		for (const chunk of chunks) {
			await this.run(sql, this.upsertValues(chunk), "upsert")
		}
		this.logger.debug("Upserted chunks", { count: chunks.length })
	}

	async delete(tableName: string): Promise<number> {
		const result = await this.run(`DELETE FROM ${this.tableSql} WHERE source_table = $1`, [tableName], "delete")
		return result.rowCount ?? 0
	}

	async deleteChunks(ids: string[]): Promise<number> {
		if (ids.length === 0) return 0
		const result = await this.run(`DELETE FROM ${this.tableSql} WHERE id = ANY($1)`, [ids], "delete chunks")
		return result.rowCount ?? 0
	}

	async search(vector: number[], topK: number, filter?: ChunkFilter): Promise<ScoredChunk[]> {
		if (topK <= 0) return []
		const values: unknown[] = [toVectorLiteral(vector), topK]
		let where = ""
		if (filter && Object.keys(filter).length > 0) {
			values.push(JSON.stringify(filter))
			where = "WHERE metadata @> $3::jsonb"
		}
		const sql = `
			SELECT
				id,
				source_table,
				text,
				embedding::text AS embedding,
				metadata,
				1 - (embedding <=> $1::vector) AS score
			FROM ${this.tableSql}
			${where}
			ORDER BY embedding <=> $1::vector, id
			LIMIT $2
		`
		const result = await this.run(sql, values, "search")
		return result.rows
			.map((row) => {
				const { chunk, score } = rowToChunk(row)
				return { chunk, score: score ?? 0 }
			})
			.sort(compareScored)
	}

	async get(ids: string[]): Promise<KnowledgeChunk[]> {
		if (ids.length === 0) return []
		const result = await this.run(
			`SELECT id, source_table, text, embedding::text AS embedding, metadata FROM ${this.tableSql} WHERE id = ANY($1)`,
			[ids],
			"get",
		)
		const byId = new Map(result.rows.map((row) => {
			const { chunk } = rowToChunk(row)
			return [chunk.id, chunk] as const
		}))
		return ids.flatMap((id) => {
			const chunk = byId.get(id)
			return chunk ? [chunk] : []
		})
	}

	async listTables(): Promise<string[]> {
		const result = await this.run(
			`SELECT DISTINCT source_table FROM ${this.tableSql} WHERE source_table IS NOT NULL ORDER BY source_table`,
			[],
			"list tables",
		)
		return result.rows.flatMap((row) => {
			const name = row.source_table
			return typeof name === "string" ? [name] : []
		})
	}

	async listIds(): Promise<ChunkRef[]> {
		const result = await this.run(`SELECT id, source_table FROM ${this.tableSql} ORDER BY id`, [], "list ids")
		return result.rows.flatMap((row) => {
			const parsed = z.object({ id: z.string(), source_table: z.string().nullable() }).safeParse(row)
			return parsed.success ? [parsed.data] : []
		})
	}

	async count(): Promise<number> {
		const result = await this.run(`SELECT COUNT(*)::int AS count FROM ${this.tableSql}`, [], "count")
		const parsed = z.object({ count: z.coerce.number() }).safeParse(result.rows[0])
		return parsed.success ? parsed.data.count : 0
	}

	async export(): Promise<KnowledgeSnapshot> {
		const result = await this.run(
			`SELECT id, source_table, text, embedding::text AS embedding, metadata FROM ${this.tableSql} ORDER BY id`,
			[],
			"export",
		)
		return buildSnapshot(
			result.rows.map((row) => rowToChunk(row).chunk),
			this.options.embeddingModel,
		)
	}

	/**
	 * Replace everything with the snapshot, atomically
	 */
	async import(snapshot: KnowledgeSnapshot): Promise<void> {
		const validated = parseSnapshot(snapshot)
		if (validated.chunks.length > 0 && validated.dimensions !== this.options.dimensions) {
			throw new KnowledgeBaseError(
				`Snapshot has ${validated.dimensions} dimensions, table expects ${this.options.dimensions}`,
			)
		}

		let client: PgClientLike
		try {
			client = await this.pool.connect()
		} catch (error) {
			throw new KnowledgeBaseError(`Cannot connect for import: ${errorMessage(error)}`)
		}

		try {
			await this.run("BEGIN", [], "import", client)
			await this.run(`DELETE FROM ${this.tableSql}`, [], "import", client)
			const sql = this.upsertSql()
			for (const chunk of validated.chunks) {
				await this.run(sql, this.upsertValues(chunk), "import", client)
			}
			await this.run("COMMIT", [], "import", client)
			this.logger.info("Imported knowledge base snapshot", { chunks: validated.chunks.length })
		} catch (error) {
			await client.query("ROLLBACK").catch((rollbackError: unknown) => {
				this.logger.error("Rollback after failed import also failed", { error: errorMessage(rollbackError) })
			})
			throw error
		} finally {
			client.release()
		}
	}

	async clear(): Promise<void> {
		await this.run(`DELETE FROM ${this.tableSql}`, [], "clear")
	}
}
