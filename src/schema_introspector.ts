/**
 * Schema Introspector
 *
 * Reads structural facts (tables, columns, PKs, FKs, comments) from a live
 * Postgres database via information_schema + pg_catalog, or from a structural
 * description file. Either way the output is an immutable TableMetadata
 * snapshot; a new extraction supersedes the previous one.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import type { PgClientLike, PgPoolLike } from "./db.js"
import { ExtractionError, errorMessage } from "./errors.js"
import type { Logger } from "./logger.js"
import type { TableMetadata } from "./schema_types.js"

export interface MetadataSource {
	extract(): Promise<TableMetadata[]>
}

function freezeSnapshot(tables: TableMetadata[]): TableMetadata[] {
	for (const table of tables) {
		for (const column of table.columns) Object.freeze(column)
		for (const fk of table.foreign_keys) Object.freeze(fk)
		Object.freeze(table.columns)
		Object.freeze(table.primary_key)
		Object.freeze(table.foreign_keys)
		Object.freeze(table)
	}
	Object.freeze(tables)
	return tables
}

// ============================================================================
// Row Schemas
// ============================================================================

const tableRow = z.object({
	table_schema: z.string(),
	table_name: z.string(),
	comment: z.string().nullable(),
	row_estimate: z.coerce.number().nullable(),
})

const columnRow = z.object({
	table_schema: z.string(),
	table_name: z.string(),
	column_name: z.string(),
	data_type: z.string(),
	is_nullable: z.boolean(),
	ordinal_position: z.coerce.number(),
	comment: z.string().nullable(),
	is_pk: z.boolean(),
	pk_ordinal: z.coerce.number().nullable(),
})

const fkRow = z.object({
	table_schema: z.string(),
	table_name: z.string(),
	constraint_name: z.string(),
	key_ordinal: z.coerce.number(),
	column_name: z.string(),
	ref_table_name: z.string(),
	ref_column_name: z.string(),
})

type TableRow = z.infer<typeof tableRow>
type ColumnRow = z.infer<typeof columnRow>
type FkRow = z.infer<typeof fkRow>

function parseRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: Record<string, unknown>[], what: string): T[] {
	return rows.map((row, i) => {
		const parsed = schema.safeParse(row)
		if (!parsed.success) {
			throw new ExtractionError(`Unexpected ${what} row shape at index ${i}: ${parsed.error.issues[0].message}`)
		}
		return parsed.data
	})
}

/**
 * Chunk ids and prompts name tables without their schema, so a name may
 * appear in only one of the introspected schemas.
 */
function rejectDuplicateNames(tables: TableRow[]): void {
	const schemasByName = new Map<string, string[]>()
	for (const t of tables) {
		schemasByName.set(t.table_name, [...(schemasByName.get(t.table_name) ?? []), t.table_schema])
	}
	for (const [name, owners] of schemasByName) {
		if (owners.length > 1) {
			throw new ExtractionError(
				`Table ${name} exists in schemas ${owners.join(", ")}; exclude all but one or introspect fewer schemas`,
				{ table: name, schemas: owners },
			)
		}
	}
}

// ============================================================================
// Introspector Class
// ============================================================================

export interface IntrospectorOptions {
	schemas: string[]
	excludeTables: string[]
}

export class PgSchemaIntrospector implements MetadataSource {
	constructor(
		private pool: PgPoolLike,
		private options: IntrospectorOptions,
		private logger: Logger,
	) {}

	async extract(): Promise<TableMetadata[]> {
		const startTime = Date.now()
		const { schemas, excludeTables } = this.options
		this.logger.info("Starting schema introspection", { schemas, exclude_tables: excludeTables })

		let client: PgClientLike
		try {
			client = await this.pool.connect()
		} catch (err) {
			throw new ExtractionError(`Metadata source unreachable: ${errorMessage(err)}`, { schemas })
		}

		try {
			const tables = await this.getTables(client, schemas, excludeTables)
			rejectDuplicateNames(tables)
			const tableNames = tables.map((t) => t.table_name)
			const columns = await this.getColumns(client, schemas, tableNames)
			const fks = await this.getForeignKeys(client, schemas, tableNames)

			const result = this.mergeIntoTables(tables, columns, fks)

			this.logger.info("Schema introspection complete", {
				tables: result.length,
				total_columns: columns.length,
				fks: fks.length,
				latency_ms: Date.now() - startTime,
			})
			return freezeSnapshot(result)
		} catch (err) {
			if (err instanceof ExtractionError) throw err
			throw new ExtractionError(`Schema unreadable: ${errorMessage(err)}`, { schemas })
		} finally {
			client.release()
		}
	}

	private async getTables(client: PgClientLike, schemas: string[], excludeTables: string[]): Promise<TableRow[]> {
		const query = `
			SELECT
				t.table_schema,
				t.table_name,
				pg_catalog.obj_description(
					(quote_ident(t.table_schema) || '.' || quote_ident(t.table_name))::regclass,
					'pg_class'
				) AS comment,
				c.reltuples::bigint AS row_estimate
			FROM information_schema.tables t
			LEFT JOIN pg_catalog.pg_namespace n ON n.nspname = t.table_schema
			LEFT JOIN pg_catalog.pg_class c ON c.relnamespace = n.oid AND c.relname = t.table_name
			WHERE t.table_schema = ANY($1)
				AND t.table_type IN ('BASE TABLE', 'VIEW')
				AND t.table_name != ALL($2)
			ORDER BY t.table_schema, t.table_name
		`
		const result = await client.query(query, [schemas, excludeTables])
		return parseRows(tableRow, result.rows, "table")
	}

	private async getColumns(client: PgClientLike, schemas: string[], tableNames: string[]): Promise<ColumnRow[]> {
		const query = `
			WITH pk_columns AS (
				SELECT
					kcu.table_schema,
					kcu.table_name,
					kcu.column_name,
					kcu.ordinal_position AS pk_ordinal
				FROM information_schema.table_constraints tc
				JOIN information_schema.key_column_usage kcu
					ON tc.constraint_name = kcu.constraint_name
					AND tc.table_schema = kcu.table_schema
				WHERE tc.constraint_type = 'PRIMARY KEY'
					AND tc.table_schema = ANY($1)
			)
			SELECT
				c.table_schema,
				c.table_name,
				c.column_name,
				c.data_type,
				(c.is_nullable = 'YES') AS is_nullable,
				c.ordinal_position,
				pg_catalog.col_description(
					(quote_ident(c.table_schema) || '.' || quote_ident(c.table_name))::regclass,
					c.ordinal_position
				) AS comment,
				(pk.column_name IS NOT NULL) AS is_pk,
				pk.pk_ordinal
			FROM information_schema.columns c
			LEFT JOIN pk_columns pk
				ON pk.table_schema = c.table_schema
				AND pk.table_name = c.table_name
				AND pk.column_name = c.column_name
			WHERE c.table_schema = ANY($1)
				AND c.table_name = ANY($2)
			ORDER BY c.table_schema, c.table_name, c.ordinal_position
		`
		const result = await client.query(query, [schemas, tableNames])
		return parseRows(columnRow, result.rows, "column")
	}

	/**
	 * One row per (local column, referenced column) pair. Composite keys are
	 * paired by their position in conkey/confkey, never cross-joined.
	 */
	private async getForeignKeys(client: PgClientLike, schemas: string[], tableNames: string[]): Promise<FkRow[]> {
		const query = `
			SELECT
				ns.nspname AS table_schema,
				cl.relname AS table_name,
				con.conname AS constraint_name,
				k.ord AS key_ordinal,
				att.attname AS column_name,
				ref_cl.relname AS ref_table_name,
				ref_att.attname AS ref_column_name
			FROM pg_catalog.pg_constraint con
			JOIN pg_catalog.pg_namespace ns ON ns.oid = con.connamespace
			JOIN pg_catalog.pg_class cl ON cl.oid = con.conrelid
			JOIN pg_catalog.pg_class ref_cl ON ref_cl.oid = con.confrelid
			CROSS JOIN LATERAL unnest(con.conkey, con.confkey) WITH ORDINALITY AS k(attnum, ref_attnum, ord)
			JOIN pg_catalog.pg_attribute att ON att.attrelid = con.conrelid AND att.attnum = k.attnum
			JOIN pg_catalog.pg_attribute ref_att ON ref_att.attrelid = con.confrelid AND ref_att.attnum = k.ref_attnum
			WHERE con.contype = 'f'
				AND ns.nspname = ANY($1)
				AND cl.relname = ANY($2)
			ORDER BY ns.nspname, cl.relname, con.conname, k.ord
		`
		const result = await client.query(query, [schemas, tableNames])
		return parseRows(fkRow, result.rows, "foreign key")
	}

	private mergeIntoTables(tables: TableRow[], columns: ColumnRow[], fks: FkRow[]): TableMetadata[] {
		const columnsByTable = new Map<string, ColumnRow[]>()
		for (const col of columns) {
			const key = `${col.table_schema}.${col.table_name}`
			const existing = columnsByTable.get(key) || []
			existing.push(col)
			columnsByTable.set(key, existing)
		}

		const fksByTable = new Map<string, FkRow[]>()
		for (const fk of fks) {
			const key = `${fk.table_schema}.${fk.table_name}`
			const existing = fksByTable.get(key) || []
			existing.push(fk)
			fksByTable.set(key, existing)
		}

		return tables.map((table) => {
			const key = `${table.table_schema}.${table.table_name}`
			const tableCols = (columnsByTable.get(key) || []).sort((a, b) => a.ordinal_position - b.ordinal_position)

			const primaryKey = tableCols
				.filter((c) => c.is_pk)
				.sort((a, b) => (a.pk_ordinal ?? 0) - (b.pk_ordinal ?? 0))
				.map((c) => c.column_name)

			return {
				table_name: table.table_name,
				columns: tableCols.map((c) => ({
					name: c.column_name,
					data_type: c.data_type,
					nullable: c.is_nullable,
					comment: c.comment,
				})),
				primary_key: primaryKey,
				foreign_keys: (fksByTable.get(key) || []).map((fk) => ({
					column: fk.column_name,
					referenced_table: fk.ref_table_name,
					referenced_column: fk.ref_column_name,
				})),
				comment: table.comment,
				row_estimate: table.row_estimate !== null && table.row_estimate >= 0 ? table.row_estimate : null,
			}
		})
	}
}

// ============================================================================
// Structural Description Feed
// ============================================================================

const columnSchema = z.object({
	name: z.string().min(1),
	type: z.string().min(1),
	nullable: z.boolean().default(true),
	comment: z.string().nullable().default(null),
	primary_key: z.boolean().default(false),
	references: z
		.string()
		.regex(/^[^.]+\.[^.]+$/, "must be table.column")
		.optional(),
})

const tableSchema = z.object({
	name: z.string().min(1),
	comment: z.string().nullable().default(null),
	columns: z.array(columnSchema).min(1),
})

export const metadataFileSchema = z.object({
	tables: z.array(tableSchema),
})

export type MetadataFile = z.input<typeof metadataFileSchema>

/** Metadata handed in directly (tests, description files). */
export class StaticMetadataSource implements MetadataSource {
	private snapshot: TableMetadata[]

	constructor(tables: TableMetadata[]) {
		this.snapshot = freezeSnapshot(tables.map(cloneTable))
	}

	async extract(): Promise<TableMetadata[]> {
		return this.snapshot
	}
}

function cloneTable(table: TableMetadata): TableMetadata {
	return {
		...table,
		columns: table.columns.map((c) => ({ ...c })),
		primary_key: [...table.primary_key],
		foreign_keys: table.foreign_keys.map((fk) => ({ ...fk })),
	}
}

export function parseMetadataDocument(doc: unknown): TableMetadata[] {
	const result = metadataFileSchema.safeParse(doc)
	if (!result.success) {
		const issue = result.error.issues[0]
		throw new ExtractionError(`Invalid metadata description at ${issue.path.join(".") || "(root)"}: ${issue.message}`)
	}

	return result.data.tables.map((t) => ({
		table_name: t.name,
		comment: t.comment,
		columns: t.columns.map((c) => ({
			name: c.name,
			data_type: c.type,
			nullable: c.primary_key ? false : c.nullable,
			comment: c.comment,
		})),
		primary_key: t.columns.filter((c) => c.primary_key).map((c) => c.name),
		foreign_keys: t.columns.flatMap((c) => {
			if (!c.references) return []
			const [referencedTable, referencedColumn] = c.references.split(".")
			return [{ column: c.name, referenced_table: referencedTable, referenced_column: referencedColumn }]
		}),
		row_estimate: null,
	}))
}

/** Read a JSON or YAML metadata description into a static source. */
export function loadMetadataFile(filePath: string): StaticMetadataSource {
	const resolved = path.resolve(filePath)
	let doc: unknown
	try {
		const raw = fs.readFileSync(resolved, "utf-8")
		doc = resolved.endsWith(".json") ? JSON.parse(raw) : yaml.load(raw)
	} catch (err) {
		throw new ExtractionError(`Cannot read metadata file ${resolved}: ${errorMessage(err)}`, { file: resolved })
	}
	return new StaticMetadataSource(parseMetadataDocument(doc))
}
