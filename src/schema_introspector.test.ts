import * as fs from "fs"
import * as os from "os"
import * as path from "path"
import { afterEach, describe, it, expect } from "vitest"
import { ExtractionError } from "./errors.js"
import { silentLogger } from "./logger.js"
import { PgSchemaIntrospector, StaticMetadataSource, loadMetadataFile, parseMetadataDocument } from "./schema_introspector.js"
import { FakePgPool, rowsResult } from "./test_support.js"

const tableRows = [
	{ table_schema: "public", table_name: "orders", comment: "订单表", row_estimate: "1200" },
	{ table_schema: "public", table_name: "users", comment: null, row_estimate: -1 },
]

const columnRows = [
	// Deliberately out of ordinal order
	{
		table_schema: "public",
		table_name: "orders",
		column_name: "user_id",
		data_type: "integer",
		is_nullable: false,
		ordinal_position: 2,
		comment: "下单用户",
		is_pk: false,
		pk_ordinal: null,
	},
	{
		table_schema: "public",
		table_name: "orders",
		column_name: "id",
		data_type: "integer",
		is_nullable: false,
		ordinal_position: 1,
		comment: null,
		is_pk: true,
		pk_ordinal: 1,
	},
	{
		table_schema: "public",
		table_name: "users",
		column_name: "id",
		data_type: "integer",
		is_nullable: false,
		ordinal_position: 1,
		comment: null,
		is_pk: true,
		pk_ordinal: 1,
	},
]

const fkRows = [
	{
		table_schema: "public",
		table_name: "orders",
		constraint_name: "orders_user_id_fkey",
		key_ordinal: "1",
		column_name: "user_id",
		ref_table_name: "users",
		ref_column_name: "id",
	},
]

function catalogPool(
	overrides: { tables?: Record<string, unknown>[]; columns?: Record<string, unknown>[]; fks?: Record<string, unknown>[] } = {},
) {
	return new FakePgPool((text) => {
		if (text.includes("pk_columns")) return rowsResult(overrides.columns ?? columnRows)
		if (text.includes("contype = 'f'")) return rowsResult(overrides.fks ?? fkRows)
		return rowsResult(overrides.tables ?? tableRows)
	})
}

describe("PgSchemaIntrospector", () => {
	it("assembles tables, ordered columns, keys and comments", async () => {
		const pool = catalogPool()
		const introspector = new PgSchemaIntrospector(pool, { schemas: ["public"], excludeTables: ["migrations"] }, silentLogger)

		const tables = await introspector.extract()

		expect(tables).toEqual([
			{
				table_name: "orders",
				columns: [
					{ name: "id", data_type: "integer", nullable: false, comment: null },
					{ name: "user_id", data_type: "integer", nullable: false, comment: "下单用户" },
				],
				primary_key: ["id"],
				foreign_keys: [{ column: "user_id", referenced_table: "users", referenced_column: "id" }],
				comment: "订单表",
				row_estimate: 1200,
			},
			{
				table_name: "users",
				columns: [{ name: "id", data_type: "integer", nullable: false, comment: null }],
				primary_key: ["id"],
				foreign_keys: [],
				comment: null,
				row_estimate: null,
			},
		])
		expect(pool.queries[0].values).toEqual([["public"], ["migrations"]])
		expect(pool.queries[1].values).toEqual([["public"], ["orders", "users"]])
		expect(pool.released).toEqual([undefined])
	})

	it("returns a frozen snapshot", async () => {
		const tables = await new PgSchemaIntrospector(catalogPool(), { schemas: ["public"], excludeTables: [] }, silentLogger).extract()
		expect(Object.isFrozen(tables)).toBe(true)
		expect(Object.isFrozen(tables[0].columns[0])).toBe(true)
	})

	it("reports an unreachable database", async () => {
		const pool = new FakePgPool()
		pool.connectError = new Error("ECONNREFUSED")

		const error = await new PgSchemaIntrospector(pool, { schemas: ["public"], excludeTables: [] }, silentLogger)
			.extract()
			.catch((e: unknown) => e)

		expect(error).toBeInstanceOf(ExtractionError)
		expect(error).toMatchObject({ message: "Metadata source unreachable: ECONNREFUSED" })
	})

	it("reports catalog query failures and releases the client", async () => {
		const pool = new FakePgPool(() => new Error("permission denied for schema public"))

		await expect(
			new PgSchemaIntrospector(pool, { schemas: ["public"], excludeTables: [] }, silentLogger).extract(),
		).rejects.toThrow("Schema unreadable: permission denied for schema public")
		expect(pool.released).toEqual([undefined])
	})

	it("pairs composite foreign key columns by key position", async () => {
		const shipments = { table_schema: "public", table_name: "shipments", comment: null, row_estimate: 10 }
		const composite = (ord: number, column: string, refColumn: string) => ({
			table_schema: "public",
			table_name: "shipments",
			constraint_name: "shipments_order_line_fkey",
			key_ordinal: ord,
			column_name: column,
			ref_table_name: "order_lines",
			ref_column_name: refColumn,
		})
		const pool = catalogPool({
			tables: [shipments],
			columns: [],
			fks: [composite(1, "order_id", "order_id"), composite(2, "line_no", "line_no")],
		})

		const [table] = await new PgSchemaIntrospector(pool, { schemas: ["public"], excludeTables: [] }, silentLogger).extract()

		expect(table.foreign_keys).toEqual([
			{ column: "order_id", referenced_table: "order_lines", referenced_column: "order_id" },
			{ column: "line_no", referenced_table: "order_lines", referenced_column: "line_no" },
		])
		const fkQuery = pool.statements()[2]
		expect(fkQuery).toContain("CROSS JOIN LATERAL unnest(con.conkey, con.confkey) WITH ORDINALITY AS k(attnum, ref_attnum, ord)")
		expect(fkQuery).toContain("JOIN pg_catalog.pg_namespace ns ON ns.oid = con.connamespace")
		expect(fkQuery).toContain("AND ns.nspname = ANY($1)")
	})

	it("refuses a table name that exists in two schemas", async () => {
		const pool = catalogPool({
			tables: [
				{ table_schema: "public", table_name: "orders", comment: null, row_estimate: 1 },
				{ table_schema: "sales", table_name: "orders", comment: null, row_estimate: 1 },
			],
		})

		const error = await new PgSchemaIntrospector(pool, { schemas: ["public", "sales"], excludeTables: [] }, silentLogger)
			.extract()
			.catch((e: unknown) => e)

		expect(error).toBeInstanceOf(ExtractionError)
		expect(error).toMatchObject({
			message: "Table orders exists in schemas public, sales; exclude all but one or introspect fewer schemas",
		})
		expect(pool.queries).toHaveLength(1)
		expect(pool.released).toEqual([undefined])
	})

	it("rejects unexpected row shapes", async () => {
		const pool = catalogPool({ columns: [{ table_name: "orders" }] })
		await expect(
			new PgSchemaIntrospector(pool, { schemas: ["public"], excludeTables: [] }, silentLogger).extract(),
		).rejects.toThrow("Unexpected column row shape at index 0")
	})
})

describe("parseMetadataDocument", () => {
	it("derives keys and nullability from the description", () => {
		const tables = parseMetadataDocument({
			tables: [
				{
					name: "orders",
					comment: "订单表",
					columns: [
						{ name: "id", type: "integer", primary_key: true },
						{ name: "user_id", type: "integer", nullable: false, references: "users.id" },
						{ name: "note", type: "text" },
					],
				},
			],
		})

		expect(tables).toEqual([
			{
				table_name: "orders",
				comment: "订单表",
				columns: [
					{ name: "id", data_type: "integer", nullable: false, comment: null },
					{ name: "user_id", data_type: "integer", nullable: false, comment: null },
					{ name: "note", data_type: "text", nullable: true, comment: null },
				],
				primary_key: ["id"],
				foreign_keys: [{ column: "user_id", referenced_table: "users", referenced_column: "id" }],
				row_estimate: null,
			},
		])
	})

	it("names the offending path", () => {
		expect(() => parseMetadataDocument({ tables: [{ name: "t", columns: [{ name: "c", type: "int", references: "bad" }] }] })).toThrow(
			"Invalid metadata description at tables.0.columns.0.references: must be table.column",
		)
	})
})

describe("loadMetadataFile", () => {
	let dir: string | null = null

	afterEach(() => {
		if (dir) fs.rmSync(dir, { recursive: true, force: true })
		dir = null
	})

	it("reads a YAML description", async () => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "metadata-"))
		const file = path.join(dir, "schema.yaml")
		fs.writeFileSync(file, "tables:\n  - name: users\n    columns:\n      - name: id\n        type: integer\n        primary_key: true\n")

		const source = loadMetadataFile(file)

		expect(source).toBeInstanceOf(StaticMetadataSource)
		const [users] = await source.extract()
		expect(users.table_name).toBe("users")
		expect(users.primary_key).toEqual(["id"])
	})

	it("reports a missing file", () => {
		expect(() => loadMetadataFile("/nonexistent/schema.json")).toThrow("Cannot read metadata file /nonexistent/schema.json")
	})
})
