/**
 * SQL Validator with State Machine Parsing
 *
 * Validates candidate SQL with proper handling of:
 * - Strings (single quotes with '' escaping)
 * - Quoted identifiers ("..." and `...`)
 * - Dollar-quoted strings ($tag$...$tag$)
 * - Comments (line comments and block comments)
 *
 * Two checks:
 * - checkSyntax: structural checks on the token stream, then a full
 *   dialect-aware parse with node-sql-parser
 * - checkReadOnly: the statement must be a single SELECT / WITH query with no
 *   write, DDL, DCL or TCL keyword and no dangerous function outside
 *   strings and comments
 */

import * as nodeSqlParser from "node-sql-parser"
import { z } from "zod"
import type { SqlDialect } from "./schema_types.js"

// ============================================================================
// Types
// ============================================================================

export type SyntaxCheck =
	| { ok: true }
	| { ok: false; message: string; offset: number; line: number; column: number }

export type PolicyCheck =
	| { ok: true; statement_type: "select" }
	| { ok: false; message: string; statement_type: string | null }

/**
 * Keywords that never appear in a read query
 * (checked outside strings/comments only)
 */
const DANGEROUS_KEYWORDS = [
	// DDL
	"DROP",
	"CREATE",
	"ALTER",
	"TRUNCATE",
	"RENAME",
	// DML (write operations)
	"INSERT",
	"UPDATE",
	"DELETE",
	"MERGE",
	// DCL
	"GRANT",
	"REVOKE",
	// TCL
	"BEGIN",
	"COMMIT",
	"ROLLBACK",
	"SAVEPOINT",
	// Other dangerous
	"COPY",
	"EXECUTE",
	"PREPARE",
]

/**
 * Functions with side effects outside the query
 * (admin functions, file I/O, system access)
 */
const DANGEROUS_FUNCTIONS = [
	// File I/O
	"pg_read_file",
	"pg_read_binary_file",
	"pg_ls_dir",
	"lo_export",
	"lo_import",
	// System functions
	"pg_sleep",
	"pg_terminate_backend",
	"pg_cancel_backend",
	// External connections
	"dblink",
	"dblink_connect",
	"dblink_exec",
	// Admin functions
	"pg_reload_conf",
	"pg_rotate_logfile",
	"pg_stat_reset",
	"set_config",
]

/** Words that can start a statement in one of the supported dialects */
const STATEMENT_KEYWORDS = new Set([
	"select", "with", "insert", "update", "delete", "merge", "upsert", "replace",
	"create", "drop", "alter", "truncate", "rename", "grant", "revoke",
	"begin", "start", "commit", "rollback", "savepoint", "release", "end",
	"copy", "execute", "exec", "prepare", "deallocate", "explain", "show", "set", "reset",
	"call", "do", "values", "table", "vacuum", "analyze", "reindex", "cluster", "lock",
	"listen", "notify", "unlisten", "load", "discard", "comment", "refresh", "security",
	"checkpoint", "import", "declare", "fetch", "move", "close", "use", "describe",
	"pragma", "attach", "detach",
])

// ============================================================================
// Tokenizer
// ============================================================================

export enum TokenType {
	NORMAL = "NORMAL",
	SINGLE_QUOTE = "SINGLE_QUOTE",
	DOUBLE_QUOTE = "DOUBLE_QUOTE",
	BACKTICK = "BACKTICK",
	DOLLAR_QUOTE = "DOLLAR_QUOTE",
	LINE_COMMENT = "LINE_COMMENT",
	BLOCK_COMMENT = "BLOCK_COMMENT",
}

export interface Token {
	type: TokenType
	value: string
	start: number
	end: number
	/** False when a string, identifier or block comment runs off the end */
	terminated: boolean
}

/** Read a quoted run where the quote char is escaped by doubling it */
function readQuoted(sql: string, start: number, quote: string): { end: number; terminated: boolean } {
	let i = start + 1
	while (i < sql.length) {
		if (sql[i] === quote) {
			if (sql[i + 1] === quote) {
				i += 2
				continue
			}
			return { end: i + 1, terminated: true }
		}
		i++
	}
	return { end: sql.length, terminated: false }
}

/**
 * Tokenize SQL with proper handling of strings, comments, and dollar quoting
 */
export function tokenizeSQL(sql: string): Token[] {
	const tokens: Token[] = []
	let i = 0
	const len = sql.length

	const push = (type: TokenType, start: number, end: number, terminated = true) => {
		tokens.push({ type, value: sql.substring(start, end), start, end, terminated })
	}

	while (i < len) {
		const char = sql[i]
		const next = i + 1 < len ? sql[i + 1] : ""

		// Line comment: -- ...
		if (char === "-" && next === "-") {
			const start = i
			while (i < len && sql[i] !== "\n") i++
			push(TokenType.LINE_COMMENT, start, i)
			continue
		}

		// Block comment: /* ... */
		if (char === "/" && next === "*") {
			const start = i
			const close = sql.indexOf("*/", i + 2)
			i = close === -1 ? len : close + 2
			push(TokenType.BLOCK_COMMENT, start, i, close !== -1)
			continue
		}

		if (char === "'" || char === '"' || char === "`") {
			const { end, terminated } = readQuoted(sql, i, char)
			const type = char === "'" ? TokenType.SINGLE_QUOTE : char === '"' ? TokenType.DOUBLE_QUOTE : TokenType.BACKTICK
			push(type, i, end, terminated)
			i = end
			continue
		}

		// Dollar-quoted string: $tag$...$tag$ or $$...$$ ($1 is a parameter, not a quote)
		if (char === "$") {
			const tagMatch = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/.exec(sql.slice(i))
			if (tagMatch) {
				const delimiter = tagMatch[0]
				const start = i
				const close = sql.indexOf(delimiter, i + delimiter.length)
				i = close === -1 ? len : close + delimiter.length
				push(TokenType.DOLLAR_QUOTE, start, i, close !== -1)
				continue
			}
		}

		// Normal token (accumulate until special char)
		const start = i
		while (i < len && !"'\"`$/-".includes(sql[i])) i++
		if (i === start) i++ // lone '-', '/' or '$'
		push(TokenType.NORMAL, start, i)
	}

	return tokens
}

/**
 * Extract all NORMAL tokens (code outside strings/comments)
 */
function getNormalTokens(tokens: Token[]): Token[] {
	return tokens.filter((t) => t.type === TokenType.NORMAL)
}

/**
 * Code with strings and comments blanked out, offsets preserved
 */
export function maskNonCode(sql: string, tokens: Token[] = tokenizeSQL(sql)): string {
	return tokens.map((t) => (t.type === TokenType.NORMAL ? t.value : " ".repeat(t.value.length))).join("")
}

// ============================================================================
// Structural Checks
// ============================================================================

export function lineAndColumnAt(sql: string, offset: number): { line: number; column: number } {
	const lines = sql.slice(0, offset).split("\n")
	return { line: lines.length, column: lines[lines.length - 1].length + 1 }
}

function failure(sql: string, message: string, offset: number): SyntaxCheck {
	return { ok: false, message, offset, ...lineAndColumnAt(sql, offset) }
}

function checkTermination(sql: string, tokens: Token[]): SyntaxCheck | null {
	const open = tokens.find((t) => !t.terminated)
	if (!open) return null
	const what: Record<TokenType, string> = {
		[TokenType.NORMAL]: "token",
		[TokenType.SINGLE_QUOTE]: "string literal",
		[TokenType.DOUBLE_QUOTE]: "quoted identifier",
		[TokenType.BACKTICK]: "quoted identifier",
		[TokenType.DOLLAR_QUOTE]: "dollar-quoted string",
		[TokenType.LINE_COMMENT]: "comment",
		[TokenType.BLOCK_COMMENT]: "block comment",
	}
	return failure(sql, `Unterminated ${what[open.type]} starting at offset ${open.start}`, open.start)
}

function checkParentheses(sql: string, tokens: Token[]): SyntaxCheck | null {
	const stack: number[] = []
	for (const token of getNormalTokens(tokens)) {
		for (let i = 0; i < token.value.length; i++) {
			const ch = token.value[i]
			if (ch === "(") stack.push(token.start + i)
			if (ch === ")") {
				if (stack.length === 0) {
					return failure(sql, `Unmatched closing parenthesis at offset ${token.start + i}`, token.start + i)
				}
				stack.pop()
			}
		}
	}
	if (stack.length > 0) {
		const offset = stack[stack.length - 1]
		return failure(sql, `Unclosed parenthesis opened at offset ${offset}`, offset)
	}
	return null
}

/**
 * Semicolons outside strings/comments; one trailing semicolon is allowed
 */
function checkMultipleStatements(sql: string, tokens: Token[]): SyntaxCheck | null {
	const code = maskNonCode(sql, tokens)
	const first = code.indexOf(";")
	if (first === -1) return null
	const rest = code.slice(first + 1).replace(/;/g, " ")
	if (rest.trim().length === 0) return null
	return failure(sql, "Multiple statements are not allowed", first)
}

// ============================================================================
// Full Parse (node-sql-parser)
// ============================================================================

type ParserInstance = InstanceType<typeof nodeSqlParser.Parser>
type ParserConstructor = new () => ParserInstance

function isParserConstructor(value: unknown): value is ParserConstructor {
	return typeof value === "function"
}

/** The package is CommonJS; the class sits on the namespace or on its default export. */
function resolveParserConstructor(): ParserConstructor {
	const named: unknown = Reflect.get(nodeSqlParser, "Parser")
	if (isParserConstructor(named)) return named
	const fallback: unknown = Reflect.get(nodeSqlParser, "default")
	if (fallback !== null && (typeof fallback === "object" || typeof fallback === "function")) {
		const inner: unknown = Reflect.get(fallback, "Parser")
		if (isParserConstructor(inner)) return inner
	}
	throw new Error("node-sql-parser Parser export not found")
}

let _parser: ParserInstance | null = null

function getParser(): ParserInstance {
	if (!_parser) {
		const Parser = resolveParserConstructor()
		_parser = new Parser()
	}
	return _parser
}

const PARSER_DATABASE: Record<SqlDialect, string> = {
	postgresql: "PostgreSQL",
	mysql: "MySQL",
	mariadb: "MariaDB",
	sqlite: "Sqlite",
	mssql: "TransactSQL",
	bigquery: "BigQuery",
}

const parserErrorLocation = z.object({
	location: z.object({
		start: z.object({ offset: z.number(), line: z.number(), column: z.number() }),
	}),
})

type ParseResult = { ok: true; ast: unknown } | { ok: false; message: string; offset: number; line: number; column: number }

function parseStatement(sql: string, dialect: SqlDialect): ParseResult {
	try {
		const ast: unknown = getParser().astify(sql, { database: PARSER_DATABASE[dialect] })
		return { ok: true, ast }
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error)
		const located = parserErrorLocation.safeParse(error)
		if (located.success) {
			const { offset, line, column } = located.data.location.start
			return { ok: false, message, offset, line, column }
		}
		return { ok: false, message, offset: 0, line: 1, column: 1 }
	}
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Syntax check: empty input, unterminated quotes/comments, parentheses,
 * multiple statements, then a full parse for the dialect.
 */
export function checkSyntax(sql: string, dialect: SqlDialect): SyntaxCheck {
	if (sql.trim().length === 0) return failure(sql, "Empty statement", 0)

	const tokens = tokenizeSQL(sql)
	const structural =
		checkTermination(sql, tokens) ?? checkParentheses(sql, tokens) ?? checkMultipleStatements(sql, tokens)
	if (structural) return structural

	const parsed = parseStatement(sql, dialect)
	if (!parsed.ok) {
		return { ok: false, message: parsed.message, offset: parsed.offset, line: parsed.line, column: parsed.column }
	}
	return { ok: true }
}

function firstKeyword(code: string): string | null {
	const match = /^[\s(]*([A-Za-z_]+)/.exec(code)
	return match ? match[1].toLowerCase() : null
}

function statementType(ast: unknown): string | null {
	const first: unknown = Array.isArray(ast) ? ast[0] : ast
	if (first === null || typeof first !== "object") return null
	const type: unknown = Reflect.get(first, "type")
	return typeof type === "string" ? type.toLowerCase() : null
}

/**
 * Read-only policy. Keyword checks run on code outside strings and
 * comments, so a literal like 'DELETE' in a WHERE clause is fine.
 */
export function checkReadOnly(sql: string, dialect: SqlDialect = "postgresql"): PolicyCheck {
	const tokens = tokenizeSQL(sql)
	const code = maskNonCode(sql, tokens)

	const leading = firstKeyword(code)
	if (leading !== "select" && leading !== "with") {
		if (leading === null || !STATEMENT_KEYWORDS.has(leading)) {
			// Not a recognizable statement at all; the syntax check reports it
			return { ok: false, message: "Statement does not start with a SQL keyword", statement_type: null }
		}
		return {
			ok: false,
			message: `Only SELECT queries are allowed; got ${leading.toUpperCase()}`,
			statement_type: leading,
		}
	}

	for (const keyword of DANGEROUS_KEYWORDS) {
		if (new RegExp(`\\b${keyword}\\b`, "i").test(code)) {
			return {
				ok: false,
				message: `Write or administrative keyword ${keyword} is not allowed`,
				statement_type: keyword.toLowerCase(),
			}
		}
	}

	for (const func of DANGEROUS_FUNCTIONS) {
		if (new RegExp(`\\b${func}\\s*\\(`, "i").test(code)) {
			return { ok: false, message: `Function ${func} is not allowed`, statement_type: leading }
		}
	}

	if (/\bINTO\b/i.test(code)) {
		return { ok: false, message: "SELECT ... INTO creates a table and is not allowed", statement_type: "select_into" }
	}

	// The parsed statement type has the final word when the parser accepts the text
	const parsed = parseStatement(sql, dialect)
	if (parsed.ok) {
		const type = statementType(parsed.ast)
		if (type !== null && type !== "select") {
			return { ok: false, message: `Only SELECT queries are allowed; got ${type.toUpperCase()}`, statement_type: type }
		}
	}

	return { ok: true, statement_type: "select" }
}

function collectCteNames(code: string): Set<string> {
	const names = new Set<string>()
	for (const m of code.matchAll(/(?:\bWITH(?:\s+RECURSIVE)?|,)\s+([A-Za-z_][A-Za-z0-9_]*)\s+AS\s*\(/gi)) {
		names.add(m[1].toLowerCase())
	}
	return names
}

/**
 * Extract table names from SQL (best-effort, not a full parser).
 * CTE names are excluded; schema prefixes are dropped.
 */
export function extractTableNames(sql: string): string[] {
	const code = maskNonCode(sql)
	const cteNames = collectCteNames(code)

	const tables: string[] = []
	// FROM/JOIN <table> (plain identifiers); quoted identifiers are masked, so read them from the source
	const pattern = /\b(?:FROM|JOIN)\s+((?:[A-Za-z_][A-Za-z0-9_]*|"[^"]*")(?:\s*\.\s*(?:[A-Za-z_][A-Za-z0-9_]*|"[^"]*"))?)/gi
	for (const m of sql.matchAll(pattern)) {
		const index = m.index ?? 0
		// Skip matches that start inside a string or comment
		if (code.slice(index, index + 4).trim().length === 0) continue
		const parts = m[1].split(".").map((p) => p.trim().replace(/^"|"$/g, ""))
		const name = (parts[parts.length - 1] ?? "").toLowerCase()
		if (name && !cteNames.has(name) && !tables.includes(name)) tables.push(name)
	}
	return tables
}

// ============================================================================
// Reference Check
// ============================================================================

/** Lower-cased table name to lower-cased column names. An empty set means the columns are unknown. */
export type SchemaCatalog = ReadonlyMap<string, ReadonlySet<string>>

export type ReferenceCheck =
	| { ok: true; tables: string[] }
	| { ok: false; sqlstate: "42P01" | "42703"; message: string; name: string; offset: number | null }

const SYSTEM_SCHEMAS = new Set(["pg_catalog", "information_schema"])

/** Words that can follow a table name without being its alias */
const NOT_AN_ALIAS = new Set([
	"where", "join", "inner", "left", "right", "full", "outer", "cross", "natural", "on", "using",
	"group", "order", "having", "limit", "offset", "fetch", "union", "intersect", "except",
	"window", "for", "lateral", "tablesample", "returning",
])

const IDENT = "[A-Za-z_][A-Za-z0-9_]*"

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/** Tables the statement reads, from the parser's table list. */
function referencedTables(sql: string, dialect: SqlDialect): string[] {
	let entries: string[]
	try {
		entries = getParser().tableList(sql, { database: PARSER_DATABASE[dialect] })
	} catch {
		return extractTableNames(sql)
	}
	const names: string[] = []
	for (const entry of entries) {
		// "<statement type>::<schema or null>::<table>"
		const [, schema, table] = entry.split("::")
		if (!table || (schema && SYSTEM_SCHEMAS.has(schema.toLowerCase()))) continue
		const name = table.replace(/["`]/g, "").toLowerCase()
		if (!names.includes(name)) names.push(name)
	}
	return names
}

/** Alias (or bare table name) to table, for FROM/JOIN items naming a known table */
function tableAliases(code: string, catalog: SchemaCatalog): Map<string, string> {
	const aliases = new Map<string, string>()
	const pattern = new RegExp(`\\b(?:FROM|JOIN)\\s+(?:${IDENT}\\s*\\.\\s*)?(${IDENT})(?:\\s+(?:AS\\s+)?(${IDENT}))?`, "gi")
	for (const m of code.matchAll(pattern)) {
		const table = m[1].toLowerCase()
		if (!catalog.has(table)) continue
		aliases.set(table, table)
		const alias = m[2]?.toLowerCase()
		if (alias && !NOT_AN_ALIAS.has(alias)) aliases.set(alias, table)
	}
	return aliases
}

function tableOffset(code: string, name: string): number | null {
	const escaped = escapeRegExp(name)
	const afterKeyword = new RegExp(`\\b(?:FROM|JOIN)\\s+(?:${IDENT}\\s*\\.\\s*)?${escaped}\\b`, "i").exec(code)
	if (afterKeyword) return afterKeyword.index + afterKeyword[0].length - name.length
	const anywhere = new RegExp(`\\b${escaped}\\b`, "i").exec(code)
	return anywhere ? anywhere.index : null
}

/**
 * Every table the statement reads must be in the catalog, and every
 * alias-qualified column (o.total) must exist in its table. Unqualified
 * columns are left to the database: they may name select-list aliases.
 * An empty catalog disables the check.
 */
export function checkReferences(sql: string, dialect: SqlDialect, catalog: SchemaCatalog): ReferenceCheck {
	const code = maskNonCode(sql)
	const ctes = collectCteNames(code)
	const tables = referencedTables(sql, dialect).filter((t) => !ctes.has(t))
	if (catalog.size === 0) return { ok: true, tables }

	for (const table of tables) {
		if (!catalog.has(table)) {
			return {
				ok: false,
				sqlstate: "42P01",
				message: `Table "${table}" is not in the knowledge base`,
				name: table,
				offset: tableOffset(code, table),
			}
		}
	}

	const aliases = tableAliases(code, catalog)
	const qualified = new RegExp(`\\b(${IDENT})\\s*\\.\\s*(${IDENT})`, "g")
	for (const m of code.matchAll(qualified)) {
		const index = m.index ?? 0
		const rest = code.slice(index + m[0].length)
		// schema.table.column, schema.function( and a.b.c chains are not column references
		if (code.slice(0, index).trimEnd().endsWith(".") || /^\s*[.(]/.test(rest)) continue

		const table = aliases.get(m[1].toLowerCase())
		if (!table) continue
		const columns = catalog.get(table)
		const column = m[2].toLowerCase()
		if (!columns || columns.size === 0 || columns.has(column)) continue
		return {
			ok: false,
			sqlstate: "42703",
			message: `Column "${m[2]}" does not exist in table ${table}`,
			name: m[2],
			offset: index + m[0].length - m[2].length,
		}
	}

	return { ok: true, tables }
}
