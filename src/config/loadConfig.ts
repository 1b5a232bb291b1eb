/**
 * Unified config loader.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml
 *
 * The merged document is validated (and defaulted) by a zod schema, so every
 * component receives a complete, typed config at construction.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import { ConfigError } from "../errors.js"

// ── Schema ───────────────────────────────────────────────────────────

export const SQL_DIALECTS = ["postgresql", "mysql", "mariadb", "sqlite", "mssql", "bigquery"] as const

const databaseSchema = z.object({
	host: z.string().default("localhost"),
	port: z.number().int().positive().default(5432),
	name: z.string().default("postgres"),
	user: z.string().default("postgres"),
	password: z.string().default(""),
	dialect: z.enum(SQL_DIALECTS).default("postgresql"),
	schemas: z.array(z.string()).nonempty().default(["public"]),
	exclude_tables: z.array(z.string()).default([]),
})

const modelSchema = z.object({
	llm: z.string().default("qwen2.5-coder:7b"),
	embedding: z.string().default("nomic-embed-text:latest"),
	base_url: z.string().url().default("http://localhost:11434"),
	timeout_ms: z.number().int().positive().default(60000),
	embed_timeout_ms: z.number().int().positive().default(30000),
})

const generationSchema = z.object({
	temperature: z.number().min(0).max(2).default(0.1),
	max_tokens: z.number().int().positive().default(1024),
})

const retrievalSchema = z.object({
	top_k: z.number().int().positive().default(5),
	score_threshold: z.number().min(-1).max(1).default(0.3),
	hybrid: z.boolean().default(true),
	pin_entities: z.boolean().default(true),
})

const promptSchema = z.object({
	max_context_chars: z.number().int().positive().default(12000),
	/** 0 turns worked examples off */
	max_examples: z.number().int().min(0).default(2),
	/** Example set file; the bundled data/few_shot_examples.json when null */
	examples_path: z.string().nullable().default(null),
})

const repairSchema = z.object({
	max_attempts: z.number().int().min(1).default(3),
	execute: z.boolean().default(true),
	execution_timeout_ms: z.number().int().positive().default(15000),
	generation_timeout_ms: z.number().int().positive().default(60000),
	max_rows: z.number().int().positive().default(100),
})

const knowledgeBaseSchema = z.object({
	backend: z.enum(["pgvector", "memory"]).default("pgvector"),
	table: z
		.string()
		.regex(/^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/, "must be a plain [schema.]table identifier")
		.default("rag.knowledge_chunks"),
	embedding_dimensions: z.number().int().positive().default(768),
	batch_size: z.number().int().positive().default(32),
	concurrency: z.number().int().positive().default(2),
	granularity: z.enum(["table", "table_and_columns"]).default("table"),
})

const businessRulesSchema = z.object({
	path: z.string().nullable().default(null),
})

const loggingSchema = z.object({
	level: z.enum(["debug", "info", "warn", "error"]).default("info"),
})

/** The executor, the introspector and the pgvector store all speak Postgres. */
export const EXECUTABLE_DIALECT = "postgresql"

export const configSchema = z
	.object({
		database: databaseSchema.default({}),
		model: modelSchema.default({}),
		generation: generationSchema.default({}),
		retrieval: retrievalSchema.default({}),
		prompt: promptSchema.default({}),
		repair: repairSchema.default({}),
		knowledge_base: knowledgeBaseSchema.default({}),
		business_rules: businessRulesSchema.default({}),
		logging: loggingSchema.default({}),
	})
	.superRefine((cfg, ctx) => {
		const dialect = cfg.database.dialect
		if (dialect === EXECUTABLE_DIALECT) return
		if (cfg.repair.execute) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["repair", "execute"],
				message: `must be false for dialect ${dialect}; only ${EXECUTABLE_DIALECT} statements can be executed`,
			})
		}
		if (cfg.knowledge_base.backend === "pgvector") {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["knowledge_base", "backend"],
				message: `must be memory for dialect ${dialect}; pgvector shares the ${EXECUTABLE_DIALECT} connection`,
			})
		}
	})

export type Text2SQLConfig = z.infer<typeof configSchema>
export type SqlDialect = Text2SQLConfig["database"]["dialect"]

// ── YAML Loading ─────────────────────────────────────────────────────

type PlainObject = Record<string, unknown>

function isPlainObject(value: unknown): value is PlainObject {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

function findConfigDir(startDir: string): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = startDir
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): PlainObject {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	let parsed: unknown
	try {
		parsed = yaml.load(raw)
	} catch (err) {
		throw new ConfigError(`Invalid YAML in ${filePath}: ${String(err)}`, { file: filePath })
	}
	if (parsed === undefined || parsed === null) return {}
	if (!isPlainObject(parsed)) {
		throw new ConfigError(`Config file ${filePath} must contain a mapping`, { file: filePath })
	}
	return parsed
}

/** Deep merge b into a (b wins on conflicts). */
export function deepMerge(a: PlainObject, b: PlainObject): PlainObject {
	const result: PlainObject = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isPlainObject(left) && isPlainObject(right)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

function env(name: string): string | undefined {
	return process.env[name]
}
function envBool(name: string): boolean | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v === "true" || v === "1"
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}

function section(cfg: PlainObject, key: string): PlainObject {
	const existing = cfg[key]
	if (isPlainObject(existing)) return existing
	const created: PlainObject = {}
	cfg[key] = created
	return created
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: PlainObject): void {
	const db = section(cfg, "database")
	db.host = env("DB_HOST") ?? db.host
	db.port = envInt("DB_PORT") ?? db.port
	db.name = env("DB_NAME") ?? db.name
	db.user = env("DB_USER") ?? db.user
	db.password = env("DB_PASSWORD") ?? db.password
	db.dialect = env("SQL_DIALECT") ?? db.dialect

	const m = section(cfg, "model")
	m.llm = env("LLM_MODEL") ?? m.llm
	m.embedding = env("EMBEDDING_MODEL") ?? m.embedding
	m.base_url = env("OLLAMA_BASE_URL") ?? m.base_url
	m.timeout_ms = envInt("LLM_TIMEOUT_MS") ?? m.timeout_ms

	const g = section(cfg, "generation")
	g.temperature = envFloat("TEMPERATURE") ?? g.temperature
	g.max_tokens = envInt("MAX_TOKENS") ?? g.max_tokens

	const r = section(cfg, "retrieval")
	r.top_k = envInt("RAG_TOP_K") ?? r.top_k
	r.score_threshold = envFloat("RAG_SCORE_THRESHOLD") ?? r.score_threshold

	const rep = section(cfg, "repair")
	rep.max_attempts = envInt("MAX_CORRECTION_ATTEMPTS") ?? rep.max_attempts
	rep.execute = envBool("EXECUTE_SQL") ?? rep.execute
	rep.execution_timeout_ms = envInt("SQL_TIMEOUT_MS") ?? rep.execution_timeout_ms

	const kb = section(cfg, "knowledge_base")
	kb.backend = env("KB_BACKEND") ?? kb.backend
	kb.table = env("KB_TABLE") ?? kb.table

	const br = section(cfg, "business_rules")
	br.path = env("BUSINESS_RULES_PATH") ?? br.path

	const l = section(cfg, "logging")
	l.level = env("LOG_LEVEL") ?? l.level
}

/** Drop keys whose value is undefined so zod defaults apply. */
function stripUndefined(value: unknown): unknown {
	if (!isPlainObject(value)) return value
	const out: PlainObject = {}
	for (const [key, inner] of Object.entries(value)) {
		if (inner !== undefined) out[key] = stripUndefined(inner)
	}
	return out
}

/**
 * Validate a raw config document. Used by the loader and by callers that
 * build a config in code (tests, MCP server).
 */
export function parseConfig(raw: unknown): Text2SQLConfig {
	const result = configSchema.safeParse(stripUndefined(raw ?? {}))
	if (!result.success) {
		const issue = result.error.issues[0]
		const where = issue.path.join(".") || "(root)"
		throw new ConfigError(`Invalid config at ${where}: ${issue.message}`, {
			issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
		})
	}
	return result.data
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: Text2SQLConfig | null = null

export function loadConfig(): Text2SQLConfig {
	if (_config) return _config

	const configDir = findConfigDir(process.cwd())
	let merged: PlainObject = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)
	_config = parseConfig(merged)
	return _config
}

export function getConfig(): Text2SQLConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
