/**
 * Text-to-SQL Engine
 *
 * Wires the offline builder and the online pipeline behind the operations
 * consumers invoke:
 * - buildKnowledgeBase({ force, rules })
 * - query(question, { showIntermediate, execute, signal })
 * - validate(sql)                      syntax, read-only and known names, no execution
 * - exportKnowledgeBase() / importKnowledgeBase(snapshot)
 * - addBusinessRule(rule), getTableSchema(table), getStats()
 *
 * Online flow: analyze -> retrieve -> repair loop (prompt -> generate ->
 * syntax check -> execute). Every stage logs with the query id.
 */

import * as path from "path"
import { v4 as uuidv4 } from "uuid"
import { BusinessRuleStore, loadBusinessRules } from "./business_rules.js"
import { EXECUTABLE_DIALECT, type Text2SQLConfig } from "./config/loadConfig.js"
import { createPool, type PgPoolLike } from "./db.js"
import { Embedder, type EmbeddingService } from "./embedder.js"
import { ConfigError, KnowledgeBaseError, errorMessage } from "./errors.js"
import { InMemoryKnowledgeBase, parseSnapshot, type KnowledgeBase, type KnowledgeSnapshot } from "./knowledge_base.js"
import { loadFewShotSet, type FewShotSet } from "./few_shot_examples.js"
import { KnowledgeBaseBuilder, type BuildReport, type RuleUpdateReport } from "./knowledge_base_builder.js"
import type { Logger } from "./logger.js"
import { OllamaClient, type LanguageModel } from "./ollama_client.js"
import { PgVectorKnowledgeBase } from "./pgvector_knowledge_base.js"
import { analyze, buildAnalyzerVocabulary, type AnalyzerVocabulary } from "./query_parser.js"
import { RepairLoop, type LoopResult } from "./repair_loop.js"
import { PgSchemaIntrospector, loadMetadataFile, type MetadataSource } from "./schema_introspector.js"
import { tableChunkId } from "./schema_embedder.js"
import { SchemaRetriever } from "./schema_retriever.js"
import type {
	BusinessRule,
	IntermediateArtifacts,
	QueryOutcome,
	QueryResult,
	TableMetadata,
	ValidationOutcome,
} from "./schema_types.js"
import { PgSqlExecutor, type SqlExecutor } from "./sql_executor.js"
import { SqlGenerator } from "./sql_generator.js"
import {
	checkReadOnly,
	checkReferences,
	checkSyntax,
	extractTableNames,
	type PolicyCheck,
	type ReferenceCheck,
	type SchemaCatalog,
	type SyntaxCheck,
} from "./sql_validator.js"

// ============================================================================
// Types
// ============================================================================

export interface EngineDependencies {
	config: Text2SQLConfig
	logger: Logger
	source: MetadataSource
	kb: KnowledgeBase
	embeddingService: EmbeddingService
	llm: LanguageModel
	/** null disables execution (dry-run only) */
	executor: SqlExecutor | null
	rules?: BusinessRuleStore
	/** Worked examples for prompts; the bundled set when absent */
	fewShot?: FewShotSet
	/** Closed by close() */
	pool?: PgPoolLike
}

export interface QueryOptions {
	showIntermediate?: boolean
	/** Override repair.execute for this query */
	execute?: boolean
	signal?: AbortSignal
}

export interface ValidateResult {
	valid: boolean
	syntax: SyntaxCheck
	policy: PolicyCheck
	/** null when the statement did not parse */
	references: ReferenceCheck | null
	tables_used: string[]
}

export interface EngineStats {
	chunks: number
	tables: string[]
	rules: number
	embedding_model: string
	dimensions: number | null
	queries: Record<QueryOutcome, number> & { total: number }
}

function emptyQueryStats(): EngineStats["queries"] {
	return { total: 0, success: 0, syntax_error: 0, execution_error: 0, policy_violation: 0, cancelled: 0 }
}

function outcomeMessage(outcome: ValidationOutcome): string | null {
	return outcome.kind === "success" ? null : outcome.message
}

// ============================================================================
// Engine
// ============================================================================

export class Text2SQLEngine {
	private embedder: Embedder
	private builder: KnowledgeBaseBuilder
	private retriever: SchemaRetriever
	private loop: RepairLoop
	private vocabulary: AnalyzerVocabulary | null = null
	private queryStats = emptyQueryStats()

	constructor(private deps: EngineDependencies) {
		const { config, logger } = deps
		this.embedder = new Embedder(
			deps.embeddingService,
			{
				batchSize: config.knowledge_base.batch_size,
				concurrency: config.knowledge_base.concurrency,
				dimensions: config.knowledge_base.embedding_dimensions,
			},
			logger,
		)
		this.builder = new KnowledgeBaseBuilder(
			deps.source,
			deps.kb,
			this.embedder,
			deps.rules ?? new BusinessRuleStore(),
			{ granularity: config.knowledge_base.granularity },
			logger,
		)
		this.retriever = new SchemaRetriever(
			deps.kb,
			this.embedder,
			{
				topK: config.retrieval.top_k,
				scoreThreshold: config.retrieval.score_threshold,
				hybrid: config.retrieval.hybrid,
				pinEntities: config.retrieval.pin_entities,
			},
			logger,
		)
		const generator = new SqlGenerator(
			deps.llm,
			{
				dialect: config.database.dialect,
				temperature: config.generation.temperature,
				maxTokens: config.generation.max_tokens,
				timeoutMs: config.repair.generation_timeout_ms,
			},
			logger,
		)
		this.loop = new RepairLoop(
			generator,
			deps.executor,
			{
				maxAttempts: config.repair.max_attempts,
				execute: config.repair.execute,
				executionTimeoutMs: config.repair.execution_timeout_ms,
				maxRows: config.repair.max_rows,
				maxContextChars: config.prompt.max_context_chars,
				dialect: config.database.dialect,
				fewShot:
					config.prompt.max_examples > 0
						? { set: deps.fewShot ?? loadFewShotSet(), max: config.prompt.max_examples }
						: undefined,
			},
			logger,
		)
	}

	get rules(): BusinessRuleStore {
		return this.builder.ruleStore
	}

	// ========================================================================
	// Offline
	// ========================================================================

	async buildKnowledgeBase(options: { force?: boolean; rules?: BusinessRuleStore } = {}): Promise<BuildReport> {
		const report = await this.builder.build(options)
		if (report.status === "built") this.vocabulary = null
		return report
	}

	async exportKnowledgeBase(): Promise<KnowledgeSnapshot> {
		const snapshot = await this.deps.kb.export()
		this.deps.logger.info("Knowledge base exported", { chunks: snapshot.chunks.length })
		return snapshot
	}

	/**
	 * Replace the knowledge base with a snapshot. Snapshots embedded by a
	 * different model are refused: their vectors live in another space.
	 */
	async importKnowledgeBase(raw: unknown): Promise<{ chunks: number }> {
		const snapshot = parseSnapshot(raw)
		const model = this.deps.config.model.embedding
		if (snapshot.embedding_model !== "unknown" && snapshot.embedding_model !== model) {
			throw new KnowledgeBaseError(
				`Snapshot was embedded with ${snapshot.embedding_model}, engine uses ${model}`,
				{ snapshot_model: snapshot.embedding_model },
			)
		}
		await this.deps.kb.import(snapshot)
		this.vocabulary = null
		this.deps.logger.info("Knowledge base imported", { chunks: snapshot.chunks.length })
		return { chunks: snapshot.chunks.length }
	}

	async addBusinessRule(rule: BusinessRule): Promise<RuleUpdateReport> {
		const report = await this.builder.addBusinessRule(rule)
		this.vocabulary = null
		return report
	}

	// ========================================================================
	// Online
	// ========================================================================

	/**
	 * Tables and rule keys the analyzer matches against. Falls back to table
	 * names in the knowledge base when the metadata source cannot be read.
	 */
	private async getVocabulary(): Promise<AnalyzerVocabulary> {
		if (this.vocabulary) return this.vocabulary
		let tables: readonly TableMetadata[] = this.builder.tables
		if (tables.length === 0) {
			try {
				tables = await this.deps.source.extract()
			} catch (error) {
				this.deps.logger.warn("Metadata unavailable for query analysis; using knowledge base table names", {
					error: errorMessage(error),
				})
				const names = await this.deps.kb.listTables()
				tables = names.map((table_name) => ({ table_name, columns: [], primary_key: [], foreign_keys: [], comment: null }))
			}
		}
		this.vocabulary = buildAnalyzerVocabulary(tables, this.rules)
		return this.vocabulary
	}

	async query(question: string, options: QueryOptions = {}): Promise<QueryResult> {
		const queryId = uuidv4()
		const startTime = Date.now()
		const { logger } = this.deps
		logger.info("Query received", { query_id: queryId, question })

		if (options.signal?.aborted) {
			return this.finish({
				query_id: queryId,
				question,
				sql: null,
				outcome: "cancelled",
				attempts: 0,
				error: "Query cancelled before retrieval",
				tables_used: [],
				latency_ms: Date.now() - startTime,
			})
		}

		const analysis = analyze(question, await this.getVocabulary())
		logger.info("Question analyzed", {
			query_id: queryId,
			entities: analysis.entities.map((e) => e.matched),
			rule_keys: analysis.rule_keys,
			intent: analysis.intent,
			aggregation: analysis.aggregation,
			time_range: analysis.time_range?.expression ?? null,
		})

		const context = await this.retriever.retrieve(question, { analysis, queryId })

		const loop = await this.loop.run({
			question,
			context,
			rules: this.rules,
			analysis,
			signal: options.signal,
			queryId,
			execute: options.execute,
			catalog: await this.getCatalog(),
		})

		const result = this.toQueryResult(queryId, question, loop, startTime)
		if (options.showIntermediate) {
			const intermediate: IntermediateArtifacts = {
				analysis,
				retrieved: context.chunks.map((c) => ({
					id: c.chunk.id,
					source_table: c.chunk.source_table,
					score: c.score,
					pinned: c.pinned,
				})),
				prompts: loop.prompts.map((p) => p.text),
				candidates: loop.history,
			}
			result.intermediate = intermediate
		}
		return this.finish(result)
	}

	private toQueryResult(queryId: string, question: string, loop: LoopResult, startTime: number): QueryResult {
		const last = loop.history.length > 0 ? loop.history[loop.history.length - 1] : null
		const sql = last?.candidate.sql ?? null

		let outcome: QueryOutcome
		let error: string | null
		if (loop.state === "CANCELLED") {
			outcome = "cancelled"
			error = "Query cancelled"
		} else if (last) {
			outcome = last.outcome.kind
			error = outcomeMessage(last.outcome)
		} else {
			outcome = "cancelled"
			error = "No attempt was made"
		}

		const result: QueryResult = {
			query_id: queryId,
			question,
			sql,
			outcome,
			attempts: loop.attempts,
			error,
			tables_used: sql ? extractTableNames(sql) : [],
			latency_ms: Date.now() - startTime,
		}
		if (last && last.outcome.kind === "success" && last.outcome.executed) {
			result.rows = last.outcome.rows
			result.row_count = last.outcome.row_count
		}
		return result
	}

	private finish(result: QueryResult): QueryResult {
		this.queryStats.total++
		this.queryStats[result.outcome]++
		this.deps.logger.info("Query finished", {
			query_id: result.query_id,
			outcome: result.outcome,
			attempts: result.attempts,
			latency_ms: result.latency_ms,
		})
		return result
	}

	async validate(sql: string): Promise<ValidateResult> {
		const dialect = this.deps.config.database.dialect
		const syntax = checkSyntax(sql, dialect)
		const policy = checkReadOnly(sql, dialect)
		const references = syntax.ok ? checkReferences(sql, dialect, await this.getCatalog()) : null
		return {
			valid: syntax.ok && policy.ok && references !== null && references.ok,
			syntax,
			policy,
			references,
			tables_used: extractTableNames(sql),
		}
	}

	/** Tables in the knowledge base with the columns their table chunks list */
	private async getCatalog(): Promise<SchemaCatalog> {
		const names = await this.deps.kb.listTables()
		const catalog = new Map<string, Set<string>>()
		for (const name of names) catalog.set(name.toLowerCase(), new Set())
		for (const chunk of await this.deps.kb.get(names.map(tableChunkId))) {
			const columns = chunk.metadata.columns
			if (!Array.isArray(columns) || chunk.source_table === null) continue
			catalog.set(chunk.source_table.toLowerCase(), new Set(columns.map((c) => c.toLowerCase())))
		}
		return catalog
	}

	// ========================================================================
	// Introspection
	// ========================================================================

	async getTableSchema(tableName: string): Promise<TableMetadata | null> {
		let tables = this.builder.tables
		if (tables.length === 0) tables = await this.deps.source.extract()
		return tables.find((t) => t.table_name === tableName) ?? null
	}

	async getStats(): Promise<EngineStats> {
		return {
			chunks: await this.deps.kb.count(),
			tables: await this.deps.kb.listTables(),
			rules: this.rules.size,
			embedding_model: this.deps.config.model.embedding,
			dimensions: this.embedder.dimension,
			queries: { ...this.queryStats },
		}
	}

	async close(): Promise<void> {
		if (this.deps.pool) await this.deps.pool.end()
	}
}

// ============================================================================
// Production Wiring
// ============================================================================

export interface CreateEngineOptions {
	/** Build from a JSON/YAML structural description instead of the database */
	metadataFile?: string
}

export async function createEngine(
	config: Text2SQLConfig,
	logger: Logger,
	options: CreateEngineOptions = {},
): Promise<Text2SQLEngine> {
	if (config.database.dialect !== EXECUTABLE_DIALECT && !options.metadataFile) {
		throw new ConfigError(
			`Schema introspection supports ${EXECUTABLE_DIALECT} only; pass a metadata file for dialect ${config.database.dialect}`,
		)
	}
	const pool = createPool(config.database)

	const source: MetadataSource = options.metadataFile
		? loadMetadataFile(options.metadataFile)
		: new PgSchemaIntrospector(
				pool,
				{ schemas: config.database.schemas, excludeTables: config.database.exclude_tables },
				logger,
			)

	const ollama = new OllamaClient(
		{
			baseUrl: config.model.base_url,
			llmModel: config.model.llm,
			embeddingModel: config.model.embedding,
			timeoutMs: config.model.timeout_ms,
			embedTimeoutMs: config.model.embed_timeout_ms,
		},
		logger,
	)

	let kb: KnowledgeBase
	if (config.knowledge_base.backend === "pgvector") {
		const pgKb = new PgVectorKnowledgeBase(
			pool,
			{
				table: config.knowledge_base.table,
				dimensions: config.knowledge_base.embedding_dimensions,
				embeddingModel: config.model.embedding,
			},
			logger,
		)
		await pgKb.ensureSchema()
		kb = pgKb
	} else {
		kb = new InMemoryKnowledgeBase(config.model.embedding)
	}

	const rules = config.business_rules.path
		? loadBusinessRules(path.resolve(process.cwd(), config.business_rules.path))
		: new BusinessRuleStore()

	const fewShot = config.prompt.examples_path
		? loadFewShotSet(path.resolve(process.cwd(), config.prompt.examples_path))
		: undefined

	logger.info("Engine configured", {
		dialect: config.database.dialect,
		kb_backend: config.knowledge_base.backend,
		llm: config.model.llm,
		embedding: config.model.embedding,
		rules: rules.size,
	})

	return new Text2SQLEngine({
		config,
		logger,
		source,
		kb,
		embeddingService: ollama,
		llm: ollama,
		executor: config.repair.execute ? new PgSqlExecutor(pool, logger) : null,
		rules,
		fewShot,
		pool,
	})
}
