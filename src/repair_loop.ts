/**
 * Validator/Repair Loop
 *
 * Explicit finite-state machine:
 *
 *   GENERATE ──► SYNTAX_CHECK ──► EXECUTE ──► SUCCESS
 *      ▲              │               │
 *      └──── repair ──┴───────────────┘  (attempts remain)
 *                     │               │
 *                     ▼               ▼
 *                 EXHAUSTED       EXHAUSTED   (budget spent)
 *
 * Terminal extras:
 * - REJECTED: the candidate is not a read query (or the engine refused it
 *   as such). Never executed, never sent back for repair.
 * - CANCELLED: the caller's AbortSignal fired; checked before every
 *   GENERATE and EXECUTE transition.
 *
 * SYNTAX_CHECK also resolves table and alias-qualified column names
 * against the caller's catalog. An unknown name is recorded as the
 * database would report it (42P01 / 42703), so dry runs get repaired too.
 *
 * The first generation is attempt 1. The generator is never called more
 * than maxAttempts times.
 */

import type { BusinessRuleStore } from "./business_rules.js"
import { ExecutionError, GenerationParseError, LanguageModelError, QueryCancelledError } from "./errors.js"
import type { FewShotSet } from "./few_shot_examples.js"
import type { Logger } from "./logger.js"
import { buildPrompt, type BuiltPrompt } from "./prompt_builder.js"
import type {
	AttemptRecord,
	QueryAnalysis,
	RetrievedContext,
	SQLCandidate,
	SqlDialect,
	ValidationOutcome,
} from "./schema_types.js"
import type { SqlExecutor } from "./sql_executor.js"
import { checkReadOnly, checkReferences, checkSyntax, type SchemaCatalog } from "./sql_validator.js"

// ============================================================================
// Types
// ============================================================================

export type LoopState = "GENERATE" | "SYNTAX_CHECK" | "EXECUTE" | "SUCCESS" | "EXHAUSTED" | "REJECTED" | "CANCELLED"

export type TerminalState = Extract<LoopState, "SUCCESS" | "EXHAUSTED" | "REJECTED" | "CANCELLED">

export interface CandidateGenerator {
	generate(prompt: string, attempt: number, signal?: AbortSignal, queryId?: string): Promise<SQLCandidate>
}

export interface RepairLoopConfig {
	maxAttempts: number
	/** false = dry run: SYNTAX_CHECK success goes straight to SUCCESS */
	execute: boolean
	executionTimeoutMs: number
	maxRows: number
	maxContextChars: number
	dialect: SqlDialect
	/** Worked examples offered to the prompt; none when absent */
	fewShot?: { set: FewShotSet; max: number }
}

export interface RepairLoopInput {
	question: string
	context: RetrievedContext
	rules: BusinessRuleStore
	analysis?: QueryAnalysis
	signal?: AbortSignal
	queryId?: string
	/** Per-query override of config.execute */
	execute?: boolean
	/** Known tables and columns; candidates naming others are sent back for repair */
	catalog?: SchemaCatalog
}

export interface LoopResult {
	state: TerminalState
	/** Number of generator calls made */
	attempts: number
	/** Every (candidate, outcome) pair, in order */
	history: AttemptRecord[]
	prompts: BuiltPrompt[]
	/** Visited states, for tracing */
	transitions: LoopState[]
}

function isTerminal(state: LoopState): state is TerminalState {
	return state === "SUCCESS" || state === "EXHAUSTED" || state === "REJECTED" || state === "CANCELLED"
}

// ============================================================================
// Loop
// ============================================================================

export class RepairLoop {
	constructor(
		private generator: CandidateGenerator,
		private executor: SqlExecutor | null,
		private config: RepairLoopConfig,
		private logger: Logger,
	) {}

	async run(input: RepairLoopInput): Promise<LoopResult> {
		const { signal, queryId } = input
		const execute = (input.execute ?? this.config.execute) && this.executor !== null
		const history: AttemptRecord[] = []
		const prompts: BuiltPrompt[] = []
		const transitions: LoopState[] = []

		let state: LoopState = "GENERATE"
		let attempt = 0
		let candidate: SQLCandidate | null = null

		const record = (c: SQLCandidate, outcome: ValidationOutcome) => {
			history.push({ candidate: c, outcome })
			this.logger.info("Attempt finished", {
				query_id: queryId,
				attempt: c.attempt,
				outcome: outcome.kind,
				...(outcome.kind === "syntax_error" ? { offset: outcome.offset } : {}),
				...(outcome.kind === "execution_error" ? { sqlstate: outcome.sqlstate } : {}),
			})
		}
		const afterFailure = (): LoopState => (attempt < this.config.maxAttempts ? "GENERATE" : "EXHAUSTED")

		while (!isTerminal(state)) {
			transitions.push(state)
			switch (state) {
				case "GENERATE": {
					if (signal?.aborted) {
						state = "CANCELLED"
						break
					}
					attempt++
					const prompt = buildPrompt(
						{
							question: input.question,
							context: input.context,
							rules: input.rules,
							history,
							dialect: this.config.dialect,
							analysis: input.analysis,
						},
						{ maxContextChars: this.config.maxContextChars, fewShot: this.config.fewShot },
					)
					prompts.push(prompt)

					try {
						candidate = await this.generator.generate(prompt.text, attempt, signal, queryId)
						state = "SYNTAX_CHECK"
					} catch (error) {
						if (error instanceof QueryCancelledError) {
							attempt--
							state = "CANCELLED"
						} else if (error instanceof GenerationParseError) {
							candidate = { raw_output: error.rawOutput, sql: null, dialect: this.config.dialect, attempt }
							record(candidate, { kind: "syntax_error", message: error.message, offset: null })
							state = afterFailure()
						} else if (error instanceof LanguageModelError && error.timedOut) {
							candidate = { raw_output: "", sql: null, dialect: this.config.dialect, attempt }
							record(candidate, { kind: "syntax_error", message: error.message, offset: null })
							state = afterFailure()
						} else {
							throw error
						}
					}
					break
				}

				case "SYNTAX_CHECK": {
					const c = requireCandidate(candidate)
					const sql = c.sql ?? ""

					// Recognizable non-read statements are rejected before anything else
					const early = checkReadOnly(sql, this.config.dialect)
					if (!early.ok && early.statement_type !== null) {
						record(c, { kind: "policy_violation", message: early.message, statement_type: early.statement_type })
						state = "REJECTED"
						break
					}

					const syntax = checkSyntax(sql, this.config.dialect)
					if (!syntax.ok) {
						record(c, {
							kind: "syntax_error",
							message: syntax.message,
							offset: syntax.offset,
							line: syntax.line,
							column: syntax.column,
						})
						state = afterFailure()
						break
					}

					if (!early.ok) {
						record(c, { kind: "policy_violation", message: early.message, statement_type: early.statement_type })
						state = "REJECTED"
						break
					}

					if (input.catalog) {
						const refs = checkReferences(sql, this.config.dialect, input.catalog)
						if (!refs.ok) {
							record(c, {
								kind: "execution_error",
								message: refs.message,
								sqlstate: refs.sqlstate,
								position: refs.offset === null ? null : refs.offset + 1,
								timed_out: false,
							})
							state = afterFailure()
							break
						}
					}

					if (!execute) {
						record(c, { kind: "success", executed: false, rows: [], row_count: 0, fields: [] })
						state = "SUCCESS"
					} else {
						state = "EXECUTE"
					}
					break
				}

				case "EXECUTE": {
					const c = requireCandidate(candidate)
					if (signal?.aborted) {
						state = "CANCELLED"
						break
					}
					const executor = this.executor
					if (!executor) throw new Error("Repair loop reached EXECUTE without an executor")
					try {
						const result = await executor.execute(c.sql ?? "", {
							timeoutMs: this.config.executionTimeoutMs,
							maxRows: this.config.maxRows,
							signal,
						})
						record(c, {
							kind: "success",
							executed: true,
							rows: result.rows,
							row_count: result.row_count,
							fields: result.fields,
						})
						state = "SUCCESS"
					} catch (error) {
						if (error instanceof QueryCancelledError) {
							state = "CANCELLED"
						} else if (error instanceof ExecutionError && error.errorClass !== "infra_failure") {
							if (error.errorClass === "validation_block") {
								record(c, { kind: "policy_violation", message: error.message, statement_type: null })
								state = "REJECTED"
							} else {
								record(c, {
									kind: "execution_error",
									message: error.message,
									sqlstate: error.sqlstate,
									position: error.position,
									timed_out: error.errorClass === "query_timeout",
								})
								state = afterFailure()
							}
						} else {
							throw error
						}
					}
					break
				}
			}
		}

		this.logger.info("Repair loop finished", {
			query_id: queryId,
			state,
			attempts: attempt,
			transitions: transitions.join(">"),
		})
		return { state, attempts: attempt, history, prompts, transitions }
	}
}

function requireCandidate(candidate: SQLCandidate | null): SQLCandidate {
	if (!candidate) throw new Error("Repair loop reached a check state without a candidate")
	return candidate
}
