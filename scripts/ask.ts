#!/usr/bin/env npx tsx
/**
 * Ask a single question from the command line.
 *
 * Usage:
 *   npx tsx scripts/ask.ts "统计每个用户的订单数量"
 *   npx tsx scripts/ask.ts "本月GMV是多少" --dry-run --verbose
 *
 * Options:
 *   --dry-run   Validate the SQL but do not execute it
 *   --verbose   Print analysis, retrieved chunks and every attempt
 */

import { loadConfig } from "../src/config/loadConfig.js"
import { errorMessage } from "../src/errors.js"
import { applyConnectionString } from "../src/index.js"
import { createLogger } from "../src/logger.js"
import { createEngine } from "../src/text2sql_engine.js"

async function main() {
	const args = process.argv.slice(2)
	const question = args.filter((a) => !a.startsWith("--")).join(" ").trim()
	const dryRun = args.includes("--dry-run")
	const verbose = args.includes("--verbose")
	if (!question) {
		console.error('Usage: ask.ts "<question>" [--dry-run] [--verbose]')
		process.exit(1)
	}

	let config = loadConfig()
	const connectionString = process.env.POSTGRES_CONNECTION_STRING
	if (connectionString) config = applyConnectionString(config, connectionString)

	const engine = await createEngine(config, createLogger(config.logging.level))

	// Ctrl-C cancels the running query
	const controller = new AbortController()
	process.once("SIGINT", () => controller.abort())

	try {
		const result = await engine.query(question, {
			showIntermediate: verbose,
			execute: dryRun ? false : undefined,
			signal: controller.signal,
		})

		if (verbose && result.intermediate) {
			const { analysis, retrieved, candidates } = result.intermediate
			console.log("Analysis:", JSON.stringify(analysis, null, 2))
			console.log("\nRetrieved:")
			for (const r of retrieved) {
				console.log(`  ${r.pinned ? "*" : " "} ${r.score.toFixed(3)}  ${r.id}`)
			}
			console.log("\nAttempts:")
			for (const c of candidates) {
				console.log(`  #${c.candidate.attempt} ${c.outcome.kind}: ${c.candidate.sql ?? "(no SQL)"}`)
				if (c.outcome.kind !== "success") console.log(`     ${c.outcome.message}`)
			}
			console.log("")
		}

		console.log(`Outcome: ${result.outcome} after ${result.attempts} attempt(s), ${result.latency_ms}ms`)
		if (result.sql) console.log(`\n${result.sql}\n`)
		if (result.error) console.log(`Error: ${result.error}`)
		if (result.rows) {
			console.table(result.rows)
			if (result.row_count !== undefined && result.row_count > result.rows.length) {
				console.log(`(${result.rows.length} of ${result.row_count} rows shown)`)
			}
		}
		if (result.outcome !== "success") process.exitCode = 2
	} finally {
		await engine.close()
	}
}

main().catch((error: unknown) => {
	console.error("Query failed:", errorMessage(error))
	process.exit(1)
})
