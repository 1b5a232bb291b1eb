#!/usr/bin/env npx tsx
/**
 * Populate Knowledge Base Script
 *
 * Extracts schema metadata (live database or a description file), renders
 * chunks with business rules, embeds them and publishes to the configured
 * knowledge base.
 *
 * Usage:
 *   npx tsx scripts/populate_knowledge_base.ts --force
 *   npx tsx scripts/populate_knowledge_base.ts --metadata-file=schema.yaml --rules=config/business_rules.yaml
 *
 * Environment variables:
 *   POSTGRES_CONNECTION_STRING - overrides database settings from config.yaml
 *   DB_*, OLLAMA_*, KB_*       - see config/config.yaml
 *
 * Options:
 *   --force           Rebuild even when the knowledge base already has chunks
 *   --metadata-file   JSON/YAML structural description instead of introspection
 *   --rules           Business rules file (default: business_rules.path from config)
 *   --granularity     table | table_and_columns
 */

import { loadBusinessRules, type BusinessRuleStore } from "../src/business_rules.js"
import { loadConfig, type Text2SQLConfig } from "../src/config/loadConfig.js"
import { errorMessage } from "../src/errors.js"
import { applyConnectionString } from "../src/index.js"
import { createLogger } from "../src/logger.js"
import { createEngine } from "../src/text2sql_engine.js"

// ============================================================================
// Configuration
// ============================================================================

interface Options {
	force: boolean
	metadataFile?: string
	rulesFile?: string
	granularity?: Text2SQLConfig["knowledge_base"]["granularity"]
}

function parseArgs(): Options {
	const options: Options = { force: false }
	for (const arg of process.argv.slice(2)) {
		const value = arg.slice(arg.indexOf("=") + 1)
		if (arg === "--force") {
			options.force = true
		} else if (arg.startsWith("--metadata-file=")) {
			options.metadataFile = value
		} else if (arg.startsWith("--rules=")) {
			options.rulesFile = value
		} else if (arg.startsWith("--granularity=")) {
			if (value !== "table" && value !== "table_and_columns") {
				console.error(`Error: --granularity must be table or table_and_columns, got ${value}`)
				process.exit(1)
			}
			options.granularity = value
		} else {
			console.error(`Error: unknown option ${arg}`)
			process.exit(1)
		}
	}
	return options
}

// ============================================================================
// Main
// ============================================================================

async function main() {
	const options = parseArgs()
	let config = loadConfig()
	const logger = createLogger(config.logging.level)

	const connectionString = process.env.POSTGRES_CONNECTION_STRING
	if (connectionString) config = applyConnectionString(config, connectionString)
	if (options.granularity) {
		config = { ...config, knowledge_base: { ...config.knowledge_base, granularity: options.granularity } }
	}

	let rules: BusinessRuleStore | undefined
	if (options.rulesFile) rules = loadBusinessRules(options.rulesFile)

	const engine = await createEngine(config, logger, { metadataFile: options.metadataFile })
	try {
		const report = await engine.buildKnowledgeBase({ force: options.force, rules })

		if (report.status === "skipped") {
			console.log(`Knowledge base already has ${report.chunks} chunks; pass --force to rebuild`)
			return
		}

		console.log(`Built ${report.chunks} chunks for ${report.tables} tables in ${report.latency_ms}ms`)
		if (report.removed_tables.length > 0) console.log(`Removed tables: ${report.removed_tables.join(", ")}`)
		if (report.removed_chunks.length > 0) console.log(`Removed chunks: ${report.removed_chunks.join(", ")}`)
		if (report.self_match_failures.length > 0) {
			console.log(`Self-match failures: ${report.self_match_failures.join(", ")}`)
			process.exitCode = 2
		}
	} finally {
		await engine.close()
	}
}

main().catch((error: unknown) => {
	console.error("Population failed:", errorMessage(error))
	process.exit(1)
})
