#!/usr/bin/env npx tsx
/**
 * Knowledge Base Snapshot Script
 *
 * Usage:
 *   npx tsx scripts/knowledge_base_snapshot.ts export --file=kb.json
 *   npx tsx scripts/knowledge_base_snapshot.ts import --file=kb.json
 *
 * Import replaces the whole knowledge base. Snapshots embedded with a
 * different embedding model are refused.
 */

import * as fs from "fs"
import * as path from "path"
import { loadConfig } from "../src/config/loadConfig.js"
import { errorMessage } from "../src/errors.js"
import { applyConnectionString } from "../src/index.js"
import { createLogger } from "../src/logger.js"
import { createEngine } from "../src/text2sql_engine.js"

function parseArgs(): { command: "export" | "import"; file: string } {
	const [command, ...rest] = process.argv.slice(2)
	const fileArg = rest.find((a) => a.startsWith("--file="))
	if ((command !== "export" && command !== "import") || !fileArg) {
		console.error("Usage: knowledge_base_snapshot.ts <export|import> --file=<path>")
		process.exit(1)
	}
	return { command, file: path.resolve(fileArg.slice("--file=".length)) }
}

async function main() {
	const { command, file } = parseArgs()
	let config = loadConfig()
	const connectionString = process.env.POSTGRES_CONNECTION_STRING
	if (connectionString) config = applyConnectionString(config, connectionString)

	const engine = await createEngine(config, createLogger(config.logging.level))
	try {
		if (command === "export") {
			const snapshot = await engine.exportKnowledgeBase()
			fs.writeFileSync(file, JSON.stringify(snapshot, null, 2))
			console.log(`Exported ${snapshot.chunks.length} chunks (${snapshot.dimensions} dimensions) to ${file}`)
		} else {
			const raw: unknown = JSON.parse(fs.readFileSync(file, "utf-8"))
			const { chunks } = await engine.importKnowledgeBase(raw)
			console.log(`Imported ${chunks} chunks from ${file}`)
		}
	} finally {
		await engine.close()
	}
}

main().catch((error: unknown) => {
	console.error("Snapshot failed:", errorMessage(error))
	process.exit(1)
})
