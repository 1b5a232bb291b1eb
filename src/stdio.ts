#!/usr/bin/env node
/**
 * Stdio entry point for the RAG Text-to-SQL MCP Server
 *
 * Server config priority:
 *   1. .mcp.json file in the project root (highest priority)
 *   2. CLI argument
 *   3. Environment variables
 *   4. Nothing: database settings come from config/config.yaml
 *
 * Usage:
 *   node stdio.js '{"postgresConnectionString":"postgresql://...","metadataFile":"schema.yaml"}'
 *
 * Or via environment variables:
 *   POSTGRES_CONNECTION_STRING=postgresql://... node stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import { readFileSync, existsSync } from "fs"
import { join, dirname } from "path"
import { fileURLToPath } from "url"
import { loadConfig } from "./config/loadConfig.js"
import { errorMessage } from "./errors.js"
import { createLogger, redactConnectionString } from "./logger.js"
import createServer, { configSchema, type ServerConfig } from "./index.js"

const logger = createLogger(loadConfig().logging.level)

/**
 * Try to load config from .mcp.json in the project root
 */
function loadConfigFromFile(): ServerConfig | null {
	const configPath = join(dirname(fileURLToPath(import.meta.url)), "..", "..", ".mcp.json")
	if (!existsSync(configPath)) return null
	try {
		const validated = configSchema.parse(JSON.parse(readFileSync(configPath, "utf-8")))
		logger.info("Config loaded", { source: configPath })
		return validated
	} catch (e) {
		logger.warn("Failed to load config from .mcp.json", { error: errorMessage(e) })
		return null
	}
}

function resolveServerConfig(): ServerConfig {
	const fileConfig = loadConfigFromFile()
	if (fileConfig) return fileConfig

	const configArg = process.argv[2]
	if (configArg) {
		try {
			const validated = configSchema.parse(JSON.parse(configArg))
			logger.info("Config loaded from CLI argument")
			return validated
		} catch (e) {
			logger.error("Failed to parse config from CLI argument", { error: errorMessage(e) })
			process.exit(1)
		}
	}

	const validated = configSchema.parse({
		postgresConnectionString: process.env.POSTGRES_CONNECTION_STRING,
		metadataFile: process.env.METADATA_FILE,
	})
	if (validated.postgresConnectionString) logger.info("Config loaded from environment variables")
	return validated
}

async function main() {
	const config = resolveServerConfig()

	logger.info("Starting RAG Text-to-SQL MCP Server with stdio transport")
	if (config.postgresConnectionString) {
		logger.info("Database", { connection: redactConnectionString(config.postgresConnectionString) })
	}

	const server = createServer({ config, logger })
	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("RAG Text-to-SQL MCP Server running via stdio")

	const shutdown = () => {
		logger.info("Shutting down...")
		server
			.close()
			.then(() => process.exit(0))
			.catch((error: unknown) => {
				logger.error("Shutdown failed", { error: errorMessage(error) })
				process.exit(1)
			})
	}
	process.on("SIGINT", shutdown)
	process.on("SIGTERM", shutdown)
}

main().catch((error: unknown) => {
	logger.error("Fatal error", { error: errorMessage(error) })
	process.exit(1)
})
