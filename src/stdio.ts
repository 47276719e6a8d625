#!/usr/bin/env node
/**
 * Stdio entry point for the QueryForge MCP Server
 *
 * Config comes from config/config.yaml, config/config.local.yaml and env
 * (see config/loadConfig.ts). Usage:
 *
 *   OPENAI_API_KEY=sk-... node dist/src/stdio.js
 *   STORAGE_BACKEND=postgres DATABASE_URL=postgresql://... node dist/src/stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import pg from "pg"
import createServer from "./index.js"
import { loadConfig, type QueryForgeConfig } from "./config/loadConfig.js"
import { createLogger, type Logger } from "./logger.js"
import { OpenAIChatProvider } from "./llm_client.js"
import { QueryGenerator } from "./query_generator.js"
import { FileSchemaStore, PgSchemaStore, type SchemaStore } from "./schema_store.js"

const { Pool } = pg

interface Storage {
	store: SchemaStore
	close: () => Promise<void>
}

async function openStorage(config: QueryForgeConfig, logger: Logger): Promise<Storage> {
	if (config.storage.backend === "postgres") {
		const pool = new Pool({ connectionString: config.storage.postgres_url, max: 5 })
		const store = new PgSchemaStore(pool)
		await store.ensureTable()
		logger.info(`Schema storage: postgres (${config.storage.postgres_url.replace(/:[^:@]+@/, ":***@")})`)
		return { store, close: () => pool.end() }
	}

	logger.info(`Schema storage: files under ${config.storage.dir}`)
	return { store: new FileSchemaStore(config.storage.dir, logger), close: async () => {} }
}

async function main() {
	const config = loadConfig()
	const logger = createLogger(config.logging.level)

	const provider = new OpenAIChatProvider({
		name: config.provider.name,
		baseUrl: config.provider.base_url,
		apiKey: config.provider.api_key,
		timeoutMs: config.provider.timeout_ms,
		maxTokens: config.provider.max_tokens,
		models: config.provider.models,
	})

	if (!provider.isConfigured()) {
		logger.warn(`${provider.name} API key not configured; generate_query will fail until OPENAI_API_KEY is set`)
	}

	const storage = await openStorage(config, logger)
	const generator = new QueryGenerator({ provider, schemas: storage.store, config, logger })
	const server = createServer({ generator, schemas: storage.store, config, logger })

	logger.info("Starting QueryForge MCP Server with stdio transport")

	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("QueryForge MCP Server running via stdio")

	const shutdown = async () => {
		logger.info("Shutting down...")
		await server.close()
		await storage.close()
		process.exit(0)
	}

	process.on("SIGINT", () => {
		shutdown().catch((error) => {
			logger.error("Shutdown failed", { error: String(error) })
			process.exit(1)
		})
	})
	process.on("SIGTERM", () => {
		shutdown().catch((error) => {
			logger.error("Shutdown failed", { error: String(error) })
			process.exit(1)
		})
	})
}

main().catch((error) => {
	console.error("[ERROR] Fatal error:", error)
	process.exit(1)
})
