/**
 * Generate a single query against the configured provider and print it.
 *
 * Usage:
 *   OPENAI_API_KEY=sk-... npx tsx scripts/generate_single.ts "Top 5 customers by revenue" PostgreSQL
 */

import { loadConfig } from "../src/config/loadConfig.js"
import { createLogger } from "../src/logger.js"
import { OpenAIChatProvider } from "../src/llm_client.js"
import { QueryGenerator } from "../src/query_generator.js"
import { FileSchemaStore } from "../src/schema_store.js"

async function main() {
	const question = process.argv[2] || "Find all users who registered in the last 30 days"
	const dialect = process.argv[3] || "PostgreSQL"
	const schemaId = process.argv[4]

	const config = loadConfig()
	const logger = createLogger("DEBUG")

	const provider = new OpenAIChatProvider({
		name: config.provider.name,
		baseUrl: config.provider.base_url,
		apiKey: config.provider.api_key,
		timeoutMs: config.provider.timeout_ms,
		maxTokens: config.provider.max_tokens,
		models: config.provider.models,
	})

	const generator = new QueryGenerator({
		provider,
		schemas: new FileSchemaStore(config.storage.dir, logger),
		config,
		logger,
	})

	console.log(`\n=== ${dialect}: "${question}" ===\n`)

	const outcome = await generator.generate({ question, dialect, schemaId, strict: true })

	if (outcome.ok) {
		console.log(outcome.query)
		console.log("\nModel:", outcome.metadata.model, `(${outcome.metadata.latencyMs}ms)`)
	} else {
		console.log(`Rejected [${outcome.error.kind}]: ${outcome.error.message}`)
		process.exitCode = 1
	}
}

main().catch((error) => {
	console.error(error)
	process.exitCode = 1
})
