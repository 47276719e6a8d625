/**
 * QueryForge MCP Server
 *
 * Exposes query generation and saved-schema management as MCP tools.
 * Transport is chosen by the caller (stdio in production, in-memory in tests).
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js"
import { z, ZodError } from "zod"
import { QueryGenerationError } from "./config.js"
import type { QueryForgeConfig } from "./config/loadConfig.js"
import type { QueryGenerator } from "./query_generator.js"
import type { SchemaStore } from "./schema_store.js"
import type { Logger } from "./logger.js"

export const SERVER_NAME = "queryforge"
export const SERVER_VERSION = "1.0.0"

export interface ServerDeps {
	generator: QueryGenerator
	schemas: SchemaStore
	config: Pick<QueryForgeConfig, "provider" | "model" | "generation">
	logger: Logger
}

function jsonResult(payload: unknown, isError: boolean = false): CallToolResult {
	return {
		content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
		...(isError ? { isError: true } : {}),
	}
}

function errorResult(error: unknown): CallToolResult {
	if (error instanceof ZodError) {
		const [issue] = error.issues
		const message = issue ? `${issue.path.join(".") || "input"}: ${issue.message}` : "Invalid input"
		return jsonResult({ error: { kind: "input_shape", message } }, true)
	}
	if (error instanceof QueryGenerationError) {
		return jsonResult({ error: { kind: error.kind, message: error.message } }, true)
	}
	const message = error instanceof Error ? error.message : String(error)
	return jsonResult({ error: { kind: "unknown", message } }, true)
}

export default function createServer({ generator, schemas, config, logger }: ServerDeps): McpServer {
	const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION })

	server.tool(
		"generate_query",
		"Generate a read-safe SQL query or MongoDB aggregation pipeline from a natural language question",
		{
			question: z.string().describe("Natural language question"),
			database_type: z
				.string()
				.describe(`Target database type: ${config.generation.supported_dialects.join(", ")}`),
			model: z.string().optional().describe(`Model to use (default ${config.model.default})`),
			schema_text: z.string().optional().describe("Database schema as text"),
			schema_id: z.string().optional().describe("ID of a saved schema"),
			strict: z.boolean().default(true).describe("Only allow read-only queries"),
			row_limit: z.number().optional().describe(`Maximum rows to return (1-${config.generation.row_limit_max})`),
		},
		async (args) => {
			const outcome = await generator.generate({
				question: args.question,
				dialect: args.database_type,
				model: args.model,
				schemaText: args.schema_text,
				schemaId: args.schema_id,
				strict: args.strict,
				rowLimit: args.row_limit,
			})

			if (!outcome.ok) {
				return jsonResult({ error: outcome.error }, true)
			}
			return jsonResult({ sql: outcome.query, metadata: outcome.metadata })
		},
	)

	server.tool("list_models", "List the chat models available for generation", async () => {
		return jsonResult({ models: generator.availableModels() })
	})

	server.tool("health", "Report provider configuration status", async () => {
		return jsonResult({
			ok: true,
			provider: config.provider.name,
			apiKeyConfigured: generator.isConfigured(),
			timestamp: new Date().toISOString(),
		})
	})

	server.tool("list_schemas", "List saved schemas, most recently updated first", async () => {
		try {
			return jsonResult({ schemas: await schemas.list() })
		} catch (error) {
			logger.error("Failed to list schemas", { error: String(error) })
			return errorResult(error)
		}
	})

	server.tool(
		"save_schema",
		"Save (or overwrite by ID) a database schema for later use by ID",
		{
			id: z.string().optional().describe("Existing schema ID to overwrite"),
			name: z.string().describe("Display name (1-100 characters)"),
			database_type: z.string().describe("Database type the schema belongs to"),
			content: z.string().describe("Schema definition text"),
		},
		async (args) => {
			try {
				const saved = await schemas.save({
					id: args.id,
					name: args.name,
					databaseType: args.database_type,
					content: args.content,
				})
				logger.info("Schema saved", { schema_id: saved.id })
				return jsonResult(saved)
			} catch (error) {
				logger.warn("Failed to save schema", { error: String(error) })
				return errorResult(error)
			}
		},
	)

	server.tool(
		"delete_schema",
		"Delete a saved schema",
		{ id: z.string().describe("Schema ID") },
		async (args) => {
			try {
				const deleted = await schemas.delete(args.id)
				if (!deleted) {
					return jsonResult({ error: { kind: "schema_not_found", message: `Schema with ID ${args.id} not found` } }, true)
				}
				return jsonResult({ message: "Schema deleted successfully" })
			} catch (error) {
				logger.error("Failed to delete schema", { error: String(error) })
				return errorResult(error)
			}
		},
	)

	return server
}
