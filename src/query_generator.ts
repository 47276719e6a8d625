/**
 * Query Generator - Natural Language to Query
 *
 * Main orchestration layer that:
 * 1. Sanitizes and validates the question
 * 2. Checks dialect, provider and row limit
 * 3. Resolves schema context (inline or saved)
 * 4. Calls the chat provider with the rendered prompt
 * 5. Cleans the response and, in strict mode, runs the safety validator
 *
 * Every failure short-circuits into a typed QueryGenerationError; generate()
 * turns it into a tagged outcome and never throws.
 */

import { v4 as uuidv4 } from "uuid"
import {
	ProviderCallError,
	ProviderNotConfiguredError,
	QueryGenerationError,
	RowLimitOutOfRangeError,
	SafetyViolationError,
	SchemaNotFoundError,
	UnknownError,
	UnsupportedDialectError,
	InputShapeError,
	type GenerationOutcome,
	type GenerationRequest,
	type SchemaSource,
} from "./config.js"
import type { QueryForgeConfig } from "./config/loadConfig.js"
import { sanitizeInput, validateInputs } from "./input_sanitizer.js"
import { buildPrompt, toChatMessages } from "./prompt_builder.js"
import { cleanResponse } from "./response_cleaner.js"
import { validateSafety } from "./safety_validator.js"
import type { ChatProvider } from "./llm_client.js"
import type { SchemaLookup } from "./schema_store.js"
import type { Logger } from "./logger.js"

export interface QueryGeneratorDeps {
	provider: ChatProvider
	schemas: SchemaLookup
	config: Pick<QueryForgeConfig, "model" | "generation">
	logger: Logger
}

interface ResolvedSchema {
	content: string | null
	source: SchemaSource
}

export class QueryGenerator {
	private provider: ChatProvider
	private schemas: SchemaLookup
	private config: QueryGeneratorDeps["config"]
	private logger: Logger

	constructor(deps: QueryGeneratorDeps) {
		this.provider = deps.provider
		this.schemas = deps.schemas
		this.config = deps.config
		this.logger = deps.logger
	}

	isConfigured(): boolean {
		return this.provider.isConfigured()
	}

	availableModels(): string[] {
		return this.provider.availableModels()
	}

	async generate(request: GenerationRequest): Promise<GenerationOutcome> {
		const startTime = Date.now()
		const queryId = uuidv4()

		this.logger.info("Query generation received", {
			query_id: queryId,
			dialect: request.dialect,
			strict: request.strict ?? true,
			has_schema_text: Boolean(request.schemaText),
			schema_id: request.schemaId,
		})

		try {
			const { query, model, rowLimit, strict, schemaSource } = await this.run(request)
			const latencyMs = Date.now() - startTime

			this.logger.info("Query generation succeeded", { query_id: queryId, latency_ms: latencyMs })

			return {
				ok: true,
				query,
				metadata: {
					queryId,
					dialect: request.dialect,
					model,
					rowLimit,
					strict,
					schemaSource,
					latencyMs,
				},
			}
		} catch (error) {
			const failure =
				error instanceof QueryGenerationError
					? error
					: new UnknownError(error instanceof Error ? error.message : String(error))

			if (failure instanceof UnknownError) {
				this.logger.error("Query generation error", {
					query_id: queryId,
					error: failure.message,
					stack: error instanceof Error ? error.stack : undefined,
				})
			} else {
				this.logger.warn("Query generation rejected", {
					query_id: queryId,
					kind: failure.kind,
					message: failure.message,
				})
			}

			return {
				ok: false,
				error: {
					kind: failure.kind,
					message: failure.message,
					...(failure instanceof SafetyViolationError ? { violations: failure.violations } : {}),
				},
			}
		}
	}

	private async run(request: GenerationRequest) {
		const { generation } = this.config
		const strict = request.strict ?? true

		const question = sanitizeInput(request.question)

		const check = validateInputs(question, request.dialect)
		if (!check.ok) {
			throw new InputShapeError(check.reason)
		}

		const supported: readonly string[] = generation.supported_dialects
		if (!supported.includes(request.dialect)) {
			throw new UnsupportedDialectError(request.dialect, supported)
		}

		if (!this.provider.isConfigured()) {
			throw new ProviderNotConfiguredError(this.provider.name)
		}

		if (request.rowLimit !== undefined) {
			this.checkRowLimit(request.rowLimit, generation.row_limit_max)
		}

		const model = request.model || this.config.model.default
		const rowLimit = request.rowLimit ?? generation.row_limit_default

		const schema = await this.resolveSchema(request)

		const prompt = buildPrompt({
			question,
			dialect: request.dialect,
			schema: schema.content,
			strict,
			rowLimit,
		})

		let raw: string
		try {
			raw = await this.provider.complete(model, toChatMessages(prompt), this.config.model.temperature)
		} catch (error) {
			if (error instanceof ProviderCallError) throw error
			throw new ProviderCallError(error instanceof Error ? error.message : String(error))
		}

		const query = cleanResponse(raw)

		if (strict) {
			const verdict = validateSafety(query, request.dialect, strict)
			if (!verdict.isSafe) {
				throw new SafetyViolationError(verdict.violations)
			}
		}

		return { query, model, rowLimit, strict, schemaSource: schema.source }
	}

	private checkRowLimit(rowLimit: number, max: number): void {
		if (!Number.isInteger(rowLimit)) {
			throw new RowLimitOutOfRangeError("Row limit must be a whole number", rowLimit)
		}
		// Explicit 0 is rejected, not treated as "use the default"
		if (rowLimit < 1) {
			throw new RowLimitOutOfRangeError("Row limit must be at least 1", rowLimit)
		}
		if (rowLimit > max) {
			throw new RowLimitOutOfRangeError(`Row limit cannot exceed ${max}`, rowLimit)
		}
	}

	private async resolveSchema(request: GenerationRequest): Promise<ResolvedSchema> {
		if (request.schemaText && request.schemaText.trim()) {
			return { content: request.schemaText, source: "text" }
		}

		if (request.schemaId) {
			const stored = await this.schemas.lookup(request.schemaId)
			if (!stored) {
				throw new SchemaNotFoundError(request.schemaId)
			}
			return { content: stored.content, source: "stored" }
		}

		return { content: null, source: "none" }
	}
}
