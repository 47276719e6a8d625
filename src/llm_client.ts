/**
 * Chat Completion HTTP Client
 *
 * Talks to an OpenAI-compatible /chat/completions endpoint.
 *
 * Responsibilities:
 * - Send the rendered prompt as chat messages
 * - Enforce a request timeout
 * - Map non-2xx bodies, empty choices, timeouts and connection failures to ProviderCallError
 */

import { z } from "zod"
import { ProviderCallError, QueryGenerationError } from "./config.js"

export interface ChatMessage {
	role: "system" | "user" | "assistant"
	content: string
}

/**
 * Capability consumed by the generator
 */
export interface ChatProvider {
	readonly name: string
	isConfigured(): boolean
	complete(model: string, messages: ChatMessage[], temperature: number): Promise<string>
	availableModels(): string[]
}

export interface OpenAIChatProviderOptions {
	name?: string
	baseUrl: string
	apiKey: string
	timeoutMs?: number
	maxTokens?: number
	models?: string[]
	fetch?: typeof fetch
}

const completionSchema = z.object({
	choices: z
		.array(
			z.object({
				message: z.object({
					content: z.string().nullable().optional(),
				}),
			}),
		)
		.optional(),
})

const errorBodySchema = z.object({
	error: z.object({
		message: z.string().optional(),
	}),
})

export class OpenAIChatProvider implements ChatProvider {
	readonly name: string
	private baseUrl: string
	private apiKey: string
	private timeout: number
	private maxTokens: number
	private models: string[]
	private fetchImpl: typeof fetch

	constructor(options: OpenAIChatProviderOptions) {
		this.name = options.name || "OpenAI"
		this.baseUrl = options.baseUrl.replace(/\/+$/, "")
		this.apiKey = options.apiKey
		this.timeout = options.timeoutMs || 30000
		this.maxTokens = options.maxTokens || 1000
		this.models = options.models ?? []
		this.fetchImpl = options.fetch ?? fetch
	}

	/**
	 * Keys issued by the provider start with "sk-"
	 */
	isConfigured(): boolean {
		return Boolean(this.apiKey) && this.apiKey.startsWith("sk-")
	}

	availableModels(): string[] {
		return [...this.models]
	}

	async complete(model: string, messages: ChatMessage[], temperature: number = 0.1): Promise<string> {
		if (!this.apiKey) {
			throw new ProviderCallError(`${this.name} API key not configured`)
		}

		const url = `${this.baseUrl}/chat/completions`

		try {
			const controller = new AbortController()
			const timeoutId = setTimeout(() => controller.abort(), this.timeout)

			let response: Response
			try {
				response = await this.fetchImpl(url, {
					method: "POST",
					headers: {
						"Authorization": `Bearer ${this.apiKey}`,
						"Content-Type": "application/json",
					},
					body: JSON.stringify({
						model,
						messages,
						temperature,
						max_tokens: this.maxTokens,
						stream: false,
					}),
					signal: controller.signal,
				})
			} finally {
				clearTimeout(timeoutId)
			}

			if (!response.ok) {
				const detail = await this.readErrorDetail(response)
				throw new ProviderCallError(`${this.name} API error: ${detail}`, {
					statusCode: response.status,
				})
			}

			const parsed = completionSchema.safeParse(await response.json())
			const content = parsed.success ? parsed.data.choices?.[0]?.message.content : undefined

			if (!parsed.success || !parsed.data.choices || parsed.data.choices.length === 0) {
				throw new ProviderCallError(`No response choices returned from ${this.name}`)
			}

			const text = (content ?? "").trim()
			if (!text) {
				throw new ProviderCallError(`Empty completion returned from ${this.name}`)
			}

			return text
		} catch (error) {
			// Handle timeout
			if (error instanceof Error && error.name === "AbortError") {
				throw new ProviderCallError(`${this.name} request timed out after ${this.timeout}ms`, {
					timeout: this.timeout,
					url,
				})
			}

			// Re-throw our own errors as-is
			if (error instanceof QueryGenerationError) {
				throw error
			}

			// Handle network errors
			if (error instanceof TypeError) {
				throw new ProviderCallError(`Cannot connect to ${this.name} at ${this.baseUrl}: ${error.message}`, {
					baseUrl: this.baseUrl,
				})
			}

			throw new ProviderCallError(`Unexpected error calling ${this.name}: ${String(error)}`)
		}
	}

	private async readErrorDetail(response: Response): Promise<string> {
		const fallback = `HTTP ${response.status}`
		try {
			const body = errorBodySchema.safeParse(await response.json())
			return body.success && body.data.error.message ? body.data.error.message : fallback
		} catch {
			// Body was not JSON
			return fallback
		}
	}
}
