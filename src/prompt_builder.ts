/**
 * Prompt Builder
 *
 * Renders the system and user blocks sent to the chat model. Line order and
 * wording are what the model is tuned against; keep them stable.
 */

import { DEFAULTS, findDialectFamily, type DialectFamily } from "./config.js"
import type { ChatMessage } from "./llm_client.js"

export interface PromptInput {
	question: string
	dialect: string
	schema?: string | null
	strict?: boolean
	rowLimit?: number
}

export interface RenderedPrompt {
	readonly system: string
	readonly user: string
}

const SYSTEM_PROMPT = `You are QueryForge, a professional SQL/NoSQL query generator.

CRITICAL RULES:
1. Generate ONLY the requested query - no explanations, markdown, or extra text
2. Return valid, executable SQL/MongoDB aggregation pipelines
3. Use proper syntax for the specified database type
4. Include appropriate JOINs for related tables when needed
5. Always add LIMIT clauses to prevent excessive data retrieval
6. Use parameterized query patterns when possible
7. Optimize for performance and readability

SAFETY REQUIREMENTS:
- In strict mode, generate ONLY SELECT statements
- Never generate DDL (CREATE, DROP, ALTER) or DML (INSERT, UPDATE, DELETE) unless explicitly requested
- Avoid system functions and administrative operations
- Use proper escaping for string literals

QUALITY STANDARDS:
- Use consistent formatting and indentation
- Include meaningful column aliases
- Use appropriate aggregate functions
- Handle NULL values appropriately
- Follow database-specific best practices`

const FAMILY_INSTRUCTIONS: Record<DialectFamily, (dialect: string) => string[]> = {
	document: () => [
		"Generate a MongoDB aggregation pipeline as a JSON array.",
		"Use proper MongoDB operators and syntax.",
		"Include $limit stage at the end.",
	],
	relational: (dialect) => [
		`Generate a ${dialect} query.`,
		"Use appropriate SQL dialect features.",
		"Include LIMIT/TOP clause for row limiting.",
		"Use proper JOIN syntax when accessing multiple tables.",
	],
}

export function buildSystemPrompt(): string {
	return SYSTEM_PROMPT
}

export function buildUserPrompt(input: PromptInput): string {
	const { question, dialect, schema, strict = true } = input
	const rowLimit = input.rowLimit ?? DEFAULTS.rowLimit

	const parts = [`Database Type: ${dialect}`, `Question: ${question}`]

	const schemaText = schema?.trim()
	if (schemaText) {
		parts.push("", "Database Schema:", schemaText)
	}

	const mode = strict ? "strict mode (SELECT-only)" : "flexible mode"
	parts.push("", `Mode: ${mode}`, `Row Limit: ${rowLimit}`)

	const family = findDialectFamily(dialect)
	if (family) {
		parts.push("", ...FAMILY_INSTRUCTIONS[family](dialect))
	}

	parts.push("", "Return ONLY the query without any explanation or formatting.")

	return parts.join("\n")
}

export function buildPrompt(input: PromptInput): RenderedPrompt {
	return Object.freeze({
		system: buildSystemPrompt(),
		user: buildUserPrompt(input),
	})
}

export function toChatMessages(prompt: RenderedPrompt): ChatMessage[] {
	return [
		{ role: "system", content: prompt.system },
		{ role: "user", content: prompt.user },
	]
}
