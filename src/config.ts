/**
 * Configuration for the QueryForge MCP Server
 *
 * Includes types, constants, and configuration for:
 * - Supported dialects and their rule families
 * - Generation request/outcome interfaces
 * - Error taxonomy surfaced to callers
 */

/**
 * Dialect registry
 *
 * Every supported label carries a family tag. The safety validator and the
 * prompt builder pick their rule set from the family, so adding a dialect
 * within a known family is a one-line change here.
 */
export const DIALECT_LABELS = [
	"MySQL",
	"PostgreSQL",
	"SQL Server",
	"SQLite",
	"Oracle",
	"MongoDB",
] as const

export type DialectLabel = (typeof DIALECT_LABELS)[number]

export type DialectFamily = "relational" | "document"

export const DIALECT_FAMILIES: Record<DialectLabel, DialectFamily> = {
	"MySQL": "relational",
	"PostgreSQL": "relational",
	"SQL Server": "relational",
	"SQLite": "relational",
	"Oracle": "relational",
	"MongoDB": "document",
}

/**
 * Resolve a dialect label to its family (case-insensitive).
 * Returns undefined for labels outside the registry.
 */
export function findDialectFamily(dialect: string): DialectFamily | undefined {
	const wanted = dialect.trim().toLowerCase()
	const label = DIALECT_LABELS.find((l) => l.toLowerCase() === wanted)
	return label ? DIALECT_FAMILIES[label] : undefined
}

/**
 * Default values used when neither YAML nor env provide one
 */
export const DEFAULTS = {
	rowLimit: 1000,
	rowLimitMax: 50000,
	model: "gpt-3.5-turbo",
	temperature: 0.1,
	maxQuestionLength: 1000,
	maxInputLength: 2000,
}

/**
 * Request to generate a query from a natural language question
 */
export interface GenerationRequest {
	/** Natural language question */
	question: string

	/** Target dialect label, e.g. "PostgreSQL" */
	dialect: string

	/** Model to use (defaults to model.default) */
	model?: string

	/** Schema definition supplied inline; wins over schemaId when non-empty */
	schemaText?: string

	/** ID of a saved schema to look up */
	schemaId?: string

	/** Restrict output to read-only queries (default true) */
	strict?: boolean

	/** Maximum rows the query should return */
	rowLimit?: number
}

export type SchemaSource = "text" | "stored" | "none"

export interface GenerationMetadata {
	queryId: string
	dialect: string
	model: string
	rowLimit: number
	strict: boolean
	schemaSource: SchemaSource
	latencyMs: number
}

/**
 * Tagged outcome of a generation: exactly one of query or error
 */
export type GenerationOutcome =
	| { ok: true; query: string; metadata: GenerationMetadata }
	| {
			ok: false
			error: {
				kind: GenerationErrorKind
				message: string
				violations?: string[]
			}
	  }

export interface SafetyVerdict {
	isSafe: boolean
	violations: string[]
}

// ============================================================================
// Errors
// ============================================================================

export type GenerationErrorKind =
	| "input_shape"
	| "unsupported_dialect"
	| "provider_not_configured"
	| "row_limit_out_of_range"
	| "schema_not_found"
	| "provider_call"
	| "safety_violation"
	| "unknown"

export class QueryGenerationError extends Error {
	constructor(
		public kind: GenerationErrorKind,
		message: string,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "QueryGenerationError"
	}
}

export class InputShapeError extends QueryGenerationError {
	constructor(message: string) {
		super("input_shape", message)
		this.name = "InputShapeError"
	}
}

export class UnsupportedDialectError extends QueryGenerationError {
	constructor(dialect: string, supported: readonly string[]) {
		super(
			"unsupported_dialect",
			`Unsupported database type: ${dialect}. Supported: ${supported.join(", ")}`,
			{ dialect },
		)
		this.name = "UnsupportedDialectError"
	}
}

export class ProviderNotConfiguredError extends QueryGenerationError {
	constructor(providerName: string) {
		super("provider_not_configured", `${providerName} API key not configured or invalid`)
		this.name = "ProviderNotConfiguredError"
	}
}

export class RowLimitOutOfRangeError extends QueryGenerationError {
	constructor(message: string, rowLimit: number) {
		super("row_limit_out_of_range", message, { rowLimit })
		this.name = "RowLimitOutOfRangeError"
	}
}

export class SchemaNotFoundError extends QueryGenerationError {
	constructor(schemaId: string) {
		super("schema_not_found", `Schema with ID ${schemaId} not found`, { schemaId })
		this.name = "SchemaNotFoundError"
	}
}

export class ProviderCallError extends QueryGenerationError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("provider_call", message, context)
		this.name = "ProviderCallError"
	}
}

export class SafetyViolationError extends QueryGenerationError {
	constructor(public violations: string[]) {
		super("safety_violation", `Query contains unsafe operations: ${violations.join("; ")}`)
		this.name = "SafetyViolationError"
	}
}

export class UnknownError extends QueryGenerationError {
	constructor(detail: string) {
		super("unknown", `Generation error: ${detail}`)
		this.name = "UnknownError"
	}
}

/**
 * Raised by the config loader when the merged configuration is invalid
 */
export class ConfigError extends Error {
	constructor(message: string) {
		super(message)
		this.name = "ConfigError"
	}
}
