/**
 * Unified config loader for QueryForge.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml
 *
 * Missing keys fall back to the defaults declared in the schema below, so a
 * process without any YAML still gets a complete, validated config.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import { ConfigError, DEFAULTS, DIALECT_LABELS } from "../config.js"

// ── Schema ───────────────────────────────────────────────────────────

const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR"] as const

export const configSchema = z
	.object({
		provider: z
			.object({
				name: z.string().min(1).default("OpenAI"),
				base_url: z.string().url().default("https://api.openai.com/v1"),
				api_key: z.string().default(""),
				timeout_ms: z.number().int().positive().default(30000),
				max_tokens: z.number().int().positive().default(1000),
				models: z
					.array(z.string().min(1))
					.min(1)
					.default([
						"gpt-3.5-turbo",
						"gpt-3.5-turbo-16k",
						"gpt-4",
						"gpt-4-turbo-preview",
						"gpt-4o",
						"gpt-4o-mini",
					]),
			})
			.default({}),
		model: z
			.object({
				default: z.string().min(1).default(DEFAULTS.model),
				temperature: z.number().min(0).max(2).default(DEFAULTS.temperature),
			})
			.default({}),
		generation: z
			.object({
				supported_dialects: z.array(z.enum(DIALECT_LABELS)).min(1).default([...DIALECT_LABELS]),
				row_limit_default: z.number().int().positive().default(DEFAULTS.rowLimit),
				row_limit_max: z.number().int().positive().default(DEFAULTS.rowLimitMax),
			})
			.default({}),
		storage: z
			.object({
				backend: z.enum(["file", "postgres"]).default("file"),
				dir: z.string().min(1).default("storage"),
				postgres_url: z.string().default(""),
			})
			.default({}),
		logging: z
			.object({
				level: z.preprocess(
					(v) => (typeof v === "string" ? v.toUpperCase() : v),
					z.enum(LOG_LEVELS),
				).default("INFO"),
			})
			.default({}),
	})
	.superRefine((cfg, ctx) => {
		if (cfg.generation.row_limit_default > cfg.generation.row_limit_max) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["generation", "row_limit_default"],
				message: `Row limit default cannot exceed maximum (${cfg.generation.row_limit_max})`,
			})
		}
		if (cfg.storage.backend === "postgres" && !cfg.storage.postgres_url) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["storage", "postgres_url"],
				message: "postgres backend requires storage.postgres_url (or DATABASE_URL)",
			})
		}
	})

export type QueryForgeConfig = z.infer<typeof configSchema>
export type LogLevel = (typeof LOG_LEVELS)[number]

// ── YAML Loading ─────────────────────────────────────────────────────

type ConfigRecord = Record<string, unknown>

function isRecord(value: unknown): value is ConfigRecord {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): ConfigRecord {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed = yaml.load(raw)
	return isRecord(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: ConfigRecord, b: ConfigRecord): ConfigRecord {
	const result: ConfigRecord = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isRecord(left) && isRecord(right)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set or empty. */
function env(name: string): string | undefined {
	const v = process.env[name]
	return v === undefined || v === "" ? undefined : v
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}

function section(cfg: ConfigRecord, key: string): ConfigRecord {
	const existing = cfg[key]
	if (isRecord(existing)) return existing
	const created: ConfigRecord = {}
	cfg[key] = created
	return created
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: ConfigRecord): void {
	const p = section(cfg, "provider")
	p.name = env("PROVIDER") ?? p.name
	p.base_url = env("OPENAI_BASE_URL") ?? p.base_url
	p.api_key = env("OPENAI_API_KEY") ?? p.api_key
	p.timeout_ms = envInt("PROVIDER_TIMEOUT_MS") ?? p.timeout_ms

	const m = section(cfg, "model")
	m.default = env("MODEL_CHAT") ?? m.default
	m.temperature = envFloat("TEMPERATURE") ?? m.temperature

	const g = section(cfg, "generation")
	g.row_limit_default = envInt("ROW_LIMIT_DEFAULT") ?? g.row_limit_default

	const s = section(cfg, "storage")
	s.backend = env("STORAGE_BACKEND") ?? s.backend
	s.dir = env("STORAGE_DIR") ?? s.dir
	s.postgres_url = env("DATABASE_URL") ?? s.postgres_url

	const l = section(cfg, "logging")
	l.level = env("LOG_LEVEL") ?? l.level
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: QueryForgeConfig | null = null

export function loadConfig(): QueryForgeConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: ConfigRecord = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)

	const parsed = configSchema.safeParse(merged)
	if (!parsed.success) {
		const detail = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ")
		throw new ConfigError(`Invalid configuration: ${detail}`)
	}

	_config = parsed.data
	return _config
}

export function getConfig(): QueryForgeConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
