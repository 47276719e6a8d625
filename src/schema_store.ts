/**
 * Saved Schema Store
 *
 * Schemas saved by users, looked up by ID when a request names one.
 * Two backends share the SchemaStore contract:
 * - FileSchemaStore: one JSON file per schema under <dir>/schemas
 * - PgSchemaStore: a saved_schemas table in Postgres
 */

import * as fs from "fs/promises"
import * as path from "path"
import { v4 as uuidv4 } from "uuid"
import { z } from "zod"
import { InputShapeError } from "./config.js"
import type { Logger } from "./logger.js"

// ============================================================================
// Types
// ============================================================================

export const newSchemaSchema = z.object({
	id: z.string().min(1).optional(),
	name: z.string().min(1).max(100),
	databaseType: z.string().min(1),
	content: z.string().min(1),
})

export const savedSchemaSchema = newSchemaSchema.extend({
	id: z.string().min(1),
	createdAt: z.string(),
	updatedAt: z.string(),
})

export type NewSchema = z.infer<typeof newSchemaSchema>
export type SavedSchema = z.infer<typeof savedSchemaSchema>

/**
 * Lookup capability consumed by the generator
 */
export interface SchemaLookup {
	lookup(id: string): Promise<SavedSchema | null>
}

export interface SchemaStore extends SchemaLookup {
	list(): Promise<SavedSchema[]>
	save(input: NewSchema): Promise<SavedSchema>
	delete(id: string): Promise<boolean>
}

// IDs become file names; both backends keep them to a safe alphabet
const SAFE_ID = /^[A-Za-z0-9_-]{1,64}$/

function assertSafeId(id: string): void {
	if (!SAFE_ID.test(id)) {
		throw new InputShapeError(`Invalid schema ID: ${id}`)
	}
}

function byUpdatedDesc(a: SavedSchema, b: SavedSchema): number {
	return b.updatedAt.localeCompare(a.updatedAt)
}

// ============================================================================
// File backend
// ============================================================================

export class FileSchemaStore implements SchemaStore {
	private schemasDir: string
	private logger: Logger

	constructor(storageDir: string, logger: Logger) {
		this.schemasDir = path.join(storageDir, "schemas")
		this.logger = logger
	}

	private filePath(id: string): string {
		return path.join(this.schemasDir, `${id}.json`)
	}

	async save(input: NewSchema): Promise<SavedSchema> {
		const fields = newSchemaSchema.parse(input)
		const id = fields.id ?? uuidv4()
		assertSafeId(id)

		const existing = await this.lookup(id)
		const now = new Date().toISOString()
		const schema: SavedSchema = {
			id,
			name: fields.name,
			databaseType: fields.databaseType,
			content: fields.content,
			createdAt: existing?.createdAt ?? now,
			updatedAt: now,
		}

		await fs.mkdir(this.schemasDir, { recursive: true })
		await fs.writeFile(this.filePath(id), JSON.stringify(schema, null, 2), "utf-8")
		return schema
	}

	async lookup(id: string): Promise<SavedSchema | null> {
		if (!SAFE_ID.test(id)) return null
		return this.readSchema(this.filePath(id))
	}

	async list(): Promise<SavedSchema[]> {
		let entries: string[]
		try {
			entries = await fs.readdir(this.schemasDir)
		} catch (error) {
			if (isNotFound(error)) return []
			throw error
		}

		const schemas: SavedSchema[] = []
		for (const entry of entries.filter((e) => e.endsWith(".json")).sort()) {
			const schema = await this.readSchema(path.join(this.schemasDir, entry))
			if (schema) schemas.push(schema)
		}
		return schemas.sort(byUpdatedDesc)
	}

	async delete(id: string): Promise<boolean> {
		if (!SAFE_ID.test(id)) return false
		try {
			await fs.unlink(this.filePath(id))
			return true
		} catch (error) {
			if (isNotFound(error)) return false
			throw error
		}
	}

	private async readSchema(filePath: string): Promise<SavedSchema | null> {
		let raw: string
		try {
			raw = await fs.readFile(filePath, "utf-8")
		} catch (error) {
			if (isNotFound(error)) return null
			throw error
		}

		try {
			return savedSchemaSchema.parse(JSON.parse(raw))
		} catch (error) {
			this.logger.warn("Skipping unreadable schema file", {
				file: filePath,
				error: String(error),
			})
			return null
		}
	}
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT"
}

// ============================================================================
// Postgres backend
// ============================================================================

/**
 * The subset of pg's Pool/Client this store needs
 */
export interface SqlClient {
	query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>
}

const schemaRowSchema = z.object({
	id: z.string(),
	name: z.string(),
	database_type: z.string(),
	content: z.string(),
	created_at: z.coerce.date(),
	updated_at: z.coerce.date(),
})

function rowToSchema(row: unknown): SavedSchema {
	const r = schemaRowSchema.parse(row)
	return {
		id: r.id,
		name: r.name,
		databaseType: r.database_type,
		content: r.content,
		createdAt: r.created_at.toISOString(),
		updatedAt: r.updated_at.toISOString(),
	}
}

export class PgSchemaStore implements SchemaStore {
	private client: SqlClient

	constructor(client: SqlClient) {
		this.client = client
	}

	async ensureTable(): Promise<void> {
		await this.client.query(`
			CREATE TABLE IF NOT EXISTS saved_schemas (
				id TEXT PRIMARY KEY,
				name TEXT NOT NULL,
				database_type TEXT NOT NULL,
				content TEXT NOT NULL,
				created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
				updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
			)
		`)
	}

	async save(input: NewSchema): Promise<SavedSchema> {
		const fields = newSchemaSchema.parse(input)
		const id = fields.id ?? uuidv4()
		assertSafeId(id)

		const result = await this.client.query(
			`INSERT INTO saved_schemas (id, name, database_type, content)
			 VALUES ($1, $2, $3, $4)
			 ON CONFLICT (id) DO UPDATE
			 SET name = EXCLUDED.name,
			     database_type = EXCLUDED.database_type,
			     content = EXCLUDED.content,
			     updated_at = now()
			 RETURNING id, name, database_type, content, created_at, updated_at`,
			[id, fields.name, fields.databaseType, fields.content],
		)
		return rowToSchema(result.rows[0])
	}

	async lookup(id: string): Promise<SavedSchema | null> {
		if (!SAFE_ID.test(id)) return null

		const result = await this.client.query(
			`SELECT id, name, database_type, content, created_at, updated_at
			 FROM saved_schemas WHERE id = $1`,
			[id],
		)
		return result.rows.length > 0 ? rowToSchema(result.rows[0]) : null
	}

	async list(): Promise<SavedSchema[]> {
		const result = await this.client.query(
			`SELECT id, name, database_type, content, created_at, updated_at
			 FROM saved_schemas ORDER BY updated_at DESC`,
		)
		return result.rows.map(rowToSchema)
	}

	async delete(id: string): Promise<boolean> {
		const result = await this.client.query(`DELETE FROM saved_schemas WHERE id = $1`, [id])
		return (result.rowCount ?? 0) > 0
	}
}
