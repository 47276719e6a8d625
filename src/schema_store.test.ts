import { describe, it, expect, beforeEach, afterEach, vi } from "vitest"
import * as fs from "fs"
import * as path from "path"
import * as os from "os"
import { FileSchemaStore, PgSchemaStore, type SavedSchema, type SqlClient } from "./schema_store.js"
import { silentLogger } from "./logger.js"
import { InputShapeError } from "./config.js"

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

let tmpDir: string

beforeEach(() => {
	tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "queryforge-store-test-"))
})

afterEach(() => {
	fs.rmSync(tmpDir, { recursive: true, force: true })
})

function writeSchemaFile(schema: SavedSchema) {
	const dir = path.join(tmpDir, "schemas")
	fs.mkdirSync(dir, { recursive: true })
	fs.writeFileSync(path.join(dir, `${schema.id}.json`), JSON.stringify(schema))
}

describe("FileSchemaStore", () => {
	it("saves with a generated id and looks it up again", async () => {
		const store = new FileSchemaStore(tmpDir, silentLogger)

		const saved = await store.save({
			name: "Shop",
			databaseType: "PostgreSQL",
			content: "users(id, email, created_at)",
		})

		expect(saved.id).toMatch(UUID_V4)
		expect(saved.createdAt).toBe(saved.updatedAt)
		expect(fs.existsSync(path.join(tmpDir, "schemas", `${saved.id}.json`))).toBe(true)
		expect(await store.lookup(saved.id)).toEqual(saved)
	})

	it("overwrites by id and keeps the creation time", async () => {
		const store = new FileSchemaStore(tmpDir, silentLogger)
		writeSchemaFile({
			id: "shop",
			name: "Shop",
			databaseType: "MySQL",
			content: "orders(id)",
			createdAt: "2024-01-01T00:00:00.000Z",
			updatedAt: "2024-01-01T00:00:00.000Z",
		})

		const updated = await store.save({ id: "shop", name: "Shop v2", databaseType: "MySQL", content: "orders(id, total)" })

		expect(updated.createdAt).toBe("2024-01-01T00:00:00.000Z")
		expect(updated.updatedAt).not.toBe("2024-01-01T00:00:00.000Z")
		expect((await store.lookup("shop"))?.content).toBe("orders(id, total)")
	})

	it("lists schemas most recently updated first", async () => {
		const store = new FileSchemaStore(tmpDir, silentLogger)
		writeSchemaFile({
			id: "older",
			name: "Older",
			databaseType: "SQLite",
			content: "a(id)",
			createdAt: "2024-01-01T00:00:00.000Z",
			updatedAt: "2024-01-01T00:00:00.000Z",
		})
		writeSchemaFile({
			id: "newer",
			name: "Newer",
			databaseType: "SQLite",
			content: "b(id)",
			createdAt: "2024-01-01T00:00:00.000Z",
			updatedAt: "2024-03-01T00:00:00.000Z",
		})

		expect((await store.list()).map((s) => s.id)).toEqual(["newer", "older"])
	})

	it("skips unreadable files with a warning", async () => {
		const warn = vi.fn()
		const store = new FileSchemaStore(tmpDir, { ...silentLogger, warn })
		writeSchemaFile({
			id: "good",
			name: "Good",
			databaseType: "Oracle",
			content: "t(id)",
			createdAt: "2024-01-01T00:00:00.000Z",
			updatedAt: "2024-01-01T00:00:00.000Z",
		})
		fs.writeFileSync(path.join(tmpDir, "schemas", "broken.json"), "{not json")

		expect((await store.list()).map((s) => s.id)).toEqual(["good"])
		expect(warn).toHaveBeenCalledTimes(1)
		expect(warn.mock.calls[0][0]).toBe("Skipping unreadable schema file")
	})

	it("returns null for unknown and unsafe ids", async () => {
		const store = new FileSchemaStore(tmpDir, silentLogger)
		expect(await store.lookup("missing")).toBeNull()
		expect(await store.lookup("../../etc/passwd")).toBeNull()
	})

	it("returns an empty list before anything is saved", async () => {
		const store = new FileSchemaStore(path.join(tmpDir, "nowhere"), silentLogger)
		expect(await store.list()).toEqual([])
	})

	it("deletes and reports whether anything was removed", async () => {
		const store = new FileSchemaStore(tmpDir, silentLogger)
		const saved = await store.save({ name: "Tmp", databaseType: "MongoDB", content: "users: { _id }" })

		expect(await store.delete(saved.id)).toBe(true)
		expect(await store.delete(saved.id)).toBe(false)
		expect(await store.lookup(saved.id)).toBeNull()
	})

	it("rejects invalid schema fields", async () => {
		const store = new FileSchemaStore(tmpDir, silentLogger)
		await expect(store.save({ name: "", databaseType: "MySQL", content: "t(id)" })).rejects.toThrow()
		await expect(store.save({ name: "x".repeat(101), databaseType: "MySQL", content: "t(id)" })).rejects.toThrow()
		await expect(store.save({ name: "Bad id", databaseType: "MySQL", content: "t(id)", id: "a/b" })).rejects.toThrow(
			"Invalid schema ID: a/b",
		)
	})
})

// ── Postgres backend ──────────────────────────────────────────────────

interface RecordedQuery {
	text: string
	values?: unknown[]
}

class FakeSqlClient implements SqlClient {
	calls: RecordedQuery[] = []

	constructor(private responses: Array<{ rows: unknown[]; rowCount: number | null }> = []) {}

	async query(text: string, values?: unknown[]) {
		this.calls.push({ text, values })
		return this.responses.shift() ?? { rows: [], rowCount: 0 }
	}
}

const ROW = {
	id: "shop",
	name: "Shop",
	database_type: "PostgreSQL",
	content: "users(id)",
	created_at: new Date("2024-01-01T00:00:00.000Z"),
	updated_at: new Date("2024-02-01T00:00:00.000Z"),
}

describe("PgSchemaStore", () => {
	it("maps a row to a saved schema", async () => {
		const client = new FakeSqlClient([{ rows: [ROW], rowCount: 1 }])
		const store = new PgSchemaStore(client)

		expect(await store.lookup("shop")).toEqual({
			id: "shop",
			name: "Shop",
			databaseType: "PostgreSQL",
			content: "users(id)",
			createdAt: "2024-01-01T00:00:00.000Z",
			updatedAt: "2024-02-01T00:00:00.000Z",
		})
		expect(client.calls[0].values).toEqual(["shop"])
	})

	it("returns null when no row matches", async () => {
		const store = new PgSchemaStore(new FakeSqlClient([{ rows: [], rowCount: 0 }]))
		expect(await store.lookup("missing")).toBeNull()
	})

	it("does not query for unsafe ids", async () => {
		const client = new FakeSqlClient()
		expect(await new PgSchemaStore(client).lookup("x' OR '1'='1")).toBeNull()
		expect(client.calls).toHaveLength(0)
	})

	it("upserts with a generated id", async () => {
		const client = new FakeSqlClient([{ rows: [ROW], rowCount: 1 }])
		const store = new PgSchemaStore(client)

		await store.save({ name: "Shop", databaseType: "PostgreSQL", content: "users(id)" })

		const [call] = client.calls
		expect(call.text).toContain("ON CONFLICT (id) DO UPDATE")
		expect(call.values?.[0]).toMatch(UUID_V4)
		expect(call.values?.slice(1)).toEqual(["Shop", "PostgreSQL", "users(id)"])
	})

	it("rejects ids that lookup would not accept", async () => {
		const client = new FakeSqlClient()
		const store = new PgSchemaStore(client)

		const call = store.save({ id: "sales.v2", name: "Sales", databaseType: "PostgreSQL", content: "sales(id)" })

		await expect(call).rejects.toBeInstanceOf(InputShapeError)
		await expect(call).rejects.toThrow("Invalid schema ID: sales.v2")
		expect(client.calls).toHaveLength(0)
	})

	it("finds a schema again by the id it was saved under", async () => {
		const row = { ...ROW, id: "sales_v2" }
		const client = new FakeSqlClient([
			{ rows: [row], rowCount: 1 },
			{ rows: [row], rowCount: 1 },
		])
		const store = new PgSchemaStore(client)

		const saved = await store.save({ id: "sales_v2", name: "Shop", databaseType: "PostgreSQL", content: "users(id)" })

		expect(await store.lookup(saved.id)).toEqual(saved)
		expect(client.calls[1].values).toEqual(["sales_v2"])
	})

	it("lists in the order the database returns", async () => {
		const older = { ...ROW, id: "older" }
		const client = new FakeSqlClient([{ rows: [ROW, older], rowCount: 2 }])

		expect((await new PgSchemaStore(client).list()).map((s) => s.id)).toEqual(["shop", "older"])
		expect(client.calls[0].text).toContain("ORDER BY updated_at DESC")
	})

	it("reports deletes from the row count", async () => {
		const client = new FakeSqlClient([
			{ rows: [], rowCount: 1 },
			{ rows: [], rowCount: 0 },
		])
		const store = new PgSchemaStore(client)

		expect(await store.delete("shop")).toBe(true)
		expect(await store.delete("shop")).toBe(false)
	})

	it("creates the table idempotently", async () => {
		const client = new FakeSqlClient()
		await new PgSchemaStore(client).ensureTable()
		expect(client.calls[0].text).toContain("CREATE TABLE IF NOT EXISTS saved_schemas")
	})
})
