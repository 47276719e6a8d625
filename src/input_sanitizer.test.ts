import { describe, it, expect } from "vitest"
import { sanitizeInput, validateInputs } from "./input_sanitizer.js"

describe("sanitizeInput", () => {
	it("returns empty string for empty or missing input", () => {
		expect(sanitizeInput("")).toBe("")
		expect(sanitizeInput(undefined)).toBe("")
		expect(sanitizeInput(null)).toBe("")
	})

	it("removes control characters without touching the rest", () => {
		expect(sanitizeInput("Hello\x00 World\x07")).toBe("Hello World")
		expect(sanitizeInput("\x7Fdeleted")).toBe("deleted")
		expect(sanitizeInput("Café naïve ünïcode")).toBe("Café naïve ünïcode")
	})

	it("drops vertical tab and form feed instead of turning them into spaces", () => {
		expect(sanitizeInput("a\x0Bb")).toBe("ab")
		expect(sanitizeInput("a\x0Cb")).toBe("ab")
	})

	it("collapses tabs, newlines and runs of spaces", () => {
		expect(sanitizeInput("  Show\tall\n\n users  ")).toBe("Show all users")
		expect(sanitizeInput("line one\r\nline two")).toBe("line one line two")
	})

	it("caps length at 2000 characters", () => {
		expect(sanitizeInput("a".repeat(2500))).toHaveLength(2000)
	})

	it("truncates before collapsing whitespace", () => {
		const input = "x".repeat(1999) + "   yz"
		expect(sanitizeInput(input)).toBe("x".repeat(1999))
	})

	it("is idempotent", () => {
		const samples = [
			"  Show\tall\n\n users  ",
			"Hello\x00 World\x07",
			"a".repeat(2500),
			"x".repeat(1999) + "   yz",
			"\x1F\x1E  \t",
			"plain question",
		]
		for (const sample of samples) {
			const once = sanitizeInput(sample)
			expect(sanitizeInput(once)).toBe(once)
		}
	})
})

describe("validateInputs", () => {
	it("accepts an ordinary question", () => {
		expect(validateInputs("Find all users who registered in the last 30 days", "PostgreSQL")).toEqual({
			ok: true,
			reason: "",
		})
	})

	it("rejects an empty or whitespace question", () => {
		expect(validateInputs("", "PostgreSQL")).toEqual({ ok: false, reason: "Question cannot be empty" })
		expect(validateInputs("   ", "PostgreSQL")).toEqual({ ok: false, reason: "Question cannot be empty" })
	})

	it("rejects questions over 1000 characters", () => {
		expect(validateInputs("a".repeat(1001), "MySQL")).toEqual({
			ok: false,
			reason: "Question is too long (max 1000 characters)",
		})
		expect(validateInputs("a".repeat(1000), "MySQL").ok).toBe(true)
	})

	it("rejects a missing dialect", () => {
		expect(validateInputs("List users", "")).toEqual({ ok: false, reason: "Database type must be specified" })
		expect(validateInputs("List users", "  ")).toEqual({ ok: false, reason: "Database type must be specified" })
	})

	it("rejects statement-injection text", () => {
		const unsafe = [
			"list users; DROP TABLE users",
			"users;delete everything",
			"run exec (something)",
			"call xp_cmdshell please",
			"use SP_EXECUTESQL here",
		]
		for (const question of unsafe) {
			expect(validateInputs(question, "MySQL")).toEqual({
				ok: false,
				reason: "Question contains potentially unsafe content",
			})
		}
	})

	it("does not flag destructive words without a statement separator", () => {
		expect(validateInputs("Delete all inactive users", "PostgreSQL").ok).toBe(true)
	})

	it("reports only the first failing reason", () => {
		expect(validateInputs("", "").reason).toBe("Question cannot be empty")
		expect(validateInputs("a".repeat(1001), "").reason).toBe("Question is too long (max 1000 characters)")
		expect(validateInputs("x; DROP TABLE t", "").reason).toBe("Database type must be specified")
	})
})
