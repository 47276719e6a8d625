/**
 * Safety Validator
 *
 * Lexical rule engine run over model output before it is returned:
 * - Relational family: strict-mode prefix, keyword denylist, injection shapes
 * - Document family: JSON shape, write methods, unsafe stages/operators
 * - Every family: system-command and file-operation indicators
 *
 * Nothing here parses the query. Matches inside string literals or comments
 * count the same as matches in code.
 */

import { findDialectFamily, type DialectFamily, type SafetyVerdict } from "./config.js"

export interface PatternRule {
	pattern: RegExp
	violation: string
}

type FamilyRules = (query: string, strict: boolean) => string[]

/**
 * Keywords rejected anywhere in a relational query (whole word, case-insensitive)
 */
export const UNSAFE_SQL_KEYWORDS = [
	// DDL
	"CREATE",
	"ALTER",
	"DROP",
	"TRUNCATE",
	// DML
	"INSERT",
	"UPDATE",
	"DELETE",
	"MERGE",
	"UPSERT",
	// DCL / TCL
	"GRANT",
	"REVOKE",
	"COMMIT",
	"ROLLBACK",
	"SAVEPOINT",
	// Procedural
	"EXEC",
	"EXECUTE",
	"CALL",
	"PROCEDURE",
	"FUNCTION",
	// Schema objects
	"INDEX",
	"TRIGGER",
	"VIEW",
	"SCHEMA",
	"DATABASE",
	"USER",
	"ROLE",
	"LOGIN",
	"PASSWORD",
	// Timing / exfiltration
	"SLEEP",
	"WAITFOR",
	"BENCHMARK",
	"LOAD_FILE",
	"INTO OUTFILE",
]

/**
 * Stages, operators and methods rejected in document-store queries
 * (case-sensitive literal substring)
 */
export const UNSAFE_MONGO_OPERATIONS = [
	"$out",
	"$merge",
	"$addFields",
	"$set",
	"$unset",
	"$replaceRoot",
	"$replaceWith",
	"insertOne",
	"insertMany",
	"updateOne",
	"updateMany",
	"deleteOne",
	"deleteMany",
	"replaceOne",
	"findOneAndUpdate",
	"findOneAndDelete",
	"findOneAndReplace",
	"bulkWrite",
	"createIndex",
	"dropIndex",
]

const MONGO_WRITE_METHODS = [
	"INSERTONE",
	"INSERTMANY",
	"UPDATEONE",
	"UPDATEMANY",
	"DELETEONE",
	"DELETEMANY",
]

const SQL_INJECTION_RULES: PatternRule[] = [
	{ pattern: /;\s*(DROP|DELETE|INSERT|UPDATE)/i, violation: "Potential SQL injection pattern detected" },
	{ pattern: /UNION\s+ALL\s+SELECT/i, violation: "Potential SQL injection pattern detected" },
	{ pattern: /--\s*\w+/i, violation: "Potential SQL injection pattern detected" },
	{ pattern: /\/\*.*?\*\//is, violation: "Potential SQL injection pattern detected" },
]

const SYSTEM_COMMAND_RULES: PatternRule[] = [
	{ pattern: /xp_cmdshell/i, violation: "System command detected" },
	{ pattern: /sp_executesql/i, violation: "System command detected" },
	{ pattern: /eval\s*\(/i, violation: "System command detected" },
	{ pattern: /exec\s*\(/i, violation: "System command detected" },
	{ pattern: /system\s*\(/i, violation: "System command detected" },
	{ pattern: /\bos\./i, violation: "System command detected" },
	{ pattern: /import\s+os/i, violation: "System command detected" },
	{ pattern: /subprocess/i, violation: "System command detected" },
]

const FILE_OPERATION_RULES: PatternRule[] = [
	{ pattern: /LOAD_FILE/i, violation: "File operation detected" },
	{ pattern: /INTO\s+OUTFILE/i, violation: "File operation detected" },
	{ pattern: /LOAD\s+DATA/i, violation: "File operation detected" },
	{ pattern: /SELECT\s+.*\s+INTO\s+DUMPFILE/i, violation: "File operation detected" },
]

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

const KEYWORD_PATTERNS = UNSAFE_SQL_KEYWORDS.map((keyword) => ({
	keyword,
	pattern: new RegExp(`\\b${escapeRegExp(keyword)}\\b`, "i"),
}))

function applyRules(query: string, rules: PatternRule[]): string[] {
	return rules.filter((rule) => rule.pattern.test(query)).map((rule) => rule.violation)
}

function validateSQLQuery(query: string, strict: boolean): string[] {
	const violations: string[] = []

	if (strict) {
		const head = query.trim().toUpperCase()
		if (!head.startsWith("SELECT") && !head.startsWith("WITH")) {
			violations.push("Only SELECT statements allowed in strict mode")
		}
	}

	for (const { keyword, pattern } of KEYWORD_PATTERNS) {
		if (pattern.test(query)) {
			violations.push(`Unsafe SQL keyword detected: ${keyword}`)
		}
	}

	violations.push(...applyRules(query, SQL_INJECTION_RULES))

	return violations
}

// Write operations are rejected regardless of strict mode
function validateMongoQuery(query: string, _strict: boolean): string[] {
	const violations: string[] = []
	const trimmed = query.trim()

	if (trimmed.startsWith("[") || trimmed.startsWith("{")) {
		try {
			JSON.parse(trimmed)
		} catch {
			violations.push("Invalid MongoDB query format")
		}
	} else {
		const upper = query.toUpperCase()
		if (MONGO_WRITE_METHODS.some((method) => upper.includes(method))) {
			violations.push("MongoDB write operations not allowed in strict mode")
		}
	}

	for (const operation of UNSAFE_MONGO_OPERATIONS) {
		if (query.includes(operation)) {
			violations.push(`Unsafe MongoDB operation detected: ${operation}`)
		}
	}

	return violations
}

const FAMILY_RULES: Record<DialectFamily, FamilyRules> = {
	relational: validateSQLQuery,
	document: validateMongoQuery,
}

/**
 * Validate a cleaned query for the given dialect.
 * Unknown dialect labels get the relational rule set.
 */
export function validateSafety(query: string, dialect: string, strict: boolean = true): SafetyVerdict {
	if (!query || !query.trim()) {
		return { isSafe: false, violations: ["Empty query"] }
	}

	const family = findDialectFamily(dialect) ?? "relational"

	const violations = [
		...FAMILY_RULES[family](query, strict),
		...applyRules(query, SYSTEM_COMMAND_RULES),
		...applyRules(query, FILE_OPERATION_RULES),
	]

	return { isSafe: violations.length === 0, violations }
}
