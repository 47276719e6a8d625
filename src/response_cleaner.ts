/**
 * Response Cleaner
 *
 * Strips markdown fences and a leading narrative prefix from model output.
 */

// Any info-string word (sql, sqlite, postgresql, tsql, json, ...) up to the line break
const OPENING_FENCE = /```[A-Za-z0-9_+-]*[ \t]*\r?\n/g
const BARE_FENCE = /```/g

// Ordered: longer phrasings first so "Here's the SQL query:" is not cut at "SQL:"
const NARRATIVE_PREFIXES = [
	"Here's the SQL query:",
	"Here's the query:",
	"The query is:",
	"Query:",
	"SQL:",
	"MongoDB:",
]

export function cleanResponse(raw: string | null | undefined): string {
	if (!raw) return ""

	let text = raw.replace(OPENING_FENCE, "").replace(BARE_FENCE, "").trim()

	const lower = text.toLowerCase()
	const prefix = NARRATIVE_PREFIXES.find((p) => lower.startsWith(p.toLowerCase()))
	if (prefix) {
		text = text.slice(prefix.length).trim()
	}

	return text
}
