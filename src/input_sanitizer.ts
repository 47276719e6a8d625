/**
 * Input Sanitizer
 *
 * Normalizes the raw question before anything else sees it, and rejects
 * questions whose shape is unusable or that carry statement-injection text.
 */

import { DEFAULTS } from "./config.js"

// NUL..BS, VT, FF, SO..US, DEL (tab, LF and CR survive to be collapsed below)
const CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g

/**
 * Patterns that never belong in a natural language question
 */
const QUESTION_INJECTION_PATTERNS: RegExp[] = [
	/;\s*(DROP|DELETE|INSERT|UPDATE)/i,
	/EXEC\s*\(/i,
	/xp_cmdshell/i,
	/sp_executesql/i,
]

export interface InputCheck {
	ok: boolean
	reason: string
}

/**
 * Strip control characters, cap length, collapse whitespace.
 * Total: never throws, empty input gives "".
 */
export function sanitizeInput(text: string | null | undefined): string {
	if (!text) return ""

	let cleaned = text.replace(CONTROL_CHARS, "")

	if (cleaned.length > DEFAULTS.maxInputLength) {
		cleaned = cleaned.slice(0, DEFAULTS.maxInputLength)
	}

	return cleaned.split(/\s+/).filter(Boolean).join(" ")
}

/**
 * Validate question and dialect before any prompt is built.
 * Returns the first failing reason only.
 */
export function validateInputs(question: string, dialect: string): InputCheck {
	if (!question || !question.trim()) {
		return { ok: false, reason: "Question cannot be empty" }
	}

	if (question.length > DEFAULTS.maxQuestionLength) {
		return {
			ok: false,
			reason: `Question is too long (max ${DEFAULTS.maxQuestionLength} characters)`,
		}
	}

	if (!dialect || !dialect.trim()) {
		return { ok: false, reason: "Database type must be specified" }
	}

	for (const pattern of QUESTION_INJECTION_PATTERNS) {
		if (pattern.test(question)) {
			return { ok: false, reason: "Question contains potentially unsafe content" }
		}
	}

	return { ok: true, reason: "" }
}
