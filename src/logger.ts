/**
 * Stderr logger
 *
 * stdout is reserved for the MCP protocol, so every level goes to stderr.
 */

import type { LogLevel } from "./config/loadConfig.js"

export type LogData = Record<string, unknown>

export interface Logger {
	info: (message: string, data?: LogData) => void
	error: (message: string, data?: LogData) => void
	warn: (message: string, data?: LogData) => void
	debug: (message: string, data?: LogData) => void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	DEBUG: 10,
	INFO: 20,
	WARN: 30,
	ERROR: 40,
}

export function createLogger(
	level: LogLevel = "INFO",
	write: (line: string) => void = (line) => console.error(line),
): Logger {
	const threshold = LEVEL_ORDER[level]

	const emit = (lvl: LogLevel) => (message: string, data?: LogData) => {
		if (LEVEL_ORDER[lvl] < threshold) return
		write(data ? `[${lvl}] ${message} ${JSON.stringify(data)}` : `[${lvl}] ${message}`)
	}

	return {
		info: emit("INFO"),
		error: emit("ERROR"),
		warn: emit("WARN"),
		debug: emit("DEBUG"),
	}
}

/** Logger that drops everything (tests, scripts). */
export const silentLogger: Logger = {
	info: () => {},
	error: () => {},
	warn: () => {},
	debug: () => {},
}
