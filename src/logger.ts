/**
 * Structured logger shared by every component.
 *
 * Writes to stderr because stdout is reserved for the MCP protocol when the
 * server runs over stdio.
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export type LogData = Record<string, unknown>

export interface Logger {
	info(message: string, data?: LogData): void
	warn(message: string, data?: LogData): void
	error(message: string, data?: LogData): void
	debug(message: string, data?: LogData): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

export function isLogLevel(value: string): value is LogLevel {
	return value in LEVEL_ORDER
}

function write(level: LogLevel, message: string, data?: LogData): void {
	const tag = `[${level.toUpperCase()}]`
	if (data && Object.keys(data).length > 0) {
		console.error(tag, message, JSON.stringify(data))
	} else {
		console.error(tag, message)
	}
}

export function createLogger(level: LogLevel = "info"): Logger {
	const threshold = LEVEL_ORDER[level]
	const emit = (msgLevel: LogLevel) => (message: string, data?: LogData) => {
		if (LEVEL_ORDER[msgLevel] >= threshold) {
			write(msgLevel, message, data)
		}
	}
	return {
		debug: emit("debug"),
		info: emit("info"),
		warn: emit("warn"),
		error: emit("error"),
	}
}

/** Logger that drops everything (tests). */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}

/** Mask the password in a postgres connection string. */
export function redactConnectionString(connectionString: string): string {
	return connectionString.replace(/:[^:@/]+@/, ":***@")
}
