/**
 * Run logger
 *
 * Every component takes a Logger instead of writing to the console directly.
 * Console output goes to stderr; when a file is given, each line is also
 * appended there with a timestamp.
 */

import * as fs from "fs"
import * as path from "path"
import type { LogLevel } from "./config/loadConfig.js"

export type LogData = Record<string, unknown>

export interface Logger {
	debug(message: string, data?: LogData): void
	info(message: string, data?: LogData): void
	warn(message: string, data?: LogData): void
	error(message: string, data?: LogData): void
}

export interface LoggerOptions {
	level: LogLevel
	/** Run log file; created along with its directory on first write */
	file?: string
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

function formatData(data: LogData | undefined): string {
	if (!data || Object.keys(data).length === 0) return ""
	try {
		return " " + JSON.stringify(data)
	} catch {
		return " [unserializable data]"
	}
}

export function createLogger(options: LoggerOptions): Logger {
	const threshold = LEVEL_ORDER[options.level]
	let fileReady = false

	const write = (level: LogLevel, message: string, data?: LogData) => {
		if (LEVEL_ORDER[level] < threshold) return
		const line = `${message}${formatData(data)}`
		console.error(`[${level.toUpperCase()}]`, line)

		if (options.file) {
			if (!fileReady) {
				fs.mkdirSync(path.dirname(options.file), { recursive: true })
				fileReady = true
			}
			fs.appendFileSync(options.file, `${new Date().toISOString()} - ${level.toUpperCase()} - ${line}\n`)
		}
	}

	return {
		debug: (message, data) => write("debug", message, data),
		info: (message, data) => write("info", message, data),
		warn: (message, data) => write("warn", message, data),
		error: (message, data) => write("error", message, data),
	}
}

/** Logger that drops everything (tests, dry runs). */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}
