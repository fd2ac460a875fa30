/**
 * Append-only diagnostic log for parse anomalies and skipped tables.
 *
 * One line per occurrence. The file accumulates across runs; nothing is
 * ever truncated.
 */

import * as fs from "fs"
import * as path from "path"

export interface DiagnosticSink {
	append(line: string): void
}

export class DiagnosticLog implements DiagnosticSink {
	private filePath: string
	private dirReady = false

	constructor(filePath: string) {
		this.filePath = filePath
	}

	append(line: string): void {
		if (!this.dirReady) {
			fs.mkdirSync(path.dirname(this.filePath), { recursive: true })
			this.dirReady = true
		}
		fs.appendFileSync(this.filePath, line.replace(/\r?\n/g, " ") + "\n")
	}
}

/** In-memory sink (tests) */
export class MemoryDiagnosticLog implements DiagnosticSink {
	readonly lines: string[] = []

	append(line: string): void {
		this.lines.push(line)
	}
}
