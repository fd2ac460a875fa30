/**
 * Table Classifier
 *
 * Sequential loop over the introspected tables: prompt, one model call,
 * parse. A failed call skips the table and the run continues. A fixed
 * throttle delay follows every call, successful or not.
 */

import { THROTTLE_CONFIG, PrivacyAnalyzerError, errorMessage } from "./config.js"
import type { DiagnosticSink } from "./diagnostic_log.js"
import type { Logger } from "./logger.js"
import type { ModelClient } from "./model_client.js"
import { buildClassificationPrompt } from "./prompt_builder.js"
import { parseClassificationResponse } from "./response_parser.js"
import type { ClassifiedTable, TableClassificationResult, TableSchema } from "./privacy_types.js"

export interface ClassifyOptions {
	logger: Logger
	diagnostics: DiagnosticSink
	/** Wait after every model call (default: THROTTLE_CONFIG.delayMs) */
	delayMs?: number
	sleep?: (ms: number) => Promise<void>
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/**
 * "2 out of 3 done. Completed: 66.67%"
 */
export function formatProgress(done: number, total: number): string {
	const pct = total === 0 ? 100 : Math.round((done / total) * 10000) / 100
	return `${done} out of ${total} done. Completed: ${pct}%`
}

export async function classifyTable(table: TableSchema, client: ModelClient): Promise<ClassifiedTable> {
	const reply = await client.generate(buildClassificationPrompt(table))
	return {
		status: "classified",
		table_name: table.table_name,
		records: parseClassificationResponse(reply),
	}
}

export async function classifyTables(
	tables: readonly TableSchema[],
	client: ModelClient,
	options: ClassifyOptions,
): Promise<TableClassificationResult[]> {
	const { logger, diagnostics } = options
	const delayMs = options.delayMs ?? THROTTLE_CONFIG.delayMs
	const sleep = options.sleep ?? defaultSleep
	const results: TableClassificationResult[] = []

	for (const [index, table] of tables.entries()) {
		logger.debug("Classifying table", { table: table.table_name, columns: table.columns.length, model: client.name })

		try {
			const result = await classifyTable(table, client)
			if (result.records.length === 0) {
				logger.warn("Model reply contained no column records", { table: table.table_name })
			}
			results.push(result)
		} catch (error) {
			// Only model failures skip a table; anything else is a bug
			if (!(error instanceof PrivacyAnalyzerError && error.recoverable)) {
				throw error
			}
			const reason = errorMessage(error)
			logger.error(`Skipping table ${table.table_name}: ${reason}`, { type: error.type })
			diagnostics.append(`Table ${table.table_name} was skipped: ${reason}`)
			results.push({ status: "skipped", table_name: table.table_name, reason })
		}

		await sleep(delayMs)
		logger.info(formatProgress(index + 1, tables.length))
	}

	return results
}
