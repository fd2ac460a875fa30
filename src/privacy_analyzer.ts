/**
 * Privacy Analyzer
 *
 * One full run: introspect the catalog, classify each table with the model,
 * flatten the results and write the report.
 *
 * Catalog and report failures abort the run with no partial report.
 * Model failures only skip the affected table.
 */

import type { DiagnosticSink } from "./diagnostic_log.js"
import type { Logger } from "./logger.js"
import type { ModelClient } from "./model_client.js"
import type { DatabaseSchema } from "./privacy_types.js"
import { countMissingCells, flattenResults, writeReport } from "./report_assembler.js"
import { classifyTables } from "./table_classifier.js"

export interface SchemaSource {
	introspect(): Promise<DatabaseSchema>
}

export interface PrivacyAnalyzerContext {
	introspector: SchemaSource
	client: ModelClient
	logger: Logger
	diagnostics: DiagnosticSink
}

export interface PrivacyAnalyzerOptions {
	reportDir: string
	delayMs?: number
	sleep?: (ms: number) => Promise<void>
	/** Clock for the report name */
	now?: () => Date
}

export interface AnalysisSummary {
	report_path: string
	tables_total: number
	tables_classified: number
	tables_skipped: number
	rows: number
	missing_fields: number
	duration_ms: number
}

export class PrivacyAnalyzer {
	private context: PrivacyAnalyzerContext
	private options: PrivacyAnalyzerOptions

	constructor(context: PrivacyAnalyzerContext, options: PrivacyAnalyzerOptions) {
		this.context = context
		this.options = options
	}

	/**
	 * Run the analysis and return the report path.
	 */
	async analyze(): Promise<string> {
		const summary = await this.run()
		return summary.report_path
	}

	async run(): Promise<AnalysisSummary> {
		const { introspector, client, logger, diagnostics } = this.context
		const startTime = Date.now()

		logger.info("Starting database analysis", { model: client.name })

		logger.info("Extracting database schema")
		const schema = await introspector.introspect()

		logger.info("Analyzing schema with AI classifier", { tables: schema.tables.length })
		const results = await classifyTables(schema.tables, client, {
			logger,
			diagnostics,
			delayMs: this.options.delayMs,
			sleep: this.options.sleep,
		})

		logger.info("Generating Excel report")
		const rows = flattenResults(results, diagnostics)
		const reportPath = writeReport(rows, {
			outputDir: this.options.reportDir,
			databaseName: schema.database_name,
			now: this.options.now?.(),
		})

		const skipped = results.filter((r) => r.status === "skipped").length
		const summary: AnalysisSummary = {
			report_path: reportPath,
			tables_total: schema.tables.length,
			tables_classified: results.length - skipped,
			tables_skipped: skipped,
			rows: rows.length,
			missing_fields: countMissingCells(rows),
			duration_ms: Date.now() - startTime,
		}

		logger.info(`Analysis completed successfully. Report generated at: ${reportPath}`, {
			tables_classified: summary.tables_classified,
			tables_skipped: summary.tables_skipped,
			rows: summary.rows,
			missing_fields: summary.missing_fields,
		})

		return summary
	}
}
