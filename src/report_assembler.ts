/**
 * Report Assembler
 *
 * Flattens per-table classification results into spreadsheet rows and
 * writes the .xlsx report. Structurally incomplete records are kept; each
 * empty field is reported to the diagnostic log.
 */

import * as fs from "fs"
import * as path from "path"
import * as XLSX from "xlsx"
import { OUTPUT_CONFIG, PrivacyAnalyzerError, errorMessage } from "./config.js"
import type { DiagnosticSink } from "./diagnostic_log.js"
import { findMissingFields } from "./response_parser.js"
import {
	CLASSIFICATION_FIELDS,
	FIELD_LABELS,
	REPORT_COLUMNS,
	type ReportRow,
	type TableClassificationResult,
} from "./privacy_types.js"

// ============================================================================
// Row Assembly
// ============================================================================

export function missingFieldMessage(label: string, tableName: string): string {
	return `Required field '${label}' for table: ${tableName} is missing from the AI analysis output.`
}

/**
 * One row per (table, record) of every classified table, in input order.
 * Skipped tables contribute no rows.
 */
export function flattenResults(
	results: readonly TableClassificationResult[],
	diagnostics: DiagnosticSink,
): ReportRow[] {
	const rows: ReportRow[] = []

	for (const result of results) {
		if (result.status !== "classified") continue

		for (const record of result.records) {
			for (const field of findMissingFields(record)) {
				diagnostics.append(missingFieldMessage(FIELD_LABELS[field], result.table_name))
			}

			rows.push({
				Table: result.table_name,
				Column: record.column,
				Description: record.description,
				"Data Type": record.requirement_type,
				"Collection Method": record.collection_method,
				"Data Source": record.data_source,
				"Primary Purpose": record.primary_purpose,
				"Legal Basis": record.legal_basis,
				"Personal Data": record.personal_data,
				"Personal Information": record.personal_information,
			})
		}
	}

	return rows
}

/** Number of empty classification cells across all rows */
export function countMissingCells(rows: readonly ReportRow[]): number {
	let count = 0
	for (const row of rows) {
		for (const field of CLASSIFICATION_FIELDS) {
			if (row[FIELD_LABELS[field]] === "") count++
		}
	}
	return count
}

// ============================================================================
// File Naming
// ============================================================================

function pad(n: number): string {
	return String(n).padStart(2, "0")
}

/**
 * Local-time stamp used in report and run-log names: YYYYMMDD_HHMMSS
 */
export function formatRunTimestamp(date: Date): string {
	const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
	const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
	return `${day}_${time}`
}

export function buildReportFilename(databaseName: string, date: Date): string {
	const safeName = databaseName.replace(/[\\/:*?"<>|\s]+/g, "_")
	return `${safeName}_privacy_analysis_${formatRunTimestamp(date)}.xlsx`
}

// ============================================================================
// Workbook
// ============================================================================

/**
 * Character widths per report column: longest cell (header included) + 2,
 * capped at OUTPUT_CONFIG.maxColumnWidth.
 */
export function computeColumnWidths(rows: readonly ReportRow[]): number[] {
	return REPORT_COLUMNS.map((column) => {
		const longest = rows.reduce((max, row) => Math.max(max, row[column].length), column.length)
		return Math.min(longest + 2, OUTPUT_CONFIG.maxColumnWidth)
	})
}

export function buildWorkbook(rows: readonly ReportRow[]): XLSX.WorkBook {
	const data: string[][] = [[...REPORT_COLUMNS], ...rows.map((row) => REPORT_COLUMNS.map((column) => row[column]))]
	const sheet = XLSX.utils.aoa_to_sheet(data)

	sheet["!cols"] = computeColumnWidths(rows).map((wch) => ({ wch }))
	sheet["!autofilter"] = {
		ref: XLSX.utils.encode_range({
			s: { r: 0, c: 0 },
			e: { r: rows.length, c: REPORT_COLUMNS.length - 1 },
		}),
	}

	const workbook = XLSX.utils.book_new()
	XLSX.utils.book_append_sheet(workbook, sheet, OUTPUT_CONFIG.reportSheetName)
	return workbook
}

export interface WriteReportOptions {
	outputDir: string
	databaseName: string
	/** Timestamp for the file name (default: now) */
	now?: Date
}

/**
 * Write the report and return its path. Any filesystem failure is a
 * fatal report error.
 */
export function writeReport(rows: readonly ReportRow[], options: WriteReportOptions): string {
	const filePath = path.join(options.outputDir, buildReportFilename(options.databaseName, options.now ?? new Date()))

	try {
		fs.mkdirSync(options.outputDir, { recursive: true })
		const buffer: Buffer = XLSX.write(buildWorkbook(rows), { type: "buffer", bookType: "xlsx" })
		fs.writeFileSync(filePath, buffer)
	} catch (error) {
		throw new PrivacyAnalyzerError("report", `Cannot write report ${filePath}: ${errorMessage(error)}`, false, {
			outputDir: options.outputDir,
		})
	}

	return filePath
}
