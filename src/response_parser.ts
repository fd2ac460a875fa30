/**
 * Classification Response Parser
 *
 * Turns the model's free-text reply into ClassificationRecords.
 *
 * Grammar (requested by prompt_builder.ts, followed loosely by models):
 * - one "Label: value" per line
 * - records separated by a blank line
 *
 * Record boundaries:
 * - a blank line closes the current record
 * - a second "Column" label closes the current record and opens the next
 *   one, so replies that drop the blank lines still split per column
 *   while field order inside a record stays irrelevant
 * - any other repeated label overwrites the earlier value (last wins)
 * - an empty value opens nothing: "Here are the columns:" before the
 *   first record is commentary, not a record
 *
 * The parser never throws. Unrecognized lines are skipped; fields the
 * reply omitted stay "".
 */

import {
	CLASSIFICATION_FIELDS,
	createEmptyRecord,
	type ClassificationField,
	type ClassificationRecord,
} from "./privacy_types.js"

// ============================================================================
// Field Matching
// ============================================================================

/**
 * Label fragments per canonical field, most specific first.
 * Matching is case-insensitive substring on the label only, so
 * "Legal Basis for processing" still maps to legal_basis.
 */
const FIELD_SYNONYMS: ReadonlyArray<readonly [ClassificationField, readonly string[]]> = [
	["personal_information", ["personal information"]],
	["personal_data", ["personal data"]],
	["legal_basis", ["legal basis", "lawful basis"]],
	["data_source", ["data source", "source"]],
	["collection_method", ["collection"]],
	["primary_purpose", ["purpose"]],
	["description", ["description"]],
	["requirement_type", ["data type", "requirement", "type"]],
	["column", ["column"]],
]

/** Longer "labels" are prose that happens to contain a colon */
const MAX_LABEL_WORDS = 5

export function matchField(label: string): ClassificationField | null {
	const normalized = label.trim().toLowerCase()
	if (!normalized || normalized.split(/\s+/).length > MAX_LABEL_WORDS) return null

	for (const [field, synonyms] of FIELD_SYNONYMS) {
		if (synonyms.some((s) => normalized.includes(s))) return field
	}
	return null
}

// ============================================================================
// Line Splitting
// ============================================================================

export interface ParsedLine {
	label: string
	value: string
}

/**
 * Split one line on the first ": " into label and value.
 *
 * Bold markers and list/heading markers are dropped first. Further
 * colons stay in the value ("GDPR Art. 6: consent"). A line ending in a bare
 * colon is a label with an empty value.
 */
export function parseLine(rawLine: string): ParsedLine | null {
	const line = rawLine
		.replace(/\*\*/g, "")
		.trim()
		.replace(/^(?:[-*•]\s+|#+\s*|\d+[.)]\s+)/, "")
		.trim()
	if (!line) return null

	const sep = line.indexOf(": ")
	if (sep > 0) {
		const value = line.slice(sep + 2).trim().replace(/^`([^`]*)`$/, "$1")
		return { label: line.slice(0, sep).trim(), value }
	}
	if (line.endsWith(":") && line.length > 1) {
		return { label: line.slice(0, -1).trim(), value: "" }
	}
	return null
}

// ============================================================================
// Record State Machine
// ============================================================================

/**
 * Owns the record being filled. Each flush hands the record off and starts
 * over from a fresh empty one.
 */
export class RecordAccumulator {
	private current = createEmptyRecord()
	private observed = new Set<ClassificationField>()
	private readonly records: ClassificationRecord[] = []

	set(field: ClassificationField, value: string): void {
		if (field === "column" && this.observed.has("column")) {
			this.flush()
		}
		// Empty values never start a record nor clear a value already read
		if (value === "" && (this.observed.size === 0 || this.current[field] !== "")) {
			return
		}
		this.current[field] = value
		this.observed.add(field)
	}

	/** Block boundary: close the record if anything was seen since the last flush */
	endBlock(): void {
		if (this.observed.size > 0) {
			this.flush()
		}
	}

	finish(): ClassificationRecord[] {
		this.endBlock()
		return this.records
	}

	private flush(): void {
		this.records.push(this.current)
		this.current = createEmptyRecord()
		this.observed = new Set()
	}
}

// ============================================================================
// Entry Points
// ============================================================================

/**
 * Split a reply into blank-line separated blocks
 */
export function splitBlocks(reply: string): string[] {
	return reply
		.replace(/\r\n?/g, "\n")
		.split(/\n[ \t]*\n/)
		.map((block) => block.trim())
		.filter((block) => block.length > 0)
}

export function parseClassificationResponse(reply: string): ClassificationRecord[] {
	const accumulator = new RecordAccumulator()

	for (const block of splitBlocks(reply)) {
		for (const rawLine of block.split("\n")) {
			const parsed = parseLine(rawLine)
			if (!parsed) continue

			const field = matchField(parsed.label)
			if (!field) continue

			accumulator.set(field, parsed.value)
		}
		accumulator.endBlock()
	}

	return accumulator.finish()
}

/**
 * Fields with no value on a record, in canonical order
 */
export function findMissingFields(record: ClassificationRecord): ClassificationField[] {
	return CLASSIFICATION_FIELDS.filter((field) => record[field] === "")
}
