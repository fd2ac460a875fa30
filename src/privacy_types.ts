/**
 * Privacy Analysis Types
 *
 * Defines types for:
 * - Catalog snapshots (columns, FK relationships, table metadata)
 * - Classification records parsed from model replies
 * - Per-table classification results
 * - Report rows
 */

// ============================================================================
// Catalog Snapshot Types
// ============================================================================

export interface ColumnMetadata {
	readonly name: string
	readonly data_type: string
	/** character_maximum_length; null for non-character types */
	readonly max_length: number | null
	readonly is_nullable: boolean
	readonly default_value: string | null
	readonly is_primary: boolean
	/** True for primary key and unique-constraint columns */
	readonly is_unique: boolean
	/** serial/nextval default or identity column */
	readonly auto_increment: boolean
	readonly comment: string | null
}

export interface Relationship {
	readonly constraint_name: string
	readonly column_name: string
	readonly referenced_table: string
	readonly referenced_column: string
}

export type TablePersistence = "permanent" | "unlogged" | "temporary"

export interface TableMetadata {
	readonly comment: string | null
	/** Table access method (heap for ordinary tables) */
	readonly engine: string | null
	readonly persistence: TablePersistence
	/** pg_class.reltuples; -1 when the table was never analyzed */
	readonly estimated_rows: number
	readonly last_analyzed_at: Date | null
	readonly last_vacuumed_at: Date | null
}

export interface TableSchema {
	readonly table_name: string
	readonly columns: readonly ColumnMetadata[]
	readonly relationships: readonly Relationship[]
	readonly metadata: TableMetadata
}

export interface DatabaseSchema {
	readonly database_name: string
	readonly schema_name: string
	readonly tables: readonly TableSchema[]
	readonly introspected_at: string
}

// ============================================================================
// Classification Types
// ============================================================================

export const COLLECTION_METHODS = [
	"USER_PROVIDED",
	"USER_USAGE_GENERATED",
	"SYSTEM_USAGE_GENERATED",
	"SYSTEM_SET",
	"THIRD_PARTY",
] as const

export type CollectionMethod = (typeof COLLECTION_METHODS)[number]

export const DATA_SOURCES = ["ALL", "VISITORS", "REGISTERED_USERS", "THIRD_PARTY"] as const

export type DataSource = (typeof DATA_SOURCES)[number]

/**
 * Canonical classification fields, in the order the model is asked to emit them.
 */
export const CLASSIFICATION_FIELDS = [
	"column",
	"description",
	"requirement_type",
	"collection_method",
	"data_source",
	"primary_purpose",
	"legal_basis",
	"personal_data",
	"personal_information",
] as const

export type ClassificationField = (typeof CLASSIFICATION_FIELDS)[number]

/**
 * Output labels for each canonical field. Used both in the prompt and as
 * report column headers.
 */
export const FIELD_LABELS = {
	column: "Column",
	description: "Description",
	requirement_type: "Data Type",
	collection_method: "Collection Method",
	data_source: "Data Source",
	primary_purpose: "Primary Purpose",
	legal_basis: "Legal Basis",
	personal_data: "Personal Data",
	personal_information: "Personal Information",
} as const satisfies Record<ClassificationField, string>

export type FieldLabel = (typeof FIELD_LABELS)[ClassificationField]

/**
 * Privacy assessment of one column as parsed from the model reply.
 *
 * Every field is a string; fields the reply omitted are "". Categorical
 * fields are not checked against COLLECTION_METHODS / DATA_SOURCES.
 */
export type ClassificationRecord = Readonly<Record<ClassificationField, string>>

export function createEmptyRecord(): Record<ClassificationField, string> {
	return {
		column: "",
		description: "",
		requirement_type: "",
		collection_method: "",
		data_source: "",
		primary_purpose: "",
		legal_basis: "",
		personal_data: "",
		personal_information: "",
	}
}

/**
 * Outcome of one model call. Skipped tables carry the reason instead of records.
 */
export interface ClassifiedTable {
	status: "classified"
	table_name: string
	records: ClassificationRecord[]
}

export interface SkippedTable {
	status: "skipped"
	table_name: string
	reason: string
}

export type TableClassificationResult = ClassifiedTable | SkippedTable

// ============================================================================
// Report Types
// ============================================================================

export type ReportColumn = "Table" | FieldLabel

export const REPORT_COLUMNS: readonly ReportColumn[] = [
	"Table",
	...CLASSIFICATION_FIELDS.map((f) => FIELD_LABELS[f]),
]

/** One spreadsheet row: a (table, classification record) pair */
export type ReportRow = Record<ReportColumn, string>
