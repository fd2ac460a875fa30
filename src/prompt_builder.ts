/**
 * Classification Prompt Builder
 *
 * Renders one table's columns into the instruction sent to the model.
 * The requested output grammar is what response_parser.ts reads back:
 *
 *   Column: email
 *   Description: ...
 *   ...
 *   Personal Information: Yes
 *   <blank line>
 *
 * Pure string construction; the same table always yields the same prompt.
 */

import {
	CLASSIFICATION_FIELDS,
	COLLECTION_METHODS,
	DATA_SOURCES,
	FIELD_LABELS,
	type ClassificationField,
	type TableSchema,
} from "./privacy_types.js"

/**
 * Placeholder shown after each label in the output template.
 * Word limits are advisory; nothing enforces them on the reply.
 */
const FIELD_HINTS: Record<ClassificationField, string> = {
	column: "[column name exactly as given]",
	description: "[clear description of the data stored in the column, max 100 words]",
	requirement_type: "[Required/Optional]",
	collection_method: `[${COLLECTION_METHODS.join("/")}]`,
	data_source: `[${DATA_SOURCES.join("/")}]`,
	primary_purpose: "[why the data is gathered, max 100 words]",
	legal_basis: "[relevant GDPR/POPIA basis, max 50 words]",
	personal_data: "[Yes/No (GDPR Article 4)]",
	personal_information: "[Yes/No (POPIA Chapter 1)]",
}

/**
 * Serialize the column list (and declared FKs) as the prompt's input block
 */
export function formatColumnsForPrompt(table: TableSchema): string {
	const columns = table.columns.map((col) => {
		const fk = table.relationships.find((r) => r.column_name === col.name)
		return {
			name: col.name,
			data_type: col.data_type,
			max_length: col.max_length,
			nullable: col.is_nullable,
			default: col.default_value,
			primary_key: col.is_primary,
			unique: col.is_unique,
			auto_increment: col.auto_increment,
			comment: col.comment || null,
			references: fk ? `${fk.referenced_table}.${fk.referenced_column}` : null,
		}
	})
	return JSON.stringify(columns, null, 2)
}

function formatOutputTemplate(): string {
	return CLASSIFICATION_FIELDS.map((field) => `${FIELD_LABELS[field]}: ${FIELD_HINTS[field]}`).join("\n")
}

export function buildClassificationPrompt(table: TableSchema): string {
	const tableComment = table.metadata.comment ? `\nTable comment: ${table.metadata.comment}` : ""
	const columnCount = table.columns.length

	return `# ROLE AND CONTEXT
You are a Data Protection and Privacy Analysis Assistant with expertise in:
- General Data Protection Regulation of the European Union (GDPR) compliance analysis
- Protection of Personal Information Act (POPIA) (South Africa) requirements
- Database structure evaluation
- Privacy policy development
- Data classification

Note: Your analysis serves as preliminary guidance and should be reviewed by qualified legal counsel.

# INPUT DATA
Table: ${table.table_name}${tableComment}
Columns (${columnCount}, JSON):
${formatColumnsForPrompt(table)}

# OUTPUT REQUIREMENTS
For each column in the input, in input order, output exactly these fields:

${formatOutputTemplate()}

## Formatting Rules
1. Each field must start on a new line.
2. No line breaks within field values.
3. Use the exact field names shown above, in the order shown.
4. One colon after each field name followed by a single space.
5. No commas or other special characters inside values.
6. Use periods or hyphens for separation where needed.
7. Separate consecutive column records with exactly one blank line.
8. Do not use markdown, headings or bullet points.
9. No additional explanations before or after the records.

## Allowed Values
- ${FIELD_LABELS.requirement_type}: Required or Optional
- ${FIELD_LABELS.collection_method}: ${COLLECTION_METHODS.join(", ")}
- ${FIELD_LABELS.data_source}: ${DATA_SOURCES.join(", ")}
- ${FIELD_LABELS.personal_data} and ${FIELD_LABELS.personal_information}: Yes or No

# ANALYSIS GUIDELINES

## Description Guidelines
- Reference common CMS/LMS table structures such as WordPress and Moodle
- Consider relationships with other visible columns and the table name
- Be specific and concise
- Focus on data content where possible and not technical aspects

## Legal Classification Guidelines
Base the analysis on:
- GDPR Article 4 definition of personal data
- POPIA Chapter 1 definition of personal information
- Purpose limitation principles
- Data minimization requirements

## Purpose Guidelines
- Link to legitimate business functions
- Demonstrate necessity
- Show proportionality
- Identify specific use cases

# OUTPUT VALIDATION
Your response must:
1. Be directly parseable using the field names
2. Contain all fields for every column
3. Follow the formatting rules exactly
4. Stay within the word limits
5. Use only the allowed values for categorical fields
`
}
