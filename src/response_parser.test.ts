import { describe, it, expect } from "vitest"
import {
	parseClassificationResponse,
	parseLine,
	matchField,
	splitBlocks,
	findMissingFields,
	RecordAccumulator,
} from "./response_parser.js"
import { createEmptyRecord, type ClassificationRecord } from "./privacy_types.js"

const ID_BLOCK = [
	"Column: id",
	"Description: primary key",
	"Data Type: Required",
	"Collection Method: SYSTEM_SET",
	"Data Source: ALL",
	"Primary Purpose: identify rows",
	"Legal Basis: necessary for contract",
	"Personal Data: No",
	"Personal Information: No",
].join("\n")

const EMAIL_BLOCK = [
	"Column: email",
	"Description: login email address of the customer",
	"Data Type: Required",
	"Collection Method: USER_PROVIDED",
	"Data Source: REGISTERED_USERS",
	"Primary Purpose: account login and order notifications",
	"Legal Basis: performance of a contract",
	"Personal Data: Yes",
	"Personal Information: Yes",
].join("\n")

const ID_RECORD: ClassificationRecord = {
	column: "id",
	description: "primary key",
	requirement_type: "Required",
	collection_method: "SYSTEM_SET",
	data_source: "ALL",
	primary_purpose: "identify rows",
	legal_basis: "necessary for contract",
	personal_data: "No",
	personal_information: "No",
}

const EMAIL_RECORD: ClassificationRecord = {
	column: "email",
	description: "login email address of the customer",
	requirement_type: "Required",
	collection_method: "USER_PROVIDED",
	data_source: "REGISTERED_USERS",
	primary_purpose: "account login and order notifications",
	legal_basis: "performance of a contract",
	personal_data: "Yes",
	personal_information: "Yes",
}

describe("parseClassificationResponse", () => {
	it("parses the single-record reply", () => {
		const records = parseClassificationResponse(ID_BLOCK)
		expect(records).toHaveLength(1)
		expect(records[0]).toEqual(ID_RECORD)
		expect(records[0]?.column).toBe("id")
		expect(records[0]?.personal_data).toBe("No")
		expect(records[0]?.personal_information).toBe("No")
	})

	it("produces one record per blank-line separated block, in order", () => {
		const records = parseClassificationResponse(`${ID_BLOCK}\n\n${EMAIL_BLOCK}\n`)
		expect(records).toEqual([ID_RECORD, EMAIL_RECORD])
	})

	it("keeps observed fields and defaults the rest when the last record is cut short", () => {
		const truncated = EMAIL_BLOCK.split("\n").slice(0, 7).join("\n")
		const records = parseClassificationResponse(`${ID_BLOCK}\n\n${truncated}`)

		expect(records).toHaveLength(2)
		expect(records[1]).toEqual({
			...EMAIL_RECORD,
			personal_data: "",
			personal_information: "",
		})
	})

	it("does not depend on field order within a block", () => {
		const shuffled = ID_BLOCK.split("\n").reverse().join("\n")
		expect(parseClassificationResponse(shuffled)).toEqual(parseClassificationResponse(ID_BLOCK))
	})

	it("splits only on the first colon-space", () => {
		const reply = ID_BLOCK.replace("Legal Basis: necessary for contract", "Legal Basis: GDPR Art. 6: consent")
		expect(parseClassificationResponse(reply)[0]?.legal_basis).toBe("GDPR Art. 6: consent")
	})

	it("keeps URLs in values intact", () => {
		const reply = ID_BLOCK.replace("Description: primary key", "Description: see https://example.com/docs")
		expect(parseClassificationResponse(reply)[0]?.description).toBe("see https://example.com/docs")
	})

	it("splits records on a repeated column label when the model drops the blank lines", () => {
		expect(parseClassificationResponse(`${ID_BLOCK}\n${EMAIL_BLOCK}`)).toEqual([ID_RECORD, EMAIL_RECORD])
	})

	it("starts a new record when the column label repeats", () => {
		const reply = "Column: first_name\nDescription: given name\nColumn: last_name\nDescription: family name"
		const records = parseClassificationResponse(reply)
		expect(records.map((r) => [r.column, r.description])).toEqual([
			["first_name", "given name"],
			["last_name", "family name"],
		])
	})

	it("ignores commentary around the records", () => {
		const reply = [
			"Sure! Here is the privacy analysis for each column of the table:",
			"",
			ID_BLOCK,
			"",
			"Let me know if you need anything else.",
		].join("\n")
		expect(parseClassificationResponse(reply)).toEqual([ID_RECORD])
	})

	it("tolerates markdown bold and list markers", () => {
		const reply = ID_BLOCK.split("\n")
			.map((line) => {
				const [label, value] = line.split(": ")
				return `- **${label}:** ${value}`
			})
			.join("\n")
		expect(parseClassificationResponse(reply)).toEqual([ID_RECORD])
	})

	it("maps label variants with extra words to the canonical field", () => {
		const reply = [
			"Column Name: phone",
			"Type: Optional",
			"Legal Basis for processing: consent",
			"Personal Information (POPIA): Yes",
		].join("\n")
		expect(parseClassificationResponse(reply)).toEqual([
			{
				...createEmptyRecord(),
				column: "phone",
				requirement_type: "Optional",
				legal_basis: "consent",
				personal_information: "Yes",
			},
		])
	})

	it("keeps the last value when a non-column label repeats", () => {
		const records = parseClassificationResponse("Personal Information: Yes\nPersonal Information: No")
		expect(records).toEqual([{ ...createEmptyRecord(), personal_information: "No" }])
	})

	it("does not split a column on a stray synonym line", () => {
		const records = parseClassificationResponse("Column: id\nColumn Type: integer\nData Type: Required")
		expect(records).toEqual([{ ...createEmptyRecord(), column: "id", requirement_type: "Required" }])
	})

	it("ignores a label-like preamble with no value", () => {
		const reply = "Here are the columns:\n\nColumn: id\nPersonal Data: No\nPersonal Information: No"
		expect(parseClassificationResponse(reply)).toEqual([
			{ ...createEmptyRecord(), column: "id", personal_data: "No", personal_information: "No" },
		])
	})

	it("does not let an empty repeat clear a value already read", () => {
		const records = parseClassificationResponse("Column: id\nLegal Basis: consent\nLegal Basis:")
		expect(records).toEqual([{ ...createEmptyRecord(), column: "id", legal_basis: "consent" }])
	})

	it("keeps a record whose column field is empty", () => {
		const records = parseClassificationResponse("Column:\nDescription: orphan description")
		expect(records).toEqual([{ ...createEmptyRecord(), description: "orphan description" }])
	})

	it("handles CRLF line endings", () => {
		const reply = [ID_BLOCK, EMAIL_BLOCK].join("\n\n").replace(/\n/g, "\r\n")
		expect(parseClassificationResponse(reply)).toEqual([ID_RECORD, EMAIL_RECORD])
	})

	it("returns an empty list for empty or unstructured replies", () => {
		expect(parseClassificationResponse("")).toEqual([])
		expect(parseClassificationResponse("\n\n   \n")).toEqual([])
		expect(parseClassificationResponse("I cannot analyze this table.")).toEqual([])
	})
})

describe("parseLine", () => {
	it("splits label and value", () => {
		expect(parseLine("Data Source: ALL")).toEqual({ label: "Data Source", value: "ALL" })
	})

	it("treats a trailing bare colon as an empty value", () => {
		expect(parseLine("Legal Basis:")).toEqual({ label: "Legal Basis", value: "" })
	})

	it("strips backticks around the value", () => {
		expect(parseLine("Column: `created_at`")).toEqual({ label: "Column", value: "created_at" })
	})

	it("returns null for lines without a separator", () => {
		expect(parseLine("No separator here")).toBeNull()
		expect(parseLine("ratio 3:1")).toBeNull()
		expect(parseLine("   ")).toBeNull()
	})
})

describe("matchField", () => {
	it("matches canonical labels case-insensitively", () => {
		expect(matchField("COLUMN")).toBe("column")
		expect(matchField("data type")).toBe("requirement_type")
		expect(matchField("Collection Method")).toBe("collection_method")
		expect(matchField("Data Source")).toBe("data_source")
		expect(matchField("Primary Purpose")).toBe("primary_purpose")
		expect(matchField("Personal Data")).toBe("personal_data")
		expect(matchField("Personal Information")).toBe("personal_information")
	})

	it("prefers the more specific field when labels overlap", () => {
		expect(matchField("Column Description")).toBe("description")
		expect(matchField("Personal Data (GDPR)")).toBe("personal_data")
		expect(matchField("Requirement Type")).toBe("requirement_type")
	})

	it("rejects unknown labels and long prose", () => {
		expect(matchField("Primary Key")).toBeNull()
		expect(matchField("Here is the analysis of each column")).toBeNull()
		expect(matchField("")).toBeNull()
	})
})

describe("splitBlocks", () => {
	it("treats whitespace-only lines as separators", () => {
		expect(splitBlocks("a: 1\n  \t\nb: 2\n\n\n\nc: 3")).toEqual(["a: 1", "b: 2", "c: 3"])
	})
})

describe("RecordAccumulator", () => {
	it("does not emit anything for a block boundary with no fields", () => {
		const acc = new RecordAccumulator()
		acc.endBlock()
		acc.endBlock()
		expect(acc.finish()).toEqual([])
	})

	it("does not share state between flushed records", () => {
		const acc = new RecordAccumulator()
		acc.set("column", "a")
		acc.set("description", "first")
		acc.set("column", "b")
		acc.set("legal_basis", "consent")
		const records = acc.finish()
		expect(records).toHaveLength(2)
		expect(records[0]).toEqual({ ...createEmptyRecord(), column: "a", description: "first" })
		expect(records[1]).toEqual({ ...createEmptyRecord(), column: "b", legal_basis: "consent" })
	})

	it("ignores an empty value when nothing has been read yet", () => {
		const acc = new RecordAccumulator()
		acc.set("column", "")
		acc.endBlock()
		expect(acc.finish()).toEqual([])
	})
})

describe("findMissingFields", () => {
	it("lists empty fields in canonical order", () => {
		const record = { ...ID_RECORD, description: "", personal_data: "" }
		expect(findMissingFields(record)).toEqual(["description", "personal_data"])
	})

	it("returns nothing for a complete record", () => {
		expect(findMissingFields(ID_RECORD)).toEqual([])
	})
})
