import { describe, it, expect, vi } from "vitest"
import { classifyTables, formatProgress } from "./table_classifier.js"
import { PrivacyAnalyzerError } from "./config.js"
import { MemoryDiagnosticLog } from "./diagnostic_log.js"
import type { Logger } from "./logger.js"
import type { ModelClient } from "./model_client.js"
import type { TableSchema } from "./privacy_types.js"

function table(name: string): TableSchema {
	return {
		table_name: name,
		columns: [
			{
				name: "id",
				data_type: "integer",
				max_length: null,
				is_nullable: false,
				default_value: null,
				is_primary: true,
				is_unique: true,
				auto_increment: true,
				comment: null,
			},
		],
		relationships: [],
		metadata: {
			comment: null,
			engine: "heap",
			persistence: "permanent",
			estimated_rows: 0,
			last_analyzed_at: null,
			last_vacuumed_at: null,
		},
	}
}

function recordingLogger() {
	const lines: string[] = []
	const logger: Logger = {
		debug: () => {},
		info: (message) => lines.push(`info: ${message}`),
		warn: (message) => lines.push(`warn: ${message}`),
		error: (message) => lines.push(`error: ${message}`),
	}
	return { logger, lines }
}

/** Replies in call order; an Error entry is thrown instead */
function scriptedClient(replies: Array<string | Error>): ModelClient & { prompts: string[] } {
	const prompts: string[] = []
	return {
		name: "fake/model",
		prompts,
		generate: async (prompt: string) => {
			prompts.push(prompt)
			const next = replies[prompts.length - 1]
			if (next === undefined) throw new Error("unexpected model call")
			if (next instanceof Error) throw next
			return next
		},
	}
}

describe("classifyTables", () => {
	it("classifies every table in order and parses the replies", async () => {
		const client = scriptedClient(["Column: id\nPersonal Data: No", "Column: email\nPersonal Data: Yes"])
		const { logger } = recordingLogger()

		const results = await classifyTables([table("users"), table("orders")], client, {
			logger,
			diagnostics: new MemoryDiagnosticLog(),
			sleep: async () => {},
		})

		expect(results.map((r) => [r.status, r.table_name])).toEqual([
			["classified", "users"],
			["classified", "orders"],
		])
		const first = results[0]
		expect(first?.status === "classified" && first.records.map((r) => r.column)).toEqual(["id"])
		expect(client.prompts[0]).toContain("Table: users")
		expect(client.prompts[1]).toContain("Table: orders")
	})

	it("skips a table whose model call fails and keeps going", async () => {
		const client = scriptedClient([
			new PrivacyAnalyzerError("model", "Gemini returned error: 500 boom", true),
			"Column: id",
		])
		const diagnostics = new MemoryDiagnosticLog()
		const { logger, lines } = recordingLogger()

		const results = await classifyTables([table("users"), table("orders")], client, {
			logger,
			diagnostics,
			sleep: async () => {},
		})

		expect(results[0]).toEqual({
			status: "skipped",
			table_name: "users",
			reason: "Gemini returned error: 500 boom",
		})
		expect(results[1]?.status).toBe("classified")
		expect(diagnostics.lines).toEqual(["Table users was skipped: Gemini returned error: 500 boom"])
		expect(lines).toContain("error: Skipping table users: Gemini returned error: 500 boom")
	})

	it("treats timeouts as skips", async () => {
		const client = scriptedClient([new PrivacyAnalyzerError("timeout", "Gemini request timed out after 10ms", true)])

		const results = await classifyTables([table("users")], client, {
			logger: recordingLogger().logger,
			diagnostics: new MemoryDiagnosticLog(),
			sleep: async () => {},
		})

		expect(results).toEqual([
			{ status: "skipped", table_name: "users", reason: "Gemini request timed out after 10ms" },
		])
	})

	it("propagates errors that are not model failures", async () => {
		const client = scriptedClient([new Error("bug")])

		await expect(
			classifyTables([table("users")], client, {
				logger: recordingLogger().logger,
				diagnostics: new MemoryDiagnosticLog(),
				sleep: async () => {},
			}),
		).rejects.toThrow("bug")
	})

	it("waits the configured delay after every call, including failures", async () => {
		const client = scriptedClient([
			"Column: a",
			new PrivacyAnalyzerError("model", "down", true),
			"Column: c",
		])
		const sleep = vi.fn(async (_ms: number) => {})

		await classifyTables([table("a"), table("b"), table("c")], client, {
			logger: recordingLogger().logger,
			diagnostics: new MemoryDiagnosticLog(),
			delayMs: 250,
			sleep,
		})

		expect(sleep.mock.calls).toEqual([[250], [250], [250]])
	})

	it("uses the default throttle when no delay is given", async () => {
		const sleep = vi.fn(async (_ms: number) => {})

		await classifyTables([table("a")], scriptedClient(["Column: a"]), {
			logger: recordingLogger().logger,
			diagnostics: new MemoryDiagnosticLog(),
			sleep,
		})

		expect(sleep).toHaveBeenCalledWith(3900)
	})

	it("logs progress after each table and warns on empty replies", async () => {
		const { logger, lines } = recordingLogger()

		await classifyTables([table("a"), table("b"), table("c")], scriptedClient(["Column: a", "nothing useful", "Column: c"]), {
			logger,
			diagnostics: new MemoryDiagnosticLog(),
			sleep: async () => {},
		})

		expect(lines).toEqual([
			"info: 1 out of 3 done. Completed: 33.33%",
			"warn: Model reply contained no column records",
			"info: 2 out of 3 done. Completed: 66.67%",
			"info: 3 out of 3 done. Completed: 100%",
		])
	})

	it("makes no calls for an empty table list", async () => {
		const client = scriptedClient([])
		const results = await classifyTables([], client, {
			logger: recordingLogger().logger,
			diagnostics: new MemoryDiagnosticLog(),
		})
		expect(results).toEqual([])
		expect(client.prompts).toEqual([])
	})
})

describe("formatProgress", () => {
	it("rounds to two decimals", () => {
		expect(formatProgress(1, 3)).toBe("1 out of 3 done. Completed: 33.33%")
		expect(formatProgress(1, 8)).toBe("1 out of 8 done. Completed: 12.5%")
	})
})
