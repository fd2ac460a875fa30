#!/usr/bin/env node
/**
 * Command-line entry point
 *
 * Config priority:
 *   1. Environment variables (highest priority)
 *   2. config/config.local.yaml
 *   3. config/config.yaml
 *
 * Usage:
 *   DB_DATABASE=shop DB_USER=reader DB_PASSWORD=... GEMINI_API_KEY=... schema-privacy-analyzer
 *
 * Prints the report path on success; exits with status 1 on any fatal error.
 */

import * as path from "path"
import pg from "pg"
import { loadConfig } from "./config/loadConfig.js"
import { PrivacyAnalyzerError, errorMessage } from "./config.js"
import { DiagnosticLog } from "./diagnostic_log.js"
import { createLogger, type Logger } from "./logger.js"
import { createModelClient } from "./model_client.js"
import { PrivacyAnalyzer } from "./privacy_analyzer.js"
import { formatRunTimestamp } from "./report_assembler.js"
import { SchemaIntrospector, openPgSession } from "./schema_introspector.js"

// Until config is loaded there is no run log; write to stderr only
let logger: Logger = createLogger({ level: "info" })

async function main() {
	const config = loadConfig()

	const logFile = path.join(config.logging.dir, `privacy_analyzer_${formatRunTimestamp(new Date())}.log`)
	logger = createLogger({ level: config.logging.level, file: logFile })

	const { database } = config
	logger.info("Configuration loaded", {
		host: database.host,
		port: database.port,
		database: database.name,
		schema: database.schema,
		provider: config.model.provider,
		model: config.model.name,
	})

	const pool = new pg.Pool({
		host: database.host,
		port: database.port,
		database: database.name,
		user: database.user,
		password: database.password,
		max: 1,
	})
	pool.on("error", (err) => {
		logger.error("Idle database client error", { error: err.message })
	})

	try {
		const analyzer = new PrivacyAnalyzer(
			{
				introspector: new SchemaIntrospector(() => openPgSession(pool), logger, {
					databaseName: database.name,
					schema: database.schema,
					excludeTables: database.exclude_tables,
				}),
				client: createModelClient(config.model),
				logger,
				diagnostics: new DiagnosticLog(config.report.diagnostic_log),
			},
			{
				reportDir: config.report.output_dir,
				delayMs: config.throttle.delay_ms,
			},
		)

		const reportPath = await analyzer.analyze()
		console.log(`\nAnalysis complete! Report generated at: ${reportPath}`)
	} finally {
		await pool.end()
	}
}

main().catch((error) => {
	const type = error instanceof PrivacyAnalyzerError ? error.type : "unexpected"
	logger.error(`Application error: ${errorMessage(error)}`, { type })
	process.exit(1)
})
