/**
 * Constants and error types for the privacy analyzer
 *
 * Includes:
 * - Model provider endpoints and defaults
 * - Run throttle and output locations
 * - PrivacyAnalyzerError (shared error type for every stage)
 */

/**
 * Model provider configuration
 *
 * Gemini is the default provider; Ollama is supported for local models.
 */
export type ModelProvider = "gemini" | "ollama"

const DEFAULT_PROVIDER: ModelProvider = "gemini"

export const MODEL_CONFIG = {
	defaultProvider: DEFAULT_PROVIDER,
	defaultModel: "gemini-1.5-flash",
	geminiBaseUrl: "https://generativelanguage.googleapis.com",
	ollamaBaseUrl: "http://localhost:11434",
	endpoints: {
		geminiGenerate: (model: string) => `/v1beta/models/${encodeURIComponent(model)}:generateContent`,
		ollamaGenerate: "/api/generate",
	},
	timeoutMs: 120000, // 2 min per table
}

/**
 * Run throttle
 *
 * Fixed wait after every model call, regardless of how long the call took.
 * Keeps a free-tier Gemini key under its requests-per-minute quota.
 */
export const THROTTLE_CONFIG = {
	delayMs: 3900,
}

/**
 * Output locations (relative to cwd)
 */
export const OUTPUT_CONFIG = {
	reportDir: "reports",
	reportSheetName: "Detailed Analysis",
	maxColumnWidth: 50,
	diagnosticLog: "logs/ai_analysis_errors.txt",
	logDir: "logs",
}

/**
 * Database defaults
 */
export const DATABASE_DEFAULTS = {
	host: "localhost",
	port: 5432,
	schema: "public",
}

/**
 * Error types
 *
 * configuration, catalog and report errors are fatal for the run.
 * model and timeout errors are recoverable: the table is skipped.
 */
export type PrivacyAnalyzerErrorType = "configuration" | "catalog" | "model" | "timeout" | "report"

export class PrivacyAnalyzerError extends Error {
	constructor(
		public type: PrivacyAnalyzerErrorType,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "PrivacyAnalyzerError"
	}
}

/**
 * Render any thrown value as a one-line message
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
