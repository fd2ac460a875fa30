/**
 * Unified config loader for the privacy analyzer.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml
 *
 * The merged result is validated before any work starts; a missing
 * credential or connection value is a configuration error.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import {
	DATABASE_DEFAULTS,
	MODEL_CONFIG,
	OUTPUT_CONFIG,
	PrivacyAnalyzerError,
	THROTTLE_CONFIG,
} from "../config.js"

// ── Schema ───────────────────────────────────────────────────────────

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const

export const configSchema = z.object({
	database: z.object({
		host: z.string().min(1).default(DATABASE_DEFAULTS.host),
		port: z.number().int().positive().default(DATABASE_DEFAULTS.port),
		name: z.string({ required_error: "DB_DATABASE is not set" }).min(1),
		user: z.string({ required_error: "DB_USER is not set" }).min(1),
		password: z.string({ required_error: "DB_PASSWORD is not set" }),
		schema: z.string().min(1).default(DATABASE_DEFAULTS.schema),
		exclude_tables: z.array(z.string()).default([]),
	}),
	model: z
		.object({
			provider: z.enum(["gemini", "ollama"]).default(MODEL_CONFIG.defaultProvider),
			name: z.string().min(1).default(MODEL_CONFIG.defaultModel),
			api_key: z.string().optional(),
			gemini_url: z.string().url().default(MODEL_CONFIG.geminiBaseUrl),
			ollama_url: z.string().url().default(MODEL_CONFIG.ollamaBaseUrl),
			timeout_ms: z.number().int().positive().default(MODEL_CONFIG.timeoutMs),
		})
		.superRefine((model, ctx) => {
			if (model.provider === "gemini" && !model.api_key) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["api_key"],
					message: "GEMINI_API_KEY is not set",
				})
			}
		}),
	throttle: z
		.object({
			delay_ms: z.number().int().nonnegative().default(THROTTLE_CONFIG.delayMs),
		})
		.default({}),
	report: z
		.object({
			output_dir: z.string().min(1).default(OUTPUT_CONFIG.reportDir),
			diagnostic_log: z.string().min(1).default(OUTPUT_CONFIG.diagnosticLog),
		})
		.default({}),
	logging: z
		.object({
			level: z
				.preprocess((v) => (typeof v === "string" ? v.toLowerCase() : v), z.enum(LOG_LEVELS))
				.default("info"),
			dir: z.string().min(1).default(OUTPUT_CONFIG.logDir),
		})
		.default({}),
})

export type PrivacyAnalyzerConfig = z.infer<typeof configSchema>
export type LogLevel = (typeof LOG_LEVELS)[number]

// ── YAML Loading ─────────────────────────────────────────────────────

type RawConfig = Record<string, unknown>

function isPlainObject(value: unknown): value is RawConfig {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): RawConfig {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	let parsed: unknown
	try {
		parsed = yaml.load(raw)
	} catch (error) {
		throw new PrivacyAnalyzerError(
			"configuration",
			`Cannot parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
		)
	}
	return isPlainObject(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: RawConfig, b: RawConfig): RawConfig {
	const result: RawConfig = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isPlainObject(right) && isPlainObject(left)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set or empty. */
function env(name: string): string | undefined {
	const v = process.env[name]
	return v === undefined || v === "" ? undefined : v
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}

/** Get (or create) a nested section of the raw config. */
function section(cfg: RawConfig, key: string): RawConfig {
	const existing = cfg[key]
	if (isPlainObject(existing)) return existing
	const created: RawConfig = {}
	cfg[key] = created
	return created
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: RawConfig): void {
	// database
	const db = section(cfg, "database")
	db.host = env("DB_HOST") ?? db.host
	db.port = envInt("DB_PORT") ?? db.port
	db.name = env("DB_DATABASE") ?? env("DB_NAME") ?? db.name
	db.user = env("DB_USER") ?? db.user
	db.password = env("DB_PASSWORD") ?? db.password
	db.schema = env("DB_SCHEMA") ?? db.schema

	// model
	const m = section(cfg, "model")
	m.provider = env("MODEL_PROVIDER") ?? m.provider
	m.name = env("LLM_MODEL") ?? m.name
	m.api_key = env("GEMINI_API_KEY") ?? m.api_key
	m.gemini_url = env("GEMINI_BASE_URL") ?? m.gemini_url
	m.ollama_url = env("OLLAMA_BASE_URL") ?? m.ollama_url
	m.timeout_ms = envInt("MODEL_TIMEOUT_MS") ?? m.timeout_ms

	// throttle
	const t = section(cfg, "throttle")
	t.delay_ms = envInt("REQUEST_DELAY_MS") ?? t.delay_ms

	// report
	const r = section(cfg, "report")
	r.output_dir = env("REPORT_DIR") ?? r.output_dir
	r.diagnostic_log = env("DIAGNOSTIC_LOG") ?? r.diagnostic_log

	// logging
	const l = section(cfg, "logging")
	l.level = env("LOG_LEVEL") ?? l.level
	l.dir = env("LOG_DIR") ?? l.dir
}

// ── Validation ───────────────────────────────────────────────────────

function validate(raw: RawConfig): PrivacyAnalyzerConfig {
	const parsed = configSchema.safeParse(raw)
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
		throw new PrivacyAnalyzerError(
			"configuration",
			`Invalid configuration: ${issues.join("; ")}`,
			false,
			{ issues },
		)
	}
	return parsed.data
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: PrivacyAnalyzerConfig | null = null

export function loadConfig(): PrivacyAnalyzerConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: RawConfig = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)
	_config = validate(merged)
	return _config
}

export function getConfig(): PrivacyAnalyzerConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
