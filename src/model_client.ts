/**
 * Model HTTP Clients
 *
 * One prompt in, one plain-text reply out. Two providers:
 * - Gemini (generateContent REST endpoint, API key header)
 * - Ollama (local /api/generate, non-streaming)
 *
 * Every failure surfaces as a PrivacyAnalyzerError of type "model" or
 * "timeout". There are no retries; the caller decides what a failure means.
 */

import { z } from "zod"
import { MODEL_CONFIG, PrivacyAnalyzerError, errorMessage } from "./config.js"
import type { PrivacyAnalyzerConfig } from "./config/loadConfig.js"

export interface ModelClient {
	/** Provider/model label for logs */
	readonly name: string
	generate(prompt: string): Promise<string>
}

// ============================================================================
// Response Shapes
// ============================================================================

const geminiResponseSchema = z.object({
	candidates: z
		.array(
			z.object({
				content: z
					.object({
						parts: z.array(z.object({ text: z.string().optional() })).default([]),
					})
					.optional(),
				finishReason: z.string().optional(),
			}),
		)
		.default([]),
	promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
})

const ollamaResponseSchema = z.object({
	response: z.string(),
})

// ============================================================================
// Shared Transport
// ============================================================================

interface PostOptions {
	url: string
	headers: Record<string, string>
	body: unknown
	timeoutMs: number
	provider: string
}

/**
 * POST a JSON body and return the parsed JSON reply.
 */
async function postJson(options: PostOptions): Promise<unknown> {
	const { url, headers, body, timeoutMs, provider } = options
	const controller = new AbortController()
	const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

	try {
		const response = await fetch(url, {
			method: "POST",
			headers: {
				"Content-Type": "application/json",
				Accept: "application/json",
				...headers,
			},
			body: JSON.stringify(body),
			signal: controller.signal,
		})

		if (!response.ok) {
			const errorText = await response.text()
			throw new PrivacyAnalyzerError(
				"model",
				`${provider} returned error: ${response.status} ${errorText}`.trim(),
				true,
				{ statusCode: response.status, responseBody: errorText },
			)
		}

		return await response.json()
	} catch (error) {
		if (error instanceof PrivacyAnalyzerError) {
			throw error
		}

		// Handle timeout
		if (error instanceof Error && error.name === "AbortError") {
			throw new PrivacyAnalyzerError(
				"timeout",
				`${provider} request timed out after ${timeoutMs}ms`,
				true,
				{ timeout: timeoutMs },
			)
		}

		// Network errors and unreadable bodies
		throw new PrivacyAnalyzerError(
			"model",
			`Cannot reach ${provider}: ${errorMessage(error)}`,
			true,
			{ originalError: errorMessage(error) },
		)
	} finally {
		clearTimeout(timeoutId)
	}
}

function invalidReply(provider: string, detail: string): PrivacyAnalyzerError {
	return new PrivacyAnalyzerError("model", `${provider} returned an unusable reply: ${detail}`, true)
}

// ============================================================================
// Gemini
// ============================================================================

export interface GeminiClientOptions {
	apiKey: string
	model?: string
	baseUrl?: string
	timeoutMs?: number
}

export class GeminiClient implements ModelClient {
	private apiKey: string
	private model: string
	private baseUrl: string
	private timeout: number

	constructor(options: GeminiClientOptions) {
		this.apiKey = options.apiKey
		this.model = options.model || MODEL_CONFIG.defaultModel
		this.baseUrl = (options.baseUrl || MODEL_CONFIG.geminiBaseUrl).replace(/\/+$/, "")
		this.timeout = options.timeoutMs || MODEL_CONFIG.timeoutMs
	}

	get name(): string {
		return `gemini/${this.model}`
	}

	async generate(prompt: string): Promise<string> {
		const data = await postJson({
			url: `${this.baseUrl}${MODEL_CONFIG.endpoints.geminiGenerate(this.model)}`,
			headers: { "x-goog-api-key": this.apiKey },
			body: { contents: [{ role: "user", parts: [{ text: prompt }] }] },
			timeoutMs: this.timeout,
			provider: "Gemini",
		})

		const parsed = geminiResponseSchema.safeParse(data)
		if (!parsed.success) {
			throw invalidReply("Gemini", parsed.error.issues[0]?.message ?? "unexpected shape")
		}

		const blockReason = parsed.data.promptFeedback?.blockReason
		if (blockReason) {
			throw invalidReply("Gemini", `prompt blocked (${blockReason})`)
		}

		const candidate = parsed.data.candidates[0]
		const text = (candidate?.content?.parts ?? []).map((part) => part.text ?? "").join("")
		if (!text.trim()) {
			const reason = candidate?.finishReason ? ` (finish reason ${candidate.finishReason})` : ""
			throw invalidReply("Gemini", `empty reply${reason}`)
		}
		return text
	}
}

// ============================================================================
// Ollama
// ============================================================================

export interface OllamaClientOptions {
	model: string
	baseUrl?: string
	timeoutMs?: number
}

export class OllamaClient implements ModelClient {
	private model: string
	private baseUrl: string
	private timeout: number

	constructor(options: OllamaClientOptions) {
		this.model = options.model
		this.baseUrl = (options.baseUrl || MODEL_CONFIG.ollamaBaseUrl).replace(/\/+$/, "")
		this.timeout = options.timeoutMs || MODEL_CONFIG.timeoutMs
	}

	get name(): string {
		return `ollama/${this.model}`
	}

	async generate(prompt: string): Promise<string> {
		const data = await postJson({
			url: `${this.baseUrl}${MODEL_CONFIG.endpoints.ollamaGenerate}`,
			headers: {},
			body: { model: this.model, prompt, stream: false },
			timeoutMs: this.timeout,
			provider: "Ollama",
		})

		const parsed = ollamaResponseSchema.safeParse(data)
		if (!parsed.success) {
			throw invalidReply("Ollama", "missing response text")
		}
		if (!parsed.data.response.trim()) {
			throw invalidReply("Ollama", "empty reply")
		}
		return parsed.data.response
	}
}

// ============================================================================
// Factory
// ============================================================================

export function createModelClient(config: PrivacyAnalyzerConfig["model"]): ModelClient {
	switch (config.provider) {
		case "gemini":
			if (!config.api_key) {
				throw new PrivacyAnalyzerError("configuration", "GEMINI_API_KEY is not set")
			}
			return new GeminiClient({
				apiKey: config.api_key,
				model: config.name,
				baseUrl: config.gemini_url,
				timeoutMs: config.timeout_ms,
			})
		case "ollama":
			return new OllamaClient({
				model: config.name,
				baseUrl: config.ollama_url,
				timeoutMs: config.timeout_ms,
			})
	}
}
