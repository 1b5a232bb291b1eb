/**
 * Ollama HTTP Client
 *
 * Talks to an Ollama-compatible inference server for both services the
 * pipeline treats as opaque:
 * - Language model: POST /api/generate (prompt -> text)
 * - Embedding model: POST /api/embed (texts -> vectors)
 *
 * Every call has its own AbortController timeout.
 */

import { z } from "zod"
import type { EmbeddingService } from "./embedder.js"
import { EmbeddingServiceError, LanguageModelError, errorMessage } from "./errors.js"
import type { Logger } from "./logger.js"

export interface GenerateOptions {
	temperature: number
	maxTokens: number
	/** Per-call timeout; falls back to the client default */
	timeoutMs?: number
}

export interface LanguageModel {
	generate(prompt: string, options: GenerateOptions): Promise<string>
}

export interface OllamaClientConfig {
	baseUrl: string
	llmModel: string
	embeddingModel: string
	timeoutMs: number
	embedTimeoutMs: number
}

const generateResponse = z.object({
	response: z.string(),
	done: z.boolean().optional(),
	eval_count: z.number().optional(),
})

const embedResponse = z.object({
	embeddings: z.array(z.array(z.number())),
})

class RequestTimeout extends Error {
	constructor(public timeoutMs: number) {
		super(`Request timed out after ${timeoutMs}ms`)
		this.name = "RequestTimeout"
	}
}

class HttpStatusError extends Error {
	constructor(
		public status: number,
		public body: string,
	) {
		super(`HTTP ${status}: ${body}`)
		this.name = "HttpStatusError"
	}
}

export class OllamaClient implements LanguageModel, EmbeddingService {
	private baseUrl: string

	constructor(
		private config: OllamaClientConfig,
		private logger: Logger,
	) {
		this.baseUrl = config.baseUrl.replace(/\/+$/, "")
	}

	get embeddingModel(): string {
		return this.config.embeddingModel
	}

	/**
	 * POST JSON with a timeout; returns the parsed JSON body.
	 */
	private async postJson(endpoint: string, body: unknown, timeoutMs: number): Promise<unknown> {
		const url = `${this.baseUrl}${endpoint}`
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

		try {
			const response = await fetch(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					Accept: "application/json",
				},
				body: JSON.stringify(body),
				signal: controller.signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new HttpStatusError(response.status, errorText)
			}

			const data: unknown = await response.json()
			return data
		} catch (error) {
			if (error instanceof Error && error.name === "AbortError") {
				throw new RequestTimeout(timeoutMs)
			}
			throw error
		} finally {
			clearTimeout(timeoutId)
		}
	}

	/**
	 * Generate text from a prompt
	 */
	async generate(prompt: string, options: GenerateOptions): Promise<string> {
		const timeoutMs = options.timeoutMs ?? this.config.timeoutMs
		const startTime = Date.now()

		let data: unknown
		try {
			data = await this.postJson(
				"/api/generate",
				{
					model: this.config.llmModel,
					prompt,
					stream: false,
					options: {
						temperature: options.temperature,
						num_predict: options.maxTokens,
					},
				},
				timeoutMs,
			)
		} catch (error) {
			if (error instanceof RequestTimeout) {
				throw new LanguageModelError(`Language model request timed out after ${timeoutMs}ms`, true, {
					model: this.config.llmModel,
				})
			}
			if (error instanceof HttpStatusError) {
				throw new LanguageModelError(`Language model returned error: ${error.status} ${error.body}`, false, {
					status: error.status,
				})
			}
			throw new LanguageModelError(`Cannot reach language model at ${this.baseUrl}: ${errorMessage(error)}`, false, {
				base_url: this.baseUrl,
			})
		}

		const parsed = generateResponse.safeParse(data)
		if (!parsed.success) {
			throw new LanguageModelError("Language model returned an unexpected response shape", false, {
				issue: parsed.error.issues[0].message,
			})
		}

		this.logger.debug("Language model call complete", {
			model: this.config.llmModel,
			latency_ms: Date.now() - startTime,
			output_chars: parsed.data.response.length,
		})
		return parsed.data.response
	}

	async embed(text: string): Promise<number[]> {
		const [vector] = await this.embedBatch([text])
		return vector
	}

	/**
	 * Embed texts in one request; output order matches input order.
	 */
	async embedBatch(texts: string[]): Promise<number[][]> {
		if (texts.length === 0) return []
		const timeoutMs = this.config.embedTimeoutMs

		let data: unknown
		try {
			data = await this.postJson("/api/embed", { model: this.config.embeddingModel, input: texts }, timeoutMs)
		} catch (error) {
			if (error instanceof RequestTimeout) {
				throw new EmbeddingServiceError(`Embedding request timed out after ${timeoutMs}ms`, true, {
					model: this.config.embeddingModel,
					batch_size: texts.length,
				})
			}
			if (error instanceof HttpStatusError) {
				throw new EmbeddingServiceError(`Embedding service returned error: ${error.status} ${error.body}`, error.status >= 500, {
					status: error.status,
				})
			}
			throw new EmbeddingServiceError(`Cannot reach embedding service at ${this.baseUrl}: ${errorMessage(error)}`, true, {
				base_url: this.baseUrl,
			})
		}

		const parsed = embedResponse.safeParse(data)
		if (!parsed.success) {
			throw new EmbeddingServiceError("Embedding service returned an unexpected response shape", false)
		}
		if (parsed.data.embeddings.length !== texts.length) {
			throw new EmbeddingServiceError(
				`Embedding service returned ${parsed.data.embeddings.length} vectors for ${texts.length} texts`,
				false,
			)
		}
		return parsed.data.embeddings
	}

	/**
	 * Check that the server is up and both models are pulled
	 */
	async healthCheck(): Promise<boolean> {
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), 5000)
		try {
			const response = await fetch(`${this.baseUrl}/api/tags`, { signal: controller.signal })
			if (!response.ok) return false
			const body: unknown = await response.json()
			const parsed = z.object({ models: z.array(z.object({ name: z.string() })) }).safeParse(body)
			if (!parsed.success) return false
			const names = parsed.data.models.map((m) => m.name)
			const missing = [this.config.llmModel, this.config.embeddingModel].filter(
				(m) => !names.includes(m) && !names.includes(`${m}:latest`),
			)
			if (missing.length > 0) {
				this.logger.warn("Models not available on inference server", { missing })
				return false
			}
			return true
		} catch (error) {
			this.logger.warn("Inference server health check failed", { error: errorMessage(error) })
			return false
		} finally {
			clearTimeout(timeoutId)
		}
	}
}
