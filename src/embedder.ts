/**
 * Embedder
 *
 * Maps chunk and question text to dense vectors through an external service.
 * Batches are sent with bounded parallelism; results are put back in input
 * order before anything downstream sees them.
 */

import { EmbeddingServiceError, Text2SQLError, errorMessage } from "./errors.js"
import type { Logger } from "./logger.js"

export interface EmbeddingService {
	embed(text: string): Promise<number[]>
	embedBatch(texts: string[]): Promise<number[][]>
}

export interface EmbedderOptions {
	batchSize: number
	concurrency: number
	/** Expected vector length; null accepts whatever the first response returns */
	dimensions: number | null
}

export class Embedder implements EmbeddingService {
	private dimensions: number | null

	constructor(
		private service: EmbeddingService,
		private options: EmbedderOptions,
		private logger: Logger,
	) {
		this.dimensions = options.dimensions
	}

	get dimension(): number | null {
		return this.dimensions
	}

	async embed(text: string): Promise<number[]> {
		let vector: number[]
		try {
			vector = await this.service.embed(text)
		} catch (error) {
			throw asEmbeddingError(error)
		}
		this.checkVector(vector, 0)
		return vector
	}

	async embedBatch(texts: string[]): Promise<number[][]> {
		if (texts.length === 0) return []
		const startTime = Date.now()
		const { batchSize, concurrency } = this.options

		const batches: { start: number; texts: string[] }[] = []
		for (let start = 0; start < texts.length; start += batchSize) {
			batches.push({ start, texts: texts.slice(start, start + batchSize) })
		}

		const results: number[][] = new Array(texts.length)
		let next = 0
		let failed = false

		const worker = async (): Promise<void> => {
			try {
				await drain()
			} catch (error) {
				failed = true
				throw error
			}
		}

		const drain = async (): Promise<void> => {
			while (!failed && next < batches.length) {
				const batch = batches[next++]
				let vectors: number[][]
				try {
					vectors = await this.service.embedBatch(batch.texts)
				} catch (error) {
					throw asEmbeddingError(error, { batch_start: batch.start })
				}
				if (vectors.length !== batch.texts.length) {
					throw new EmbeddingServiceError(
						`Expected ${batch.texts.length} vectors, got ${vectors.length}`,
						false,
						{ batch_start: batch.start },
					)
				}
				vectors.forEach((vector, i) => {
					this.checkVector(vector, batch.start + i)
					results[batch.start + i] = vector
				})
			}
		}

		const workers = Array.from({ length: Math.min(concurrency, batches.length) }, () => worker())
		await Promise.all(workers)

		this.logger.debug("Embedded batch", {
			texts: texts.length,
			batches: batches.length,
			latency_ms: Date.now() - startTime,
		})
		return results
	}

	private checkVector(vector: number[], index: number): void {
		if (vector.length === 0) {
			throw new EmbeddingServiceError(`Empty embedding for input ${index}`, false, { index })
		}
		if (!vector.every((v) => Number.isFinite(v))) {
			throw new EmbeddingServiceError(`Non-finite value in embedding for input ${index}`, false, { index })
		}
		if (this.dimensions === null) {
			this.dimensions = vector.length
		} else if (vector.length !== this.dimensions) {
			throw new EmbeddingServiceError(
				`Embedding dimension mismatch: expected ${this.dimensions}, got ${vector.length}`,
				false,
				{ index },
			)
		}
	}
}

function asEmbeddingError(error: unknown, context?: Record<string, unknown>): Text2SQLError {
	if (error instanceof EmbeddingServiceError) return error
	return new EmbeddingServiceError(`Embedding failed: ${errorMessage(error)}`, true, context)
}

// ============================================================================
// Vector Math
// ============================================================================

export function cosineSimilarity(a: number[], b: number[]): number {
	if (a.length !== b.length) return 0
	let dot = 0
	let normA = 0
	let normB = 0
	for (let i = 0; i < a.length; i++) {
		dot += a[i] * b[i]
		normA += a[i] * a[i]
		normB += b[i] * b[i]
	}
	if (normA === 0 || normB === 0) return 0
	return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}
