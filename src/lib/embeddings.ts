/**
 * @fileoverview Voyage AI Embeddings Client
 *
 * Multilingual order embeddings (order titles and descriptions are mostly
 * Chinese) via Voyage AI's `voyage-3` model. Caching lives one layer up in
 * {@link EmbeddingCache}; this client always calls the API.
 *
 * @module lib/embeddings
 */

import { z } from "zod"
import { EmbeddingFailedError } from "./errors"

/**
 * Voyage AI configuration.
 */
export const VOYAGE_CONFIG = {
  model: "voyage-3",
  dimensions: 1024,
  batchLimit: 128,
  baseUrl: "https://api.voyageai.com/v1",
} as const

/**
 * Anything that turns text into a fixed-width vector.
 */
export interface EmbeddingModel {
  readonly dimensions: number
  embed(text: string): Promise<number[]>
  embedBatch(texts: string[]): Promise<number[][]>
}

/**
 * Voyage AI API response schema.
 */
const voyageResponseSchema = z.object({
  object: z.literal("list"),
  data: z.array(
    z.object({
      object: z.literal("embedding"),
      index: z.number(),
      embedding: z.array(z.number()),
    })
  ),
  model: z.string(),
  usage: z.object({
    total_tokens: z.number(),
  }),
})

export class VoyageAIClient implements EmbeddingModel {
  readonly dimensions = VOYAGE_CONFIG.dimensions
  private readonly baseUrl: string

  constructor(private readonly apiKey: string) {
    if (!apiKey) {
      throw new EmbeddingFailedError("VOYAGE_API_KEY is required")
    }
    this.baseUrl = VOYAGE_CONFIG.baseUrl
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text])
    if (!embedding) {
      throw new EmbeddingFailedError("Voyage AI returned no embedding")
    }
    return embedding
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return []
    }

    if (texts.length > VOYAGE_CONFIG.batchLimit) {
      throw new EmbeddingFailedError(
        `Batch size ${texts.length} exceeds limit ${VOYAGE_CONFIG.batchLimit}`
      )
    }

    const response = await fetch(`${this.baseUrl}/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: VOYAGE_CONFIG.model,
        input: texts,
        input_type: "document",
      }),
    })

    if (!response.ok) {
      const error = await response.text()
      throw new EmbeddingFailedError(
        `Voyage AI API error (${response.status}): ${error}`
      )
    }

    const parsed = voyageResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new EmbeddingFailedError("Unexpected Voyage AI response shape")
    }

    const embeddings = [...parsed.data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding)

    if (embeddings.length !== texts.length) {
      throw new EmbeddingFailedError(
        `Expected ${texts.length} embeddings, received ${embeddings.length}`
      )
    }
    return embeddings
  }
}
