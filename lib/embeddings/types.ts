/**
 * Types and constants for embedding generation
 */

/**
 * OpenAI embedding (1536 dimensions)
 */
export type Embedding = number[]

/**
 * Dimensions of OpenAI text-embedding-3-small
 */
export const EMBEDDING_DIMENSIONS = 1536

export const EMBEDDING_MODEL = "text-embedding-3-small" as const

export interface EmbeddingOptions {
  /** Defaults to OPENAI_API_KEY from `env` */
  apiKey?: string
  /** Default: process.env */
  env?: NodeJS.ProcessEnv
}

/**
 * Embedding generation failure
 */
export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message)
    this.name = "EmbeddingError"
  }
}
