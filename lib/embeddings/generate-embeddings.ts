import OpenAI from "openai"

import {
  EMBEDDING_DIMENSIONS,
  EMBEDDING_MODEL,
  EmbeddingError,
  type Embedding,
  type EmbeddingOptions
} from "./types"

function createOpenAIClient(options: EmbeddingOptions): OpenAI {
  const env = options.env ?? process.env
  const apiKey = options.apiKey ?? env.OPENAI_API_KEY
  if (!apiKey) {
    throw new EmbeddingError("OPENAI_API_KEY is not set")
  }
  return new OpenAI({ apiKey })
}

function assertDimensions(embedding: Embedding): void {
  if (embedding.length !== EMBEDDING_DIMENSIONS) {
    throw new EmbeddingError(
      `Embedding has ${embedding.length} dimensions (expected: ${EMBEDDING_DIMENSIONS})`
    )
  }
}

/**
 * Generates the embedding for one text with text-embedding-3-small
 * @returns 1536-dimension vector
 * @throws EmbeddingError on empty text, missing key or an OpenAI API error
 */
export async function generateEmbedding(
  text: string,
  options: EmbeddingOptions = {}
): Promise<Embedding> {
  if (!text || text.trim().length === 0) {
    throw new EmbeddingError("Empty text passed to embedding generation")
  }

  const openai = createOpenAIClient(options)

  try {
    const response = await openai.embeddings.create({
      model: EMBEDDING_MODEL,
      input: text,
      encoding_format: "float"
    })

    if (!response.data || response.data.length === 0) {
      throw new EmbeddingError("Empty response from the OpenAI API")
    }

    const embedding = response.data[0].embedding
    assertDimensions(embedding)
    return embedding
  } catch (error) {
    // Connection errors have no status and keep their own message
    if (error instanceof OpenAI.APIError && error.status !== undefined) {
      throw new EmbeddingError(
        `OpenAI API error (${error.status}): ${error.message}`,
        error.status
      )
    }
    throw error
  }
}
