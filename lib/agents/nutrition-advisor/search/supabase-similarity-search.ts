/**
 * Supabase Similarity Search - pgvector search through a Postgres function
 *
 * Embeds the query with text-embedding-3-small and calls the
 * `match_nutrition_documents` RPC. Rows that do not match the expected shape
 * are skipped with a warning.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js"
import { z } from "zod"

import type { NutritionDocument, SimilaritySearch } from "../types"
import { DocumentMetadataSchema } from "../schemas/retrieval-schemas"
import { generateEmbedding } from "@/lib/embeddings/generate-embeddings"
import { withRetry } from "@/lib/tools/nutrition/error-handler"
import {
  createRetrievalLogger,
  type RetrievalLogger
} from "@/lib/tools/nutrition/logger"

// =============================================================================
// Types
// =============================================================================

export const DEFAULT_MATCH_FUNCTION = "match_nutrition_documents"

export interface MatchDocumentsArgs {
  query_embedding: number[]
  match_threshold: number
  match_count: number
}

export interface MatchDocumentsResult {
  data: unknown
  error: { message: string } | null
}

/**
 * Calls the match function; kept separate from the client so tests can
 * replace it
 */
export type MatchDocumentsFn = (
  args: MatchDocumentsArgs
) => PromiseLike<MatchDocumentsResult>

export type EmbedFn = (text: string) => Promise<number[]>

export interface SupabaseSimilaritySearchOptions {
  matchDocuments: MatchDocumentsFn
  /** Default: generateEmbedding */
  embed?: EmbedFn
  /** Rows requested per query (default: 10) */
  limit?: number
  /** Minimum cosine similarity (default: 0.5) */
  matchThreshold?: number
  /** Base delay for embedding retries (default: 1000) */
  retryDelayMs?: number
  logger?: RetrievalLogger
}

const MatchedRowSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  content: z.string(),
  metadata: DocumentMetadataSchema.nullish(),
  similarity: z.number().optional()
})

// =============================================================================
// Search
// =============================================================================

export class SupabaseSimilaritySearch implements SimilaritySearch {
  private readonly matchDocuments: MatchDocumentsFn
  private readonly embed: EmbedFn
  private readonly limit: number
  private readonly matchThreshold: number
  private readonly retryDelayMs: number
  private readonly logger: RetrievalLogger

  constructor(options: SupabaseSimilaritySearchOptions) {
    this.matchDocuments = options.matchDocuments
    this.embed = options.embed ?? (text => generateEmbedding(text))
    this.limit = options.limit ?? 10
    this.matchThreshold = options.matchThreshold ?? 0.5
    this.retryDelayMs = options.retryDelayMs ?? 1000
    this.logger = options.logger ?? createRetrievalLogger("supabase-search")
  }

  /**
   * @throws When embedding fails after retries or the RPC returns an error
   */
  async search(query: string): Promise<NutritionDocument[]> {
    const queryEmbedding = await withRetry(() => this.embed(query), {
      stage: "embedding",
      baseDelayMs: this.retryDelayMs
    })

    const { data, error } = await this.matchDocuments({
      query_embedding: queryEmbedding,
      match_threshold: this.matchThreshold,
      match_count: this.limit
    })

    if (error) {
      throw new Error(`Supabase rpc failed: ${error.message}`)
    }

    if (!Array.isArray(data)) {
      return []
    }

    const documents: NutritionDocument[] = []
    data.forEach((row: unknown, index) => {
      const parsed = MatchedRowSchema.safeParse(row)
      if (!parsed.success) {
        this.logger.warn("search_row_invalid", {
          index,
          issues: parsed.error.errors.map(e => e.message)
        })
        return
      }

      const { content, metadata, similarity } = parsed.data
      documents.push({
        content,
        metadata:
          similarity === undefined
            ? { ...metadata }
            : { ...metadata, similarity }
      })
    })

    return documents
  }
}

// =============================================================================
// Builders
// =============================================================================

/**
 * Binds the match function of a Supabase client
 */
export function createSupabaseMatchDocuments(
  client: SupabaseClient,
  functionName: string = DEFAULT_MATCH_FUNCTION
): MatchDocumentsFn {
  return async args => {
    const { data, error } = await client.rpc(functionName, args)
    return { data, error }
  }
}

/**
 * Search over the project's Supabase instance. Reads SUPABASE_URL and
 * SUPABASE_SERVICE_ROLE_KEY from `env` unless a client is passed, and
 * OPENAI_API_KEY from `env` unless an embed function is passed.
 */
export function createSupabaseSimilaritySearch(
  options: Omit<SupabaseSimilaritySearchOptions, "matchDocuments"> & {
    client?: SupabaseClient
    functionName?: string
    /** Default: process.env */
    env?: NodeJS.ProcessEnv
  } = {}
): SupabaseSimilaritySearch {
  const { client, functionName, env = process.env, ...searchOptions } =
    options

  const supabase = client ?? createDefaultClient(env)

  return new SupabaseSimilaritySearch({
    ...searchOptions,
    embed: searchOptions.embed ?? (text => generateEmbedding(text, { env })),
    matchDocuments: createSupabaseMatchDocuments(supabase, functionName)
  })
}

function createDefaultClient(env: NodeJS.ProcessEnv): SupabaseClient {
  const url = env.SUPABASE_URL
  const key = env.SUPABASE_SERVICE_ROLE_KEY
  if (!url || !key) {
    throw new Error("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set")
  }
  return createClient(url, key)
}
