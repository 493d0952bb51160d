/**
 * Retriever wiring - assembles the full pipeline from a RetrievalConfig
 *
 * search → hybrid ranking → optional re-ranking, fanned out over
 * reformulated queries when a completion model is available.
 */

import type { SimilaritySearch, TextCompletion } from "../types"
import { loadRetrievalConfig, type RetrievalConfig } from "../config"
import { DocumentReRanker } from "../nodes/rag/document-reranker"
import type { SemanticSimilarityFn } from "../nodes/rag/document-scorers"
import { EnhancedRetriever } from "../nodes/rag/enhanced-retriever"
import { NutritionRetriever } from "../nodes/rag/nutrition-retriever"
import { QueryReformulator } from "../nodes/rag/query-reformulator"
import { createChatCompletion } from "../completion/chat-completion"
import { createSupabaseSimilaritySearch } from "../search/supabase-similarity-search"
import type { RetrievalLogger } from "@/lib/tools/nutrition/logger"

export interface RetrieverCollaborators {
  search: SimilaritySearch
  /** Without one, reformulation is off regardless of config */
  completion?: TextCompletion
  /** Semantic signal for the re-ranker */
  similarity?: SemanticSimilarityFn
  now?: () => Date
  logger?: RetrievalLogger
}

/**
 * Builds the retriever described by `config`
 */
export function createNutritionAdvisorRetriever(
  config: RetrievalConfig,
  collaborators: RetrieverCollaborators
): EnhancedRetriever {
  const { search, completion, similarity, now, logger } = collaborators

  const reranker = config.useReranking
    ? new DocumentReRanker({
        config: {
          topNToRerank: config.rerankTopN,
          maxAgeDays: config.maxAgeDays
        },
        similarity,
        now,
        logger
      })
    : undefined

  const retriever = new NutritionRetriever({
    search,
    k: config.k,
    reranker,
    useReranking: config.useReranking,
    now,
    logger
  })

  const reformulator = completion
    ? new QueryReformulator({
        completion,
        includeOriginal: config.includeOriginal,
        logger
      })
    : undefined

  return new EnhancedRetriever({
    retriever,
    reformulator,
    maxQueries: config.maxQueries,
    useReformulation: config.useReformulation && reformulator !== undefined,
    logger
  })
}

/**
 * Production wiring: config from NUTRITION_* variables, Supabase pgvector
 * search and an OpenAI chat model for reformulation. SUPABASE_URL,
 * SUPABASE_SERVICE_ROLE_KEY and OPENAI_API_KEY are read from `env` too.
 *
 * @throws ConfigError when a variable is invalid
 */
export function createDefaultNutritionAdvisorRetriever(
  env: NodeJS.ProcessEnv = process.env
): EnhancedRetriever {
  const config = loadRetrievalConfig(env)

  const search = createSupabaseSimilaritySearch({
    limit: config.searchLimit,
    matchThreshold: config.matchThreshold,
    functionName: config.matchFunction,
    env
  })

  const completion = config.useReformulation
    ? createChatCompletion({
        model: config.model,
        timeoutMs: config.completionTimeoutMs,
        apiKey: env.OPENAI_API_KEY
      })
    : undefined

  return createNutritionAdvisorRetriever(config, { search, completion })
}
