/**
 * Nutrition Retriever - hybrid retrieval over an embedding search
 *
 * Pipeline per call:
 * 1. Base similarity search (failure → empty result, logged)
 * 2. Query intent detection
 * 3. Keyword scoring + metadata boosting, sorted by hybrid score
 * 4. Optional multi-signal re-ranking
 * 5. Truncate to k
 */

import type {
  NutritionDocument,
  Reranker,
  Retriever,
  SimilaritySearch
} from "../../types"
import { detectQueryIntent } from "../../intent/query-intent"
import {
  DocumentReRanker,
  type DocumentReRankerOptions
} from "./document-reranker"
import { rankByHybridScore } from "./hybrid-scoring"
import { classifyError } from "@/lib/tools/nutrition/error-handler"
import {
  createRetrievalLogger,
  type RetrievalLogger
} from "@/lib/tools/nutrition/logger"
import {
  addRunMetadata,
  createRetrievalTraceOptions,
  traceable
} from "@/lib/monitoring/langsmith-setup"

// =============================================================================
// Types
// =============================================================================

export interface NutritionRetrieverOptions {
  /** Embedding-backed candidate search */
  search: SimilaritySearch
  /** Documents returned per call (default: 4) */
  k?: number
  reranker?: Reranker
  /** Applies `reranker` after hybrid ordering (default: true when a reranker is given) */
  useReranking?: boolean
  /** Clock for the recency boost */
  now?: () => Date
  logger?: RetrievalLogger
}

export const DEFAULT_K = 4

// =============================================================================
// Retriever
// =============================================================================

export class NutritionRetriever implements Retriever {
  readonly k: number
  readonly search: SimilaritySearch
  readonly reranker?: Reranker
  readonly useReranking: boolean
  private readonly now: () => Date
  private readonly logger: RetrievalLogger

  private readonly tracedRetrieve = traceable(
    (query: string) => this.runRetrieval(query),
    createRetrievalTraceOptions("nutrition-retriever", "similarity_search", [
      "hybrid"
    ])
  )

  constructor(options: NutritionRetrieverOptions) {
    this.search = options.search
    this.k = options.k ?? DEFAULT_K
    this.reranker = options.reranker
    this.useReranking = options.useReranking ?? options.reranker !== undefined
    this.now = options.now ?? (() => new Date())
    this.logger = options.logger ?? createRetrievalLogger("nutrition-retriever")
  }

  /**
   * Retrieves at most k documents for the query. Never rejects.
   */
  retrieve(query: string): Promise<NutritionDocument[]> {
    return this.tracedRetrieve(query)
  }

  /**
   * Intent, keyword and metadata ordering, then re-ranking when enabled.
   * Does not truncate.
   */
  async applyDomainFilters(
    documents: NutritionDocument[],
    query: string
  ): Promise<NutritionDocument[]> {
    const intent = detectQueryIntent(query)
    const ranked = rankByHybridScore(documents, query, intent, this.now()).map(
      entry => entry.document
    )

    this.logger.debug("domain_filters", {
      candidates: documents.length,
      intent
    })

    if (!this.useReranking || !this.reranker) {
      return ranked
    }

    try {
      return await this.reranker.rerank(ranked, query)
    } catch (error) {
      const classified = classifyError(error, "reranking")
      this.logger.error("rerank_error", error, { type: classified.type })
      return ranked
    }
  }

  private async runRetrieval(query: string): Promise<NutritionDocument[]> {
    this.logger.info("retrieval_start", { query, k: this.k })

    let candidates: NutritionDocument[]
    try {
      candidates = await this.search.search(query)
    } catch (error) {
      const classified = classifyError(error, "similarity_search")
      this.logger.error("base_search_error", error, {
        query,
        type: classified.type,
        retryable: classified.retryable
      })
      return []
    }

    const filtered = await this.applyDomainFilters(candidates, query)
    const documents = filtered.slice(0, this.k)

    this.logger.info("retrieval_end", {
      retrieved: candidates.length,
      filtered: filtered.length,
      returned: documents.length
    })
    addRunMetadata({ retrieved: candidates.length, returned: documents.length })

    return documents
  }
}

// =============================================================================
// Builders
// =============================================================================

/**
 * Hybrid retriever without re-ranking unless a reranker is passed
 */
export function createNutritionRetriever(
  options: NutritionRetrieverOptions
): NutritionRetriever {
  return new NutritionRetriever(options)
}

/**
 * Hybrid retriever with the default multi-signal re-ranker attached
 */
export function createRetrieverWithReranker(
  search: SimilaritySearch,
  options: {
    k?: number
    reranking?: DocumentReRankerOptions
    now?: () => Date
    logger?: RetrievalLogger
  } = {}
): NutritionRetriever {
  const reranker = new DocumentReRanker({
    now: options.now,
    logger: options.logger,
    ...options.reranking
  })

  return new NutritionRetriever({
    search,
    k: options.k,
    reranker,
    useReranking: true,
    now: options.now,
    logger: options.logger
  })
}
