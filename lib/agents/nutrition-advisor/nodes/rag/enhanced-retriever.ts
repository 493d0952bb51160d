/**
 * Enhanced Retriever - Multi-Query retrieval with reformulation
 *
 * Fans the query out to reformulated variants, searches each one against the
 * raw similarity search, deduplicates by content and applies the hybrid
 * retriever's domain filters using the ORIGINAL query.
 *
 * Features:
 * - Reformulation failure falls back to the original query alone
 * - Per-variant search failures are logged and skipped
 * - Disabled reformulation delegates to the hybrid retriever unchanged
 */

import type {
  NutritionDocument,
  Retriever,
  SimilaritySearch,
  TextCompletion
} from "../../types"
import {
  NutritionRetriever,
  type NutritionRetrieverOptions
} from "./nutrition-retriever"
import { QueryReformulator } from "./query-reformulator"
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

export interface EnhancedRetrieverOptions {
  retriever: NutritionRetriever
  reformulator?: QueryReformulator
  /** Cap on queries searched, original included (default: 4) */
  maxQueries?: number
  /** Runtime switch for reformulation (default: true) */
  useReformulation?: boolean
  /** Search the variants concurrently instead of one at a time (default: false) */
  parallelFanOut?: boolean
  logger?: RetrievalLogger
}

export const DEFAULT_MAX_QUERIES = 4

// =============================================================================
// Deduplication
// =============================================================================

/**
 * Removes documents with identical content. A duplicate keeps the position
 * of the first occurrence and the value of the last one.
 */
export function deduplicateDocuments(
  documents: NutritionDocument[]
): NutritionDocument[] {
  const unique = new Map<string, NutritionDocument>()
  for (const doc of documents) {
    unique.set(doc.content, doc)
  }
  return Array.from(unique.values())
}

// =============================================================================
// Retriever
// =============================================================================

export class EnhancedRetriever implements Retriever {
  readonly retriever: NutritionRetriever
  readonly reformulator?: QueryReformulator
  readonly maxQueries: number
  readonly useReformulation: boolean
  readonly parallelFanOut: boolean
  private readonly logger: RetrievalLogger

  private readonly tracedRetrieve = traceable(
    (query: string) => this.runRetrieval(query),
    createRetrievalTraceOptions("enhanced-retriever", "similarity_search", [
      "multi-query"
    ])
  )

  constructor(options: EnhancedRetrieverOptions) {
    this.retriever = options.retriever
    this.reformulator = options.reformulator
    this.maxQueries = options.maxQueries ?? DEFAULT_MAX_QUERIES
    this.useReformulation = options.useReformulation ?? true
    this.parallelFanOut = options.parallelFanOut ?? false
    this.logger = options.logger ?? createRetrievalLogger("enhanced-retriever")
  }

  get k(): number {
    return this.retriever.k
  }

  /**
   * Retrieves at most k documents for the query. Never rejects.
   */
  retrieve(query: string): Promise<NutritionDocument[]> {
    if (!this.useReformulation || !this.reformulator) {
      return this.retriever.retrieve(query)
    }
    return this.tracedRetrieve(query)
  }

  /**
   * Reformulated queries capped to `maxQueries`, or `[query]` when
   * reformulation throws
   */
  async generateQueries(query: string): Promise<string[]> {
    if (!this.reformulator) {
      return [query]
    }

    try {
      const queries = await this.reformulator.rewriteQuery(query)
      return queries.slice(0, this.maxQueries)
    } catch (error) {
      const classified = classifyError(error, "reformulation")
      this.logger.error("reformulation_error", error, {
        query,
        type: classified.type
      })
      return [query]
    }
  }

  private async runRetrieval(query: string): Promise<NutritionDocument[]> {
    this.logger.info("retrieval_start", { query, k: this.k })

    const queries = await this.generateQueries(query)
    const results = this.parallelFanOut
      ? await Promise.all(queries.map(q => this.searchVariant(q)))
      : await this.searchSequentially(queries)

    const allDocuments = results.flat()
    const uniqueDocuments = deduplicateDocuments(allDocuments)

    this.logger.info("deduplication", {
      total: allDocuments.length,
      unique: uniqueDocuments.length
    })

    const filtered = await this.retriever.applyDomainFilters(
      uniqueDocuments,
      query
    )
    const documents = filtered.slice(0, this.k)

    this.logger.info("retrieval_end", {
      queries: queries.length,
      retrieved: allDocuments.length,
      returned: documents.length
    })
    addRunMetadata({ queries: queries.length, returned: documents.length })

    return documents
  }

  private async searchSequentially(
    queries: string[]
  ): Promise<NutritionDocument[][]> {
    const results: NutritionDocument[][] = []
    for (const query of queries) {
      results.push(await this.searchVariant(query))
    }
    return results
  }

  /**
   * Raw similarity search for one variant; failures yield no documents
   */
  private async searchVariant(query: string): Promise<NutritionDocument[]> {
    try {
      const documents = await this.retriever.search.search(query)
      this.logger.debug("fanout_query", { query, retrieved: documents.length })
      return documents
    } catch (error) {
      const classified = classifyError(error, "similarity_search")
      this.logger.error("fanout_query_error", error, {
        query,
        type: classified.type
      })
      return []
    }
  }
}

// =============================================================================
// Builders
// =============================================================================

export function createEnhancedRetriever(
  options: EnhancedRetrieverOptions
): EnhancedRetriever {
  return new EnhancedRetriever(options)
}

/**
 * Enhanced retriever whose reformulator is powered by a completion model
 */
export function createEnhancedRetrieverFromCompletion(
  search: SimilaritySearch,
  completion: TextCompletion,
  options: Omit<NutritionRetrieverOptions, "search"> & {
    maxQueries?: number
    includeOriginal?: boolean
    parallelFanOut?: boolean
  } = {}
): EnhancedRetriever {
  const { maxQueries, includeOriginal, parallelFanOut, ...retrieverOptions } =
    options

  const reformulator = new QueryReformulator({
    completion,
    includeOriginal,
    logger: retrieverOptions.logger
  })

  return new EnhancedRetriever({
    retriever: new NutritionRetriever({ search, ...retrieverOptions }),
    reformulator,
    maxQueries,
    useReformulation: true,
    parallelFanOut,
    logger: retrieverOptions.logger
  })
}
