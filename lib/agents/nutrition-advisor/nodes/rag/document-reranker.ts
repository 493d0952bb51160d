/**
 * Document Re-Ranker - weighted multi-signal re-ranking
 *
 * Combines the scorers in `document-scorers.ts` into a single ranking.
 *
 * Features:
 * - Only the first `topNToRerank` documents are scored; the tail keeps
 *   its original order after the re-ranked prefix
 * - Each score vector is divided by its own max (max 0 counts as 1)
 * - A scorer that throws is left out of numerator and denominator
 * - Stable sort: exact ties keep their input order
 */

import type { NutritionDocument, Reranker } from "../../types"
import {
  createReRankingConfig,
  type ReRankingConfig,
  type ReRankingConfigInput
} from "../../schemas/retrieval-schemas"
import {
  AuthorityScorer,
  FreshnessScorer,
  NutritionSpecificScorer,
  SemanticSimilarityScorer,
  TermProximityScorer,
  type DocumentScorer,
  type SemanticSimilarityFn
} from "./document-scorers"
import { classifyError } from "@/lib/tools/nutrition/error-handler"
import {
  createRetrievalLogger,
  type RetrievalLogger
} from "@/lib/tools/nutrition/logger"

// =============================================================================
// Types
// =============================================================================

export interface DocumentReRankerOptions {
  config?: ReRankingConfigInput
  /** Replaces the default scorer set entirely */
  scorers?: DocumentScorer[]
  /** Semantic similarity used instead of the keyword fallback */
  similarity?: SemanticSimilarityFn
  /** Authority map used instead of the defaults */
  authoritySources?: Record<string, number>
  /** Clock for freshness scoring */
  now?: () => Date
  logger?: RetrievalLogger
}

export interface ScoredDocument {
  document: NutritionDocument
  score: number
}

// =============================================================================
// Re-Ranker
// =============================================================================

export class DocumentReRanker implements Reranker {
  readonly config: Readonly<ReRankingConfig>
  readonly scorers: readonly DocumentScorer[]
  private readonly logger: RetrievalLogger

  constructor(options: DocumentReRankerOptions = {}) {
    this.config = createReRankingConfig(options.config)
    this.scorers = options.scorers ?? createDefaultScorers(this.config, options)
    this.logger = options.logger ?? createRetrievalLogger("document-reranker")
  }

  /**
   * Reorders documents by the weighted combination of all scorers
   *
   * @returns A permutation of the input
   */
  rerank(documents: NutritionDocument[], query: string): NutritionDocument[] {
    if (documents.length <= 1) {
      return documents
    }

    const head = documents.slice(0, this.config.topNToRerank)
    const tail = documents.slice(this.config.topNToRerank)

    const scored = this.scoreDocuments(head, query)
    const reranked = [...scored]
      .sort((a, b) => b.score - a.score)
      .map(entry => entry.document)

    this.logger.info("rerank_complete", {
      reranked: head.length,
      untouched: tail.length,
      topScore: Math.max(...scored.map(entry => entry.score))
    })

    return [...reranked, ...tail]
  }

  /**
   * Combined score per document, in input order
   */
  scoreDocuments(
    documents: NutritionDocument[],
    query: string
  ): ScoredDocument[] {
    const weightedVectors: Array<{ scores: number[]; weight: number }> = []

    for (const scorer of this.scorers) {
      try {
        const scores = scorer.score(documents, query)
        if (scores.length === 0) {
          continue
        }
        if (scores.length !== documents.length) {
          throw new Error(
            `Scorer returned ${scores.length} scores for ${documents.length} documents`
          )
        }
        weightedVectors.push({
          scores: normalizeByMax(scores),
          weight: scorer.weight
        })
      } catch (error) {
        const classified = classifyError(error, "scoring")
        this.logger.error("scorer_error", error, {
          scorer: scorer.name,
          type: classified.type
        })
      }
    }

    const totalWeight = weightedVectors.reduce(
      (sum, entry) => sum + entry.weight,
      0
    )

    return documents.map((document, i) => {
      const total = weightedVectors.reduce(
        (sum, entry) => sum + entry.scores[i] * entry.weight,
        0
      )
      return {
        document,
        score: totalWeight > 0 ? total / totalWeight : 0
      }
    })
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Divides every score by the vector's max; a max of 0 or less counts as 1
 */
export function normalizeByMax(scores: number[]): number[] {
  const max = Math.max(...scores)
  const divisor = max > 0 ? max : 1
  return scores.map(score => score / divisor)
}

/**
 * The five default scorers, weighted from the config
 */
export function createDefaultScorers(
  config: Readonly<ReRankingConfig>,
  options: Pick<
    DocumentReRankerOptions,
    "similarity" | "authoritySources" | "now"
  > = {}
): DocumentScorer[] {
  return [
    new SemanticSimilarityScorer({
      weight: config.semanticWeight,
      similarity: options.similarity
    }),
    new FreshnessScorer({
      weight: config.freshnessWeight,
      maxAgeDays: config.maxAgeDays,
      now: options.now
    }),
    new AuthorityScorer({
      weight: config.authorityWeight,
      authoritySources: options.authoritySources
    }),
    new TermProximityScorer({ weight: config.termProximityWeight }),
    new NutritionSpecificScorer({ weight: config.nutrientMatchBonus })
  ]
}
