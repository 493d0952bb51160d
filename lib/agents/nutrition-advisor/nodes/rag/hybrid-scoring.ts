/**
 * Hybrid Scoring - keyword and metadata signals layered over vector search
 *
 * final_score = (1 + keyword_score) * (1 + metadata_boost)
 *
 * Keyword scores are unbounded sums; callers must not assume [0, 1].
 */

import type { NutritionDocument, QueryIntent } from "../../types"
import { AUTHORITY_SOURCE_FRAGMENTS } from "../../intent/intent-terms"
import {
  ageInDays,
  countOccurrences,
  extractQueryTerms,
  getMetadataString,
  parseIsoDate
} from "./document-utils"

// =============================================================================
// Constants
// =============================================================================

export const KEYWORD_WEIGHTS = {
  /** Per occurrence of a query term, capped at `occurrenceCap` per term */
  perOccurrence: 0.05,
  occurrenceCap: 0.2,
  /** Term also present as a whitespace-delimited token */
  exactToken: 0.1,
  /** Adjacent query terms found verbatim */
  bigram: 0.15,
  /** Metadata `name` contains a query term */
  nameMatch: 0.3
} as const

export const METADATA_BOOSTS = {
  nutrientType: 0.3,
  recipeType: 0.4,
  dietAdviceType: 0.2,
  authoritativeSource: 0.3,
  recentDocument: 0.1
} as const

/** Documents younger than this get the recency boost */
export const RECENT_DOCUMENT_DAYS = 365

export interface HybridScoredDocument {
  document: NutritionDocument
  keywordScore: number
  metadataBoost: number
  finalScore: number
}

// =============================================================================
// Keyword Scoring
// =============================================================================

/**
 * Scores every document by keyword evidence for the query
 *
 * @returns One unbounded score per document, in input order
 */
export function scoreByKeywords(
  documents: NutritionDocument[],
  query: string
): number[] {
  const queryTerms = extractQueryTerms(query)
  const bigrams = queryTerms
    .slice(0, -1)
    .map((term, i) => `${term} ${queryTerms[i + 1]}`)

  return documents.map(doc => {
    const content = doc.content.toLowerCase()
    const tokens = new Set(content.split(/\s+/))
    let score = 0

    for (const term of queryTerms) {
      const occurrences = countOccurrences(content, term)
      if (occurrences === 0) continue

      score += Math.min(
        KEYWORD_WEIGHTS.occurrenceCap,
        KEYWORD_WEIGHTS.perOccurrence * occurrences
      )
      if (tokens.has(term)) {
        score += KEYWORD_WEIGHTS.exactToken
      }
    }

    for (const bigram of bigrams) {
      if (content.includes(bigram)) {
        score += KEYWORD_WEIGHTS.bigram
      }
    }

    const name = getMetadataString(doc, "name")?.toLowerCase()
    if (name && queryTerms.some(term => name.includes(term))) {
      score += KEYWORD_WEIGHTS.nameMatch
    }

    return score
  })
}

// =============================================================================
// Metadata Boost
// =============================================================================

/**
 * Additive boost from document metadata given the query intent
 */
export function getMetadataBoost(
  document: NutritionDocument,
  intent: Partial<QueryIntent>,
  now: Date = new Date()
): number {
  const type = getMetadataString(document, "type")?.toLowerCase()
  const source = getMetadataString(document, "source")?.toLowerCase() ?? ""
  let boost = 0

  if (
    (type === "vitamin" || type === "mineral") &&
    (intent.nutrient_info ?? 0) > 0
  ) {
    boost += METADATA_BOOSTS.nutrientType
  }

  if (type === "recipe" && (intent.recipe ?? 0) > 0) {
    boost += METADATA_BOOSTS.recipeType
  }

  if (type === "diet_advice" && (intent.general_nutrition ?? 0) > 0) {
    boost += METADATA_BOOSTS.dietAdviceType
  }

  if (
    (intent.health_condition ?? 0) > 0 &&
    AUTHORITY_SOURCE_FRAGMENTS.some(fragment => source.includes(fragment))
  ) {
    boost += METADATA_BOOSTS.authoritativeSource
  }

  const date = parseIsoDate(getMetadataString(document, "date"))
  if (date && ageInDays(date, now) < RECENT_DOCUMENT_DAYS) {
    boost += METADATA_BOOSTS.recentDocument
  }

  return boost
}

// =============================================================================
// Hybrid Ranking
// =============================================================================

/**
 * Scores and sorts candidates by hybrid score, highest first (stable)
 */
export function rankByHybridScore(
  documents: NutritionDocument[],
  query: string,
  intent: QueryIntent,
  now: Date = new Date()
): HybridScoredDocument[] {
  const keywordScores = scoreByKeywords(documents, query)

  return documents
    .map((document, i) => {
      const keywordScore = keywordScores[i]
      const metadataBoost = getMetadataBoost(document, intent, now)
      return {
        document,
        keywordScore,
        metadataBoost,
        finalScore: 1.0 * (1 + keywordScore) * (1 + metadataBoost)
      }
    })
    .sort((a, b) => b.finalScore - a.finalScore)
}
