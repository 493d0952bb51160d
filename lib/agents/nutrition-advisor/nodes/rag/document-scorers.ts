/**
 * Document Scorers - relevance signals for post-retrieval re-ranking
 *
 * Each scorer returns one score per document, in input order. Scores are
 * meant to land in [0, 1]; the re-ranker normalizes each vector by its max.
 *
 * Scorers:
 * - SemanticSimilarityScorer: pluggable similarity, keyword overlap fallback
 * - FreshnessScorer: linear decay over `maxAgeDays`
 * - AuthorityScorer: known source/domain trust weights
 * - TermProximityScorer: query terms co-occurring in 10-word windows
 * - NutritionSpecificScorer: shared nutrition vocabulary
 */

import type { NutritionDocument } from "../../types"
import {
  ageInDays,
  getDocumentDate,
  getMetadataString
} from "./document-utils"

// =============================================================================
// Types
// =============================================================================

export interface DocumentScorer {
  /** Scorer name used in logs */
  readonly name: string
  /** Weight in the re-ranker's weighted average */
  readonly weight: number
  score(documents: NutritionDocument[], query: string): number[]
}

/** Score returned when a signal is absent */
export const NEUTRAL_SCORE = 0.5

// =============================================================================
// Semantic Similarity
// =============================================================================

/**
 * Synchronous similarity between a document and the query, in [0, 1]
 */
export type SemanticSimilarityFn = (content: string, query: string) => number

export class SemanticSimilarityScorer implements DocumentScorer {
  readonly name = "semantic_similarity"
  readonly weight: number
  private readonly similarity?: SemanticSimilarityFn

  constructor(
    options: { weight?: number; similarity?: SemanticSimilarityFn } = {}
  ) {
    this.weight = options.weight ?? 1
    this.similarity = options.similarity
  }

  score(documents: NutritionDocument[], query: string): number[] {
    if (this.similarity) {
      const similarity = this.similarity
      return documents.map(doc => similarity(doc.content, query))
    }

    // Keyword overlap: share of query words found in the content
    const queryTerms = query.toLowerCase().split(/\s+/).filter(Boolean)

    return documents.map(doc => {
      const content = doc.content.toLowerCase()
      const matches = queryTerms.filter(term => content.includes(term)).length
      return matches / Math.max(1, queryTerms.length)
    })
  }
}

// =============================================================================
// Freshness
// =============================================================================

export class FreshnessScorer implements DocumentScorer {
  readonly name = "freshness"
  readonly weight: number
  private readonly maxAgeDays: number
  private readonly now: () => Date

  constructor(
    options: { weight?: number; maxAgeDays?: number; now?: () => Date } = {}
  ) {
    this.weight = options.weight ?? 1
    this.maxAgeDays = options.maxAgeDays ?? 365
    this.now = options.now ?? (() => new Date())
  }

  score(documents: NutritionDocument[], _query: string): number[] {
    const now = this.now()

    return documents.map(doc => {
      const date = getDocumentDate(doc)
      if (!date) {
        return NEUTRAL_SCORE
      }
      return Math.min(
        1,
        Math.max(0, 1 - ageInDays(date, now) / this.maxAgeDays)
      )
    })
  }
}

// =============================================================================
// Authority
// =============================================================================

export const DEFAULT_AUTHORITY_SOURCES: Readonly<Record<string, number>> = {
  "nih.gov": 0.9,
  "cdc.gov": 0.9,
  "mayoclinic.org": 0.85,
  "harvard.edu": 0.85,
  "who.int": 0.9,
  "nutrition.org": 0.8,
  "nutritionfacts.org": 0.75
}

export class AuthorityScorer implements DocumentScorer {
  readonly name = "authority"
  readonly weight: number
  private readonly authoritySources: Readonly<Record<string, number>>

  constructor(
    options: {
      weight?: number
      authoritySources?: Record<string, number>
    } = {}
  ) {
    this.weight = options.weight ?? 1
    this.authoritySources = options.authoritySources ?? DEFAULT_AUTHORITY_SOURCES
  }

  score(documents: NutritionDocument[], _query: string): number[] {
    return documents.map(doc => {
      const source = getMetadataString(doc, "source")
      const url = getMetadataString(doc, "url")

      // Exact source name first, then domain inside the URL
      if (source && Object.hasOwn(this.authoritySources, source)) {
        return this.authoritySources[source]
      }

      if (url) {
        for (const [domain, authority] of Object.entries(
          this.authoritySources
        )) {
          if (url.includes(domain)) {
            return authority
          }
        }
      }

      return NEUTRAL_SCORE
    })
  }
}

// =============================================================================
// Term Proximity
// =============================================================================

const PROXIMITY_WINDOW_SIZE = 10

export class TermProximityScorer implements DocumentScorer {
  readonly name = "term_proximity"
  readonly weight: number

  constructor(options: { weight?: number } = {}) {
    this.weight = options.weight ?? 1
  }

  score(documents: NutritionDocument[], query: string): number[] {
    const queryTerms = [
      ...new Set(
        query
          .toLowerCase()
          .split(/\s+/)
          .filter(term => term.length > 2)
      )
    ]

    if (queryTerms.length < 2) {
      return documents.map(() => NEUTRAL_SCORE)
    }

    return documents.map(doc => {
      const words = doc.content.toLowerCase().split(/\s+/).filter(Boolean)
      let windowsFound = 0

      for (let i = 0; i + PROXIMITY_WINDOW_SIZE <= words.length; i++) {
        const window = words.slice(i, i + PROXIMITY_WINDOW_SIZE).join(" ")
        const termsInWindow = queryTerms.filter(term =>
          window.includes(term)
        ).length
        if (termsInWindow >= 2) {
          windowsFound++
        }
      }

      return windowsFound > 0
        ? Math.min(1, NEUTRAL_SCORE + windowsFound * 0.1)
        : NEUTRAL_SCORE
    })
  }
}

// =============================================================================
// Nutrition Vocabulary
// =============================================================================

export const NUTRITION_TERMS = [
  "vitamin",
  "mineral",
  "protein",
  "carbohydrate",
  "fat",
  "omega",
  "calcium",
  "iron",
  "zinc",
  "magnesium",
  "potassium",
  "sodium",
  "fiber",
  "nutrient",
  "diet",
  "calorie",
  "supplement",
  "deficiency",
  "meal",
  "nutrition",
  "food",
  "health",
  "metabolism"
] as const

export class NutritionSpecificScorer implements DocumentScorer {
  readonly name = "nutrition_specific"
  readonly weight: number

  constructor(options: { weight?: number } = {}) {
    this.weight = options.weight ?? 1
  }

  score(documents: NutritionDocument[], query: string): number[] {
    const queryLower = query.toLowerCase()
    const queryNutritionTerms = NUTRITION_TERMS.filter(term =>
      queryLower.includes(term)
    )

    return documents.map(doc => {
      if (queryNutritionTerms.length === 0) {
        return NEUTRAL_SCORE
      }

      const content = doc.content.toLowerCase()
      const matches = queryNutritionTerms.filter(term =>
        content.includes(term)
      ).length

      if (matches === 0) {
        return NEUTRAL_SCORE
      }

      return Math.min(
        1,
        NEUTRAL_SCORE + (matches / queryNutritionTerms.length) * 0.5
      )
    })
  }
}
