/**
 * Keyword Similarity Search - in-process stand-in for the embedding store
 *
 * Scores each document by keyword presence:
 * - +1 per query keyword contained in the text
 * - +0.5 more when the keyword is longer than 3 characters and appears as
 *   a whole space-delimited word
 *
 * Zero-score documents are dropped; the rest are sorted by score (stable)
 * and capped at `limit`. Useful for local runs and tests.
 */

import { readFile } from "node:fs/promises"
import { fileURLToPath } from "node:url"
import { z } from "zod"

import type { NutritionDocument, SimilaritySearch } from "../types"
import { NutritionDocumentSchema } from "../schemas/retrieval-schemas"

export const DEFAULT_KEYWORD_SEARCH_LIMIT = 5

export const SAMPLE_DOCUMENTS_PATH = fileURLToPath(
  new URL("../../../../data/samples/nutrition-documents.json", import.meta.url)
)

const SampleDocumentsSchema = z.array(NutritionDocumentSchema)

/**
 * Keyword match score for a text
 */
export function scoreKeywordMatch(text: string, keywords: string[]): number {
  if (!text || keywords.length === 0) {
    return 0
  }

  const textLower = text.toLowerCase()
  const padded = ` ${textLower} `
  let score = 0

  for (const keyword of keywords) {
    if (textLower.includes(keyword)) {
      score += 1
      if (keyword.length > 3 && padded.includes(` ${keyword} `)) {
        score += 0.5
      }
    }
  }

  return score
}

export class KeywordSimilaritySearch implements SimilaritySearch {
  private readonly documents: readonly NutritionDocument[]
  private readonly limit: number

  constructor(
    documents: readonly NutritionDocument[],
    options: { limit?: number } = {}
  ) {
    this.documents = documents
    this.limit = options.limit ?? DEFAULT_KEYWORD_SEARCH_LIMIT
  }

  async search(query: string): Promise<NutritionDocument[]> {
    const keywords = query.toLowerCase().split(/\s+/).filter(Boolean)

    return this.documents
      .map(document => ({
        document,
        score: scoreKeywordMatch(document.content, keywords)
      }))
      .filter(entry => entry.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, this.limit)
      .map(entry => entry.document)
  }
}

/**
 * Reads and validates a JSON array of documents
 *
 * @throws ZodError when an entry has no string `content`
 */
export async function loadSampleDocuments(
  filePath: string = SAMPLE_DOCUMENTS_PATH
): Promise<NutritionDocument[]> {
  const raw = await readFile(filePath, "utf-8")
  const parsed: unknown = JSON.parse(raw)
  return SampleDocumentsSchema.parse(parsed)
}

export async function createSampleKeywordSearch(
  options: { limit?: number; filePath?: string } = {}
): Promise<KeywordSimilaritySearch> {
  const documents = await loadSampleDocuments(options.filePath)
  return new KeywordSimilaritySearch(documents, { limit: options.limit })
}
