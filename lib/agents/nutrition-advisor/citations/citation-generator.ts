/**
 * Citation Generator - source attribution for retrieved documents
 *
 * Builds MLA, APA or Chicago citations from document metadata so the answer
 * layer can list where each passage came from.
 *
 * Features:
 * - Source name falls back from `source` to `name` to "Unknown Source"
 * - Access date rendered as "DD Month YYYY"
 * - Content preview capped at 100 characters
 */

import type { NutritionDocument } from "../types"
import {
  CitationStyleSchema,
  type Citation,
  type CitationStyle
} from "../schemas/retrieval-schemas"
import { getMetadataString } from "../nodes/rag/document-utils"

// =============================================================================
// Constants
// =============================================================================

export const UNKNOWN_SOURCE = "Unknown Source"

const PREVIEW_MAX_LENGTH = 100
const PREVIEW_CUT_LENGTH = 97

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December"
] as const

export interface CitationOptions {
  /** Default: mla */
  style?: CitationStyle
  /** Clock for the access date */
  now?: () => Date
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * "05 March 2024"
 */
export function formatAccessDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, "0")
  return `${day} ${MONTH_NAMES[date.getMonth()]} ${date.getFullYear()}`
}

function buildCitationText(
  style: CitationStyle,
  sourceName: string,
  sourceUrl: string | null,
  dateAccessed: string | null
): string {
  switch (style) {
    case "apa": {
      const url = sourceUrl ? `. Retrieved from ${sourceUrl}` : ""
      const date = dateAccessed ? ` on ${dateAccessed}` : ""
      return `${sourceName}${url}${date}.`
    }
    case "chicago": {
      const url = sourceUrl ? `, ${sourceUrl}` : ""
      const date = dateAccessed ? `, accessed ${dateAccessed}` : ""
      return `"${sourceName}"${url}${date}.`
    }
    case "mla": {
      const url = sourceUrl ? `, ${sourceUrl}` : ""
      const date = dateAccessed ? `, Accessed ${dateAccessed}` : ""
      return `"${sourceName}"${url}${date}.`
    }
  }
}

// =============================================================================
// Generation
// =============================================================================

/**
 * Builds a citation for one document
 */
export function generateCitation(
  document: NutritionDocument,
  options: CitationOptions = {}
): Citation {
  const style = options.style ?? "mla"
  const now = options.now ?? (() => new Date())

  const sourceName =
    getMetadataString(document, "source") ??
    getMetadataString(document, "name") ??
    UNKNOWN_SOURCE
  const sourceUrl = getMetadataString(document, "url") ?? null
  const dateAccessed = formatAccessDate(now())

  let originalContent: string | null = document.content || null
  if (originalContent && originalContent.length > PREVIEW_MAX_LENGTH) {
    originalContent = `${originalContent.slice(0, PREVIEW_CUT_LENGTH)}...`
  }

  return {
    text: buildCitationText(style, sourceName, sourceUrl, dateAccessed),
    sourceName,
    sourceUrl,
    dateAccessed,
    originalContent,
    metadata: document.metadata
  }
}

/**
 * Citations for every document, in input order
 */
export function generateCitations(
  documents: NutritionDocument[],
  options: CitationOptions = {}
): Citation[] {
  return documents.map(doc => generateCitation(doc, options))
}

/**
 * Renders a stored citation in the requested style
 *
 * MLA reuses the stored text when it already carries an access date.
 * Chicago lower-cases the access date. Unknown styles return the stored text.
 */
export function formatCitation(
  citation: Citation,
  style: string = "mla"
): string {
  const parsed = CitationStyleSchema.safeParse(style.toLowerCase())
  if (!parsed.success) {
    return citation.text
  }

  const sourceName = citation.sourceName || UNKNOWN_SOURCE

  switch (parsed.data) {
    case "mla":
      if (citation.text && citation.text.includes("Accessed")) {
        return citation.text
      }
      return buildCitationText(
        "mla",
        sourceName,
        citation.sourceUrl,
        citation.dateAccessed
      )
    case "apa":
      return buildCitationText(
        "apa",
        sourceName,
        citation.sourceUrl,
        citation.dateAccessed
      )
    case "chicago":
      return buildCitationText(
        "chicago",
        sourceName,
        citation.sourceUrl,
        citation.dateAccessed?.toLowerCase() ?? null
      )
  }
}
