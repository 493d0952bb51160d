/**
 * Context Formatting - turns retrieved documents into prompt context and
 * a source list for the answer layer
 */

import type { DocumentMetadata, NutritionDocument } from "../../types"

export const EMPTY_CONTEXT_MESSAGE = "No relevant information found."

const SOURCE_PREVIEW_LENGTH = 150

export interface FormattedSource extends DocumentMetadata {
  /** 1-based position in the retrieved list */
  id: number
  contentPreview: string
}

/**
 * Joins document contents with a blank line between them
 */
export function formatDocumentsForContext(
  documents: NutritionDocument[]
): string {
  if (documents.length === 0) {
    return EMPTY_CONTEXT_MESSAGE
  }
  return documents.map(doc => doc.content).join("\n\n")
}

/**
 * One entry per document, numbered from 1. Metadata keys are spread over
 * the generated fields.
 */
export function formatSources(
  documents: NutritionDocument[]
): FormattedSource[] {
  return documents.map((doc, i) => ({
    id: i + 1,
    contentPreview: `${doc.content.slice(0, SOURCE_PREVIEW_LENGTH)}...`,
    ...doc.metadata
  }))
}
