/**
 * Retrieval Schemas - Zod schemas for the nutrition retrieval pipeline
 *
 * Centralizes the validation schemas shared by every stage:
 * - NutritionDocument: content + loosely typed metadata
 * - ReRankingConfig: scorer weights and reranking limits
 * - Citation: source attribution derived from a document
 */

import { z } from "zod"

// =============================================================================
// Document Schemas
// =============================================================================

/**
 * Metadata keys read by the retrieval core. Unknown keys are kept.
 */
export const DocumentMetadataSchema = z
  .object({
    source: z.string().optional(),
    url: z.string().optional(),
    name: z.string().optional(),
    /** vitamin, mineral, recipe, diet_advice, ... */
    type: z.string().optional(),
    /** ISO-8601 */
    date: z.string().optional(),
    created_at: z.string().optional()
  })
  .passthrough()

export type DocumentMetadata = z.infer<typeof DocumentMetadataSchema>

export const NutritionDocumentSchema = z.object({
  content: z.string({
    required_error: "Document content is required",
    invalid_type_error: "Document content must be a string"
  }),
  metadata: DocumentMetadataSchema.default({})
})

export type NutritionDocument = z.infer<typeof NutritionDocumentSchema>

// =============================================================================
// Re-ranking Schemas
// =============================================================================

const weight = (label: string, fallback: number) =>
  z
    .number()
    .finite(`${label} must be finite`)
    .min(0, `${label} must not be negative`)
    .default(fallback)

export const ReRankingConfigSchema = z.object({
  semanticWeight: weight("semanticWeight", 0.6),
  freshnessWeight: weight("freshnessWeight", 0.1),
  authorityWeight: weight("authorityWeight", 0.15),
  termProximityWeight: weight("termProximityWeight", 0.15),
  /** Weight of the nutrition-vocabulary scorer */
  nutrientMatchBonus: weight("nutrientMatchBonus", 0.2),
  maxAgeDays: z
    .number()
    .finite("maxAgeDays must be finite")
    .int()
    .positive("maxAgeDays must be a positive integer")
    .default(365),
  topNToRerank: z
    .number()
    .finite("topNToRerank must be finite")
    .int()
    .positive("topNToRerank must be a positive integer")
    .default(20)
})

export type ReRankingConfig = z.output<typeof ReRankingConfigSchema>
export type ReRankingConfigInput = z.input<typeof ReRankingConfigSchema>

/**
 * Builds a frozen reranking config, filling defaults
 *
 * @throws ZodError when a weight is negative or a limit is not a positive integer
 */
export function createReRankingConfig(
  overrides: ReRankingConfigInput = {}
): Readonly<ReRankingConfig> {
  return Object.freeze(ReRankingConfigSchema.parse(overrides))
}

// =============================================================================
// Citation Schemas
// =============================================================================

export const CitationStyleSchema = z.enum(["mla", "apa", "chicago"], {
  errorMap: () => ({ message: "Citation style must be: mla, apa or chicago" })
})

export type CitationStyle = z.infer<typeof CitationStyleSchema>

export const CitationSchema = z.object({
  text: z.string(),
  sourceName: z.string().nullable(),
  sourceUrl: z.string().nullable(),
  dateAccessed: z.string().nullable(),
  originalContent: z.string().nullable(),
  metadata: DocumentMetadataSchema
})

export type Citation = z.infer<typeof CitationSchema>
