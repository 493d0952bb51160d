/**
 * Shared types for the Nutrition Advisor retrieval core
 */

import type { NutritionDocument } from "./schemas/retrieval-schemas"

export type {
  NutritionDocument,
  DocumentMetadata
} from "./schemas/retrieval-schemas"

/**
 * Closed set of query purposes used to bias scoring
 */
export type IntentLabel =
  | "nutrient_info" // "What does vitamin D do?"
  | "food_sources" // "Which foods are rich in iron?"
  | "health_condition" // "How to prevent anemia?"
  | "recipe" // "How do I cook lentils?"
  | "general_nutrition" // "Tips for healthy eating"
  | "comparison" // "Whey vs soy protein"
  | "dietary_restriction" // "Vegan sources of B12"

/**
 * Additive confidence per intent. Not normalized; at least one entry is non-zero.
 */
export type QueryIntent = Record<IntentLabel, number>

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Embedding-backed similarity search. Returns candidates already ranked by
 * vector similarity.
 */
export interface SimilaritySearch {
  search(query: string): Promise<NutritionDocument[]>
}

/**
 * Text completion capability (give text, get text back)
 */
export interface TextCompletion {
  complete(prompt: string): Promise<string>
}

/**
 * Reorders an already retrieved candidate set
 */
export interface Reranker {
  rerank(
    documents: NutritionDocument[],
    query: string
  ): NutritionDocument[] | Promise<NutritionDocument[]>
}

/**
 * Public entry point consumed by the answer-synthesis layer
 */
export interface Retriever {
  retrieve(query: string): Promise<NutritionDocument[]>
}
