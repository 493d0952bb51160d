/**
 * SimilaritySearch implementations
 */

export * from "./keyword-similarity-search"
export * from "./vector-store-search"
export * from "./supabase-similarity-search"
