/**
 * RAG Nodes - hybrid retrieval and re-ranking for the Nutrition Advisor
 */

// Hybrid Retrieval
export {
  NutritionRetriever,
  createNutritionRetriever,
  createRetrieverWithReranker,
  DEFAULT_K,
  type NutritionRetrieverOptions
} from "./nutrition-retriever"

export {
  scoreByKeywords,
  getMetadataBoost,
  rankByHybridScore,
  KEYWORD_WEIGHTS,
  METADATA_BOOSTS,
  RECENT_DOCUMENT_DAYS,
  type HybridScoredDocument
} from "./hybrid-scoring"

// Multi-Query Retrieval
export {
  EnhancedRetriever,
  createEnhancedRetriever,
  createEnhancedRetrieverFromCompletion,
  deduplicateDocuments,
  DEFAULT_MAX_QUERIES,
  type EnhancedRetrieverOptions
} from "./enhanced-retriever"

// Query Reformulation
export {
  QueryReformulator,
  LineListOutputParser,
  type OutputParser,
  type QueryReformulatorOptions
} from "./query-reformulator"

// Re-ranking
export {
  DocumentReRanker,
  createDefaultScorers,
  normalizeByMax,
  type DocumentReRankerOptions,
  type ScoredDocument
} from "./document-reranker"

export {
  SemanticSimilarityScorer,
  FreshnessScorer,
  AuthorityScorer,
  TermProximityScorer,
  NutritionSpecificScorer,
  DEFAULT_AUTHORITY_SOURCES,
  NUTRITION_TERMS,
  NEUTRAL_SCORE,
  type DocumentScorer,
  type SemanticSimilarityFn
} from "./document-scorers"

// Context
export {
  formatDocumentsForContext,
  formatSources,
  EMPTY_CONTEXT_MESSAGE,
  type FormattedSource
} from "./context-formatting"
