/**
 * Nutrition Advisor - hybrid retrieval and re-ranking core
 *
 * Retrieves nutrition passages for a user question: embedding search,
 * keyword and metadata boosting, optional multi-signal re-ranking and
 * multi-query reformulation. Answer synthesis lives outside this package.
 */

// Wiring
export * from "./workflow/build-retriever"
export * from "./config"

// Retrieval pipeline
export * from "./nodes/rag"
export * from "./intent"
export * from "./prompts"

// Collaborators
export * from "./search"
export * from "./completion/chat-completion"

// Citations
export * from "./citations"

// Schemas and types
export * from "./schemas"
export type {
  IntentLabel,
  QueryIntent,
  SimilaritySearch,
  TextCompletion,
  Reranker,
  Retriever
} from "./types"
