/**
 * LangSmith Setup
 *
 * LangSmith configuration for the retrieval pipeline using the SDK's
 * recommended abstraction:
 * - traceable: wraps the retrieval entry points
 *
 * With LANGSMITH_TRACING unset, traceable functions run untraced.
 */

import { traceable, getCurrentRunTree } from "langsmith/traceable"

import type { RetrievalStage } from "@/lib/tools/nutrition/error-handler"

// =============================================================================
// TYPES
// =============================================================================

export type LangSmithRunType = "chain" | "llm" | "tool" | "retriever"

export interface TraceableOptions {
  name: string
  run_type?: LangSmithRunType
  tags?: string[]
  metadata?: Record<string, unknown>
}

export interface ConfigCheckResult {
  valid: boolean
  enabled: boolean
  errors: string[]
  warnings: string[]
  config: {
    apiKey: boolean
    tracing: boolean
    project: string
    endpoint: string
  }
}

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * Run types for each traced stage
 */
export const STAGE_RUN_TYPES: Record<RetrievalStage, LangSmithRunType> = {
  similarity_search: "retriever",
  reformulation: "llm",
  scoring: "chain",
  reranking: "chain",
  embedding: "tool",
  completion: "llm"
}

export const LANGSMITH_DEFAULTS = {
  project: process.env.LANGSMITH_PROJECT || "nutrition-advisor",
  endpoint: process.env.LANGSMITH_ENDPOINT || "https://api.smith.langchain.com",
  version: "1.0.0"
} as const

// =============================================================================
// CONFIGURATION CHECK
// =============================================================================

/**
 * Checks whether LangSmith is configured
 */
export function checkLangSmithConfig(
  env: NodeJS.ProcessEnv = process.env
): ConfigCheckResult {
  const errors: string[] = []
  const warnings: string[] = []

  const apiKey = env.LANGSMITH_API_KEY
  const tracing = env.LANGSMITH_TRACING === "true"

  if (!apiKey) {
    errors.push("LANGSMITH_API_KEY is not set")
  }

  if (apiKey && !tracing) {
    warnings.push("LANGSMITH_TRACING is not 'true': runs will not be traced")
  }

  return {
    valid: errors.length === 0,
    enabled: Boolean(apiKey) && tracing,
    errors,
    warnings,
    config: {
      apiKey: Boolean(apiKey),
      tracing,
      project: env.LANGSMITH_PROJECT || LANGSMITH_DEFAULTS.project,
      endpoint: env.LANGSMITH_ENDPOINT || LANGSMITH_DEFAULTS.endpoint
    }
  }
}

export function isLangSmithEnabled(): boolean {
  return checkLangSmithConfig().enabled
}

// =============================================================================
// TRACEABLE HELPERS
// =============================================================================

/**
 * Builds traceable options for a pipeline stage
 */
export function createRetrievalTraceOptions(
  name: string,
  stage: RetrievalStage,
  additionalTags?: string[],
  additionalMetadata?: Record<string, unknown>
): TraceableOptions {
  return {
    name,
    run_type: STAGE_RUN_TYPES[stage],
    tags: ["nutrition-advisor", "rag", stage, ...(additionalTags || [])],
    metadata: {
      stage,
      version: LANGSMITH_DEFAULTS.version,
      ...additionalMetadata
    }
  }
}

/**
 * Adds metadata to the current run. No-op outside a traceable context.
 */
export function addRunMetadata(metadata: Record<string, unknown>): void {
  let runTree: ReturnType<typeof getCurrentRunTree> | undefined
  try {
    runTree = getCurrentRunTree()
  } catch (error) {
    // getCurrentRunTree throws when called outside a traced function
    if (process.env.NODE_ENV === "development") {
      console.debug("[langsmith-setup] No active run:", error)
    }
    return
  }

  if (runTree) {
    runTree.extra = {
      ...runTree.extra,
      metadata: {
        ...runTree.extra?.metadata,
        ...metadata
      }
    }
  }
}

export { traceable }
