/**
 * Nutrition Retrieval Error Handler
 *
 * Classifies failures raised by the collaborators of the retrieval pipeline
 * (similarity search, completion model, embeddings) so they can be logged
 * and degraded to "fewer or no documents".
 */

import { EmbeddingError } from "@/lib/embeddings/types"

// =============================================================================
// TYPES
// =============================================================================

/**
 * Error type classification
 */
export enum ErrorType {
  VALIDATION = "ValidationError",
  TIMEOUT = "TimeoutError",
  API = "APIError",
  DATABASE = "DatabaseError",
  NETWORK = "NetworkError",
  RATE_LIMIT = "RateLimitError",
  UNKNOWN = "UnknownError"
}

/**
 * Pipeline stage where an error surfaced
 */
export type RetrievalStage =
  | "similarity_search"
  | "reformulation"
  | "scoring"
  | "reranking"
  | "embedding"
  | "completion"

/**
 * Classified error with context
 */
export interface StageError {
  stage: RetrievalStage
  type: ErrorType
  message: string
  retryable: boolean
  originalError?: Error
}

// =============================================================================
// TIMEOUT ERROR
// =============================================================================

export class TimeoutError extends Error {
  public readonly stage: RetrievalStage
  public readonly timeoutMs: number

  constructor(stage: RetrievalStage, timeoutMs: number) {
    super(`${stage} exceeded the time limit of ${timeoutMs}ms`)
    this.name = "TimeoutError"
    this.stage = stage
    this.timeoutMs = timeoutMs
  }
}

/**
 * Executes a promise with timeout
 *
 * @throws TimeoutError if timeout is exceeded
 */
export async function executeWithTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  stage: RetrievalStage
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(stage, timeoutMs))
    }, timeoutMs)
  })

  try {
    return await Promise.race([promise, timeout])
  } finally {
    clearTimeout(timer)
  }
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

const KEYWORD_RULES: Array<{
  type: ErrorType
  keywords: string[]
  retryable: boolean
}> = [
  {
    type: ErrorType.RATE_LIMIT,
    keywords: ["rate limit", "too many requests", "429"],
    retryable: true
  },
  {
    type: ErrorType.API,
    keywords: ["api", "openai", "500", "502", "503"],
    retryable: true
  },
  {
    type: ErrorType.DATABASE,
    keywords: ["database", "supabase", "postgres", "pgvector", "rpc"],
    retryable: true
  },
  {
    type: ErrorType.NETWORK,
    keywords: ["network", "fetch", "connection", "econnrefused", "socket"],
    retryable: true
  },
  {
    type: ErrorType.VALIDATION,
    keywords: ["invalid", "required", "validation", "missing"],
    retryable: false
  }
]

/**
 * Classifies an error and returns structured error info
 */
export function classifyError(
  error: unknown,
  stage: RetrievalStage
): StageError {
  if (error instanceof TimeoutError) {
    return {
      stage,
      type: ErrorType.TIMEOUT,
      message: error.message,
      retryable: true,
      originalError: error
    }
  }

  // No status: local failure (missing key, empty text, wrong dimensions)
  if (error instanceof EmbeddingError) {
    const status = error.statusCode
    const type =
      status === 429
        ? ErrorType.RATE_LIMIT
        : status !== undefined && status >= 500
          ? ErrorType.API
          : ErrorType.VALIDATION

    return {
      stage,
      type,
      message: error.message,
      retryable: type !== ErrorType.VALIDATION,
      originalError: error
    }
  }

  if (error instanceof Error) {
    const errorMessage = error.message.toLowerCase()

    if (error.name === "ZodError") {
      return {
        stage,
        type: ErrorType.VALIDATION,
        message: error.message,
        retryable: false,
        originalError: error
      }
    }

    const rule = KEYWORD_RULES.find(r =>
      r.keywords.some(keyword => errorMessage.includes(keyword))
    )

    return {
      stage,
      type: rule?.type ?? ErrorType.UNKNOWN,
      message: error.message,
      retryable: rule?.retryable ?? true,
      originalError: error
    }
  }

  return {
    stage,
    type: ErrorType.UNKNOWN,
    message: String(error),
    retryable: true
  }
}

// =============================================================================
// RETRY
// =============================================================================

export interface RetryOptions {
  /** Maximum retry attempts (default: 2) */
  maxRetries?: number
  /** Stage used for classification (default: completion) */
  stage?: RetrievalStage
  /** First backoff delay in ms, doubled per attempt, capped at 4x (default: 1000) */
  baseDelayMs?: number
}

/**
 * Gets retry delay with exponential backoff
 */
export function getRetryDelay(attempt: number, baseDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt), baseDelayMs * 4)
}

/**
 * Wraps an async function with retry logic. Non-retryable errors are
 * rethrown immediately.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { maxRetries = 2, stage = "completion", baseDelayMs = 1000 } = options

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn()
    } catch (error) {
      const classified = classifyError(error, stage)

      if (attempt >= maxRetries || !classified.retryable) {
        throw error
      }

      const delay = getRetryDelay(attempt, baseDelayMs)
      await new Promise(resolve => setTimeout(resolve, delay))

      console.log(
        `[error-handler] Retrying ${stage} (attempt ${attempt + 1}/${maxRetries})`
      )
    }
  }
}
