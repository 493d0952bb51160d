/**
 * Nutrition Retrieval Logger
 *
 * Structured logging for the retrieval pipeline.
 *
 * Features:
 * - Structured JSON logs for debugging
 * - Sensitive data masking (queries are user text)
 * - Error formatting with stack traces in development
 */

// =============================================================================
// TYPES
// =============================================================================

export type LogLevel = "INFO" | "WARN" | "ERROR" | "DEBUG"

export type LogAction =
  | "retrieval_start"
  | "retrieval_end"
  | "base_search_error"
  | "reformulation_generated"
  | "reformulation_error"
  | "fanout_query"
  | "fanout_query_error"
  | "deduplication"
  | "domain_filters"
  | "scorer_error"
  | "rerank_complete"
  | "rerank_error"
  | "search_row_invalid"

/**
 * Structured log entry
 */
export interface LogEntry {
  timestamp: string
  level: LogLevel
  component: string
  action: LogAction
  [key: string]: unknown
}

export interface FormattedError {
  message: string
  type?: string
  stack?: string
}

// =============================================================================
// SENSITIVE DATA MASKING
// =============================================================================

/**
 * Fields that should be masked in logs
 */
const SENSITIVE_FIELDS = [
  "phone",
  "email",
  "address",
  "api_key",
  "apikey",
  "password",
  "token",
  "secret",
  "credit_card"
]

const EMAIL_PATTERN = /[^\s@]+@[^\s@]+\.[^\s@]+/g
const PHONE_PATTERN = /(\+\d{1,3}[\s.-]?)?\(?\d{2,3}\)?[\s.-]?\d{3,5}[\s.-]?\d{4}\b/g

/**
 * Masks sensitive data in a value
 *
 * @param data - The data to mask
 * @param depth - Current recursion depth (max 10)
 * @returns Masked copy of the data
 */
export function maskSensitiveData(data: unknown, depth: number = 0): unknown {
  if (depth > 10) return data

  if (data === null || data === undefined) {
    return data
  }

  if (typeof data === "string") {
    return data
      .replace(EMAIL_PATTERN, "***EMAIL***")
      .replace(PHONE_PATTERN, "***PHONE***")
  }

  if (Array.isArray(data)) {
    return data.map(item => maskSensitiveData(item, depth + 1))
  }

  if (typeof data === "object") {
    const masked: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase()

      if (SENSITIVE_FIELDS.some(field => lowerKey.includes(field))) {
        masked[key] = "***MASKED***"
      } else {
        masked[key] = maskSensitiveData(value, depth + 1)
      }
    }

    return masked
  }

  return data
}

/**
 * Formats an error for logging
 */
export function formatError(error: unknown): FormattedError {
  if (error instanceof Error) {
    return {
      message: error.message,
      type: error.name,
      stack: process.env.NODE_ENV === "development" ? error.stack : undefined
    }
  }
  return { message: String(error) }
}

// =============================================================================
// LOGGER CLASS
// =============================================================================

export class RetrievalLogger {
  private readonly component: string
  private readonly silent: boolean

  constructor(component: string, options: { silent?: boolean } = {}) {
    this.component = component
    this.silent = options.silent ?? false
  }

  info(action: LogAction, metadata?: Record<string, unknown>): void {
    this.log("INFO", action, metadata)
  }

  warn(action: LogAction, metadata?: Record<string, unknown>): void {
    this.log("WARN", action, metadata)
  }

  debug(action: LogAction, metadata?: Record<string, unknown>): void {
    this.log("DEBUG", action, metadata)
  }

  error(
    action: LogAction,
    error: unknown,
    metadata?: Record<string, unknown>
  ): void {
    this.log("ERROR", action, { ...metadata, error: formatError(error) })
  }

  /**
   * Builds the entry without writing it
   */
  createEntry(
    level: LogLevel,
    action: LogAction,
    metadata?: Record<string, unknown>
  ): LogEntry {
    const masked = maskSensitiveData(metadata ?? {})

    return {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      action,
      ...(isRecord(masked) ? masked : {})
    }
  }

  /**
   * Core logging function
   */
  private log(
    level: LogLevel,
    action: LogAction,
    metadata?: Record<string, unknown>
  ): void {
    if (this.silent) return

    const prefix = `[nutrition-advisor]`
    const json = JSON.stringify(this.createEntry(level, action, metadata))

    switch (level) {
      case "ERROR":
        console.error(prefix, json)
        break
      case "WARN":
        console.warn(prefix, json)
        break
      case "DEBUG":
        if (process.env.NODE_ENV === "development") {
          console.log(prefix, json)
        }
        break
      default:
        console.log(prefix, json)
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

// =============================================================================
// FACTORY FUNCTIONS
// =============================================================================

/**
 * Creates a new logger instance for a pipeline component
 */
export function createRetrievalLogger(component: string): RetrievalLogger {
  return new RetrievalLogger(component)
}

/**
 * Creates a no-op logger for testing
 */
export function createNoopLogger(): RetrievalLogger {
  return new RetrievalLogger("test", { silent: true })
}
