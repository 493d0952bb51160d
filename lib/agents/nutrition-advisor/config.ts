/**
 * Retrieval Configuration
 *
 * Reads NUTRITION_* environment variables into a validated config.
 *
 * | Variable                         | Default                   |
 * |----------------------------------|---------------------------|
 * | NUTRITION_MODEL                  | gpt-5-mini                |
 * | NUTRITION_COMPLETION_TIMEOUT_MS  | 10000                     |
 * | NUTRITION_K                      | 4                         |
 * | NUTRITION_MAX_QUERIES            | 4                         |
 * | NUTRITION_INCLUDE_ORIGINAL       | true                      |
 * | NUTRITION_USE_REFORMULATION      | true                      |
 * | NUTRITION_USE_RERANKING          | false                     |
 * | NUTRITION_RERANK_TOP_N           | 20                        |
 * | NUTRITION_MAX_AGE_DAYS           | 365                       |
 * | NUTRITION_SEARCH_LIMIT           | 10                        |
 * | NUTRITION_MATCH_THRESHOLD        | 0.5                       |
 * | NUTRITION_MATCH_FUNCTION         | match_nutrition_documents |
 */

import { z } from "zod"

import { DEFAULT_MATCH_FUNCTION } from "./search/supabase-similarity-search"

// =============================================================================
// Schema
// =============================================================================

const positiveInt = (fallback: number) =>
  z.coerce
    .number({ invalid_type_error: "must be a number" })
    .int("must be an integer")
    .positive("must be positive")
    .default(fallback)

const flag = (fallback: boolean) =>
  z
    .union([z.boolean(), z.enum(["true", "false"])], {
      errorMap: () => ({ message: "must be true or false" })
    })
    .transform(value => value === true || value === "true")
    .default(fallback)

export const RetrievalConfigSchema = z.object({
  model: z.string().min(1).default("gpt-5-mini"),
  completionTimeoutMs: positiveInt(10000),
  k: positiveInt(4),
  maxQueries: positiveInt(4),
  includeOriginal: flag(true),
  useReformulation: flag(true),
  useReranking: flag(false),
  rerankTopN: positiveInt(20),
  maxAgeDays: positiveInt(365),
  searchLimit: positiveInt(10),
  matchThreshold: z.coerce
    .number({ invalid_type_error: "must be a number" })
    .min(0, "must be between 0 and 1")
    .max(1, "must be between 0 and 1")
    .default(0.5),
  matchFunction: z.string().min(1).default(DEFAULT_MATCH_FUNCTION)
})

export type RetrievalConfig = z.output<typeof RetrievalConfigSchema>
export type RetrievalConfigInput = z.input<typeof RetrievalConfigSchema>

const ENV_KEYS: Record<keyof RetrievalConfig, string> = {
  model: "NUTRITION_MODEL",
  completionTimeoutMs: "NUTRITION_COMPLETION_TIMEOUT_MS",
  k: "NUTRITION_K",
  maxQueries: "NUTRITION_MAX_QUERIES",
  includeOriginal: "NUTRITION_INCLUDE_ORIGINAL",
  useReformulation: "NUTRITION_USE_REFORMULATION",
  useReranking: "NUTRITION_USE_RERANKING",
  rerankTopN: "NUTRITION_RERANK_TOP_N",
  maxAgeDays: "NUTRITION_MAX_AGE_DAYS",
  searchLimit: "NUTRITION_SEARCH_LIMIT",
  matchThreshold: "NUTRITION_MATCH_THRESHOLD",
  matchFunction: "NUTRITION_MATCH_FUNCTION"
}

// =============================================================================
// Errors
// =============================================================================

export class ConfigError extends Error {
  public readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid retrieval configuration: ${issues.join("; ")}`)
    this.name = "ConfigError"
    this.issues = issues
  }
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Validates a config object, filling defaults
 *
 * @throws ConfigError listing every invalid key
 */
export function parseRetrievalConfig(
  input: RetrievalConfigInput = {}
): RetrievalConfig {
  return validateConfig(input)
}

function validateConfig(input: unknown): RetrievalConfig {
  const result = RetrievalConfigSchema.safeParse(input)

  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map(e => `${e.path.join(".")}: ${e.message}`)
    )
  }

  return result.data
}

/**
 * Builds the config from environment variables. Unset or blank variables
 * take their defaults.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadRetrievalConfig(
  env: NodeJS.ProcessEnv = process.env
): RetrievalConfig {
  const raw: Record<string, string> = {}

  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey]?.trim()
    if (value) {
      raw[key] = value
    }
  }

  return validateConfig(raw)
}
