/**
 * Query Reformulator - multi-perspective query expansion
 *
 * Asks a completion model for alternative phrasings of a nutrition query
 * (nutrients, health effects, food sources, scientific framing) and parses
 * the line-oriented answer.
 *
 * Failures propagate: the enhanced retriever decides the fallback.
 */

import type { TextCompletion } from "../../types"
import {
  NUTRITION_QUERY_PROMPT,
  formatReformulationPrompt
} from "../../prompts/reformulation-prompts"
import {
  createRetrievalLogger,
  type RetrievalLogger
} from "@/lib/tools/nutrition/logger"
import {
  createRetrievalTraceOptions,
  traceable
} from "@/lib/monitoring/langsmith-setup"

// =============================================================================
// Output Parsing
// =============================================================================

/** Numbering prefixes stripped from generated lines ("1. ", "1) ", "1- ") */
const NUMBERING_SEPARATORS = [". ", ") ", "- "]

export interface OutputParser<T> {
  parse(text: string): T
}

/**
 * Parses completion output into one string per non-blank line
 */
export class LineListOutputParser implements OutputParser<string[]> {
  parse(text: string): string[] {
    const lines = text.trim().split("\n")
    const cleanLines: string[] = []

    for (const line of lines) {
      let cleaned = line.trim()
      if (!cleaned) continue

      if (
        /^\d$/.test(cleaned[0]) &&
        NUMBERING_SEPARATORS.includes(cleaned.slice(1, 3))
      ) {
        cleaned = cleaned.slice(3).trim()
      }

      cleanLines.push(cleaned)
    }

    return cleanLines
  }
}

// =============================================================================
// Reformulator
// =============================================================================

export interface QueryReformulatorOptions {
  completion: TextCompletion
  /** Template with a {question} placeholder */
  prompt?: string
  parser?: OutputParser<string[]>
  /** Prepend the original query when it is not generated verbatim (default: true) */
  includeOriginal?: boolean
  logger?: RetrievalLogger
}

export class QueryReformulator {
  readonly includeOriginal: boolean
  private readonly completion: TextCompletion
  private readonly prompt: string
  private readonly parser: OutputParser<string[]>
  private readonly logger: RetrievalLogger

  private readonly tracedRewrite = traceable(
    (originalQuery: string) => this.runRewrite(originalQuery),
    createRetrievalTraceOptions("rewrite-query", "reformulation")
  )

  constructor(options: QueryReformulatorOptions) {
    this.completion = options.completion
    this.prompt = options.prompt ?? NUTRITION_QUERY_PROMPT
    this.parser = options.parser ?? new LineListOutputParser()
    this.includeOriginal = options.includeOriginal ?? true
    this.logger = options.logger ?? createRetrievalLogger("query-reformulator")
  }

  /**
   * Rewrites the query into alternative phrasings
   *
   * @returns Original first (when included), then alternatives in generation order
   * @throws Whatever the completion call throws
   */
  rewriteQuery(originalQuery: string): Promise<string[]> {
    return this.tracedRewrite(originalQuery)
  }

  private async runRewrite(originalQuery: string): Promise<string[]> {
    const prompt = formatReformulationPrompt(originalQuery, this.prompt)
    const output = await this.completion.complete(prompt)
    const alternatives = this.parser.parse(output)

    this.logger.info("reformulation_generated", {
      query: originalQuery,
      alternatives
    })

    if (this.includeOriginal && !alternatives.includes(originalQuery)) {
      return [originalQuery, ...alternatives]
    }

    return alternatives
  }
}
