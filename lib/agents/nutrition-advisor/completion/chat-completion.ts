/**
 * Chat Completion - TextCompletion backed by an OpenAI chat model
 *
 * GPT-5 models take reasoning settings instead of a temperature.
 * Every call is bounded by `timeoutMs`.
 */

import { ChatOpenAI } from "@langchain/openai"
import type { MessageContent } from "@langchain/core/messages"

import type { TextCompletion } from "../types"
import { REFORMULATION_TEMPERATURE } from "../prompts/reformulation-prompts"
import { executeWithTimeout } from "@/lib/tools/nutrition/error-handler"

// =============================================================================
// Types
// =============================================================================

export interface ChatCompletionOptions {
  /** Default: gpt-5-mini */
  model?: string
  /** Default: 10000 */
  timeoutMs?: number
  /** Ignored for GPT-5 models */
  temperature?: number
  /** Client-side retries inside the SDK (default: 2) */
  maxRetries?: number
  apiKey?: string
}

export const DEFAULT_CHAT_MODEL = "gpt-5-mini"
export const DEFAULT_COMPLETION_TIMEOUT_MS = 10000

// =============================================================================
// Content Flattening
// =============================================================================

/**
 * Message content as plain text; non-text parts are dropped
 */
export function messageContentToText(content: MessageContent): string {
  if (typeof content === "string") {
    return content
  }

  return content
    .map(part => {
      if (typeof part === "string") return part
      if ("text" in part && typeof part.text === "string") return part.text
      return ""
    })
    .join("")
}

// =============================================================================
// Factory
// =============================================================================

export function createChatCompletion(
  options: ChatCompletionOptions = {}
): TextCompletion {
  const model = options.model ?? DEFAULT_CHAT_MODEL
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMPLETION_TIMEOUT_MS
  const isGpt5Model = model.startsWith("gpt-5")

  const llm = new ChatOpenAI({
    modelName: model,
    timeout: timeoutMs,
    maxRetries: options.maxRetries ?? 2,
    apiKey: options.apiKey,
    tags: ["nutrition-advisor", "rag", "completion"],
    ...(isGpt5Model
      ? {
          modelKwargs: {
            reasoning: { effort: "low" }
          }
        }
      : {
          temperature: options.temperature ?? REFORMULATION_TEMPERATURE
        })
  })

  return {
    async complete(prompt: string): Promise<string> {
      const response = await executeWithTimeout(
        llm.invoke(prompt),
        timeoutMs,
        "completion"
      )
      return messageContentToText(response.content)
    }
  }
}
