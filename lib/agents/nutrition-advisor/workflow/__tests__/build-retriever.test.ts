/**
 * Retriever Wiring Tests
 */

import { describe, it, expect, vi, afterEach } from "vitest"

const { mockCreateClient } = vi.hoisted(() => ({
  mockCreateClient: vi.fn(() => ({ rpc: vi.fn() }))
}))

vi.mock("@supabase/supabase-js", () => ({
  createClient: mockCreateClient
}))

import {
  createDefaultNutritionAdvisorRetriever,
  createNutritionAdvisorRetriever
} from "../build-retriever"
import { ConfigError, parseRetrievalConfig } from "../../config"
import { DocumentReRanker } from "../../nodes/rag/document-reranker"
import {
  createFakeCompletion,
  createFakeSearch,
  fixedClock,
  knowledgeBase
} from "../../nodes/rag/__tests__/fixtures"
import { createNoopLogger } from "@/lib/tools/nutrition/logger"

const logger = createNoopLogger()

describe("createNutritionAdvisorRetriever", () => {
  it("should disable reformulation without a completion model", () => {
    const { similaritySearch } = createFakeSearch(knowledgeBase)

    const retriever = createNutritionAdvisorRetriever(parseRetrievalConfig(), {
      search: similaritySearch,
      logger
    })

    expect(retriever.useReformulation).toBe(false)
    expect(retriever.reformulator).toBeUndefined()
    expect(retriever.retriever.reranker).toBeUndefined()
    expect(retriever.k).toBe(4)
  })

  it("should attach a reformulator when a completion model is given", () => {
    const { similaritySearch } = createFakeSearch(knowledgeBase)
    const { completion } = createFakeCompletion("vitamin D sources")

    const retriever = createNutritionAdvisorRetriever(
      parseRetrievalConfig({ maxQueries: 3, includeOriginal: false }),
      { search: similaritySearch, completion, logger }
    )

    expect(retriever.useReformulation).toBe(true)
    expect(retriever.maxQueries).toBe(3)
    expect(retriever.reformulator?.includeOriginal).toBe(false)
  })

  it("should keep reformulation off when the config says so", () => {
    const { similaritySearch } = createFakeSearch(knowledgeBase)
    const { completion } = createFakeCompletion("vitamin D sources")

    const retriever = createNutritionAdvisorRetriever(
      parseRetrievalConfig({ useReformulation: false }),
      { search: similaritySearch, completion, logger }
    )

    expect(retriever.useReformulation).toBe(false)
  })

  it("should configure the re-ranker from the config", () => {
    const { similaritySearch } = createFakeSearch(knowledgeBase)

    const retriever = createNutritionAdvisorRetriever(
      parseRetrievalConfig({
        useReranking: true,
        rerankTopN: 8,
        maxAgeDays: 90
      }),
      { search: similaritySearch, logger }
    )

    const reranker = retriever.retriever.reranker
    expect(reranker).toBeInstanceOf(DocumentReRanker)
    if (!(reranker instanceof DocumentReRanker)) return
    expect(reranker.config.topNToRerank).toBe(8)
    expect(reranker.config.maxAgeDays).toBe(90)
    expect(retriever.retriever.useReranking).toBe(true)
  })

  it("should fan out over reformulated queries and rank by the original", async () => {
    const { similaritySearch, search } = createFakeSearch(knowledgeBase)
    const { completion } = createFakeCompletion(
      "1. vitamin D food sources\n2. vitamin D deficiency symptoms"
    )

    const retriever = createNutritionAdvisorRetriever(
      parseRetrievalConfig({ k: 2 }),
      { search: similaritySearch, completion, now: fixedClock, logger }
    )

    const results = await retriever.retrieve(
      "What are the health benefits of vitamin D?"
    )

    expect(search.mock.calls.map(call => call[0])).toEqual([
      "What are the health benefits of vitamin D?",
      "vitamin D food sources",
      "vitamin D deficiency symptoms"
    ])
    expect(results).toEqual([knowledgeBase[0], knowledgeBase[4]])
  })
})

describe("createDefaultNutritionAdvisorRetriever", () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it("should reject an invalid environment", () => {
    expect(() =>
      createDefaultNutritionAdvisorRetriever({ NUTRITION_K: "-1" })
    ).toThrow(ConfigError)
  })

  it("should require Supabase credentials in the given environment", () => {
    vi.stubEnv("SUPABASE_URL", "http://localhost:54321")
    vi.stubEnv("SUPABASE_SERVICE_ROLE_KEY", "test-key")

    expect(() =>
      createDefaultNutritionAdvisorRetriever({
        NUTRITION_USE_REFORMULATION: "false"
      })
    ).toThrow("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set")
  })

  it("should read Supabase credentials from the given environment", () => {
    vi.stubEnv("SUPABASE_URL", "")
    vi.stubEnv("SUPABASE_SERVICE_ROLE_KEY", "")

    const retriever = createDefaultNutritionAdvisorRetriever({
      SUPABASE_URL: "http://localhost:54321",
      SUPABASE_SERVICE_ROLE_KEY: "test-key",
      NUTRITION_USE_REFORMULATION: "false"
    })

    expect(mockCreateClient).toHaveBeenCalledWith(
      "http://localhost:54321",
      "test-key"
    )
    expect(retriever.useReformulation).toBe(false)
  })
})
