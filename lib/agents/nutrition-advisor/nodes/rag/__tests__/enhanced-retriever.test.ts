/**
 * Tests for enhanced-retriever.ts
 */

import { describe, it, expect } from "vitest"
import {
  EnhancedRetriever,
  createEnhancedRetrieverFromCompletion,
  deduplicateDocuments
} from "../enhanced-retriever"
import { NutritionRetriever } from "../nutrition-retriever"
import { QueryReformulator } from "../query-reformulator"
import type {
  NutritionDocument,
  SimilaritySearch,
  TextCompletion
} from "../../../types"
import { createNoopLogger } from "@/lib/tools/nutrition/logger"
import {
  createFakeCompletion,
  createFakeSearch,
  doc,
  fixedClock,
  knowledgeBase
} from "./fixtures"

// =============================================================================
// Helpers
// =============================================================================

const QUESTION = "What are the health benefits of vitamin D?"

const [vitaminD, protein, iron, , vitaminC] = knowledgeBase

const createEnhanced = (
  search: SimilaritySearch,
  completion: TextCompletion | undefined,
  options: {
    k?: number
    maxQueries?: number
    useReformulation?: boolean
    parallelFanOut?: boolean
  } = {}
) => {
  const logger = createNoopLogger()
  const { k = 3, ...enhancedOptions } = options

  return new EnhancedRetriever({
    retriever: new NutritionRetriever({ search, k, now: fixedClock, logger }),
    reformulator: completion
      ? new QueryReformulator({ completion, logger })
      : undefined,
    logger,
    ...enhancedOptions
  })
}

const searchedQueries = (calls: Array<[string]>) => calls.map(call => call[0])

// =============================================================================
// deduplicateDocuments
// =============================================================================

describe("deduplicateDocuments", () => {
  it("should collapse repeated content to one document", () => {
    const repeated = doc("same text")

    expect(deduplicateDocuments([repeated, repeated, repeated])).toEqual([
      repeated
    ])
  })

  it("should keep the first position and the last value of a duplicate", () => {
    const first = doc("iron text", { source: "first" })
    const other = doc("zinc text")
    const last = doc("iron text", { source: "last" })

    const unique = deduplicateDocuments([first, other, last])

    expect(unique).toHaveLength(2)
    expect(unique[0]).toBe(last)
    expect(unique[1]).toBe(other)
  })

  it("should be idempotent", () => {
    const documents = [...knowledgeBase, ...knowledgeBase]
    const once = deduplicateDocuments(documents)

    expect(deduplicateDocuments(once)).toEqual(once)
    expect(once).toEqual(knowledgeBase)
  })
})

// =============================================================================
// EnhancedRetriever
// =============================================================================

describe("EnhancedRetriever", () => {
  it("should delegate to the hybrid retriever when reformulation is disabled", async () => {
    const { similaritySearch, search } = createFakeSearch(knowledgeBase)
    const { completion, complete } = createFakeCompletion("alt")
    const retriever = createEnhanced(similaritySearch, completion, {
      useReformulation: false
    })

    const documents = await retriever.retrieve(QUESTION)

    expect(documents).toEqual([vitaminD, vitaminC, iron])
    expect(complete).not.toHaveBeenCalled()
    expect(search).toHaveBeenCalledTimes(1)
  })

  it("should delegate when no reformulator is configured", async () => {
    const { similaritySearch, search } = createFakeSearch(knowledgeBase)
    const retriever = createEnhanced(similaritySearch, undefined)

    expect(await retriever.retrieve(QUESTION)).toEqual([
      vitaminD,
      vitaminC,
      iron
    ])
    expect(searchedQueries(search.mock.calls)).toEqual([QUESTION])
  })

  it("should search the original query alone when reformulation fails", async () => {
    const { similaritySearch, search } = createFakeSearch(knowledgeBase)
    const { completion } = createFakeCompletion(new Error("rate limit"))
    const retriever = createEnhanced(similaritySearch, completion)

    const documents = await retriever.retrieve(QUESTION)

    expect(searchedQueries(search.mock.calls)).toEqual([QUESTION])
    expect(documents).toEqual([vitaminD, vitaminC, iron])
  })

  it("should cap the fan-out at maxQueries, original first", async () => {
    const { similaritySearch, search } = createFakeSearch(knowledgeBase)
    const { completion } = createFakeCompletion("a1\na2\na3\na4\na5")
    const retriever = createEnhanced(similaritySearch, completion, {
      maxQueries: 4
    })

    await retriever.retrieve(QUESTION)

    expect(searchedQueries(search.mock.calls)).toEqual([
      QUESTION,
      "a1",
      "a2",
      "a3"
    ])
  })

  it("should deduplicate documents found by several queries", async () => {
    const { similaritySearch } = createFakeSearch(knowledgeBase)
    const { completion } = createFakeCompletion("a1\na2\na3")
    const retriever = createEnhanced(similaritySearch, completion, { k: 10 })

    const documents = await retriever.retrieve(QUESTION)

    expect(documents).toHaveLength(knowledgeBase.length)
    expect(new Set(documents.map(d => d.content)).size).toBe(
      knowledgeBase.length
    )
  })

  it("should rank the merged results against the original query", async () => {
    const resultsByQuery: Record<string, NutritionDocument[]> = {
      [QUESTION]: [iron],
      "protein for bones": [protein],
      "vitamin D sunlight": [vitaminD]
    }
    const { similaritySearch } = createFakeSearch(
      query => resultsByQuery[query] ?? []
    )
    const { completion } = createFakeCompletion(
      "protein for bones\nvitamin D sunlight"
    )
    const retriever = createEnhanced(similaritySearch, completion)

    expect(await retriever.retrieve(QUESTION)).toEqual([
      vitaminD,
      iron,
      protein
    ])
  })

  it("should skip a variant whose search fails", async () => {
    const { similaritySearch } = createFakeSearch(query => {
      if (query === "a1") throw new Error("network down")
      return query === "a2" ? [protein] : [vitaminD]
    })
    const { completion } = createFakeCompletion("a1\na2")
    const retriever = createEnhanced(similaritySearch, completion)

    expect(await retriever.retrieve(QUESTION)).toEqual([vitaminD, protein])
  })

  it("should return the same documents with a parallel fan-out", async () => {
    const { similaritySearch } = createFakeSearch(query =>
      query === "a2" ? [protein, iron] : [vitaminD, vitaminC]
    )
    const { completion } = createFakeCompletion("a1\na2")

    const sequential = await createEnhanced(similaritySearch, completion, {
      k: 10
    }).retrieve(QUESTION)
    const parallel = await createEnhanced(similaritySearch, completion, {
      k: 10,
      parallelFanOut: true
    }).retrieve(QUESTION)

    expect(parallel).toEqual(sequential)
    expect(parallel).toEqual([vitaminD, vitaminC, iron, protein])
  })

  it("should return no documents when every search fails", async () => {
    const { similaritySearch } = createFakeSearch(() => {
      throw new Error("database unavailable")
    })
    const { completion } = createFakeCompletion("a1")
    const retriever = createEnhanced(similaritySearch, completion)

    await expect(retriever.retrieve(QUESTION)).resolves.toEqual([])
  })
})

describe("createEnhancedRetrieverFromCompletion", () => {
  it("should wire a reformulator from the completion", async () => {
    const { similaritySearch, search } = createFakeSearch(knowledgeBase)
    const { completion } = createFakeCompletion("alt one")

    const retriever = createEnhancedRetrieverFromCompletion(
      similaritySearch,
      completion,
      { k: 2, maxQueries: 3, now: fixedClock, logger: createNoopLogger() }
    )

    const documents = await retriever.retrieve(QUESTION)

    expect(retriever.k).toBe(2)
    expect(retriever.maxQueries).toBe(3)
    expect(searchedQueries(search.mock.calls)).toEqual([QUESTION, "alt one"])
    expect(documents).toEqual([vitaminD, vitaminC])
  })
})
