/**
 * Error Handler Tests
 *
 * Tests for error classification, retry logic, and timeout handling
 */

import { describe, it, expect, vi, afterEach } from "vitest"
import { z } from "zod"
import {
  ErrorType,
  TimeoutError,
  classifyError,
  executeWithTimeout,
  getRetryDelay,
  withRetry
} from "../error-handler"
import { EmbeddingError } from "@/lib/embeddings/types"

describe("classifyError", () => {
  it("should classify timeout errors", () => {
    const error = new TimeoutError("completion", 10000)
    const result = classifyError(error, "reformulation")

    expect(result.type).toBe(ErrorType.TIMEOUT)
    expect(result.retryable).toBe(true)
    expect(result.stage).toBe("reformulation")
    expect(result.message).toBe("completion exceeded the time limit of 10000ms")
  })

  it("should classify rate limit errors", () => {
    const result = classifyError(
      new Error("Rate limit exceeded - 429"),
      "completion"
    )

    expect(result.type).toBe(ErrorType.RATE_LIMIT)
    expect(result.retryable).toBe(true)
  })

  it("should classify API errors", () => {
    const result = classifyError(new Error("OpenAI API error 500"), "embedding")

    expect(result.type).toBe(ErrorType.API)
    expect(result.retryable).toBe(true)
  })

  it("should classify database errors", () => {
    const result = classifyError(
      new Error("Supabase query failed"),
      "similarity_search"
    )

    expect(result.type).toBe(ErrorType.DATABASE)
  })

  it("should classify network errors", () => {
    const result = classifyError(
      new Error("connect ECONNREFUSED 127.0.0.1:5432"),
      "similarity_search"
    )

    expect(result.type).toBe(ErrorType.NETWORK)
    expect(result.retryable).toBe(true)
  })

  it("should classify zod errors as validation errors", () => {
    const parsed = z.object({ content: z.string() }).safeParse({})
    expect(parsed.success).toBe(false)
    if (parsed.success) return

    const result = classifyError(parsed.error, "similarity_search")

    expect(result.type).toBe(ErrorType.VALIDATION)
    expect(result.retryable).toBe(false)
  })

  it("should classify unknown errors as retryable", () => {
    const result = classifyError(new Error("something odd"), "scoring")

    expect(result.type).toBe(ErrorType.UNKNOWN)
    expect(result.retryable).toBe(true)
    expect(result.originalError?.message).toBe("something odd")
  })

  it("should not retry embedding errors without a status", () => {
    const missingKey = classifyError(
      new EmbeddingError("OPENAI_API_KEY is not set"),
      "embedding"
    )
    const emptyText = classifyError(
      new EmbeddingError("Empty text passed to embedding generation"),
      "embedding"
    )

    expect(missingKey.type).toBe(ErrorType.VALIDATION)
    expect(missingKey.retryable).toBe(false)
    expect(emptyText.retryable).toBe(false)
  })

  it("should classify embedding errors by status code", () => {
    const classify = (status: number) =>
      classifyError(new EmbeddingError("OpenAI API error", status), "embedding")

    expect(classify(429)).toMatchObject({
      type: ErrorType.RATE_LIMIT,
      retryable: true
    })
    expect(classify(503)).toMatchObject({ type: ErrorType.API, retryable: true })
    expect(classify(401)).toMatchObject({
      type: ErrorType.VALIDATION,
      retryable: false
    })
  })

  it("should handle non-Error values", () => {
    const result = classifyError("plain failure", "reranking")

    expect(result).toEqual({
      stage: "reranking",
      type: ErrorType.UNKNOWN,
      message: "plain failure",
      retryable: true
    })
  })
})

describe("getRetryDelay", () => {
  it("should double per attempt and caps at four times the base", () => {
    expect([0, 1, 2, 3].map(attempt => getRetryDelay(attempt, 1000))).toEqual([
      1000, 2000, 4000, 4000
    ])
  })
})

describe("withRetry", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("should retry retryable errors until success", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {})
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("network glitch"))
      .mockResolvedValueOnce("ok")

    await expect(withRetry(fn, { baseDelayMs: 1 })).resolves.toBe("ok")
    expect(fn).toHaveBeenCalledTimes(2)
  })

  it("should give up after maxRetries", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {})
    const fn = vi.fn(async () => {
      throw new Error("503 service unavailable")
    })

    await expect(
      withRetry(fn, { maxRetries: 2, baseDelayMs: 1 })
    ).rejects.toThrow("503 service unavailable")
    expect(fn).toHaveBeenCalledTimes(3)
  })

  it("should not retry non-retryable errors", async () => {
    const fn = vi.fn(async () => {
      throw new Error("invalid embedding request")
    })

    await expect(withRetry(fn, { baseDelayMs: 1 })).rejects.toThrow(
      "invalid embedding request"
    )
    expect(fn).toHaveBeenCalledTimes(1)
  })
  it("should not retry embedding errors without a status", async () => {
    const fn = vi.fn(async () => {
      throw new EmbeddingError("OPENAI_API_KEY is not set")
    })

    await expect(
      withRetry(fn, { stage: "embedding", baseDelayMs: 1 })
    ).rejects.toThrow("OPENAI_API_KEY is not set")
    expect(fn).toHaveBeenCalledTimes(1)
  })
})

describe("executeWithTimeout", () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it("should resolve when the promise settles in time", async () => {
    await expect(
      executeWithTimeout(Promise.resolve("done"), 1000, "completion")
    ).resolves.toBe("done")
  })

  it("should reject with a TimeoutError after the limit", async () => {
    vi.useFakeTimers()
    const pending = executeWithTimeout(
      new Promise<string>(() => {}),
      100,
      "embedding"
    )
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError)

    await vi.advanceTimersByTimeAsync(100)
    await assertion
  })

  it("should clear its timer once the promise settles", async () => {
    vi.useFakeTimers()

    await executeWithTimeout(Promise.resolve(1), 100, "completion")

    expect(vi.getTimerCount()).toBe(0)
  })
})
