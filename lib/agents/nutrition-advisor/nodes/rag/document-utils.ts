/**
 * Helpers for reading loosely typed document metadata and query text
 */

import type { NutritionDocument } from "../../types"

const MS_PER_DAY = 24 * 60 * 60 * 1000

/** YYYY-MM-DD, optionally followed by a time part */
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}([T ][\d:.]+(Z|[+-]\d{2}:?\d{2})?)?$/

/**
 * Reads a string metadata field; non-string values count as absent
 */
export function getMetadataString(
  document: NutritionDocument,
  key: string
): string | undefined {
  const value: unknown = document.metadata?.[key]
  return typeof value === "string" && value.length > 0 ? value : undefined
}

/**
 * Parses an ISO-8601 date string. Returns null for anything else.
 */
export function parseIsoDate(value: string | undefined): Date | null {
  if (!value || !ISO_DATE_PATTERN.test(value.trim())) {
    return null
  }

  const timestamp = Date.parse(value.trim())
  return Number.isNaN(timestamp) ? null : new Date(timestamp)
}

/**
 * Whole days elapsed between `date` and `now` (negative for future dates)
 */
export function ageInDays(date: Date, now: Date): number {
  return Math.floor((now.getTime() - date.getTime()) / MS_PER_DAY)
}

/**
 * Reads `date`, falling back to `created_at`
 */
export function getDocumentDate(document: NutritionDocument): Date | null {
  const raw =
    getMetadataString(document, "date") ??
    getMetadataString(document, "created_at")
  return parseIsoDate(raw)
}

/**
 * Lower-cased query words longer than two characters, with leading and
 * trailing punctuation removed
 */
export function extractQueryTerms(query: string): string[] {
  return query
    .toLowerCase()
    .split(/\s+/)
    .map(word => word.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ""))
    .filter(word => word.length > 2)
}

/**
 * Non-overlapping occurrences of `term` in `text`
 */
export function countOccurrences(text: string, term: string): number {
  if (!term) return 0

  let count = 0
  let index = text.indexOf(term)
  while (index !== -1) {
    count++
    index = text.indexOf(term, index + term.length)
  }
  return count
}
