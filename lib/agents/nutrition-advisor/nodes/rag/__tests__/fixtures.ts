/**
 * Shared test data for the RAG node tests
 */

import { vi } from "vitest"
import type {
  NutritionDocument,
  SimilaritySearch,
  TextCompletion
} from "../../../types"

export const NOW = new Date("2024-06-01T00:00:00Z")

export const fixedClock = (): Date => NOW

export const doc = (
  content: string,
  metadata: NutritionDocument["metadata"] = {}
): NutritionDocument => ({ content, metadata })

export const sampleDocs: NutritionDocument[] = [
  doc(
    "Vitamin C is an antioxidant found in citrus fruits such as oranges, kiwis and grapefruit.",
    { source: "nutrition_sample", type: "vitamin", date: "2024-06-01" }
  ),
  doc("Protein supports muscle repair and is found in eggs, beans and fish.", {
    source: "nutrition_sample",
    type: "macronutrient"
  }),
  doc(
    "Iron deficiency causes fatigue and anemia; spinach and lentils provide iron.",
    { source: "nih.gov", type: "mineral", date: "2021-01-01" }
  ),
  doc("A varied diet mixes fruits, vegetables, grains and proteins.", {
    source: "general",
    type: "diet_advice"
  })
]

/**
 * Knowledge base used by the retriever tests
 */
export const knowledgeBase: NutritionDocument[] = [
  doc(
    "Vitamin D helps the body absorb calcium and supports bone health. Sunlight and fatty fish are good sources.",
    { source: "nih.gov", type: "vitamin", name: "Vitamin D" }
  ),
  doc(
    "Protein needs vary with age and activity. Eggs, lentils and yogurt are protein-rich foods.",
    { source: "nutrition.org", type: "food", name: "Protein" }
  ),
  doc(
    "Iron is needed to make hemoglobin. Low iron leads to tiredness and anemia.",
    { source: "mayoclinic.org", type: "mineral", name: "Iron" }
  ),
  doc(
    "A balanced plate is half vegetables and fruit, a quarter grains and a quarter protein.",
    { source: "health.org", type: "general", name: "Balanced Plate" }
  ),
  doc(
    "Vitamin C supports the immune system and helps wounds heal. Peppers and oranges are rich sources.",
    { source: "cdc.gov", type: "vitamin", name: "Vitamin C" }
  )
]

/**
 * Search returning fixed results, recording every query
 */
export function createFakeSearch(
  results: NutritionDocument[] | ((query: string) => NutritionDocument[])
) {
  const search = vi.fn(async (query: string) =>
    typeof results === "function" ? results(query) : results
  )
  const similaritySearch: SimilaritySearch = { search }
  return { similaritySearch, search }
}

export function createFakeCompletion(output: string | Error) {
  const complete = vi.fn(async (_prompt: string) => {
    if (output instanceof Error) {
      throw output
    }
    return output
  })
  const completion: TextCompletion = { complete }
  return { completion, complete }
}
