/**
 * Trigger vocabularies for query-intent detection and metadata boosting
 */

import type { IntentLabel } from "../types"

export const INTENT_LABELS: readonly IntentLabel[] = [
  "nutrient_info",
  "food_sources",
  "health_condition",
  "recipe",
  "general_nutrition",
  "comparison",
  "dietary_restriction"
] as const

export interface IntentRule {
  intent: IntentLabel
  /** Matched as lower-case substrings of the query */
  terms: readonly string[]
  /** Added once when any term matches */
  increment: number
}

export const INTENT_RULES: readonly IntentRule[] = [
  {
    intent: "nutrient_info",
    terms: [
      "vitamin",
      "mineral",
      "protein",
      "carbohydrate",
      "fat",
      "omega",
      "calcium",
      "iron",
      "zinc",
      "magnesium",
      "potassium"
    ],
    increment: 0.3
  },
  {
    intent: "food_sources",
    terms: ["source", "food", "contain", "rich in", "high in"],
    increment: 0.3
  },
  {
    intent: "health_condition",
    terms: [
      "deficiency",
      "health",
      "condition",
      "disease",
      "symptom",
      "prevent",
      "improve",
      "boost",
      "benefit"
    ],
    increment: 0.2
  },
  {
    intent: "recipe",
    terms: ["recipe", "make", "cook", "prepare", "meal"],
    increment: 0.4
  },
  {
    intent: "comparison",
    terms: ["vs", "versus", "compared to", "difference", "better"],
    increment: 0.3
  },
  {
    intent: "dietary_restriction",
    terms: [
      "vegan",
      "vegetarian",
      "keto",
      "paleo",
      "gluten",
      "lactose",
      "allergy",
      "intolerance",
      "diet"
    ],
    increment: 0.3
  },
  {
    intent: "general_nutrition",
    terms: ["nutrition", "nutrient", "healthy eating"],
    increment: 0.5
  }
]

/** Fallback confidence when no trigger fires */
export const GENERAL_NUTRITION_FALLBACK = 0.5

/** Source fragments boosted for health-condition queries */
export const AUTHORITY_SOURCE_FRAGMENTS = [
  "nih.gov",
  "cdc.gov",
  "who.int",
  "mayoclinic"
] as const
