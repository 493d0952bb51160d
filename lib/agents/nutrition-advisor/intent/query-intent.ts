/**
 * Query Intent Detection
 *
 * Keyword-triggered, additive intent scores. Each rule contributes its
 * increment at most once per query, however many of its terms match.
 */

import type { IntentLabel, QueryIntent } from "../types"
import {
  GENERAL_NUTRITION_FALLBACK,
  INTENT_LABELS,
  INTENT_RULES
} from "./intent-terms"

/**
 * Returns a fresh intent map with every label at zero
 */
export function createEmptyIntent(): QueryIntent {
  return {
    nutrient_info: 0,
    food_sources: 0,
    health_condition: 0,
    recipe: 0,
    general_nutrition: 0,
    comparison: 0,
    dietary_restriction: 0
  }
}

/**
 * Detects the purposes of a query
 *
 * @param query - Raw user query
 * @returns Confidence per intent; `general_nutrition` is 0.5 when nothing fires
 */
export function detectQueryIntent(query: string): QueryIntent {
  const queryLower = query.toLowerCase()
  const intent = createEmptyIntent()

  for (const rule of INTENT_RULES) {
    if (rule.terms.some(term => queryLower.includes(term))) {
      intent[rule.intent] += rule.increment
    }
  }

  if (INTENT_LABELS.every(label => intent[label] === 0)) {
    intent.general_nutrition = GENERAL_NUTRITION_FALLBACK
  }

  return intent
}

/**
 * Intent with the highest confidence. Ties go to the label listed first.
 */
export function getDominantIntent(intent: QueryIntent): IntentLabel {
  return INTENT_LABELS.reduce((best, label) =>
    intent[label] > intent[best] ? label : best
  )
}
