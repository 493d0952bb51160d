/**
 * Query intent detection
 */

export {
  detectQueryIntent,
  createEmptyIntent,
  getDominantIntent
} from "./query-intent"

export {
  INTENT_LABELS,
  INTENT_RULES,
  GENERAL_NUTRITION_FALLBACK,
  AUTHORITY_SOURCE_FRAGMENTS,
  type IntentRule
} from "./intent-terms"
