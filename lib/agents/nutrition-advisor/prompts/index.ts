/**
 * Nutrition Advisor prompts
 */

export * from "./reformulation-prompts"
