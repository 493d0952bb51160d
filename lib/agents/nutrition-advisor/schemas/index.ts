/**
 * Nutrition Advisor schemas
 */

export * from "./retrieval-schemas"
