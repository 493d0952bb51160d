/**
 * Reformulation Prompts
 *
 * Placeholders:
 * - {question}: the user's original query
 */

/** Temperature for reformulation (non GPT-5 models) */
export const REFORMULATION_TEMPERATURE = 0.3

export const NUTRITION_QUERY_PROMPT = `You are an AI nutrition expert. Your task is to generate four different versions
of the given nutrition-related question to improve retrieval of relevant nutrition information.

For the question: "{question}"

Generate four different ways to ask this question, focusing on different aspects such as:
1. Specific nutrients or components involved
2. Health benefits or effects
3. Food sources or dietary considerations
4. Scientific or medical perspective

Make each query detailed and specific to improve search results. Provide these alternative
questions separated by newlines, without numbering or prefixes.`

/**
 * Fills a prompt template's {question} placeholder
 */
export function formatReformulationPrompt(
  question: string,
  template: string = NUTRITION_QUERY_PROMPT
): string {
  return template.split("{question}").join(question)
}
