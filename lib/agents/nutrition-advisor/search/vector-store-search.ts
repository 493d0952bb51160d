/**
 * Vector Store Search - adapts a LangChain vector store to SimilaritySearch
 */

import type { VectorStoreInterface } from "@langchain/core/vectorstores"

import type { NutritionDocument, SimilaritySearch } from "../types"

export type SimilaritySearchStore = Pick<
  VectorStoreInterface,
  "similaritySearch"
>

export class VectorStoreSearch implements SimilaritySearch {
  private readonly store: SimilaritySearchStore
  private readonly limit: number

  /**
   * @param limit - Candidates requested per query (default: 10)
   */
  constructor(store: SimilaritySearchStore, limit: number = 10) {
    this.store = store
    this.limit = limit
  }

  async search(query: string): Promise<NutritionDocument[]> {
    const documents = await this.store.similaritySearch(query, this.limit)
    return documents.map(doc => ({
      content: doc.pageContent,
      metadata: { ...doc.metadata }
    }))
  }
}
