import { HNSWLib } from '@langchain/community/vectorstores/hnswlib'
import type { EmbeddingsInterface } from '@langchain/core/embeddings'
import fs from 'fs/promises'
import path from 'path'
import type { SearchResult } from '../types/rag.types'

// Files HNSWLib.save writes into the store directory
const INDEX_FILES = ['args.json', 'docstore.json', 'hnswlib.index']

export class VectorStoreService {
  constructor(
    private readonly embeddings: EmbeddingsInterface,
    private readonly storePath: string
  ) {}

  /**
   * Replaces whatever is stored at the store path with an index built from
   * `chunks` alone. The previous index is removed even when `chunks` is empty.
   */
  async rebuild(chunks: string[]): Promise<void> {
    await this.clearVectorStore()

    if (chunks.length === 0) {
      throw new Error('No text chunks to index')
    }

    const vectorStore = await HNSWLib.fromTexts(chunks, {}, this.embeddings)
    await fs.mkdir(this.storePath, { recursive: true })
    await vectorStore.save(this.storePath)

    console.log(`Indexed ${chunks.length} chunks into ${this.storePath}`)
  }

  async search(query: string, k: number = 4): Promise<SearchResult[]> {
    const vectorStore = await this.loadVectorStore()
    const results = await vectorStore.similaritySearchWithScore(query, k)

    return results.map(([doc, score]) => ({
      content: doc.pageContent,
      score
    }))
  }

  private async clearVectorStore(): Promise<void> {
    await fs.rm(this.storePath, { recursive: true, force: true })
  }

  private async loadVectorStore(): Promise<HNSWLib> {
    try {
      await Promise.all(INDEX_FILES.map(file => fs.access(path.join(this.storePath, file))))
    } catch (error) {
      throw new Error(`Vector store not found at ${this.storePath}`, { cause: error })
    }

    return HNSWLib.load(this.storePath, this.embeddings)
  }
}
