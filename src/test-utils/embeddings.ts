import { Embeddings } from '@langchain/core/embeddings'

const DIMENSIONS = 64

function hashToken(token: string): number {
  let hash = 0
  for (let i = 0; i < token.length; i++) {
    hash = (hash * 31 + token.charCodeAt(i)) >>> 0
  }
  return hash % (DIMENSIONS - 1)
}

/**
 * Deterministic bag-of-words embeddings: each lowercase word bumps one
 * bucket, and the result is scaled to unit length. Identical texts always get
 * identical vectors.
 */
export class HashingEmbeddings extends Embeddings {
  public documentCalls = 0
  public queryCalls = 0

  constructor() {
    super({})
  }

  embed(text: string): number[] {
    const vector = new Array<number>(DIMENSIONS).fill(0)
    // Reserved bucket keeps word-less text away from the zero vector
    vector[DIMENSIONS - 1] = 0.01

    for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      vector[hashToken(token)] += 1
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0))
    return vector.map(value => value / norm)
  }

  async embedDocuments(documents: string[]): Promise<number[][]> {
    this.documentCalls++
    return documents.map(document => this.embed(document))
  }

  async embedQuery(document: string): Promise<number[]> {
    this.queryCalls++
    return this.embed(document)
  }
}

export class FailingEmbeddings extends Embeddings {
  constructor(
    private readonly failOn: 'documents' | 'query' = 'documents',
    private readonly inner = new HashingEmbeddings()
  ) {
    super({})
  }

  async embedDocuments(documents: string[]): Promise<number[][]> {
    if (this.failOn === 'documents') {
      throw new Error('embedding service unavailable')
    }
    return this.inner.embedDocuments(documents)
  }

  async embedQuery(document: string): Promise<number[]> {
    if (this.failOn === 'query') {
      throw new Error('embedding service unavailable')
    }
    return this.inner.embedQuery(document)
  }
}
