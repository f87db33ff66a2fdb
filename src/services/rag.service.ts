import {
  AskDocsError,
  ChunkingError,
  ExtractionError,
  GenerationError,
  IndexingError,
  RetrievalError,
  getErrorMessage
} from '../errors'
import type { RAGResponse, UploadedDocument } from '../types/rag.types'
import { IndexLock } from '../utils/indexLock'
import { AnswerService } from './answer.service'
import { DocumentLoaderService } from './documentLoader.service'
import { SlidingWindowTextSplitter } from './textSplitter'
import { VectorStoreService } from './vectorStore.service'

export interface RAGServiceDeps {
  documentLoader: DocumentLoaderService
  textSplitter: SlidingWindowTextSplitter
  vectorStore: VectorStoreService
  answerService: AnswerService
  retrievalK: number
  indexLock?: IndexLock
}

type StageErrorFactory = (message: string, cause: unknown) => AskDocsError

/**
 * Runs `fn` and rewraps anything it throws as the stage's error type. Errors
 * that already carry a stage pass through untouched.
 */
async function runStage<T>(
  fn: () => Promise<T>,
  toError: StageErrorFactory
): Promise<T> {
  try {
    return await fn()
  } catch (error) {
    if (error instanceof AskDocsError) {
      throw error
    }
    throw toError(getErrorMessage(error), error)
  }
}

export class RAGService {
  private readonly documentLoader: DocumentLoaderService
  private readonly textSplitter: SlidingWindowTextSplitter
  private readonly vectorStore: VectorStoreService
  private readonly answerService: AnswerService
  private readonly retrievalK: number
  private readonly indexLock: IndexLock

  constructor(deps: RAGServiceDeps) {
    this.documentLoader = deps.documentLoader
    this.textSplitter = deps.textSplitter
    this.vectorStore = deps.vectorStore
    this.answerService = deps.answerService
    this.retrievalK = deps.retrievalK
    this.indexLock = deps.indexLock ?? new IndexLock()
  }

  async ask(question: string, documents: UploadedDocument[]): Promise<RAGResponse> {
    // 1. Extract
    const text = await runStage(
      () => this.documentLoader.extractText(documents),
      (message, cause) => new ExtractionError(`Failed to extract text: ${message}`, cause)
    )

    // 2. Chunk
    const chunks = await runStage(
      () => this.textSplitter.splitText(text),
      (message, cause) => new ChunkingError(`Failed to split text: ${message}`, cause)
    )
    console.log(`Split ${text.length} characters into ${chunks.length} chunks`)

    // 3-4. Rebuild the index and query it before anyone else can rebuild it
    const searchResults = await this.indexLock.runExclusive(async () => {
      await runStage(
        () => this.vectorStore.rebuild(chunks),
        (message, cause) => new IndexingError(`Failed to build vector index: ${message}`, cause)
      )

      return runStage(
        () => this.vectorStore.search(question, this.retrievalK),
        (message, cause) => new RetrievalError(`Failed to search vector index: ${message}`, cause)
      )
    })
    console.log(`Retrieved ${searchResults.length} chunks for question`)

    // 5. Answer
    const answer = await runStage(
      () => this.answerService.generate(question, searchResults.map(result => result.content)),
      (message, cause) => new GenerationError(`Failed to generate answer: ${message}`, cause)
    )

    return { answer }
  }
}
