import type { Server } from 'http'
import { createApp } from './app'
import { loadConfig } from './config/env'
import { AnswerService } from './services/answer.service'
import { DocumentLoaderService } from './services/documentLoader.service'
import { createChatModel, createEmbeddings } from './services/providers'
import { RAGService } from './services/rag.service'
import { SlidingWindowTextSplitter } from './services/textSplitter'
import { VectorStoreService } from './services/vectorStore.service'

/**
 * Builds every long-lived dependency from the environment and starts
 * listening. Configuration problems reject before any port is opened.
 */
export async function startServer(env: NodeJS.ProcessEnv = process.env): Promise<Server> {
  const config = loadConfig(env)

  const embeddings = createEmbeddings(config)
  const llm = createChatModel(config)

  const ragService = new RAGService({
    documentLoader: new DocumentLoaderService(),
    textSplitter: new SlidingWindowTextSplitter({
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap
    }),
    vectorStore: new VectorStoreService(embeddings, config.vectorStorePath),
    answerService: new AnswerService(llm),
    retrievalK: config.retrievalK
  })

  const app = createApp({ ragService, config })

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, () => {
      console.log(`Server running on http://localhost:${config.port}`)
      console.log(`Vector store -> ${config.vectorStorePath}`)
      resolve(server)
    })
    server.on('error', reject)
  })
}
