import express, { Express, Request, Response } from 'express'
import cors from 'cors'
import type { AppConfig } from './config/env'
import { createRagRouter } from './routes/rag.routes'
import { RAGService } from './services/rag.service'

export const SERVICE_NAME = 'Ask Docs API'
export const SERVICE_VERSION = '1.0.0'

export interface AppDeps {
  ragService: RAGService
  config: Pick<AppConfig, 'frontendUrl' | 'uploadDir' | 'maxFileSize'>
}

export function createApp({ ragService, config }: AppDeps): Express {
  const app = express()

  // Middleware
  app.use(cors({
    origin: config.frontendUrl
  }))

  app.use('/', createRagRouter(ragService, {
    uploadDir: config.uploadDir,
    maxFileSize: config.maxFileSize
  }))

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', name: SERVICE_NAME, version: SERVICE_VERSION })
  })

  return app
}
