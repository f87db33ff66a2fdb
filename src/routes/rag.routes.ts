import { Router, Request, Response } from 'express'
import formidable, { type File } from 'formidable'
import fs from 'fs/promises'
import {
  RequestValidationError,
  getErrorMessage,
  toErrorResponse,
  type ErrorResponse
} from '../errors'
import { RAGService } from '../services/rag.service'
import type { RAGResponse, UploadedDocument } from '../types/rag.types'

export interface RagRouterOptions {
  uploadDir: string
  maxFileSize: number
}

const isPdf = (file: File) =>
  file.mimetype === 'application/pdf' || /\.pdf$/i.test(file.originalFilename ?? '')

async function parseForm(req: Request, options: RagRouterOptions) {
  if (!req.is('multipart/form-data')) {
    throw new RequestValidationError('Request body must be multipart/form-data')
  }

  await fs.mkdir(options.uploadDir, { recursive: true })

  const form = formidable({
    uploadDir: options.uploadDir,
    keepExtensions: true,
    maxFileSize: options.maxFileSize
  })

  try {
    return await form.parse(req)
  } catch (error) {
    throw new RequestValidationError(`Failed to parse upload: ${getErrorMessage(error)}`, error)
  }
}

async function removeUploads(files: File[]): Promise<void> {
  const results = await Promise.allSettled(
    files.map(file => fs.rm(file.filepath, { force: true }))
  )
  for (const result of results) {
    if (result.status === 'rejected') {
      console.error('Failed to delete uploaded file:', result.reason)
    }
  }
}

export function createRagRouter(ragService: RAGService, options: RagRouterOptions): Router {
  const router = Router()

  router.get('/', (req: Request, res: Response) => {
    res.json({ message: 'Welcome to the Ask Docs API!' })
  })

  // Upload one or more PDFs and ask a question about their content
  router.post('/ask_question/', async (req: Request, res: Response) => {
    let uploaded: File[] = []
    let statusCode = 200
    let body: RAGResponse | ErrorResponse['body']

    try {
      const [fields, files] = await parseForm(req, options)
      uploaded = Object.values(files).flatMap(list => list ?? [])

      const question = fields.user_question?.[0]?.trim()
      if (!question) {
        throw new RequestValidationError('user_question is required')
      }

      const pdfFiles = files.pdf_files ?? []
      if (pdfFiles.length === 0) {
        throw new RequestValidationError('pdf_files: at least one PDF file is required')
      }

      const unsupported = pdfFiles.find(file => !isPdf(file))
      if (unsupported) {
        throw new RequestValidationError(
          `Unsupported file type: ${unsupported.originalFilename ?? 'unknown'}. Only PDF files are accepted.`
        )
      }

      const documents: UploadedDocument[] = pdfFiles.map(file => ({
        filepath: file.filepath,
        filename: file.originalFilename || 'unknown'
      }))
      console.log('Processing question over files:', documents.map(doc => doc.filename).join(', '))

      body = await ragService.ask(question, documents)
    } catch (error) {
      console.error('Ask question error:', error)
      const response = toErrorResponse(error)
      statusCode = response.statusCode
      body = response.body
    }

    // Uploads are gone before the client sees the response
    await removeUploads(uploaded)
    res.status(statusCode).json(body)
  })

  return router
}
