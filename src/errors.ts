export type PipelineStage =
  | 'config'
  | 'request'
  | 'extract'
  | 'chunk'
  | 'index'
  | 'retrieve'
  | 'generate'
  | 'unknown'

/**
 * Base class for every failure the service reports. Each subclass pins the
 * pipeline stage it belongs to and the HTTP status it maps to. Failures while
 * answering a question all map to 400; `stage` tells them apart.
 */
export class AskDocsError extends Error {
  public readonly stage: PipelineStage
  public readonly statusCode: number

  constructor(
    message: string,
    options: {
      stage: PipelineStage
      statusCode: number
      cause?: unknown
    }
  ) {
    super(message, { cause: options.cause })
    this.name = 'AskDocsError'
    this.stage = options.stage
    this.statusCode = options.statusCode
  }
}

/** Missing credential, invalid setting or a provider that cannot be constructed. */
export class ConfigError extends AskDocsError {
  constructor(message: string, cause?: unknown) {
    super(message, { stage: 'config', statusCode: 500, cause })
    this.name = 'ConfigError'
  }
}

export class RequestValidationError extends AskDocsError {
  constructor(message: string, cause?: unknown) {
    super(message, { stage: 'request', statusCode: 400, cause })
    this.name = 'RequestValidationError'
  }
}

export class ExtractionError extends AskDocsError {
  constructor(message: string, cause?: unknown) {
    super(message, { stage: 'extract', statusCode: 400, cause })
    this.name = 'ExtractionError'
  }
}

export class ChunkingError extends AskDocsError {
  constructor(message: string, cause?: unknown) {
    super(message, { stage: 'chunk', statusCode: 400, cause })
    this.name = 'ChunkingError'
  }
}

export class IndexingError extends AskDocsError {
  constructor(message: string, cause?: unknown) {
    super(message, { stage: 'index', statusCode: 400, cause })
    this.name = 'IndexingError'
  }
}

export class RetrievalError extends AskDocsError {
  constructor(message: string, cause?: unknown) {
    super(message, { stage: 'retrieve', statusCode: 400, cause })
    this.name = 'RetrievalError'
  }
}

export class GenerationError extends AskDocsError {
  constructor(message: string, cause?: unknown) {
    super(message, { stage: 'generate', statusCode: 400, cause })
    this.name = 'GenerationError'
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

export interface ErrorResponse {
  statusCode: number
  body: {
    detail: string
    stage: PipelineStage
  }
}

/**
 * Maps any thrown value to the status and JSON body sent back to the client.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  const statusCode = error instanceof AskDocsError ? error.statusCode : 400
  const stage = error instanceof AskDocsError ? error.stage : 'unknown'

  return {
    statusCode,
    body: {
      detail: `Error processing question: ${getErrorMessage(error)}`,
      stage
    }
  }
}
