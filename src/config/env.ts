import path from 'path'
import { z } from 'zod'
import { ConfigError } from '../errors'

const requiredKey = (name: string) =>
  z
    .string({ required_error: `${name} not found in environment variables` })
    .trim()
    .min(1, `${name} not found in environment variables`)

const envSchema = z
  .object({
    ANTHROPIC_API_KEY: requiredKey('ANTHROPIC_API_KEY'),
    OPENAI_API_KEY: requiredKey('OPENAI_API_KEY'),
    PORT: z.coerce.number().int().min(0).max(65535).default(3001),
    FRONTEND_URL: z.string().default('http://localhost:5173'),
    CHAT_MODEL: z.string().min(1).default('claude-sonnet-4-20250514'),
    CHAT_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.3),
    CHAT_MAX_TOKENS: z.coerce.number().int().positive().default(4096),
    EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
    CHUNK_SIZE: z.coerce.number().int().positive().default(10000),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(1000),
    RETRIEVAL_K: z.coerce.number().int().positive().default(4),
    VECTOR_STORE_PATH: z.string().min(1).default(path.join('data', 'vectorstore')),
    UPLOAD_DIR: z.string().min(1).default('uploads'),
    MAX_FILE_SIZE_MB: z.coerce.number().positive().default(10)
  })
  .refine(env => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP']
  })

export interface AppConfig {
  port: number
  frontendUrl: string
  anthropicApiKey: string
  openAIApiKey: string
  chatModel: string
  chatTemperature: number
  chatMaxTokens: number
  embeddingModel: string
  chunkSize: number
  chunkOverlap: number
  retrievalK: number
  vectorStorePath: string
  uploadDir: string
  maxFileSize: number
}

// Empty strings count as unset so `PORT=` in a .env file falls back to the default.
const withoutBlanks = (env: NodeJS.ProcessEnv) =>
  Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''))

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env))

  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => issue.message).join('; ')
    throw new ConfigError(`Invalid configuration: ${problems}`, parsed.error)
  }

  const values = parsed.data

  return {
    port: values.PORT,
    frontendUrl: values.FRONTEND_URL,
    anthropicApiKey: values.ANTHROPIC_API_KEY,
    openAIApiKey: values.OPENAI_API_KEY,
    chatModel: values.CHAT_MODEL,
    chatTemperature: values.CHAT_TEMPERATURE,
    chatMaxTokens: values.CHAT_MAX_TOKENS,
    embeddingModel: values.EMBEDDING_MODEL,
    chunkSize: values.CHUNK_SIZE,
    chunkOverlap: values.CHUNK_OVERLAP,
    retrievalK: values.RETRIEVAL_K,
    vectorStorePath: path.resolve(values.VECTOR_STORE_PATH),
    uploadDir: path.resolve(values.UPLOAD_DIR),
    maxFileSize: Math.round(values.MAX_FILE_SIZE_MB * 1024 * 1024)
  }
}
