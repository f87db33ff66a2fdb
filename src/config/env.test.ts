import path from 'path'
import { describe, expect, it } from 'vitest'
import { ConfigError } from '../errors'
import { loadConfig } from './env'

const credentials = {
  ANTHROPIC_API_KEY: 'test-anthropic-key',
  OPENAI_API_KEY: 'test-openai-key'
}

describe('loadConfig', () => {
  it('fails when the credentials are missing', () => {
    expect(() => loadConfig({})).toThrow(ConfigError)
    expect(() => loadConfig({})).toThrow(
      'Invalid configuration: ANTHROPIC_API_KEY not found in environment variables; ' +
      'OPENAI_API_KEY not found in environment variables'
    )
  })

  it('treats a blank credential as missing', () => {
    expect(() => loadConfig({ ...credentials, ANTHROPIC_API_KEY: '   ' })).toThrow(
      'Invalid configuration: ANTHROPIC_API_KEY not found in environment variables'
    )
  })

  it('applies defaults', () => {
    const config = loadConfig(credentials)

    expect(config).toEqual({
      port: 3001,
      frontendUrl: 'http://localhost:5173',
      anthropicApiKey: 'test-anthropic-key',
      openAIApiKey: 'test-openai-key',
      chatModel: 'claude-sonnet-4-20250514',
      chatTemperature: 0.3,
      chatMaxTokens: 4096,
      embeddingModel: 'text-embedding-3-small',
      chunkSize: 10000,
      chunkOverlap: 1000,
      retrievalK: 4,
      vectorStorePath: path.resolve('data', 'vectorstore'),
      uploadDir: path.resolve('uploads'),
      maxFileSize: 10 * 1024 * 1024
    })
  })

  it('reads overrides and falls back on empty values', () => {
    const config = loadConfig({
      ...credentials,
      PORT: '',
      CHUNK_SIZE: '500',
      CHUNK_OVERLAP: '50',
      RETRIEVAL_K: '2',
      CHAT_TEMPERATURE: '0',
      VECTOR_STORE_PATH: '/tmp/index',
      MAX_FILE_SIZE_MB: '1'
    })

    expect(config.port).toBe(3001)
    expect(config.chunkSize).toBe(500)
    expect(config.chunkOverlap).toBe(50)
    expect(config.retrievalK).toBe(2)
    expect(config.chatTemperature).toBe(0)
    expect(config.vectorStorePath).toBe(path.resolve('/tmp/index'))
    expect(config.maxFileSize).toBe(1048576)
  })

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => loadConfig({ ...credentials, CHUNK_SIZE: '100', CHUNK_OVERLAP: '100' })).toThrow(
      'Invalid configuration: CHUNK_OVERLAP must be smaller than CHUNK_SIZE'
    )
  })

  it('rejects values that are not numbers', () => {
    expect(() => loadConfig({ ...credentials, RETRIEVAL_K: 'many' })).toThrow(ConfigError)
  })
})
