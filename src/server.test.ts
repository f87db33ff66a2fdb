import fs from 'fs/promises'
import path from 'path'
import type { Server } from 'http'
import request from 'supertest'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ConfigError } from './errors'
import { makeTempDir } from './test-utils/pdf'
import { startServer } from './server'

describe('startServer', () => {
  let dir: string
  let server: Server | undefined

  beforeEach(async () => {
    dir = await makeTempDir('server')
  })

  afterEach(async () => {
    const running = server
    server = undefined
    if (running) {
      await new Promise<void>((resolve, reject) => running.close(error => (error ? reject(error) : resolve())))
    }
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('refuses to start without the model credential', async () => {
    await expect(startServer({ OPENAI_API_KEY: 'test-openai-key', PORT: '0' })).rejects.toBeInstanceOf(ConfigError)
    await expect(startServer({ OPENAI_API_KEY: 'test-openai-key', PORT: '0' })).rejects.toThrow(
      'ANTHROPIC_API_KEY not found in environment variables'
    )
  })

  it('listens once configuration is complete', async () => {
    server = await startServer({
      ANTHROPIC_API_KEY: 'test-anthropic-key',
      OPENAI_API_KEY: 'test-openai-key',
      PORT: '0',
      VECTOR_STORE_PATH: path.join(dir, 'vectorstore'),
      UPLOAD_DIR: path.join(dir, 'uploads')
    })

    const res = await request(server).get('/')

    expect(res.status).toBe(200)
    expect(res.body).toEqual({ message: 'Welcome to the Ask Docs API!' })
  })
})
