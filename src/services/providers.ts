import { ChatAnthropic } from '@langchain/anthropic'
import { OpenAIEmbeddings } from '@langchain/openai'
import type { AppConfig } from '../config/env'
import { ConfigError, getErrorMessage } from '../errors'

// text-embedding-3 models return unit-length vectors, so no extra normalization is applied
export function createEmbeddings(config: AppConfig): OpenAIEmbeddings {
  try {
    return new OpenAIEmbeddings({
      openAIApiKey: config.openAIApiKey,
      modelName: config.embeddingModel
    })
  } catch (error) {
    throw new ConfigError(`Error configuring embedding model: ${getErrorMessage(error)}`, error)
  }
}

export function createChatModel(config: AppConfig): ChatAnthropic {
  try {
    return new ChatAnthropic({
      modelName: config.chatModel,
      anthropicApiKey: config.anthropicApiKey,
      temperature: config.chatTemperature,
      maxTokens: config.chatMaxTokens
    })
  } catch (error) {
    throw new ConfigError(`Error configuring chat model: ${getErrorMessage(error)}`, error)
  }
}
