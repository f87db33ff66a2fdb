import { SimpleChatModel } from '@langchain/core/language_models/chat_models'
import type { BaseMessage } from '@langchain/core/messages'

export type Responder = (prompt: string) => string | Promise<string>

/**
 * Chat model stand-in that records every prompt it receives and answers with
 * whatever `respond` returns for it.
 */
export class ScriptedChatModel extends SimpleChatModel {
  public readonly prompts: string[] = []

  constructor(private readonly respond: Responder) {
    super({})
  }

  _llmType(): string {
    return 'scripted'
  }

  async _call(messages: BaseMessage[]): Promise<string> {
    const prompt = messages
      .map(message => (typeof message.content === 'string' ? message.content : ''))
      .join('\n')
    this.prompts.push(prompt)
    return this.respond(prompt)
  }
}

/**
 * Answers with the sentence of the prompt's context section that shares the
 * most words with the question, or the not-in-context phrase when none do.
 */
export const answerFromContext: Responder = (prompt) => {
  const context = prompt.split('Context:\n')[1]?.split('\n\nQuestion:\n')[0] ?? ''
  const question = prompt.split('Question:\n')[1]?.split('\n\nAnswer:')[0] ?? ''
  const questionWords = new Set(question.toLowerCase().match(/[a-z]+/g) ?? [])

  let best = ''
  let bestOverlap = 0
  for (const sentence of context.split(/(?<=\.)/)) {
    const overlap = (sentence.toLowerCase().match(/[a-z]+/g) ?? [])
      .filter(word => questionWords.has(word)).length
    if (overlap > bestOverlap) {
      best = sentence.trim()
      bestOverlap = overlap
    }
  }

  return best || 'answer is not available in the context'
}

export const failingResponder: Responder = () => {
  throw new Error('model quota exceeded')
}
