import type { BaseChatModel } from '@langchain/core/language_models/chat_models'
import { StringOutputParser } from '@langchain/core/output_parsers'
import { answerPrompt } from '../prompts/answer.prompt'

export class AnswerService {
  constructor(private readonly llm: BaseChatModel) {}

  async generate(question: string, chunks: string[]): Promise<string> {
    const context = chunks.join('\n\n')
    const chain = answerPrompt.pipe(this.llm).pipe(new StringOutputParser())

    return chain.invoke({ context, question })
  }
}
