import { PromptTemplate } from '@langchain/core/prompts'

export const NOT_IN_CONTEXT_ANSWER = 'answer is not available in the context'

export const ANSWER_PROMPT_TEMPLATE = `Answer the question as thoroughly as possible using only the provided context, and include every relevant detail.
If the answer is not in the provided context, just say "${NOT_IN_CONTEXT_ANSWER}". Do not make up an answer.

Context:
{context}

Question:
{question}

Answer:`

export interface AnswerPromptInput {
  context: string
  question: string
}

export const answerPrompt = PromptTemplate.fromTemplate<AnswerPromptInput>(ANSWER_PROMPT_TEMPLATE)
