import { describe, expect, it } from 'vitest'
import { ANSWER_PROMPT_TEMPLATE, NOT_IN_CONTEXT_ANSWER } from '../prompts/answer.prompt'
import { ScriptedChatModel, answerFromContext, failingResponder } from '../test-utils/chatModel'
import { AnswerService } from './answer.service'

describe('AnswerService', () => {
  it('fills the template with the joined chunks and the question', async () => {
    const model = new ScriptedChatModel(() => 'ok')
    const service = new AnswerService(model)

    await service.generate('Why is the sky blue?', ['Rayleigh scattering.', 'Blue light scatters most.'])

    const expected = ANSWER_PROMPT_TEMPLATE
      .replace('{context}', 'Rayleigh scattering.\n\nBlue light scatters most.')
      .replace('{question}', 'Why is the sky blue?')
    expect(model.prompts).toEqual([expected])
  })

  it('returns the model output verbatim', async () => {
    const service = new AnswerService(new ScriptedChatModel(() => 'Paris, according to the document.'))

    await expect(service.generate('Capital?', ['The capital of France is Paris.']))
      .resolves.toBe('Paris, according to the document.')
  })

  it('tells the model what to say when the context lacks the answer', () => {
    expect(ANSWER_PROMPT_TEMPLATE).toContain(`"${NOT_IN_CONTEXT_ANSWER}"`)
  })

  it('answers from the supplied context', async () => {
    const service = new AnswerService(new ScriptedChatModel(answerFromContext))

    const answer = await service.generate('What is the capital of France?', [
      'Lyon is known for food. The capital of France is Paris.'
    ])

    expect(answer).toBe('The capital of France is Paris.')
  })

  it('propagates provider failures', async () => {
    const service = new AnswerService(new ScriptedChatModel(failingResponder))

    await expect(service.generate('Anything?', ['context'])).rejects.toThrow('model quota exceeded')
  })
})
