import { TextSplitter, type TextSplitterParams } from '@langchain/textsplitters'

export type SlidingWindowTextSplitterParams = Pick<TextSplitterParams, 'chunkSize' | 'chunkOverlap'>

/**
 * Cuts text into fixed-size character windows where each window repeats the
 * last `chunkOverlap` characters of the previous one. Separators, sentences
 * and whitespace are ignored: the split points depend only on offsets.
 */
export class SlidingWindowTextSplitter extends TextSplitter {
  static lc_name() {
    return 'SlidingWindowTextSplitter'
  }

  constructor(fields: SlidingWindowTextSplitterParams) {
    super(fields)
  }

  async splitText(text: string): Promise<string[]> {
    // Offsets count code points so a window never splits a surrogate pair
    const chars = Array.from(text)
    const chunks: string[] = []
    const step = this.chunkSize - this.chunkOverlap

    for (let start = 0; start < chars.length; start += step) {
      const end = start + this.chunkSize
      chunks.push(chars.slice(start, end).join(''))
      if (end >= chars.length) {
        break
      }
    }

    return chunks
  }
}
