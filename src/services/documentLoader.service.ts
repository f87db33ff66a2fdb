import { PDFLoader } from '@langchain/community/document_loaders/fs/pdf'
import { ExtractionError, getErrorMessage } from '../errors'
import type { UploadedDocument } from '../types/rag.types'

export class DocumentLoaderService {
  /**
   * Returns the text of each page of a single PDF, in page order.
   */
  async loadPDF(document: UploadedDocument): Promise<string[]> {
    try {
      const loader = new PDFLoader(document.filepath, { splitPages: true })
      const pages = await loader.load()

      return pages.map(page => page.pageContent)
    } catch (error) {
      console.error('Error loading PDF:', error)
      throw new ExtractionError(
        `Failed to load PDF ${document.filename}: ${getErrorMessage(error)}`,
        error
      )
    }
  }

  /**
   * Concatenates the text of every page of every document, in the order the
   * documents were uploaded.
   */
  async extractText(documents: UploadedDocument[]): Promise<string> {
    let text = ''

    for (const document of documents) {
      const pages = await this.loadPDF(document)
      text += pages.join('')
      console.log(`Extracted ${pages.length} pages from ${document.filename}`)
    }

    return text
  }
}
