export interface UploadedDocument {
  filepath: string
  filename: string
}

export interface SearchResult {
  content: string
  // Distance from the question in the index space, lower is closer
  score: number
}

export interface RAGResponse {
  answer: string
}
