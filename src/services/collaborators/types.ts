import type { LLMMode } from '../../config/llmConfig';

export interface LlmRequest {
  system?: string;
  prompt: string;
  mode?: LLMMode;
  /** Ask the model for a JSON object reply. */
  json?: boolean;
  model?: string;
}

export interface LlmResponse {
  text: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
  };
}

export interface LlmClient {
  complete(request: LlmRequest, signal?: AbortSignal): Promise<LlmResponse>;
}

export interface SearchResult {
  id: string;
  title: string;
  url: string;
  snippet: string;
  source: string;
  score?: number;
}

export interface SearchOptions {
  limit?: number;
  signal?: AbortSignal;
}

export interface SearchClient {
  search(query: string, options?: SearchOptions): Promise<SearchResult[]>;
}

export interface StoredDocument {
  id: string;
  title: string;
  content: string;
  tags: string[];
}

export interface RetrievedDocument extends StoredDocument {
  similarity: number;
}

export interface DocumentStore {
  retrieve(query: string, topK: number): Promise<RetrievedDocument[]>;
}
