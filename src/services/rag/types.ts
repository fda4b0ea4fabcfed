/**
 * RAG pipeline types
 */

export interface SearchResult {
  embeddingId: string;
  chunkText: string;
  objectType: string;
  objectId: string;
  similarity: number;
}

export interface SearchOptions {
  objectTypes?: readonly string[];
  startDate?: Date;
  endDate?: Date;
  limit?: number;
  minScore?: number;
}

/** Named prompt templates; `rag_prompt_template` fills {query}, {context} and {calculation_summary} */
export type PromptTemplates = Readonly<Record<string, string>>;

export interface AnswerOptions {
  filters?: SearchOptions;
  promptTemplates?: PromptTemplates;
  calculationSummary?: string;
}

export type AnswerSource = 'llm' | 'fallback' | 'no_data';

export interface GeneratedAnswer {
  text: string;
  source: AnswerSource;
  results: SearchResult[];
}

export interface RebuildResult {
  skipped: boolean;
  total: number;
  ingested: number;
  failed: number;
}

export type RebuildProgressCallback = (current: number, total: number) => void;

export interface RagOptions {
  chunkMaxTokens: number;
  chunkOverlapTokens: number;
  minScore: number;
  answerLimit: number;
  contextBudgetChars: number;
  /** Rows scanned by the lexical fallback */
  scanLimit: number;
}
