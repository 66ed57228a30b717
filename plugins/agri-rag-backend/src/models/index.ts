/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * Domain models and data structures
 * 
 * @packageDocumentation
 */

/**
 * Knowledge base categories. A document's category is the name of the
 * directory it was loaded from.
 */
export const AGRI_CATEGORIES = [
  'crop_production_guide',
  'crops_statistics',
  'planting_tips',
  'soil_data',
] as const;

export type AgriCategory = (typeof AGRI_CATEGORIES)[number];

/**
 * Human-readable labels for each category
 */
export const CATEGORY_DESCRIPTIONS: Record<AgriCategory, string> = {
  crop_production_guide: 'Crop production and farming guides',
  crops_statistics: 'Agricultural statistics and data',
  planting_tips: 'Planting tips and recommendations',
  soil_data: 'Soil properties and analysis data',
};

export function isCategory(value: string): value is AgriCategory {
  return (AGRI_CATEGORIES as readonly string[]).includes(value);
}

/**
 * Represents a chat message in the conversation
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * A document as produced by a loader, before cleaning and chunking
 */
export interface SourceDocument {
  text: string;
  source: string;
  category: string;
  filename: string;
}

/**
 * Represents a document chunk with its provenance
 */
export interface DocumentChunk {
  text: string;
  chunkIndex: number;
  totalChunks: number;
  source: string;
  category: string;
  filename: string;
}

/**
 * Metadata stored next to every indexed vector
 */
export interface RecordMetadata {
  source: string;
  category: string;
  filename: string;
  chunkIndex: number;
  totalChunks: number;
}

/**
 * A row of a vector store collection
 */
export interface IndexedRecord {
  id: string;
  embedding: number[];
  document: string;
  metadata: RecordMetadata;
}

/**
 * A nearest-neighbour match returned by a vector store
 */
export interface VectorMatch {
  id: string;
  document: string;
  metadata: RecordMetadata;
  distance: number;
}

/**
 * Represents a scored retrieval result
 */
export interface RetrievedResult {
  content: string;
  source: string;
  category: string;
  filename: string;
  chunkIndex: number;
  totalChunks: number;
  score: number;
}

/**
 * Filter conditions understood by every vector store
 */
export type FilterCondition =
  | { category: { $eq: string } }
  | { source: { $contains: string } }
  | { filename: { $contains: string } };

export type FilterExpr = FilterCondition | { $and: FilterCondition[] };

/**
 * Optional filters accepted by the retriever
 */
export interface FilterOptions {
  category?: string;
  source?: string;
  filename?: string;
}

/**
 * Outcome of a retrieval. A missing collection and a failing backend are
 * reported instead of thrown so callers can degrade.
 */
export type RetrievalOutcome =
  | { status: 'ok'; results: RetrievedResult[] }
  | { status: 'unavailable'; reason: string }
  | { status: 'backend_error'; error: Error };

/**
 * Collection statistics. `categoriesSample` is counted over a bounded
 * sample of rows and is an estimate for large collections.
 */
export interface CollectionStats {
  totalChunks: number;
  collectionName: string;
  categoriesSample: Record<string, number>;
  availableCategories: AgriCategory[];
}

export type StatsOutcome =
  | { status: 'ok'; stats: CollectionStats }
  | { status: 'unavailable'; reason: string }
  | { status: 'backend_error'; error: Error };

/**
 * Source excerpt attached to an answer
 */
export interface SourceExcerpt {
  content: string;
  source: string;
  category: string;
  filename: string;
  score: number;
}

/**
 * Answer envelope returned to callers
 */
export interface RAGAnswer {
  answer: string;
  sources: SourceExcerpt[];
  question: string;
  categoryFilter: string | null;
  documentsRetrieved: number;
}

export interface ThresholdRAGAnswer extends RAGAnswer {
  thresholdUsed: number;
}

/**
 * Summary of a full ingestion run
 */
export interface IngestionSummary {
  documentsProcessed: number;
  chunksCreated: number;
  errors: number;
  categories: Record<string, number>;
}

export interface AddDocumentResult {
  filename: string;
  chunksAdded: number;
  category: AgriCategory;
}

export type IngestionState =
  | 'idle'
  | 'extracting'
  | 'chunking'
  | 'embedding'
  | 'done'
  | 'failed';

export interface IngestionStatus {
  state: IngestionState;
  inProgress: boolean;
  lastRunAt: Date | null;
  lastSummary: IngestionSummary | null;
}

/**
 * Ollama chat API response structure
 */
export interface OllamaChatResponse {
  model: string;
  created_at: string;
  message: {
    role: string;
    content: string;
  };
  done: boolean;
}

/**
 * Ollama tags API response structure
 */
export interface OllamaTagsResponse {
  models: Array<{ name: string }>;
}

/**
 * Ollama embed API response structure
 */
export interface OllamaEmbedResponse {
  model: string;
  embeddings: number[][];
}

/**
 * PostgreSQL connection configuration
 */
export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  maxConnections?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

/**
 * Vector store configuration
 */
export interface VectorStoreConfig {
  type: 'memory' | 'postgresql';
  postgresql?: PostgresConfig;
}

/**
 * Resolved application configuration
 */
export interface AgriRagConfig {
  llm: {
    baseUrl: string;
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
  };
  embedding: {
    model: string;
    dimension: number;
  };
  chunking: {
    chunkSize: number;
    chunkOverlap: number;
  };
  retrieval: {
    defaultTopK: number;
    maxDistance: number;
    maxContextChars: number;
  };
  ingestion: {
    dataDir: string;
    batchSize: number;
  };
  collectionName: string;
  vectorStore: VectorStoreConfig;
  server: {
    port: number;
  };
  logLevel: string;
}
