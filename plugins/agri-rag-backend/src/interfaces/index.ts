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
 * Service interfaces following SOLID principles
 * 
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import {
  AgriRagConfig,
  ChatMessage,
  DocumentChunk,
  FilterExpr,
  IndexedRecord,
  RecordMetadata,
  SourceDocument,
  VectorMatch,
} from '../models';

/**
 * Interface for the language model used to write answers
 * Single Responsibility: turns a message sequence into text
 */
export interface ICompletionService {
  /**
   * Generate a chat completion. Throws CompletionUnavailableError when the
   * backend cannot be reached.
   */
  generate(messages: ChatMessage[], options?: GenerationOptions): Promise<string>;

  /**
   * Whether the backend is reachable and configured
   */
  isConfigured(): Promise<boolean>;

  /**
   * Names of the models the backend serves; empty when it cannot be reached
   */
  listModels(): Promise<string[]>;
}

export interface GenerationOptions {
  temperature?: number;
  maxTokens?: number;
}

/**
 * Interface for text embedding
 * Single Responsibility: maps text to fixed-length vectors
 */
export interface IEmbedder {
  readonly dimension: number;

  /**
   * Embed one text. Empty input yields a zero vector.
   */
  embed(text: string): Promise<number[]>;

  /**
   * Embed several texts, preserving order. Empty inputs yield zero vectors.
   */
  embedBatch(texts: string[]): Promise<number[][]>;
}

/**
 * Interface for vector store operations
 * Single Responsibility: Manages named collections of vectors
 */
export interface IVectorStore {
  createCollection(name: string, options: { dimension: number }): Promise<void>;

  /**
   * Drop a collection and its rows. Resolves to false if it did not exist.
   */
  deleteCollection(name: string): Promise<boolean>;

  hasCollection(name: string): Promise<boolean>;

  /**
   * Insert or replace records by id
   */
  upsert(collection: string, records: IndexedRecord[]): Promise<void>;

  /**
   * Nearest neighbours by ascending Euclidean distance
   */
  query(
    collection: string,
    vector: number[],
    topK: number,
    filter?: FilterExpr | null
  ): Promise<VectorMatch[]>;

  count(collection: string): Promise<number>;

  /**
   * Metadata of up to `limit` rows, in storage order
   */
  sample(collection: string, limit: number): Promise<RecordMetadata[]>;

  /**
   * Whether the backing store answers
   */
  healthCheck(): Promise<boolean>;

  /**
   * Release connections; called once on shutdown
   */
  close(): Promise<void>;
}

/**
 * Interface for document loading
 * Single Responsibility: Reads source files into text documents
 */
export interface IDocumentLoader {
  /**
   * Yield every readable document below `directory`, skipping unreadable files
   */
  loadAll(directory: string): AsyncIterable<SourceDocument>;

  /**
   * Load a single file. The category defaults to the parent directory name.
   */
  loadFile(filePath: string, category?: string): Promise<SourceDocument>;
}

/**
 * Turns a loaded document into cleaned, chunked text
 */
export interface IDocumentProcessor {
  processDocument(document: SourceDocument): Promise<DocumentChunk[]>;
}

/**
 * Interface for configuration management
 * Single Responsibility: Manages application configuration
 */
export interface IConfigService {
  /**
   * Get the complete configuration
   */
  getConfig(): AgriRagConfig;
}

/**
 * Dependencies for service construction
 */
export interface ServiceDependencies {
  logger: Logger;
  config: IConfigService;
}

export interface RetrieverDependencies extends ServiceDependencies {
  embedder: IEmbedder;
  vectorStore: IVectorStore;
}

export interface IngestionDependencies extends RetrieverDependencies {
  documentLoader: IDocumentLoader;
  documentProcessor: IDocumentProcessor;
}
