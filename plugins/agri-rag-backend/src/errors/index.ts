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
 * Error types raised by the RAG pipeline
 *
 * @packageDocumentation
 */

import { AGRI_CATEGORIES } from '../models';

/**
 * Base class for all errors raised by this package
 */
export class AgriRagError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidCategoryError extends AgriRagError {
  readonly category: string;

  constructor(category: string) {
    super(
      `Invalid category: ${category}. Valid categories: ${AGRI_CATEGORIES.join(', ')}`,
      'INVALID_CATEGORY',
    );
    this.category = category;
  }
}

/**
 * The configured collection has not been created yet (nothing ingested)
 */
export class CollectionUnavailableError extends AgriRagError {
  constructor(collectionName: string) {
    super(
      `Collection '${collectionName}' is not available. Run document ingestion first.`,
      'COLLECTION_UNAVAILABLE',
    );
  }
}

export class CollectionNotFoundError extends AgriRagError {
  constructor(collectionName: string) {
    super(`Collection not found: ${collectionName}`, 'COLLECTION_NOT_FOUND');
  }
}

export class EmbeddingDimensionError extends AgriRagError {
  constructor(expected: number, actual: number) {
    super(
      `Embedding dimension mismatch: expected ${expected}, got ${actual}`,
      'EMBEDDING_DIMENSION',
    );
  }
}

export class IngestionInProgressError extends AgriRagError {
  constructor() {
    super('Ingestion already in progress', 'INGESTION_IN_PROGRESS');
  }
}

export class InvalidBatchSizeError extends AgriRagError {
  constructor(batchSize: number) {
    super(`Invalid batch size: ${batchSize}. Expected a positive integer`, 'INVALID_BATCH_SIZE');
  }
}

export class EmbeddingServiceError extends AgriRagError {
  constructor(message: string) {
    super(message, 'EMBEDDING_FAILED');
  }
}

/**
 * The completion backend answered, but not with a usable completion
 */
export class CompletionServiceError extends AgriRagError {
  constructor(message: string, code = 'COMPLETION_FAILED') {
    super(message, code);
  }
}

/**
 * The completion backend could not be reached (refused, timed out, DNS)
 */
export class CompletionUnavailableError extends CompletionServiceError {
  readonly baseUrl: string;

  constructor(baseUrl: string, cause: string) {
    super(`Cannot reach completion service at ${baseUrl}: ${cause}`, 'COMPLETION_UNAVAILABLE');
    this.baseUrl = baseUrl;
  }
}

export class DocumentLoadError extends AgriRagError {
  readonly path: string;

  constructor(path: string, cause: string) {
    super(`Failed to load document ${path}: ${cause}`, 'DOCUMENT_LOAD_FAILED');
    this.path = path;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
