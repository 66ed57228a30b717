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
 * In-memory vector store implementation
 * Provides vector storage and similarity search capabilities
 * 
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IVectorStore } from '../interfaces';
import { FilterExpr, IndexedRecord, RecordMetadata, VectorMatch } from '../models';
import { matchesFilter } from '../rag/filters';
import { CollectionNotFoundError, EmbeddingDimensionError } from '../errors';

interface MemoryCollection {
  dimension: number;
  records: Map<string, IndexedRecord>;
}

/**
 * In-memory vector store using Euclidean distance
 * Follows Single Responsibility Principle
 * 
 * Note: contents are lost on restart; use PgVectorStore for a
 * persistent collection
 */
export class InMemoryVectorStore implements IVectorStore {
  private readonly logger: Logger;
  private readonly collections: Map<string, MemoryCollection> = new Map();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async createCollection(name: string, options: { dimension: number }): Promise<void> {
    if (this.collections.has(name)) {
      throw new Error(`Collection already exists: ${name}`);
    }
    this.collections.set(name, { dimension: options.dimension, records: new Map() });
    this.logger.info(`Created collection '${name}' (dimension ${options.dimension})`);
  }

  async deleteCollection(name: string): Promise<boolean> {
    const existed = this.collections.delete(name);
    if (existed) {
      this.logger.info(`Deleted collection '${name}'`);
    }
    return existed;
  }

  async hasCollection(name: string): Promise<boolean> {
    return this.collections.has(name);
  }

  async upsert(collection: string, records: IndexedRecord[]): Promise<void> {
    const target = this.getCollection(collection);

    for (const record of records) {
      if (record.embedding.length !== target.dimension) {
        throw new EmbeddingDimensionError(target.dimension, record.embedding.length);
      }
    }

    records.forEach(record => {
      target.records.set(record.id, record);
    });
    this.logger.debug(`Stored batch of ${records.length} records in '${collection}'`);
  }

  async query(
    collection: string,
    vector: number[],
    topK: number,
    filter?: FilterExpr | null
  ): Promise<VectorMatch[]> {
    const target = this.getCollection(collection);
    if (vector.length !== target.dimension) {
      throw new EmbeddingDimensionError(target.dimension, vector.length);
    }

    const matches: VectorMatch[] = [];
    for (const record of target.records.values()) {
      if (!matchesFilter(record.metadata, filter)) {
        continue;
      }
      matches.push({
        id: record.id,
        document: record.document,
        metadata: record.metadata,
        distance: this.euclideanDistance(vector, record.embedding),
      });
    }

    // Sort by distance (ascending) and return top K
    matches.sort((a, b) => a.distance - b.distance);
    const topMatches = matches.slice(0, topK);

    this.logger.debug(`Found ${topMatches.length} matches in '${collection}'`);
    return topMatches;
  }

  async count(collection: string): Promise<number> {
    return this.getCollection(collection).records.size;
  }

  async sample(collection: string, limit: number): Promise<RecordMetadata[]> {
    const metadata: RecordMetadata[] = [];
    for (const record of this.getCollection(collection).records.values()) {
      if (metadata.length >= limit) {
        break;
      }
      metadata.push(record.metadata);
    }
    return metadata;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.collections.clear();
    this.logger.info('In-memory vector store closed');
  }

  private getCollection(name: string): MemoryCollection {
    const collection = this.collections.get(name);
    if (!collection) {
      throw new CollectionNotFoundError(name);
    }
    return collection;
  }

  /**
   * Calculate Euclidean (L2) distance between two vectors
   */
  private euclideanDistance(a: number[], b: number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
      const diff = a[i] - b[i];
      sum += diff * diff;
    }
    return Math.sqrt(sum);
  }
}
