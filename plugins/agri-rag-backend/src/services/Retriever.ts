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
 * Semantic search over the configured collection
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IConfigService, IEmbedder, IVectorStore, RetrieverDependencies } from '../interfaces';
import {
  AGRI_CATEGORIES,
  FilterOptions,
  RetrievalOutcome,
  RetrievedResult,
  StatsOutcome,
} from '../models';
import { buildFilter } from '../rag/filters';
import { errorMessage } from '../errors';
import { zeroVector } from './OllamaEmbedder';

export interface RetrieveOptions extends FilterOptions {
  topK?: number;
}

const STATS_SAMPLE_LIMIT = 1000;

/**
 * Map a Euclidean distance to a relevance score in [0, 1], rounded to 4 decimals
 */
export function scoreFromDistance(distance: number, maxDistance: number): number {
  const score = Math.max(0, 1 - distance / maxDistance);
  return Math.round(score * 10000) / 10000;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class Retriever {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly embedder: IEmbedder;
  private readonly vectorStore: IVectorStore;

  constructor(dependencies: RetrieverDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.embedder = dependencies.embedder;
    this.vectorStore = dependencies.vectorStore;
  }

  /**
   * Nearest chunks to the query, best first.
   * Throws InvalidCategoryError before any I/O; every other failure is
   * reported through the outcome.
   */
  async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrievalOutcome> {
    const filter = buildFilter(options);
    const config = this.configService.getConfig();
    const topK = options.topK ?? config.retrieval.defaultTopK;
    const collection = config.collectionName;

    try {
      if (!(await this.vectorStore.hasCollection(collection))) {
        this.logger.error(`Collection '${collection}' not found. Run document ingestion first.`);
        return { status: 'unavailable', reason: `Collection '${collection}' is not available` };
      }

      const vector = query.trim().length > 0
        ? await this.embedder.embed(query)
        : zeroVector(this.embedder.dimension);

      const matches = await this.vectorStore.query(collection, vector, topK, filter);

      const results: RetrievedResult[] = matches.map(match => ({
        content: match.document,
        source: match.metadata.source,
        category: match.metadata.category,
        filename: match.metadata.filename,
        chunkIndex: match.metadata.chunkIndex,
        totalChunks: match.metadata.totalChunks,
        score: scoreFromDistance(match.distance, config.retrieval.maxDistance),
      }));

      this.logger.debug(`Found ${results.length} results for query: ${query.substring(0, 50)}...`);
      return { status: 'ok', results };
    } catch (error) {
      this.logger.error(`Search error: ${errorMessage(error)}`);
      return { status: 'backend_error', error: toError(error) };
    }
  }

  /**
   * `retrieve` as a plain list; empty when the store is unavailable or failing
   */
  async search(query: string, topK?: number, category?: string): Promise<RetrievedResult[]> {
    const outcome = await this.retrieve(query, { topK, category });
    return outcome.status === 'ok' ? outcome.results : [];
  }

  async searchWithThreshold(
    query: string,
    threshold = 0.5,
    maxResults = 10,
    category?: string
  ): Promise<RetrievedResult[]> {
    const results = await this.search(query, maxResults, category);
    return results.filter(result => result.score >= threshold);
  }

  /**
   * Chunk count plus a category histogram estimated from a sample of rows
   */
  async getCollectionStats(): Promise<StatsOutcome> {
    const collection = this.configService.getConfig().collectionName;

    try {
      if (!(await this.vectorStore.hasCollection(collection))) {
        return { status: 'unavailable', reason: 'No collection available' };
      }

      const totalChunks = await this.vectorStore.count(collection);
      const sample = await this.vectorStore.sample(
        collection,
        Math.min(STATS_SAMPLE_LIMIT, totalChunks)
      );

      const categoriesSample: Record<string, number> = {};
      for (const metadata of sample) {
        categoriesSample[metadata.category] = (categoriesSample[metadata.category] ?? 0) + 1;
      }

      return {
        status: 'ok',
        stats: {
          totalChunks,
          collectionName: collection,
          categoriesSample,
          availableCategories: [...AGRI_CATEGORIES],
        },
      };
    } catch (error) {
      this.logger.error(`Failed to read collection stats: ${errorMessage(error)}`);
      return { status: 'backend_error', error: toError(error) };
    }
  }

  async hasCollection(): Promise<boolean> {
    return this.vectorStore.hasCollection(this.configService.getConfig().collectionName);
  }
}
