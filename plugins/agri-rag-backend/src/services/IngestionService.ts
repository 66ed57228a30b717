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
 * Document ingestion: load, clean, chunk, embed and store
 *
 * @packageDocumentation
 */

import * as path from 'path';
import type { Logger } from 'winston';
import {
  IConfigService,
  IDocumentLoader,
  IDocumentProcessor,
  IEmbedder,
  IngestionDependencies,
  IVectorStore,
} from '../interfaces';
import {
  AddDocumentResult,
  DocumentChunk,
  IndexedRecord,
  IngestionState,
  IngestionStatus,
  IngestionSummary,
} from '../models';
import { assertCategory } from '../rag/filters';
import {
  CollectionUnavailableError,
  EmbeddingDimensionError,
  EmbeddingServiceError,
  IngestionInProgressError,
  InvalidBatchSizeError,
  errorMessage,
} from '../errors';

export interface IngestOptions {
  dataDir?: string;
  batchSize?: number;
}

const PROGRESS_LOG_INTERVAL = 50;

/**
 * Builds the vector collection from the PDF tree.
 * Only one ingestion or document addition runs at a time.
 */
export class IngestionService {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly embedder: IEmbedder;
  private readonly vectorStore: IVectorStore;
  private readonly documentLoader: IDocumentLoader;
  private readonly documentProcessor: IDocumentProcessor;

  private state: IngestionState = 'idle';
  private inProgress = false;
  private lastRunAt: Date | null = null;
  private lastSummary: IngestionSummary | null = null;

  constructor(dependencies: IngestionDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.embedder = dependencies.embedder;
    this.vectorStore = dependencies.vectorStore;
    this.documentLoader = dependencies.documentLoader;
    this.documentProcessor = dependencies.documentProcessor;
  }

  /**
   * Rebuild the collection from every PDF below the data directory
   */
  async ingestDocuments(options: IngestOptions = {}): Promise<IngestionSummary> {
    const config = this.configService.getConfig();
    const dataDir = options.dataDir ?? config.ingestion.dataDir;
    const batchSize = options.batchSize ?? config.ingestion.batchSize;
    const collection = config.collectionName;

    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new InvalidBatchSizeError(batchSize);
    }

    this.begin();
    this.lastRunAt = new Date();

    try {
      this.logger.info(`Starting document ingestion from ${dataDir}`);

      const summary: IngestionSummary = {
        documentsProcessed: 0,
        chunksCreated: 0,
        errors: 0,
        categories: {},
      };
      const allChunks: DocumentChunk[] = [];

      this.state = 'extracting';
      for await (const document of this.documentLoader.loadAll(dataDir)) {
        this.state = 'chunking';
        try {
          assertCategory(document.category);
          const chunks = await this.documentProcessor.processDocument(document);
          allChunks.push(...chunks);

          summary.documentsProcessed++;
          summary.categories[document.category] = (summary.categories[document.category] ?? 0) + 1;

          if (summary.documentsProcessed % PROGRESS_LOG_INTERVAL === 0) {
            this.logger.info(`Processed ${summary.documentsProcessed} documents...`);
          }
        } catch (error) {
          this.logger.error(`Error processing document ${document.filename}: ${errorMessage(error)}`);
          summary.errors++;
        }
        this.state = 'extracting';
      }

      summary.chunksCreated = allChunks.length;
      this.logger.info(
        `Created ${allChunks.length} chunks from ${summary.documentsProcessed} documents`
      );

      // The old collection stays queryable until every document is chunked
      if (await this.vectorStore.deleteCollection(collection)) {
        this.logger.info(`Deleted existing collection: ${collection}`);
      }
      await this.vectorStore.createCollection(collection, { dimension: this.embedder.dimension });

      this.state = 'embedding';
      for (let offset = 0; offset < allChunks.length; offset += batchSize) {
        const batch = allChunks.slice(offset, offset + batchSize);
        await this.storeChunks(collection, batch, offset);
        this.logger.debug(`Added batch ${Math.floor(offset / batchSize) + 1} to vector store`);
      }

      this.logger.info(
        `Ingestion complete: ${summary.documentsProcessed} documents, ` +
          `${summary.chunksCreated} chunks, ${summary.errors} errors`
      );

      this.state = 'done';
      this.lastSummary = summary;
      return summary;
    } catch (error) {
      this.state = 'failed';
      this.logger.error(`Ingestion failed: ${errorMessage(error)}`);
      throw error;
    } finally {
      this.inProgress = false;
    }
  }

  /**
   * Add one PDF to an existing collection
   */
  async addDocument(filePath: string, category?: string): Promise<AddDocumentResult> {
    const collection = this.configService.getConfig().collectionName;

    const resolvedCategory = category ?? path.basename(path.dirname(filePath));
    assertCategory(resolvedCategory);

    this.begin();
    try {
      if (!(await this.vectorStore.hasCollection(collection))) {
        throw new CollectionUnavailableError(collection);
      }

      this.state = 'extracting';
      const document = await this.documentLoader.loadFile(filePath, resolvedCategory);

      this.state = 'chunking';
      const chunks = await this.documentProcessor.processDocument(document);

      this.state = 'embedding';
      const currentCount = await this.vectorStore.count(collection);
      await this.storeChunks(collection, chunks, currentCount);

      this.logger.info(`Added ${chunks.length} chunks from ${document.filename}`);
      this.state = 'done';

      return {
        filename: document.filename,
        chunksAdded: chunks.length,
        category: resolvedCategory,
      };
    } catch (error) {
      this.state = 'failed';
      throw error;
    } finally {
      this.inProgress = false;
    }
  }

  getStatus(): IngestionStatus {
    return {
      state: this.state,
      inProgress: this.inProgress,
      lastRunAt: this.lastRunAt,
      lastSummary: this.lastSummary,
    };
  }

  private begin(): void {
    if (this.inProgress) {
      throw new IngestionInProgressError();
    }
    this.inProgress = true;
  }

  /**
   * Embed one batch in a single call and upsert it with ids `chunk_{offset + i}`
   */
  private async storeChunks(
    collection: string,
    chunks: DocumentChunk[],
    offset: number
  ): Promise<void> {
    if (chunks.length === 0) {
      return;
    }

    const embeddings = await this.embedder.embedBatch(chunks.map(chunk => chunk.text));
    if (embeddings.length !== chunks.length) {
      throw new EmbeddingServiceError(
        `Expected ${chunks.length} embeddings, got ${embeddings.length}`
      );
    }

    const records: IndexedRecord[] = chunks.map((chunk, i) => {
      const embedding = embeddings[i];
      if (embedding.length !== this.embedder.dimension) {
        throw new EmbeddingDimensionError(this.embedder.dimension, embedding.length);
      }
      return {
        id: `chunk_${offset + i}`,
        embedding,
        document: chunk.text,
        metadata: {
          source: chunk.source,
          category: chunk.category,
          filename: chunk.filename,
          chunkIndex: chunk.chunkIndex,
          totalChunks: chunk.totalChunks,
        },
      };
    });

    await this.vectorStore.upsert(collection, records);
  }
}
