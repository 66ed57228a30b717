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

import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { ConfigReader } from '@backstage/config';
import { IngestionService } from './IngestionService';
import { DocumentProcessor } from './DocumentProcessor';
import { ConfigService } from './ConfigService';
import { InMemoryVectorStore } from './InMemoryVectorStore';
import { Retriever } from './Retriever';
import { ResponseGenerator } from './ResponseGenerator';
import { createLogger } from '../logger';
import {
  CollectionUnavailableError,
  DocumentLoadError,
  EmbeddingDimensionError,
  IngestionInProgressError,
  InvalidBatchSizeError,
  InvalidCategoryError,
} from '../errors';
import { ICompletionService, IDocumentLoader, IEmbedder } from '../interfaces';
import { SourceDocument } from '../models';

const RICE_WATER = 'Rice needs standing water of five centimetres during tillering.';
const RICE_TRANSPLANT = 'Transplant rice seedlings at twenty one days in straight rows.';
const ACID_SOIL = 'Acid soil below pH five point five limits nitrogen uptake by the roots.';

const toVector = (text: string): number[] => [
  text.toLowerCase().includes('rice') ? 1 : 0,
  text.toLowerCase().includes('soil') ? 1 : 0,
  text.length / 100,
];

class FakeEmbedder implements IEmbedder {
  readonly dimension = 3;
  readonly embed = jest.fn(async (text: string) => toVector(text));
  readonly embedBatch = jest.fn(async (texts: string[]) => texts.map(toVector));
}

class FakeDocumentLoader implements IDocumentLoader {
  documents: SourceDocument[] = [];
  files: Record<string, SourceDocument> = {};
  missingDirectory = false;

  async *loadAll(directory: string): AsyncIterable<SourceDocument> {
    if (this.missingDirectory) {
      throw new DocumentLoadError(directory, 'directory not found');
    }
    for (const document of this.documents) {
      yield document;
    }
  }

  async loadFile(filePath: string, category?: string): Promise<SourceDocument> {
    const document = this.files[filePath];
    if (!document) {
      throw new DocumentLoadError(filePath, 'ENOENT');
    }
    return { ...document, category: category ?? document.category };
  }
}

const riceGuide: SourceDocument = {
  text: `${RICE_WATER}\n\n${RICE_TRANSPLANT}`,
  source: 'data/raw/planting_tips/rice.pdf',
  category: 'planting_tips',
  filename: 'rice.pdf',
};

const soilNotes: SourceDocument = {
  text: ACID_SOIL,
  source: 'data/raw/soil_data/acid.pdf',
  category: 'soil_data',
  filename: 'acid.pdf',
};

describe('IngestionService', () => {
  const logger = createLogger({ silent: true });
  const config = new ConfigService(
    new ConfigReader({ agriRag: { chunking: { chunkSize: 100, chunkOverlap: 10 } } })
  );

  let embedder: FakeEmbedder;
  let vectorStore: InMemoryVectorStore;
  let loader: FakeDocumentLoader;
  let ingestion: IngestionService;

  const storedIds = async () =>
    (await vectorStore.query('agri_docs', [0, 0, 0], 100)).map(match => match.id).sort();

  beforeEach(() => {
    embedder = new FakeEmbedder();
    vectorStore = new InMemoryVectorStore(logger);
    loader = new FakeDocumentLoader();
    loader.documents = [riceGuide, soilNotes];
    ingestion = new IngestionService({
      logger,
      config,
      embedder,
      vectorStore,
      documentLoader: loader,
      documentProcessor: new DocumentProcessor(logger, config),
    });
  });

  describe('ingestDocuments', () => {
    it('indexes every chunk with sequential ids in batches', async () => {
      const summary = await ingestion.ingestDocuments({ batchSize: 2 });

      expect(summary).toEqual({
        documentsProcessed: 2,
        chunksCreated: 3,
        errors: 0,
        categories: { planting_tips: 1, soil_data: 1 },
      });
      expect(embedder.embedBatch.mock.calls.map(([texts]) => texts.length)).toEqual([2, 1]);
      await expect(storedIds()).resolves.toEqual(['chunk_0', 'chunk_1', 'chunk_2']);
    });

    it.each([0, -5, 2.5, NaN])('rejects a batch size of %p before starting', async batchSize => {
      await expect(ingestion.ingestDocuments({ batchSize })).rejects.toBeInstanceOf(InvalidBatchSizeError);

      expect(ingestion.getStatus().state).toBe('idle');
      expect(ingestion.getStatus().inProgress).toBe(false);
      await expect(vectorStore.hasCollection('agri_docs')).resolves.toBe(false);
      await expect(ingestion.ingestDocuments({ batchSize: 10 })).resolves.toMatchObject({ chunksCreated: 3 });
    });

    it('counts failing documents and carries on', async () => {
      loader.documents = [
        riceGuide,
        { ...soilNotes, category: 'uncategorized', filename: 'stray.pdf' },
        soilNotes,
      ];

      const summary = await ingestion.ingestDocuments();

      expect(summary.documentsProcessed).toBe(2);
      expect(summary.errors).toBe(1);
      expect(summary.categories).toEqual({ planting_tips: 1, soil_data: 1 });
    });

    it('rebuilds the collection from scratch', async () => {
      await ingestion.ingestDocuments();
      loader.documents = [soilNotes];

      const summary = await ingestion.ingestDocuments();

      expect(summary.chunksCreated).toBe(1);
      await expect(vectorStore.count('agri_docs')).resolves.toBe(1);
    });

    it('refuses to start while a run is in progress', async () => {
      const first = ingestion.ingestDocuments();

      expect(ingestion.getStatus().inProgress).toBe(true);
      await expect(ingestion.ingestDocuments()).rejects.toBeInstanceOf(IngestionInProgressError);

      await first;
      expect(ingestion.getStatus()).toEqual({
        state: 'done',
        inProgress: false,
        lastRunAt: expect.any(Date),
        lastSummary: expect.objectContaining({ chunksCreated: 3 }),
      });
    });

    it('marks the run failed when the data directory is missing', async () => {
      loader.missingDirectory = true;

      await expect(ingestion.ingestDocuments({ dataDir: 'nowhere' })).rejects.toBeInstanceOf(
        DocumentLoadError
      );
      expect(ingestion.getStatus().state).toBe('failed');
      expect(ingestion.getStatus().inProgress).toBe(false);
    });

    it('checks vector dimensions before storing', async () => {
      embedder.embedBatch.mockResolvedValueOnce([[1, 0], [0, 1]]);

      await expect(ingestion.ingestDocuments({ batchSize: 2 })).rejects.toBeInstanceOf(
        EmbeddingDimensionError
      );
      expect(ingestion.getStatus().state).toBe('failed');
    });

    it('starts idle', () => {
      expect(ingestion.getStatus()).toEqual({
        state: 'idle',
        inProgress: false,
        lastRunAt: null,
        lastSummary: null,
      });
    });
  });

  describe('addDocument', () => {
    const newFile = 'data/raw/soil_data/liming.pdf';

    beforeEach(() => {
      loader.files[newFile] = {
        text: 'Apply two tonnes of lime per hectare on acid soil.',
        source: newFile,
        category: 'soil_data',
        filename: 'liming.pdf',
      };
    });

    it('requires an existing collection', async () => {
      await expect(ingestion.addDocument(newFile)).rejects.toBeInstanceOf(CollectionUnavailableError);
    });

    it('continues ids after the existing rows', async () => {
      await ingestion.ingestDocuments();

      const result = await ingestion.addDocument(newFile);

      expect(result).toEqual({ filename: 'liming.pdf', chunksAdded: 1, category: 'soil_data' });
      await expect(storedIds()).resolves.toEqual(['chunk_0', 'chunk_1', 'chunk_2', 'chunk_3']);
    });

    it('takes the category from the parent directory unless given', async () => {
      await ingestion.ingestDocuments();
      loader.files['inbox/liming.pdf'] = { ...loader.files[newFile], source: 'inbox/liming.pdf' };

      await expect(ingestion.addDocument('inbox/liming.pdf')).rejects.toBeInstanceOf(InvalidCategoryError);

      const result = await ingestion.addDocument('inbox/liming.pdf', 'crop_production_guide');
      expect(result.category).toBe('crop_production_guide');
    });
  });
});

describe('ingestion to answer', () => {
  it('serves search, stats and answers from an ingested collection', async () => {
    const logger = createLogger({ silent: true });
    const config = new ConfigService(
      new ConfigReader({ agriRag: { chunking: { chunkSize: 100, chunkOverlap: 10 } } })
    );
    const embedder = new FakeEmbedder();
    const vectorStore = new InMemoryVectorStore(logger);
    const loader = new FakeDocumentLoader();
    loader.documents = [riceGuide, soilNotes];

    const ingestion = new IngestionService({
      logger,
      config,
      embedder,
      vectorStore,
      documentLoader: loader,
      documentProcessor: new DocumentProcessor(logger, config),
    });
    const retriever = new Retriever({ logger, config, embedder, vectorStore });
    const llmService: ICompletionService = {
      generate: async () => 'Keep five centimetres of water on the paddy.',
      isConfigured: async () => true,
      listModels: async () => [],
    };
    const generator = new ResponseGenerator({ logger, config, llmService, retriever });

    await ingestion.ingestDocuments();

    const stats = await retriever.getCollectionStats();
    expect(stats.status === 'ok' && stats.stats.totalChunks).toBe(3);

    const results = await retriever.search('How much water does rice need?');
    expect(results.length).toBeGreaterThan(0);
    expect(results.length).toBeLessThanOrEqual(3);
    const scores = results.map(result => result.score);
    expect(scores).toEqual([...scores].sort((a, b) => b - a));

    const answer = await generator.answer('How much water does rice need?');
    expect(answer.answer).toBe('Keep five centimetres of water on the paddy.');
    expect(answer.sources.length).toBeLessThanOrEqual(3);
    expect(answer.documentsRetrieved).toBe(answer.sources.length);
  });
});
