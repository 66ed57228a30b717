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
 * Wires the pipeline services together once per process
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { ICompletionService, IDocumentLoader, IEmbedder, IVectorStore } from '../interfaces';
import { ConfigService } from './ConfigService';
import { DocumentProcessor } from './DocumentProcessor';
import { IngestionService } from './IngestionService';
import { OllamaEmbedder } from './OllamaEmbedder';
import { OllamaLLMService } from './OllamaLLMService';
import { PdfDocumentLoader } from './PdfDocumentLoader';
import { ResponseGenerator } from './ResponseGenerator';
import { Retriever } from './Retriever';
import { VectorStoreFactory } from './VectorStoreFactory';

export interface AgriRagServices {
  logger: Logger;
  config: ConfigService;
  llmService: ICompletionService;
  embedder: IEmbedder;
  vectorStore: IVectorStore;
  documentLoader: IDocumentLoader;
  documentProcessor: DocumentProcessor;
  ingestion: IngestionService;
  retriever: Retriever;
  responseGenerator: ResponseGenerator;
}

/**
 * Adapters to use instead of the configured ones
 */
export interface ServiceOverrides {
  llmService?: ICompletionService;
  embedder?: IEmbedder;
  vectorStore?: IVectorStore;
  documentLoader?: IDocumentLoader;
}

export async function createServices(
  config: ConfigService,
  logger: Logger,
  overrides: ServiceOverrides = {}
): Promise<AgriRagServices> {
  const llmService = overrides.llmService ?? new OllamaLLMService({ logger, config });
  const embedder = overrides.embedder ?? new OllamaEmbedder({ logger, config });
  const vectorStore = overrides.vectorStore ?? (await VectorStoreFactory.create(config, logger));
  const documentLoader = overrides.documentLoader ?? new PdfDocumentLoader(logger);
  const documentProcessor = new DocumentProcessor(logger, config);

  const retriever = new Retriever({ logger, config, embedder, vectorStore });
  const ingestion = new IngestionService({
    logger,
    config,
    embedder,
    vectorStore,
    documentLoader,
    documentProcessor,
  });
  const responseGenerator = new ResponseGenerator({ logger, config, llmService, retriever });

  return {
    logger,
    config,
    llmService,
    embedder,
    vectorStore,
    documentLoader,
    documentProcessor,
    ingestion,
    retriever,
    responseGenerator,
  };
}
