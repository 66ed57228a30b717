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
 * Express router for the agricultural RAG backend
 * Handles HTTP requests and delegates to the pipeline services
 * 
 * @packageDocumentation
 */

import express, { Request, Response, Router } from 'express';
import { ZodError } from 'zod';
import { AGRI_CATEGORIES, CATEGORY_DESCRIPTIONS } from './models';
import { AgriRagError, errorMessage } from './errors';
import { AgriRagServices } from './services';
import {
  addDocumentRequestSchema,
  ingestRequestSchema,
  queryRequestSchema,
  searchQuerySchema,
} from './schemas';

export const SERVICE_NAME = 'agri-rag';
export const SERVICE_VERSION = '1.0.0';

const STATUS_BY_CODE: Record<string, number> = {
  INVALID_CATEGORY: 400,
  INVALID_BATCH_SIZE: 400,
  DOCUMENT_LOAD_FAILED: 400,
  INGESTION_IN_PROGRESS: 409,
  COLLECTION_UNAVAILABLE: 503,
};

function sendValidationError(res: Response, error: ZodError): void {
  res.status(400).json({
    error: 'Invalid request',
    details: error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  });
}

/**
 * Known pipeline errors map to their status; anything else is a 500
 */
function sendError(res: Response, error: unknown, context: string): void {
  const status = error instanceof AgriRagError ? STATUS_BY_CODE[error.code] : undefined;
  if (status !== undefined) {
    res.status(status).json({ error: errorMessage(error) });
    return;
  }
  res.status(500).json({
    error: `Error ${context}`,
    message: errorMessage(error),
  });
}

/**
 * Create and configure the API router
 */
export function createAgriRagRouter(services: AgriRagServices): Router {
  const router = Router();
  router.use(express.json());

  const { logger, ingestion, retriever, responseGenerator, llmService, vectorStore } = services;

  /**
   * POST /query
   * Answer a question from the indexed documents
   */
  router.post('/query', async (req: Request, res: Response) => {
    const parsed = queryRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }
    const { question, category, topK, threshold } = parsed.data;

    try {
      const answer = threshold === undefined
        ? await responseGenerator.answer(question, { category, topK })
        : await responseGenerator.answerWithThreshold(question, { category, topK, threshold });
      res.json(answer);
    } catch (error) {
      logger.error(`Query error: ${errorMessage(error)}`);
      sendError(res, error, 'processing query');
    }
  });

  /**
   * GET /search
   * Semantic search without generation
   */
  router.get('/search', async (req: Request, res: Response) => {
    const parsed = searchQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }
    const { query, category, topK } = parsed.data;

    try {
      const results = await retriever.search(query, topK, category);
      res.json({
        query,
        categoryFilter: category ?? null,
        results,
      });
    } catch (error) {
      logger.error(`Search error: ${errorMessage(error)}`);
      sendError(res, error, 'searching');
    }
  });

  /**
   * GET /categories
   */
  router.get('/categories', (_req: Request, res: Response) => {
    res.json({
      categories: AGRI_CATEGORIES,
      descriptions: CATEGORY_DESCRIPTIONS,
    });
  });

  /**
   * GET /stats
   * Collection size and category distribution
   */
  router.get('/stats', async (_req: Request, res: Response) => {
    const outcome = await retriever.getCollectionStats();
    switch (outcome.status) {
      case 'ok':
        res.json(outcome.stats);
        return;
      case 'unavailable':
        res.status(503).json({ error: outcome.reason });
        return;
      case 'backend_error':
        res.status(500).json({
          error: 'Error getting statistics',
          message: outcome.error.message,
        });
        return;
    }
  });

  /**
   * POST /ingest
   * Rebuild the collection from the data directory
   */
  router.post('/ingest', async (req: Request, res: Response) => {
    const parsed = ingestRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const summary = await ingestion.ingestDocuments(parsed.data);
      res.json({
        ...summary,
        message: 'Ingestion completed successfully',
      });
    } catch (error) {
      logger.error(`Ingestion error: ${errorMessage(error)}`);
      sendError(res, error, 'during ingestion');
    }
  });

  /**
   * GET /ingest/status
   */
  router.get('/ingest/status', (_req: Request, res: Response) => {
    res.json(ingestion.getStatus());
  });

  /**
   * POST /documents
   * Add a single PDF to the existing collection
   */
  router.post('/documents', async (req: Request, res: Response) => {
    const parsed = addDocumentRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const result = await ingestion.addDocument(parsed.data.filePath, parsed.data.category);
      res.json(result);
    } catch (error) {
      logger.error(`Failed to add document: ${errorMessage(error)}`);
      sendError(res, error, 'adding document');
    }
  });

  /**
   * GET /health
   * Component status
   */
  router.get('/health', async (_req: Request, res: Response) => {
    try {
      const [ready, llmConfigured, models, vectorStoreHealthy] = await Promise.all([
        responseGenerator.isReady(),
        llmService.isConfigured(),
        llmService.listModels(),
        vectorStore.healthCheck(),
      ]);

      res.json({
        status: ready ? 'healthy' : 'degraded',
        version: SERVICE_VERSION,
        service: SERVICE_NAME,
        llmConfigured,
        models,
        vectorStoreHealthy,
      });
    } catch (error) {
      logger.error(`Health check failed: ${errorMessage(error)}`);
      res.status(500).json({
        status: 'unhealthy',
        error: errorMessage(error),
      });
    }
  });

  return router;
}
