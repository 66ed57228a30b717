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
 * Request schemas for the HTTP API
 *
 * @packageDocumentation
 */

import { z } from 'zod';

export const queryRequestSchema = z.object({
  question: z.string().min(3).max(1000).describe('Question about agriculture'),
  category: z.string().optional().describe('Restrict retrieval to one category'),
  topK: z.number().int().min(1).max(20).default(5).describe('Number of chunks to retrieve'),
  threshold: z.number().min(0).max(1).optional().describe('Minimum relevance score'),
});

export type QueryRequest = z.infer<typeof queryRequestSchema>;

export const searchQuerySchema = z.object({
  query: z.string().min(1),
  category: z.string().optional(),
  topK: z.coerce.number().int().min(1).max(20).default(5),
});

export type SearchQuery = z.infer<typeof searchQuerySchema>;

export const ingestRequestSchema = z.object({
  dataDir: z.string().min(1).optional().describe('Data directory to ingest instead of the configured one'),
  batchSize: z.number().int().min(10).max(500).default(100).describe('Chunks per embedding call'),
});

export type IngestRequest = z.infer<typeof ingestRequestSchema>;

export const addDocumentRequestSchema = z.object({
  filePath: z.string().min(1),
  category: z.string().optional(),
});

export type AddDocumentRequest = z.infer<typeof addDocumentRequestSchema>;
