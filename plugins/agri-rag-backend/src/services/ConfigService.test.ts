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

import { describe, expect, it } from '@jest/globals';
import { ConfigReader } from '@backstage/config';
import { ConfigService, configFromEnv } from './ConfigService';

describe('ConfigService', () => {
  it('applies defaults for an empty configuration', () => {
    const config = new ConfigService(new ConfigReader({})).getConfig();

    expect(config).toEqual({
      llm: {
        baseUrl: 'http://localhost:11434',
        model: 'llama3.2',
        temperature: 0.1,
        maxTokens: 1024,
        timeoutMs: 60000,
      },
      embedding: { model: 'all-minilm', dimension: 384 },
      chunking: { chunkSize: 1000, chunkOverlap: 200 },
      retrieval: { defaultTopK: 5, maxDistance: 2, maxContextChars: 4000 },
      ingestion: { dataDir: 'data/raw', batchSize: 100 },
      collectionName: 'agri_docs',
      vectorStore: { type: 'memory' },
      server: { port: 7007 },
      logLevel: 'info',
    });
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(
      () =>
        new ConfigService(
          new ConfigReader({ agriRag: { chunking: { chunkSize: 500, chunkOverlap: 500 } } })
        )
    ).toThrow('chunkOverlap must be between 0 and chunkSize (500), got 500');
  });

  it('rejects a non-positive distance bound', () => {
    expect(
      () => new ConfigService(new ConfigReader({ agriRag: { retrieval: { maxDistance: 0 } } }))
    ).toThrow('retrieval.maxDistance must be positive, got 0');
  });

  it('rejects unknown vector store types', () => {
    expect(
      () => new ConfigService(new ConfigReader({ agriRag: { vectorStore: { type: 'chroma' } } }))
    ).toThrow('Unknown vector store type: chroma');
  });

  it('requires a password for the postgresql store', () => {
    expect(
      () => new ConfigService(new ConfigReader({ agriRag: { vectorStore: { type: 'postgresql' } } }))
    ).toThrow('PostgreSQL password is required when using postgresql vector store');
  });

  it('fills postgresql defaults', () => {
    const service = new ConfigService(
      new ConfigReader({
        agriRag: { vectorStore: { type: 'postgresql', postgresql: { password: 'test-secret' } } },
      })
    );

    expect(service.getVectorStoreType()).toBe('postgresql');
    expect(service.getPostgresConfig()).toEqual({
      host: 'localhost',
      port: 5432,
      database: 'agri_vectors',
      user: 'agri',
      password: 'test-secret',
      ssl: false,
      maxConnections: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });
  });

  it('refuses postgresql settings for the memory store', () => {
    expect(() => new ConfigService(new ConfigReader({})).getPostgresConfig()).toThrow(
      'PostgreSQL vector store is not configured'
    );
  });
});

describe('configFromEnv', () => {
  it('maps environment variables onto configuration keys', () => {
    expect(
      configFromEnv({
        OLLAMA_BASE_URL: 'http://gpu-box:11434',
        CHUNK_SIZE: '800',
        CHUNK_OVERLAP: '100',
        VECTOR_STORE: 'postgresql',
        POSTGRES_PASSWORD: 'test-secret',
        POSTGRES_SSL: 'true',
        UNRELATED: 'ignored',
      })
    ).toEqual({
      agriRag: {
        llm: { baseUrl: 'http://gpu-box:11434' },
        chunking: { chunkSize: 800, chunkOverlap: 100 },
        vectorStore: {
          type: 'postgresql',
          postgresql: { password: 'test-secret', ssl: true },
        },
      },
    });
  });

  it('rejects non-numeric values for numeric settings', () => {
    expect(() => configFromEnv({ PORT: 'eighty' })).toThrow(
      "Environment variable PORT must be a number, got 'eighty'"
    );
  });

  it('builds a service from the environment', () => {
    const service = ConfigService.fromEnv({ COLLECTION_NAME: 'field_manuals', DEFAULT_TOP_K: '8' });

    expect(service.getConfig().collectionName).toBe('field_manuals');
    expect(service.getConfig().retrieval.defaultTopK).toBe(8);
  });
});
