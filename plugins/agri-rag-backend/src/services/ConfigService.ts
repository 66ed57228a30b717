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
 * Configuration service implementation
 * Manages application configuration with type-safe access
 * 
 * @packageDocumentation
 */

import { Config, ConfigReader } from '@backstage/config';
import type { JsonObject } from '@backstage/types';
import { IConfigService } from '../interfaces';
import { AgriRagConfig, PostgresConfig, VectorStoreConfig } from '../models';

/**
 * Configuration service that wraps a Config tree
 * rooted at `agriRag`
 */
export class ConfigService implements IConfigService {
  private readonly config: Config;
  private readonly cachedConfig: AgriRagConfig;

  constructor(config: Config) {
    this.config = config;
    this.cachedConfig = this.loadConfig();
  }

  /**
   * Build the configuration from environment variables
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): ConfigService {
    return new ConfigService(new ConfigReader(configFromEnv(env), 'env'));
  }

  /**
   * Load and validate configuration
   */
  private loadConfig(): AgriRagConfig {
    const config: AgriRagConfig = {
      llm: {
        baseUrl: this.config.getOptionalString('agriRag.llm.baseUrl') ?? 'http://localhost:11434',
        model: this.config.getOptionalString('agriRag.llm.model') ?? 'llama3.2',
        temperature: this.config.getOptionalNumber('agriRag.llm.temperature') ?? 0.1,
        maxTokens: this.config.getOptionalNumber('agriRag.llm.maxTokens') ?? 1024,
        timeoutMs: this.config.getOptionalNumber('agriRag.llm.timeoutMs') ?? 60000,
      },
      embedding: {
        model: this.config.getOptionalString('agriRag.embedding.model') ?? 'all-minilm',
        dimension: this.config.getOptionalNumber('agriRag.embedding.dimension') ?? 384,
      },
      chunking: {
        chunkSize: this.config.getOptionalNumber('agriRag.chunking.chunkSize') ?? 1000,
        chunkOverlap: this.config.getOptionalNumber('agriRag.chunking.chunkOverlap') ?? 200,
      },
      retrieval: {
        defaultTopK: this.config.getOptionalNumber('agriRag.retrieval.defaultTopK') ?? 5,
        maxDistance: this.config.getOptionalNumber('agriRag.retrieval.maxDistance') ?? 2,
        maxContextChars: this.config.getOptionalNumber('agriRag.retrieval.maxContextChars') ?? 4000,
      },
      ingestion: {
        dataDir: this.config.getOptionalString('agriRag.ingestion.dataDir') ?? 'data/raw',
        batchSize: this.config.getOptionalNumber('agriRag.ingestion.batchSize') ?? 100,
      },
      collectionName: this.config.getOptionalString('agriRag.collectionName') ?? 'agri_docs',
      vectorStore: this.loadVectorStoreConfig(),
      server: {
        port: this.config.getOptionalNumber('agriRag.server.port') ?? 7007,
      },
      logLevel: this.config.getOptionalString('agriRag.logLevel') ?? 'info',
    };

    this.validate(config);
    return config;
  }

  private validate(config: AgriRagConfig): void {
    const { chunkSize, chunkOverlap } = config.chunking;
    if (chunkSize <= 0) {
      throw new Error(`chunkSize must be positive, got ${chunkSize}`);
    }
    if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new Error(`chunkOverlap must be between 0 and chunkSize (${chunkSize}), got ${chunkOverlap}`);
    }
    if (config.embedding.dimension <= 0) {
      throw new Error(`embedding dimension must be positive, got ${config.embedding.dimension}`);
    }
    if (config.retrieval.maxDistance <= 0) {
      throw new Error(`retrieval.maxDistance must be positive, got ${config.retrieval.maxDistance}`);
    }
    if (config.ingestion.batchSize <= 0) {
      throw new Error(`ingestion.batchSize must be positive, got ${config.ingestion.batchSize}`);
    }
  }

  /**
   * Load vector store configuration
   */
  private loadVectorStoreConfig(): VectorStoreConfig {
    const type = this.config.getOptionalString('agriRag.vectorStore.type');

    if (type === 'postgresql') {
      return {
        type: 'postgresql',
        postgresql: this.loadPostgresConfig(),
      };
    }
    if (type !== undefined && type !== 'memory') {
      throw new Error(`Unknown vector store type: ${type}`);
    }

    // Default to in-memory store
    return {
      type: 'memory',
    };
  }

  /**
   * Load PostgreSQL configuration with validation
   */
  private loadPostgresConfig(): PostgresConfig {
    const prefix = 'agriRag.vectorStore.postgresql';
    const password = this.config.getOptionalString(`${prefix}.password`) ?? '';

    if (!password) {
      throw new Error('PostgreSQL password is required when using postgresql vector store');
    }

    return {
      host: this.config.getOptionalString(`${prefix}.host`) ?? 'localhost',
      port: this.config.getOptionalNumber(`${prefix}.port`) ?? 5432,
      database: this.config.getOptionalString(`${prefix}.database`) ?? 'agri_vectors',
      user: this.config.getOptionalString(`${prefix}.user`) ?? 'agri',
      password,
      ssl: this.config.getOptionalBoolean(`${prefix}.ssl`) ?? false,
      maxConnections: this.config.getOptionalNumber(`${prefix}.maxConnections`) ?? 10,
      idleTimeoutMillis: this.config.getOptionalNumber(`${prefix}.idleTimeoutMillis`) ?? 30000,
      connectionTimeoutMillis: this.config.getOptionalNumber(`${prefix}.connectionTimeoutMillis`) ?? 5000,
    };
  }

  getConfig(): AgriRagConfig {
    return this.cachedConfig;
  }

  /**
   * Get vector store type
   */
  getVectorStoreType(): 'memory' | 'postgresql' {
    return this.cachedConfig.vectorStore.type;
  }

  /**
   * Get PostgreSQL configuration
   * Throws error if not configured
   */
  getPostgresConfig(): PostgresConfig {
    if (this.cachedConfig.vectorStore.type !== 'postgresql' || !this.cachedConfig.vectorStore.postgresql) {
      throw new Error('PostgreSQL vector store is not configured');
    }
    return this.cachedConfig.vectorStore.postgresql;
  }
}

// config key (below agriRag) -> environment variable
const STRING_VARS: Record<string, string> = {
  'llm.baseUrl': 'OLLAMA_BASE_URL',
  'llm.model': 'LLM_MODEL',
  'embedding.model': 'EMBEDDING_MODEL',
  'ingestion.dataDir': 'DATA_DIR',
  collectionName: 'COLLECTION_NAME',
  'vectorStore.type': 'VECTOR_STORE',
  'vectorStore.postgresql.host': 'POSTGRES_HOST',
  'vectorStore.postgresql.database': 'POSTGRES_DB',
  'vectorStore.postgresql.user': 'POSTGRES_USER',
  'vectorStore.postgresql.password': 'POSTGRES_PASSWORD',
  logLevel: 'LOG_LEVEL',
};

const NUMBER_VARS: Record<string, string> = {
  'llm.temperature': 'LLM_TEMPERATURE',
  'llm.maxTokens': 'LLM_MAX_TOKENS',
  'llm.timeoutMs': 'LLM_TIMEOUT_MS',
  'embedding.dimension': 'EMBEDDING_DIMENSION',
  'chunking.chunkSize': 'CHUNK_SIZE',
  'chunking.chunkOverlap': 'CHUNK_OVERLAP',
  'retrieval.defaultTopK': 'DEFAULT_TOP_K',
  'retrieval.maxDistance': 'RETRIEVAL_MAX_DISTANCE',
  'retrieval.maxContextChars': 'MAX_CONTEXT_CHARS',
  'ingestion.batchSize': 'INGEST_BATCH_SIZE',
  'vectorStore.postgresql.port': 'POSTGRES_PORT',
  'server.port': 'PORT',
};

const BOOLEAN_VARS: Record<string, string> = {
  'vectorStore.postgresql.ssl': 'POSTGRES_SSL',
};

function setPath(target: JsonObject, path: string, value: string | number | boolean): void {
  const keys = path.split('.');
  let node = target;
  for (const key of keys.slice(0, -1)) {
    const child = node[key];
    if (typeof child === 'object' && child !== null && !Array.isArray(child)) {
      node = child;
    } else {
      const created: JsonObject = {};
      node[key] = created;
      node = created;
    }
  }
  node[keys[keys.length - 1]] = value;
}

/**
 * Map environment variables onto an `agriRag` config object.
 * Unset and empty variables are left out so defaults apply.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): JsonObject {
  const agriRag: JsonObject = {};

  for (const [path, name] of Object.entries(STRING_VARS)) {
    const value = env[name];
    if (value) {
      setPath(agriRag, path, value);
    }
  }

  for (const [path, name] of Object.entries(NUMBER_VARS)) {
    const value = env[name];
    if (value) {
      const parsed = Number(value);
      if (Number.isNaN(parsed)) {
        throw new Error(`Environment variable ${name} must be a number, got '${value}'`);
      }
      setPath(agriRag, path, parsed);
    }
  }

  for (const [path, name] of Object.entries(BOOLEAN_VARS)) {
    const value = env[name];
    if (value) {
      setPath(agriRag, path, value === 'true' || value === '1');
    }
  }

  return { agriRag };
}
