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
 * PostgreSQL vector store implementation with pgvector
 * Provides persistent vector storage and similarity search capabilities
 * 
 * @packageDocumentation
 */

import { Pool, PoolClient } from 'pg';
import type { Logger } from 'winston';
import { IVectorStore } from '../interfaces';
import {
  FilterExpr,
  IndexedRecord,
  PostgresConfig,
  RecordMetadata,
  VectorMatch,
} from '../models';
import { filterConditions } from '../rag/filters';
import { CollectionNotFoundError, EmbeddingDimensionError } from '../errors';

interface MetadataRow {
  source: string;
  category: string;
  filename: string;
  chunk_index: number;
  total_chunks: number;
}

interface MatchRow extends MetadataRow {
  id: string;
  content: string;
  distance: string | number;
}

const UPSERT_SQL = `
  INSERT INTO embeddings (
    collection, id, content, embedding,
    source, category, filename, chunk_index, total_chunks
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
  ON CONFLICT (collection, id)
  DO UPDATE SET
    content = EXCLUDED.content,
    embedding = EXCLUDED.embedding,
    source = EXCLUDED.source,
    category = EXCLUDED.category,
    filename = EXCLUDED.filename,
    chunk_index = EXCLUDED.chunk_index,
    total_chunks = EXCLUDED.total_chunks,
    updated_at = CURRENT_TIMESTAMP
`;

/**
 * Translate a filter into SQL conditions. Placeholders start at `firstIndex`.
 */
export function filterToSql(
  filter: FilterExpr | null | undefined,
  firstIndex: number
): { conditions: string[]; values: string[] } {
  const conditions: string[] = [];
  const values: string[] = [];

  if (!filter) {
    return { conditions, values };
  }

  for (const condition of filterConditions(filter)) {
    const placeholder = `$${firstIndex + values.length}`;
    if ('category' in condition) {
      conditions.push(`category = ${placeholder}`);
      values.push(condition.category.$eq);
    } else if ('source' in condition) {
      conditions.push(`strpos(source, ${placeholder}) > 0`);
      values.push(condition.source.$contains);
    } else {
      conditions.push(`strpos(filename, ${placeholder}) > 0`);
      values.push(condition.filename.$contains);
    }
  }

  return { conditions, values };
}

function toMetadata(row: MetadataRow): RecordMetadata {
  return {
    source: row.source,
    category: row.category,
    filename: row.filename,
    chunkIndex: row.chunk_index,
    totalChunks: row.total_chunks,
  };
}

/**
 * PostgreSQL vector store using pgvector extension
 * Follows Single Responsibility Principle
 * 
 * Features:
 * - Named collections sharing one embeddings table
 * - HNSW index on Euclidean distance
 * - Transactional batch upserts
 * - Connection pooling
 */
export class PgVectorStore implements IVectorStore {
  private readonly logger: Logger;
  private readonly pool: Pool;
  private initialized: boolean = false;
  // Declared size of embeddings.embedding; null when the column is unsized
  private columnDimension: number | null = null;

  constructor(logger: Logger, config: PostgresConfig) {
    this.logger = logger;

    // Initialize connection pool
    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      max: config.maxConnections ?? 10,
      idleTimeoutMillis: config.idleTimeoutMillis ?? 30000,
      connectionTimeoutMillis: config.connectionTimeoutMillis ?? 5000,
    });

    // Handle pool errors
    this.pool.on('error', (err) => {
      this.logger.error(`Unexpected PostgreSQL pool error: ${err.message}`);
    });
  }

  /**
   * Initialize the vector store (verify connection, extension and schema)
   * Should be called after construction
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      this.logger.debug('PgVectorStore already initialized');
      return;
    }

    try {
      this.logger.info('Initializing PgVectorStore...');

      await this.withClient(async client => {
        await client.query('SELECT NOW()');

        const extension = await client.query<{ installed: boolean }>(
          "SELECT EXISTS(SELECT 1 FROM pg_extension WHERE extname = 'vector') as installed"
        );
        if (!extension.rows[0]?.installed) {
          throw new Error('pgvector extension is not installed. Please run: CREATE EXTENSION vector;');
        }

        const schema = await client.query<{ tables: string }>(
          "SELECT COUNT(*) as tables FROM information_schema.tables WHERE table_name IN ('collections', 'embeddings')"
        );
        if (parseInt(schema.rows[0]?.tables ?? '0', 10) < 2) {
          throw new Error('Vector store tables not found. Run migrations first.');
        }

        // pgvector stores the declared dimension as the column's type modifier
        const column = await client.query<{ dimension: number }>(
          "SELECT atttypmod AS dimension FROM pg_attribute WHERE attrelid = 'embeddings'::regclass AND attname = 'embedding'"
        );
        const dimension = column.rows[0]?.dimension ?? -1;
        this.columnDimension = dimension > 0 ? dimension : null;
      });

      this.initialized = true;
      this.logger.info('PgVectorStore initialized successfully');
    } catch (error) {
      this.logger.error(`Failed to initialize PgVectorStore: ${error}`);
      throw new Error(`PgVectorStore initialization failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  async createCollection(name: string, options: { dimension: number }): Promise<void> {
    this.ensureInitialized();
    if (this.columnDimension !== null && options.dimension !== this.columnDimension) {
      throw new EmbeddingDimensionError(this.columnDimension, options.dimension);
    }
    await this.withClient(client =>
      client.query('INSERT INTO collections (name, dimension) VALUES ($1, $2)', [name, options.dimension])
    );
    this.logger.info(`Created collection '${name}' (dimension ${options.dimension})`);
  }

  async deleteCollection(name: string): Promise<boolean> {
    this.ensureInitialized();
    const result = await this.withClient(client =>
      client.query('DELETE FROM collections WHERE name = $1', [name])
    );
    const existed = (result.rowCount ?? 0) > 0;
    if (existed) {
      this.logger.info(`Deleted collection '${name}'`);
    }
    return existed;
  }

  async hasCollection(name: string): Promise<boolean> {
    this.ensureInitialized();
    const result = await this.withClient(client =>
      client.query<{ exists: boolean }>(
        'SELECT EXISTS(SELECT 1 FROM collections WHERE name = $1) as exists',
        [name]
      )
    );
    return result.rows[0]?.exists ?? false;
  }

  /**
   * Store records in a single transaction
   */
  async upsert(collection: string, records: IndexedRecord[]): Promise<void> {
    this.ensureInitialized();

    if (records.length === 0) {
      return;
    }

    await this.withClient(async client => {
      try {
        await client.query('BEGIN');

        const dimension = await this.collectionDimension(client, collection);
        for (const record of records) {
          if (record.embedding.length !== dimension) {
            throw new EmbeddingDimensionError(dimension, record.embedding.length);
          }
          await client.query(UPSERT_SQL, [
            collection,
            record.id,
            record.document,
            this.vectorToSql(record.embedding),
            record.metadata.source,
            record.metadata.category,
            record.metadata.filename,
            record.metadata.chunkIndex,
            record.metadata.totalChunks,
          ]);
        }

        await client.query('COMMIT');
        this.logger.debug(`Stored batch of ${records.length} records in '${collection}'`);
      } catch (error) {
        await client.query('ROLLBACK');
        this.logger.error(`Failed to store record batch: ${error}`);
        throw error;
      }
    });
  }

  /**
   * Nearest neighbours by Euclidean distance (pgvector `<->`)
   */
  async query(
    collection: string,
    vector: number[],
    topK: number,
    filter?: FilterExpr | null
  ): Promise<VectorMatch[]> {
    this.ensureInitialized();

    return this.withClient(async client => {
      await this.collectionDimension(client, collection);

      const where = filterToSql(filter, 3);
      const limitIndex = 3 + where.values.length;
      const sql = `
        SELECT
          id,
          content,
          source,
          category,
          filename,
          chunk_index,
          total_chunks,
          embedding <-> $2 as distance
        FROM embeddings
        WHERE ${['collection = $1', ...where.conditions].join(' AND ')}
        ORDER BY embedding <-> $2
        LIMIT $${limitIndex}
      `;

      const result = await client.query<MatchRow>(sql, [
        collection,
        this.vectorToSql(vector),
        ...where.values,
        topK,
      ]);

      return result.rows.map(row => ({
        id: row.id,
        document: row.content,
        metadata: toMetadata(row),
        distance: typeof row.distance === 'number' ? row.distance : parseFloat(row.distance),
      }));
    });
  }

  async count(collection: string): Promise<number> {
    this.ensureInitialized();
    return this.withClient(async client => {
      await this.collectionDimension(client, collection);
      const result = await client.query<{ count: string }>(
        'SELECT COUNT(*) as count FROM embeddings WHERE collection = $1',
        [collection]
      );
      return parseInt(result.rows[0]?.count ?? '0', 10);
    });
  }

  async sample(collection: string, limit: number): Promise<RecordMetadata[]> {
    this.ensureInitialized();
    return this.withClient(async client => {
      await this.collectionDimension(client, collection);
      const result = await client.query<MetadataRow>(
        `SELECT source, category, filename, chunk_index, total_chunks
         FROM embeddings WHERE collection = $1 ORDER BY seq LIMIT $2`,
        [collection, limit]
      );
      return result.rows.map(toMetadata);
    });
  }

  /**
   * Close the connection pool
   */
  async close(): Promise<void> {
    await this.pool.end();
    this.logger.info('PgVectorStore connection pool closed');
  }

  /**
   * Health check for the vector store
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.withClient(client => client.query('SELECT 1'));
      return true;
    } catch (error) {
      this.logger.error(`Health check failed: ${error}`);
      return false;
    }
  }

  private async collectionDimension(client: PoolClient, collection: string): Promise<number> {
    const result = await client.query<{ dimension: number }>(
      'SELECT dimension FROM collections WHERE name = $1',
      [collection]
    );
    const row = result.rows[0];
    if (!row) {
      throw new CollectionNotFoundError(collection);
    }
    return row.dimension;
  }

  private async withClient<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await work(client);
    } finally {
      client.release();
    }
  }

  /**
   * Convert number array to PostgreSQL vector format
   */
  private vectorToSql(vector: number[]): string {
    return `[${vector.join(',')}]`;
  }

  /**
   * Ensure the store is initialized
   */
  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('PgVectorStore not initialized. Call initialize() first.');
    }
  }
}
