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
 * Factory for creating vector store implementations
 * 
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IVectorStore } from '../interfaces';
import { errorMessage } from '../errors';
import { ConfigService } from './ConfigService';
import { InMemoryVectorStore } from './InMemoryVectorStore';
import { PgVectorStore } from './PgVectorStore';

/**
 * Chooses the vector store named by `agriRag.vectorStore.type`.
 * 
 * Usage:
 * ```typescript
 * const vectorStore = await VectorStoreFactory.create(configService, logger);
 * ```
 */
export class VectorStoreFactory {
  /**
   * Create a vector store, falling back to memory when PostgreSQL cannot
   * be initialized
   */
  static async create(
    config: ConfigService,
    logger: Logger
  ): Promise<IVectorStore> {
    if (config.getVectorStoreType() !== 'postgresql') {
      logger.info('Using in-memory vector store');
      return new InMemoryVectorStore(logger);
    }

    try {
      return await VectorStoreFactory.createPostgres(config, logger);
    } catch (error) {
      logger.error(`Failed to initialize PostgreSQL vector store: ${errorMessage(error)}`);
      logger.warn('Falling back to in-memory vector store');
      return new InMemoryVectorStore(logger);
    }
  }

  /**
   * Create vector store with strict mode (no fallback)
   * Throws error if the configured store cannot be initialized
   */
  static async createStrict(
    config: ConfigService,
    logger: Logger
  ): Promise<IVectorStore> {
    if (config.getVectorStoreType() !== 'postgresql') {
      logger.info('Using in-memory vector store');
      return new InMemoryVectorStore(logger);
    }
    return VectorStoreFactory.createPostgres(config, logger);
  }

  private static async createPostgres(
    config: ConfigService,
    logger: Logger
  ): Promise<PgVectorStore> {
    logger.info('Creating vector store: postgresql');
    const store = new PgVectorStore(logger, config.getPostgresConfig());
    await store.initialize();
    logger.info('PostgreSQL vector store initialized successfully');
    return store;
  }
}
