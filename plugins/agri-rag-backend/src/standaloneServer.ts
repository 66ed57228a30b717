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
 * Standalone HTTP server hosting the router under /api/v1
 *
 * @packageDocumentation
 */

import express from 'express';
import { Server } from 'http';
import type { Logger } from 'winston';
import { errorMessage } from './errors';
import { createAgriRagRouter } from './router';
import { ConfigService, createServices } from './services';
import type { ServiceOverrides } from './services';

export const API_PREFIX = '/api/v1';

export interface ServerOptions {
  config: ConfigService;
  logger: Logger;
  /** Port to bind; defaults to `agriRag.server.port`, 0 picks a free one */
  port?: number;
  overrides?: ServiceOverrides;
}

/**
 * Start listening; closing the returned server also closes the vector store
 */
export async function startStandaloneServer(options: ServerOptions): Promise<Server> {
  const { config, logger } = options;
  const services = await createServices(config, logger, options.overrides);

  const app = express();
  app.use(API_PREFIX, createAgriRagRouter(services));

  const port = options.port ?? config.getConfig().server.port;

  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info(`Agricultural RAG API listening on port ${port}${API_PREFIX}`);
      resolve(server);
    });
    server.on('error', reject);
    server.on('close', () => {
      services.vectorStore.close().catch(error => {
        logger.error(`Failed to close vector store: ${errorMessage(error)}`);
      });
    });
  });
}
