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

import 'dotenv/config';
import { createLogger } from './logger';
import { ConfigService } from './services';
import { startStandaloneServer } from './standaloneServer';

async function main(): Promise<void> {
  const config = ConfigService.fromEnv(process.env);
  const logger = createLogger({ level: config.getConfig().logLevel });
  const server = await startStandaloneServer({ config, logger });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(error => {
      if (error) {
        logger.error(`Error while closing server: ${error.message}`);
        process.exitCode = 1;
      }
    });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

main().catch(error => {
  process.stderr.write(`Failed to start server: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
