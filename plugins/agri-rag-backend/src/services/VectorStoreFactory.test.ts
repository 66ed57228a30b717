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
import { VectorStoreFactory } from './VectorStoreFactory';
import { ConfigService } from './ConfigService';
import { InMemoryVectorStore } from './InMemoryVectorStore';
import { PgVectorStore } from './PgVectorStore';
import { createLogger } from '../logger';

const mockPool = {
  connect: jest.fn<() => Promise<unknown>>(),
  end: jest.fn(async () => undefined),
  on: jest.fn(),
};

jest.mock('pg', () => ({
  Pool: jest.fn(() => mockPool),
}));

const postgresConfig = new ConfigService(
  new ConfigReader({
    agriRag: { vectorStore: { type: 'postgresql', postgresql: { password: 'test-secret' } } },
  })
);

describe('VectorStoreFactory', () => {
  const logger = createLogger({ silent: true });

  beforeEach(() => {
    mockPool.connect.mockReset();
  });

  it('creates an in-memory store by default', async () => {
    const store = await VectorStoreFactory.create(new ConfigService(new ConfigReader({})), logger);

    expect(store).toBeInstanceOf(InMemoryVectorStore);
  });

  it('creates an initialized PostgreSQL store when configured', async () => {
    const query = jest.fn<(sql: string) => Promise<unknown>>()
      .mockResolvedValueOnce({ rows: [{ now: new Date() }] })
      .mockResolvedValueOnce({ rows: [{ installed: true }] })
      .mockResolvedValueOnce({ rows: [{ tables: '2' }] })
      .mockResolvedValueOnce({ rows: [{ dimension: 384 }] });
    mockPool.connect.mockResolvedValue({ query, release: jest.fn() });

    const store = await VectorStoreFactory.createStrict(postgresConfig, logger);

    expect(store).toBeInstanceOf(PgVectorStore);
  });

  it('falls back to memory when PostgreSQL cannot be reached', async () => {
    mockPool.connect.mockRejectedValue(new Error('connect ECONNREFUSED'));
    const warn = jest.spyOn(logger, 'warn');

    const store = await VectorStoreFactory.create(postgresConfig, logger);

    expect(store).toBeInstanceOf(InMemoryVectorStore);
    expect(warn).toHaveBeenCalledWith('Falling back to in-memory vector store');
  });

  it('does not fall back in strict mode', async () => {
    mockPool.connect.mockRejectedValue(new Error('connect ECONNREFUSED'));

    await expect(VectorStoreFactory.createStrict(postgresConfig, logger)).rejects.toThrow(
      'PgVectorStore initialization failed: connect ECONNREFUSED'
    );
  });
});
