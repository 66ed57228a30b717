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
 * Static checks of the vector store schema against the columns and
 * operators PgVectorStore relies on
 */

import { describe, expect, it } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';

const readMigrationFile = (filename: string): string =>
  fs.readFileSync(path.join(__dirname, filename), 'utf8');

const tableColumns = (sql: string, table: string): string[] => {
  const match = new RegExp(`CREATE TABLE IF NOT EXISTS ${table} \\(([\\s\\S]*?)\\n\\);`).exec(sql);
  return (match?.[1] ?? '')
    .split('\n')
    .map(line => line.trim().split(/\s+/)[0] ?? '')
    .filter(name => name !== '' && name !== 'PRIMARY');
};

describe('001_initial_schema', () => {
  const sql = readMigrationFile('001_initial_schema.sql');

  it('should enable the pgvector extension', () => {
    expect(sql).toContain('CREATE EXTENSION IF NOT EXISTS vector;');
  });

  it('should create the collections table', () => {
    expect(tableColumns(sql, 'collections')).toEqual(['name', 'dimension', 'created_at']);
  });

  it('should create every column the store writes', () => {
    expect(tableColumns(sql, 'embeddings')).toEqual([
      'seq',
      'collection',
      'id',
      'content',
      'embedding',
      'source',
      'category',
      'filename',
      'chunk_index',
      'total_chunks',
      'created_at',
      'updated_at',
    ]);
  });

  it('should size the embedding column for the default model', () => {
    expect(sql).toContain('embedding vector(384) NOT NULL');
  });

  it('should index embeddings for Euclidean distance', () => {
    expect(sql).toContain('ON embeddings USING hnsw (embedding vector_l2_ops)');
  });

  it('should cascade collection deletes to embeddings', () => {
    expect(sql).toContain('REFERENCES collections (name) ON DELETE CASCADE');
  });

  it('should keep updated_at current on update', () => {
    expect(sql).toContain('CREATE TRIGGER update_embeddings_updated_at');
    expect(sql).toContain('EXECUTE FUNCTION update_updated_at_column();');
  });
});
