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
import { DocumentProcessor, estimateChunkCount, normalizeWhitespace } from './DocumentProcessor';
import { ConfigService } from './ConfigService';
import { createLogger } from '../logger';

describe('DocumentProcessor', () => {
  const config = new ConfigService(
    new ConfigReader({ agriRag: { chunking: { chunkSize: 200, chunkOverlap: 20 } } })
  );
  const processor = new DocumentProcessor(createLogger({ silent: true }), config);

  const paragraph = (i: number) =>
    `Paragraph ${i} explains how smallholder farms rotate legumes with cereals to restore nitrogen in tired soils.`;
  const longText = Array.from({ length: 12 }, (_, i) => paragraph(i)).join('\n\n');

  describe('chunk', () => {
    it('returns nothing for blank input', async () => {
      await expect(processor.chunk('')).resolves.toEqual([]);
      await expect(processor.chunk('   \n\t ')).resolves.toEqual([]);
    });

    it('keeps short text as a single chunk', async () => {
      await expect(processor.chunk('Maize grows well in loam.')).resolves.toEqual([
        'Maize grows well in loam.',
      ]);
    });

    it('splits long text into chunks no longer than the chunk size', async () => {
      const chunks = await processor.chunk(longText);

      expect(chunks.length).toBeGreaterThan(1);
      for (const chunk of chunks) {
        expect(chunk.length).toBeLessThanOrEqual(200);
      }
    });

    it('honours explicit sizes', async () => {
      const chunks = await processor.chunk(longText, 500, 50);

      expect(chunks.length).toBeGreaterThan(1);
      for (const chunk of chunks) {
        expect(chunk.length).toBeLessThanOrEqual(500);
      }
    });

    it('rejects an overlap as large as the chunk size', async () => {
      await expect(processor.chunk(longText, 100, 100)).rejects.toThrow(
        'chunkOverlap (100) must be smaller than chunkSize (100)'
      );
    });
  });

  describe('chunkWithMetadata', () => {
    const document = {
      text: longText,
      source: 'data/raw/crop_production_guide/rotation.pdf',
      category: 'crop_production_guide',
      filename: 'rotation.pdf',
    };

    it('stamps position and provenance on every chunk', async () => {
      const chunks = await processor.chunkWithMetadata(document);

      expect(chunks.length).toBeGreaterThan(1);
      chunks.forEach((chunk, index) => {
        expect(chunk.chunkIndex).toBe(index);
        expect(chunk.totalChunks).toBe(chunks.length);
        expect(chunk.source).toBe(document.source);
        expect(chunk.category).toBe('crop_production_guide');
        expect(chunk.filename).toBe('rotation.pdf');
      });
    });

    it('returns nothing for a document without text', async () => {
      await expect(processor.chunkWithMetadata({ ...document, text: '' })).resolves.toEqual([]);
    });
  });

  describe('cleanText', () => {
    it('normalizes typography and drops page furniture', () => {
      const raw = [
        'Page 3 of 10',
        'The \ufb01eld yield rose\u2014sharply.',
        '',
        '',
        '',
        '42',
        'Use \u201cgood\u201d   seed.   ',
        '\u00a9 2024 Farm Office',
      ].join('\n');

      expect(processor.cleanText(raw)).toBe('The field yield rose-sharply.\n\nUse "good" seed.');
    });

    it('removes control characters and odd spaces', () => {
      expect(processor.cleanText('Soil\u0007 pH\u200b 6.5\u00a0to\u00a07')).toBe('Soil pH 6.5 to 7');
    });

    it('returns an empty string for empty input', () => {
      expect(processor.cleanText('')).toBe('');
    });
  });

  describe('cleanForEmbedding', () => {
    it('strips links and addresses and shortens leader runs', () => {
      const text = [
        'Spacing........ 30 cm',
        'See https://example.org/guide or write to info@example.org',
        'Rows ------ apart',
      ].join('\n');

      expect(processor.cleanForEmbedding(text)).toBe(
        'Spacing... 30 cm\nSee or write to\nRows --- apart'
      );
    });
  });

  describe('processDocument', () => {
    it('cleans before chunking', async () => {
      const chunks = await processor.processDocument({
        text: 'Page 1 of 2\nCowpea fixes nitrogen.\n7',
        source: 'data/raw/planting_tips/cowpea.pdf',
        category: 'planting_tips',
        filename: 'cowpea.pdf',
      });

      expect(chunks).toEqual([
        {
          text: 'Cowpea fixes nitrogen.',
          chunkIndex: 0,
          totalChunks: 1,
          source: 'data/raw/planting_tips/cowpea.pdf',
          category: 'planting_tips',
          filename: 'cowpea.pdf',
        },
      ]);
    });
  });
});

describe('estimateChunkCount', () => {
  it('is one for text within a chunk', () => {
    expect(estimateChunkCount('a'.repeat(100), 100, 10)).toBe(1);
  });

  it('accounts for the overlap', () => {
    expect(estimateChunkCount('a'.repeat(250), 100, 20)).toBe(3);
  });
});

describe('normalizeWhitespace', () => {
  it('collapses spaces and caps blank lines', () => {
    expect(normalizeWhitespace('a  \t b  \n\n\n\nc ')).toBe('a b\n\nc');
  });
});
