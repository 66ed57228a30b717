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
 * Document processor for text cleaning and chunking
 * Handles document preparation for embedding
 * 
 * @packageDocumentation
 */

import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import type { Logger } from 'winston';
import { IConfigService, IDocumentProcessor } from '../interfaces';
import { DocumentChunk, SourceDocument } from '../models';

/**
 * Separators tried in order: paragraph, line, sentence, word, character
 */
export const CHUNK_SEPARATORS = ['\n\n', '\n', '. ', ' ', ''];

const CHARACTER_REPLACEMENTS: Array<[string, string]> = [
  ['\ufb01', 'fi'],
  ['\ufb02', 'fl'],
  ['\ufb00', 'ff'],
  ['\ufb03', 'ffi'],
  ['\ufb04', 'ffl'],
  ['\u2019', "'"],
  ['\u2018', "'"],
  ['\u201c', '"'],
  ['\u201d', '"'],
  ['\u2013', '-'],
  ['\u2014', '-'],
  ['\u2026', '...'],
  ['\u00a0', ' '],
  ['\u200b', ''],
];

const HEADER_FOOTER_PATTERN = new RegExp(
  [
    '^\\s*page\\s+\\d+\\s*(of\\s+\\d+)?\\s*$',
    '^\\s*\\d+\\s*$',
    '^\\s*-\\s*\\d+\\s*-\\s*$',
    '^\\s*\u00a9.*$',
    '^\\s*confidential\\s*$',
  ].join('|'),
  'i'
);

// C0/C1 control characters except tab, newline and carriage return
const CONTROL_CHARACTERS = /[\x00-\x08\x0b\x0c\x0e-\x1f\x7f-\x9f]/g;

/**
 * Closed-form chunk count, used for sizing before the real split
 */
export function estimateChunkCount(text: string, chunkSize: number, chunkOverlap: number): number {
  if (text.length <= chunkSize) {
    return 1;
  }
  return Math.max(1, Math.ceil((text.length - chunkOverlap) / (chunkSize - chunkOverlap)));
}

/**
 * Collapse space runs, cap blank-line runs and strip trailing spaces per line
 */
export function normalizeWhitespace(text: string): string {
  return text
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .split('\n')
    .map(line => line.trimEnd())
    .join('\n');
}

/**
 * Service for processing documents into chunks
 * Follows Single Responsibility Principle
 */
export class DocumentProcessor implements IDocumentProcessor {
  private readonly logger: Logger;
  private readonly configService: IConfigService;

  constructor(logger: Logger, configService: IConfigService) {
    this.logger = logger;
    this.configService = configService;
  }

  /**
   * Split text into overlapping chunks of at most `chunkSize` characters
   */
  async chunk(text: string, chunkSize?: number, chunkOverlap?: number): Promise<string[]> {
    if (!text || text.trim().length === 0) {
      return [];
    }

    const config = this.configService.getConfig().chunking;
    const size = chunkSize ?? config.chunkSize;
    const overlap = chunkOverlap ?? config.chunkOverlap;

    if (overlap >= size) {
      throw new Error(`chunkOverlap (${overlap}) must be smaller than chunkSize (${size})`);
    }

    const splitter = new RecursiveCharacterTextSplitter({
      chunkSize: size,
      chunkOverlap: overlap,
      separators: CHUNK_SEPARATORS,
    });

    const chunks = await splitter.splitText(text);
    this.logger.debug(`Split document into ${chunks.length} chunks`);
    return chunks;
  }

  /**
   * Chunk a document, stamping every chunk with its position and provenance
   */
  async chunkWithMetadata(
    document: SourceDocument,
    chunkSize?: number,
    chunkOverlap?: number
  ): Promise<DocumentChunk[]> {
    if (!document.text) {
      return [];
    }

    const texts = await this.chunk(document.text, chunkSize, chunkOverlap);

    return texts.map((text, index) => ({
      text,
      chunkIndex: index,
      totalChunks: texts.length,
      source: document.source,
      category: document.category,
      filename: document.filename,
    }));
  }

  /**
   * Clean a loaded document and split it for embedding
   */
  async processDocument(document: SourceDocument): Promise<DocumentChunk[]> {
    const text = this.cleanForEmbedding(this.cleanText(document.text));
    const chunks = await this.chunkWithMetadata({ ...document, text });

    this.logger.debug(`Created ${chunks.length} chunks for ${document.filename}`);
    return chunks;
  }

  /**
   * Normalize text extracted from a PDF: unicode, typography, page
   * headers and footers, whitespace and control characters
   */
  cleanText(text: string): string {
    if (!text) {
      return '';
    }

    let cleaned = text.normalize('NFKC');

    for (const [from, to] of CHARACTER_REPLACEMENTS) {
      cleaned = cleaned.split(from).join(to);
    }

    cleaned = cleaned
      .split('\n')
      .filter(line => !HEADER_FOOTER_PATTERN.test(line))
      .join('\n');

    cleaned = normalizeWhitespace(cleaned);
    cleaned = cleaned.replace(CONTROL_CHARACTERS, '');

    return cleaned.trim();
  }

  /**
   * Drop text that carries no meaning for embeddings
   */
  cleanForEmbedding(text: string): string {
    let cleaned = text;

    // URLs and e-mail addresses
    cleaned = cleaned.replace(/https?:\/\/\S+/g, '');
    cleaned = cleaned.replace(/\S+@\S+\.\S+/g, '');

    cleaned = cleaned.replace(/\.{4,}/g, '...');
    cleaned = cleaned.replace(/-{4,}/g, '---');

    return normalizeWhitespace(cleaned).trim();
  }
}
