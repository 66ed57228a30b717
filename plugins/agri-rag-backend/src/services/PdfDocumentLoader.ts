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
 * PDF document loader backed by pdf-parse
 *
 * @packageDocumentation
 */

import { readdir, readFile, stat } from 'fs/promises';
import * as path from 'path';
import type { Logger } from 'winston';
import { IDocumentLoader } from '../interfaces';
import { SourceDocument } from '../models';
import { DocumentLoadError, errorMessage } from '../errors';

/**
 * Category used for PDFs placed directly in the data directory
 */
export const UNCATEGORIZED = 'uncategorized';

/**
 * Extract the text of every non-blank page, pages separated by a blank line
 */
export async function extractPdfText(data: Buffer): Promise<string> {
  // Loaded on first use: the package entry runs a self-test when required without a parent module
  const { default: pdfParse } = await import('pdf-parse');
  // pdf-parse prefixes every rendered page with a blank line
  const result = await pdfParse(data);
  return result.text
    .split('\n\n')
    .filter(page => page.trim())
    .join('\n\n');
}

/**
 * Loads the PDFs of a category-per-directory tree:
 * `<dataDir>/<category>/<file>.pdf`
 */
export class PdfDocumentLoader implements IDocumentLoader {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async *loadAll(directory: string): AsyncIterable<SourceDocument> {
    const root = path.resolve(directory);
    const files = await this.findPdfs(root);
    this.logger.info(`Found ${files.length} PDF files in ${directory}`);

    for (const file of files) {
      const parent = path.dirname(file);
      const category = parent === root ? UNCATEGORIZED : path.basename(parent);
      try {
        yield await this.loadFile(file, category);
      } catch (error) {
        this.logger.warn(`Skipping ${path.basename(file)}: ${errorMessage(error)}`);
      }
    }
  }

  async loadFile(filePath: string, category?: string): Promise<SourceDocument> {
    let data: Buffer;
    try {
      data = await readFile(filePath);
    } catch (error) {
      throw new DocumentLoadError(filePath, errorMessage(error));
    }

    let text: string;
    try {
      text = await extractPdfText(data);
    } catch (error) {
      throw new DocumentLoadError(filePath, errorMessage(error));
    }

    this.logger.debug(`Extracted ${text.length} characters from ${path.basename(filePath)}`);

    return {
      text,
      source: filePath,
      category: category ?? path.basename(path.dirname(filePath)),
      filename: path.basename(filePath),
    };
  }

  private async findPdfs(root: string): Promise<string[]> {
    try {
      const info = await stat(root);
      if (!info.isDirectory()) {
        throw new Error('not a directory');
      }
    } catch (error) {
      throw new DocumentLoadError(root, `directory not found (${errorMessage(error)})`);
    }

    const found: string[] = [];
    const walk = async (dir: string): Promise<void> => {
      const entries = await readdir(dir, { withFileTypes: true });
      entries.sort((a, b) => a.name.localeCompare(b.name));
      for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(fullPath);
        } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.pdf')) {
          found.push(fullPath);
        }
      }
    };

    await walk(root);
    return found;
  }
}
