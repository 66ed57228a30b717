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
 * Embedding service implementation for Ollama
 *
 * @packageDocumentation
 */

import fetch from 'node-fetch';
import type { Logger } from 'winston';
import { IEmbedder, IConfigService, ServiceDependencies } from '../interfaces';
import { OllamaEmbedResponse } from '../models';
import { EmbeddingDimensionError, EmbeddingServiceError, errorMessage } from '../errors';

export function zeroVector(dimension: number): number[] {
  return new Array<number>(dimension).fill(0);
}

/**
 * Embeds text with an Ollama embedding model (`/api/embed`).
 * Blank inputs never reach the backend and map to zero vectors.
 */
export class OllamaEmbedder implements IEmbedder {
  readonly dimension: number;

  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly baseUrl: string;

  constructor(dependencies: ServiceDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    const config = this.configService.getConfig();
    this.baseUrl = config.llm.baseUrl.replace(/\/+$/, '');
    this.dimension = config.embedding.dimension;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const result = texts.map(() => zeroVector(this.dimension));
    const indices: number[] = [];
    const inputs: string[] = [];

    texts.forEach((text, index) => {
      if (text.trim().length > 0) {
        indices.push(index);
        inputs.push(text);
      }
    });

    if (inputs.length === 0) {
      return result;
    }

    const embeddings = await this.request(inputs);
    if (embeddings.length !== inputs.length) {
      throw new EmbeddingServiceError(
        `Expected ${inputs.length} embeddings from Ollama, got ${embeddings.length}`
      );
    }

    embeddings.forEach((embedding, i) => {
      if (embedding.length !== this.dimension) {
        throw new EmbeddingDimensionError(this.dimension, embedding.length);
      }
      result[indices[i]] = embedding;
    });

    return result;
  }

  private async request(inputs: string[]): Promise<number[][]> {
    const model = this.configService.getConfig().embedding.model;
    this.logger.debug(`Generating embeddings for ${inputs.length} inputs with model: ${model}`);

    try {
      const response = await fetch(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model,
          input: inputs,
        }),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Ollama API error (${response.status}): ${errorText}`);
      }

      const json = (await response.json()) as OllamaEmbedResponse;

      if (!json.embeddings || !Array.isArray(json.embeddings)) {
        throw new Error('Invalid embeddings response format from Ollama');
      }

      return json.embeddings;
    } catch (error) {
      this.logger.error(`Failed to generate embeddings: ${error}`);
      throw new EmbeddingServiceError(`Embedding generation failed: ${errorMessage(error)}`);
    }
  }
}
