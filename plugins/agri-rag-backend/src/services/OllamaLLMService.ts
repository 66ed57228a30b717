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
 * Completion service implementation for Ollama
 * Handles chat completions against the Ollama API
 * 
 * @packageDocumentation
 */

import fetch, { FetchError } from 'node-fetch';
import type { Logger } from 'winston';
import {
  GenerationOptions,
  ICompletionService,
  IConfigService,
  ServiceDependencies,
} from '../interfaces';
import { ChatMessage, OllamaChatResponse, OllamaTagsResponse } from '../models';
import { CompletionServiceError, CompletionUnavailableError, errorMessage } from '../errors';

// node-fetch error types raised when the server cannot be reached or stops answering
const UNAVAILABLE_FETCH_ERRORS = new Set(['system', 'request-timeout', 'body-timeout']);

/**
 * Service for generating answers with an Ollama-hosted model
 * Follows Single Responsibility and Dependency Inversion principles
 */
export class OllamaLLMService implements ICompletionService {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly baseUrl: string;

  constructor(dependencies: ServiceDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.baseUrl = this.configService.getConfig().llm.baseUrl.replace(/\/+$/, '');
  }

  /**
   * Generate a chat completion using Ollama
   */
  async generate(messages: ChatMessage[], options: GenerationOptions = {}): Promise<string> {
    const llm = this.configService.getConfig().llm;
    const temperature = options.temperature ?? llm.temperature;
    const maxTokens = options.maxTokens ?? llm.maxTokens;

    this.logger.info(`Generating chat completion with model: ${llm.model}`);

    const json = await this.post<OllamaChatResponse>('/api/chat', {
      model: llm.model,
      messages,
      stream: false,
      options: {
        temperature,
        num_predict: maxTokens,
      },
    }, llm.timeoutMs);

    if (!json.message || typeof json.message.content !== 'string') {
      throw new CompletionServiceError('Invalid response format from Ollama');
    }

    this.logger.debug(`Generated response: ${json.message.content.length} chars`);
    return json.message.content;
  }

  /**
   * POST a request and parse the JSON reply. Connection failures and
   * timeouts, including those while reading the body, map to
   * CompletionUnavailableError; any other failure to CompletionServiceError.
   */
  private async post<T>(path: string, body: unknown, timeoutMs: number): Promise<T> {
    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        timeout: timeoutMs,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new CompletionServiceError(`Ollama API error (${response.status}): ${errorText}`);
      }

      return (await response.json()) as T;
    } catch (error) {
      this.logger.error(`Chat completion request failed: ${errorMessage(error)}`);
      if (error instanceof CompletionServiceError) {
        throw error;
      }
      if (error instanceof FetchError && UNAVAILABLE_FETCH_ERRORS.has(error.type)) {
        throw new CompletionUnavailableError(this.baseUrl, error.message);
      }
      throw new CompletionServiceError(`Chat completion failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Health check for Ollama service
   */
  async isConfigured(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, { timeout: 5000 });
      return response.ok;
    } catch (error) {
      this.logger.error(`Ollama health check failed: ${error}`);
      return false;
    }
  }

  async listModels(): Promise<string[]> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, { timeout: 5000 });
      if (!response.ok) {
        throw new Error(`status ${response.status}`);
      }
      const json = (await response.json()) as OllamaTagsResponse;
      return Array.isArray(json.models) ? json.models.map(model => model.name) : [];
    } catch (error) {
      this.logger.warn(`Could not list models: ${errorMessage(error)}`);
      return [];
    }
  }
}
