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
 * Retrieve, prompt and generate: the question-answering pipeline
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { ICompletionService, IConfigService, ServiceDependencies } from '../interfaces';
import {
  RAGAnswer,
  RetrievedResult,
  SourceExcerpt,
  ThresholdRAGAnswer,
} from '../models';
import { buildMessages } from '../rag/promptBuilder';
import { LOW_RELEVANCE_FALLBACK } from '../rag/prompts';
import { CompletionServiceError, CompletionUnavailableError, errorMessage } from '../errors';
import { Retriever } from './Retriever';

export interface ResponseGeneratorDependencies extends ServiceDependencies {
  llmService: ICompletionService;
  retriever: Retriever;
}

export interface AnswerOptions {
  category?: string;
  topK?: number;
}

export interface ThresholdAnswerOptions extends AnswerOptions {
  threshold?: number;
}

const EXCERPT_LENGTH = 200;

export const COMPLETION_UNREACHABLE_MESSAGE =
  'Error: Cannot connect to Ollama. ' +
  'Please ensure Ollama is running with: `ollama serve`';

export function toSourceExcerpt(result: RetrievedResult): SourceExcerpt {
  return {
    content: result.content.length > EXCERPT_LENGTH
      ? `${result.content.substring(0, EXCERPT_LENGTH)}...`
      : result.content,
    source: result.source,
    category: result.category,
    filename: result.filename,
    score: result.score,
  };
}

export class ResponseGenerator {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly llmService: ICompletionService;
  private readonly retriever: Retriever;

  constructor(dependencies: ResponseGeneratorDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.llmService = dependencies.llmService;
    this.retriever = dependencies.retriever;
  }

  /**
   * Answer a question from the top-k retrieved chunks. When retrieval is
   * unavailable the model is still asked, with the no-context prompt.
   */
  async answer(question: string, options: AnswerOptions = {}): Promise<RAGAnswer> {
    this.logger.info(`Processing question: ${question.substring(0, 100)}...`);

    const outcome = await this.retriever.retrieve(question, {
      topK: options.topK,
      category: options.category,
    });
    if (outcome.status !== 'ok') {
      this.logger.warn(`Retrieval ${outcome.status}, answering without context`);
    }
    const documents = outcome.status === 'ok' ? outcome.results : [];
    this.logger.debug(`Retrieved ${documents.length} documents`);

    const answer = await this.generate(question, documents);
    const sources = documents.map(toSourceExcerpt);

    this.logger.info(`Generated answer with ${sources.length} sources`);

    return {
      answer,
      sources,
      question,
      categoryFilter: options.category ?? null,
      documentsRetrieved: documents.length,
    };
  }

  /**
   * Answer only from chunks scoring at least `threshold`. Without any such
   * chunk the model is not called.
   */
  async answerWithThreshold(
    question: string,
    options: ThresholdAnswerOptions = {}
  ): Promise<ThresholdRAGAnswer> {
    const threshold = options.threshold ?? 0.5;
    const documents = await this.retriever.searchWithThreshold(
      question,
      threshold,
      options.topK ?? 10,
      options.category
    );

    const envelope = {
      question,
      categoryFilter: options.category ?? null,
      thresholdUsed: threshold,
    };

    if (documents.length === 0) {
      return {
        ...envelope,
        answer: LOW_RELEVANCE_FALLBACK,
        sources: [],
        documentsRetrieved: 0,
      };
    }

    return {
      ...envelope,
      answer: await this.generate(question, documents),
      sources: documents.map(toSourceExcerpt),
      documentsRetrieved: documents.length,
    };
  }

  /**
   * Completion backend reachable and collection present
   */
  async isReady(): Promise<boolean> {
    const [configured, hasCollection] = await Promise.all([
      this.llmService.isConfigured(),
      this.retriever.hasCollection().catch(error => {
        this.logger.warn(`Vector store check failed: ${errorMessage(error)}`);
        return false;
      }),
    ]);
    return configured && hasCollection;
  }

  private async generate(question: string, documents: RetrievedResult[]): Promise<string> {
    const messages = buildMessages(
      question,
      documents,
      true,
      this.configService.getConfig().retrieval.maxContextChars
    );

    try {
      return await this.llmService.generate(messages);
    } catch (error) {
      if (error instanceof CompletionUnavailableError) {
        this.logger.error(`LLM generation error: ${error.message}`);
        return COMPLETION_UNREACHABLE_MESSAGE;
      }
      if (error instanceof CompletionServiceError) {
        this.logger.error(`LLM generation error: ${error.message}`);
        return `Error generating response: ${error.message}`;
      }
      throw error;
    }
  }
}
