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
 * Builds LLM message sequences from a question and retrieved passages
 *
 * @packageDocumentation
 */

import { ChatMessage } from '../models';
import {
  SYSTEM_PROMPT,
  multiSourceTemplate,
  noContextTemplate,
  ragTemplate,
} from './prompts';

export const DEFAULT_MAX_CONTEXT_CHARS = 4000;

const CONTEXT_SEPARATOR = '\n\n---\n\n';
// Room kept free for the ellipsis when the last block is cut
const TRUNCATION_RESERVE = 50;
const MIN_TRUNCATED_BLOCK = 100;

/**
 * The fields of a retrieved passage the prompt needs
 */
export interface ContextDocument {
  content: string;
  filename: string;
  category: string;
}

/**
 * Pack passages into a context string of at most `maxChars` characters.
 *
 * Blocks are taken in order. The first block that does not fit is cut to
 * the remaining budget when at least {@link MIN_TRUNCATED_BLOCK} characters
 * of it survive, otherwise dropped; no later block is considered.
 */
export function formatContext(
  documents: ContextDocument[],
  maxChars: number = DEFAULT_MAX_CONTEXT_CHARS
): string {
  const parts: string[] = [];
  let currentLength = 0;

  for (const doc of documents) {
    const entry = `[Source: ${doc.filename}]\n${doc.content}`;

    if (currentLength + entry.length > maxChars) {
      const remaining = maxChars - currentLength - TRUNCATION_RESERVE;
      if (remaining >= MIN_TRUNCATED_BLOCK) {
        parts.push(`${entry.slice(0, remaining)}...`);
      }
      break;
    }

    parts.push(entry);
    currentLength += entry.length + CONTEXT_SEPARATOR.length;
  }

  return parts.join(CONTEXT_SEPARATOR);
}

/**
 * Bullet list of distinct (filename, category) pairs in first-seen order
 */
export function formatSources(documents: ContextDocument[]): string {
  if (documents.length === 0) {
    return 'No sources found.';
  }

  const seen = new Set<string>();
  const lines: string[] = [];

  for (const doc of documents) {
    const key = `${doc.filename}|${doc.category}`;
    if (!seen.has(key)) {
      seen.add(key);
      lines.push(`- ${doc.filename} (${doc.category})`);
    }
  }

  return lines.join('\n');
}

/**
 * Build the system + user messages for a question.
 *
 * The user message shape depends only on whether there is context and on
 * how many distinct files it comes from.
 */
export function buildMessages(
  question: string,
  contextDocs: ContextDocument[],
  includeSources = true,
  maxContextChars: number = DEFAULT_MAX_CONTEXT_CHARS
): ChatMessage[] {
  let userContent: string;

  if (contextDocs.length === 0) {
    userContent = noContextTemplate(question);
  } else {
    const context = formatContext(contextDocs, maxContextChars);
    const filenames = new Set(contextDocs.map(doc => doc.filename));

    if (includeSources && filenames.size > 1) {
      userContent = multiSourceTemplate(formatSources(contextDocs), context, question);
    } else {
      userContent = ragTemplate(context, question);
    }
  }

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: userContent },
  ];
}

/**
 * Single prompt string for completion-style models
 */
export function buildSimplePrompt(question: string, context: string): string {
  return ragTemplate(context, question);
}
