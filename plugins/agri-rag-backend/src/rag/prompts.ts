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
 * Prompt templates for grounded agricultural answers
 *
 * @packageDocumentation
 */

export const SYSTEM_PROMPT = `You are an agricultural knowledge assistant serving farmers, extension workers and agronomists.

You answer questions about:
- Crop production and farming techniques
- Planting schedules and good practices
- Soil properties and soil management
- Agricultural statistics and trends

Rules:
1. Answer ONLY from the context retrieved from the document database.
2. When the context is not enough to answer, say so plainly.
3. Name the source document when you use information from it.
4. Use clear, practical language that a farmer can act on.
5. Give step-by-step guidance for technical procedures.
6. Politely decline questions outside agriculture.

Never invent facts, figures or sources.`;

export function ragTemplate(context: string, question: string): string {
  return `Answer the question using the following context from the agricultural knowledge base.

CONTEXT:
${context}

---

QUESTION: ${question}

Give a helpful, accurate answer based on the context above. If the context only partly covers the question, say what it does cover and what is missing.`;
}

export function noContextTemplate(question: string): string {
  return `The agricultural knowledge base was searched, but no passages relevant to this question were found.

Question: ${question}

The knowledge base only holds:
- Crop production guides
- Planting tips and recommendations
- Soil data and analysis
- Agricultural statistics

Tell the user that no matching documents were found and invite them to rephrase the question or ask about a specific crop or farming topic.`;
}

export function multiSourceTemplate(sources: string, context: string, question: string): string {
  return `Answer the question using information from several documents in the knowledge base.

SOURCES:
${sources}

CONTEXT:
${context}

---

QUESTION: ${question}

Combine what these sources say into one complete answer and cite each source you use.`;
}

/**
 * Returned by the threshold-gated answer path when nothing is relevant enough
 */
export const LOW_RELEVANCE_FALLBACK =
  "I couldn't find sufficiently relevant information to answer your question. " +
  'Could you try rephrasing or ask about a specific crop or farming topic?';
