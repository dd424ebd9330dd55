/**
 * Prompt templates for answer generation.
 */

import type { ContextItem } from '../retrieval/RetrievalEngine.js';

export const NO_CONTEXT_ANSWER =
  "I don't have enough information to answer this question. Please upload relevant documents first.";

export const answerInstructions = `You are a helpful assistant that answers questions using only the provided context.
• If the context does not contain enough information to answer, say so clearly.
• Do not invent facts that are not in the context.
• Be concise and accurate.`;

/**
 * Numbered context sections followed by the question.
 */
export function buildAnswerPrompt(question: string, context: ContextItem[]): string {
  const sections = context.map((item, i) => `[${i + 1}] ${item.text.trim()}`).join('\n\n');
  return `Based on the following context, please answer the question.

Context:
${sections}

Question: ${question}

Answer:`;
}
