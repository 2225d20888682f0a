/**
 * @tubeqa/qa - Grounded prompt
 */

import type { SearchResult } from '@tubeqa/memory';

/** Answers must come from the supplied context only. */
export const QA_PROMPT_TEMPLATE = `You are a helpful assistant.
Answer ONLY from the provided transcript context.
If the context is insufficient, just say you don't know.

{context}
Question: {question}`;

/** Chunk texts separated by a blank line. */
export function formatContext(chunks: Pick<SearchResult, 'content'>[]): string {
  return chunks.map((c) => c.content).join('\n\n');
}

/**
 * Substitute `{context}` and `{question}`. Values are inserted verbatim, so
 * braces inside a transcript are never treated as placeholders.
 */
export function fillPromptTemplate(
  context: string,
  question: string,
  template: string = QA_PROMPT_TEMPLATE,
): string {
  return template.replace(/\{(context|question)\}/g, (_match, key: string) =>
    key === 'context' ? context : question,
  );
}
