/**
 * Unit Tests for the grounded prompt
 */
import { describe, it, expect } from 'vitest';
import { QA_PROMPT_TEMPLATE, fillPromptTemplate, formatContext } from '@tubeqa/qa';

describe('formatContext', () => {
  it('joins chunk texts with a blank line', () => {
    expect(formatContext([{ content: 'first' }, { content: 'second' }])).toBe('first\n\nsecond');
  });

  it('is empty without chunks', () => {
    expect(formatContext([])).toBe('');
  });
});

describe('fillPromptTemplate', () => {
  it('fills the grounded template', () => {
    expect(fillPromptTemplate('The sky is blue.', 'What colour is the sky?')).toBe(
      'You are a helpful assistant.\n' +
        'Answer ONLY from the provided transcript context.\n' +
        "If the context is insufficient, just say you don't know.\n" +
        '\n' +
        'The sky is blue.\n' +
        'Question: What colour is the sky?',
    );
  });

  it('does not expand placeholders that appear inside the values', () => {
    expect(fillPromptTemplate('talks about {question} syntax', 'why $& and {context}?', '{context}|{question}')).toBe(
      'talks about {question} syntax|why $& and {context}?',
    );
  });

  it('keeps the instruction to admit ignorance', () => {
    expect(QA_PROMPT_TEMPLATE).toContain("just say you don't know");
  });
});
