import { describe, it, expect } from 'vitest';
import {
  buildContext,
  buildFallbackAnswer,
  buildPrompt,
  noDataMessage,
  RAG_PROMPT_TEMPLATE_KEY,
} from '../../src/services/rag/prompt.js';
import type { SearchResult } from '../../src/services/rag/types.js';

function result(chunkText: string, similarity: number, objectType = 'journals'): SearchResult {
  return { embeddingId: `${chunkText}_chunk_0`, chunkText, objectType, objectId: chunkText, similarity };
}

describe('noDataMessage', () => {
  it('answers in English for English queries', () => {
    expect(noDataMessage('Why am I tired?')).toBe(
      'I couldn\'t find relevant information in your data to answer: "Why am I tired?". You may need to add more data or try a different question.'
    );
  });

  it('answers in Chinese for Chinese queries', () => {
    expect(noDataMessage('我为什么累')).toBe(
      '抱歉，我在您的数据中没有找到与"我为什么累"相关的信息。您可能需要添加更多数据或换一个问题。'
    );
  });
});

describe('buildContext', () => {
  const first = '1. alpha\n   (Type: journals, Relevance: 75.6%)\n\n';
  const second = '2. beta\n   (Type: meals, Relevance: 50.0%)\n\n';
  const results = [result('alpha', 0.756), result('beta', 0.5, 'meals')];

  it('numbers entries with type and relevance', () => {
    expect(buildContext(results, 4000)).toBe(`## Relevant Information\n\n${first}${second}`);
  });

  it('stops adding entries once the budget is reached', () => {
    expect(buildContext(results, first.length)).toBe(`## Relevant Information\n\n${first}`);
    expect(buildContext(results, 0)).toBe('## Relevant Information\n\n');
  });
});

describe('buildPrompt', () => {
  it('builds the default prompt without a calculation summary', () => {
    const prompt = buildPrompt('Why am I tired?', 'CTX', undefined, undefined);
    expect(prompt).toBe(
      [
        'You are a helpful personal AI assistant. A user has asked you a question about their personal data.',
        '',
        'User Question: Why am I tired?',
        '',
        'CTX',
        '',
        "Please provide a helpful, accurate, and natural response based on the user's personal data above.",
        'Be conversational and focus on insights that would be useful to the user.',
      ].join('\n')
    );
  });

  it('includes the calculation summary when given', () => {
    const prompt = buildPrompt('q', 'CTX', 'Total: 150.5', undefined);
    expect(prompt.split('\n')).toContain('Calculation Summary: Total: 150.5');
  });

  it('fills a custom template and collapses blank runs', () => {
    const templates = { [RAG_PROMPT_TEMPLATE_KEY]: 'Q: {query}\n{calculation_summary}\n\nC: {context}' };

    expect(buildPrompt('q', 'ctx', undefined, templates)).toBe('Q: q\n\nC: ctx');
    expect(buildPrompt('q', 'ctx', 'S', templates)).toBe('Q: q\n\n**Calculation Summary:**\nS\n\nC: ctx');
  });

  it('ignores templates under other keys', () => {
    const prompt = buildPrompt('q', 'ctx', undefined, { other: '{query}' });
    expect(prompt.startsWith('You are a helpful personal AI assistant.')).toBe(true);
  });
});

describe('buildFallbackAnswer', () => {
  it('lists every result when there are at most five', () => {
    expect(buildFallbackAnswer('tired', [result('a', 0.9), result('b', 0.8)])).toBe(
      'Based on your data, here\'s what I found regarding "tired":\n\n1. a\n\n2. b'
    );
  });

  it('lists five results and counts the rest', () => {
    const results = ['a', 'b', 'c', 'd', 'e', 'f', 'g'].map((text) => result(text, 0.5));
    const answer = buildFallbackAnswer('q', results);

    expect(answer).toContain('5. e');
    expect(answer).not.toContain('6. f');
    expect(answer.endsWith('\n\n...and 2 more related entries in your data.')).toBe(true);
  });
});
