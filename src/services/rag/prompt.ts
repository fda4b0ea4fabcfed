/**
 * Prompt and fallback text assembly for retrieval answers
 */

import { containsCjk } from '../../utils/text.js';
import type { PromptTemplates, SearchResult } from './types.js';

export const RAG_PROMPT_TEMPLATE_KEY = 'rag_prompt_template';

const FALLBACK_ITEMS = 5;

export function noDataMessage(query: string): string {
  if (containsCjk(query)) {
    return `抱歉，我在您的数据中没有找到与"${query}"相关的信息。您可能需要添加更多数据或换一个问题。`;
  }
  return `I couldn't find relevant information in your data to answer: "${query}". You may need to add more data or try a different question.`;
}

/**
 * Numbered context entries. Entries are added while their combined length fits the budget.
 */
export function buildContext(results: readonly SearchResult[], budgetChars: number): string {
  let context = '## Relevant Information\n\n';
  let used = 0;

  for (const [i, result] of results.entries()) {
    const relevance = (result.similarity * 100).toFixed(1);
    const entry = `${i + 1}. ${result.chunkText}\n   (Type: ${result.objectType}, Relevance: ${relevance}%)\n\n`;
    if (used + entry.length > budgetChars) break;
    context += entry;
    used += entry.length;
  }

  return context;
}

export function buildPrompt(
  query: string,
  context: string,
  calculationSummary: string | undefined,
  templates: PromptTemplates | undefined
): string {
  const template = templates?.[RAG_PROMPT_TEMPLATE_KEY];
  if (template) {
    const summary = calculationSummary ? `\n**Calculation Summary:**\n${calculationSummary}\n` : '';
    return template
      .replaceAll('{query}', query)
      .replaceAll('{context}', context)
      .replaceAll('{calculation_summary}', summary)
      .replace(/\n\s*\n\s*\n/g, '\n\n');
  }

  const lines = [
    'You are a helpful personal AI assistant. A user has asked you a question about their personal data.',
    '',
    `User Question: ${query}`,
    '',
  ];
  if (calculationSummary) {
    lines.push(`Calculation Summary: ${calculationSummary}`, '');
  }
  lines.push(
    context,
    '',
    "Please provide a helpful, accurate, and natural response based on the user's personal data above.",
    'Be conversational and focus on insights that would be useful to the user.'
  );
  return lines.join('\n');
}

/**
 * Deterministic answer listing the top results verbatim
 */
export function buildFallbackAnswer(query: string, results: readonly SearchResult[]): string {
  const items = results.slice(0, FALLBACK_ITEMS).map((result, i) => `${i + 1}. ${result.chunkText}`);
  let text = `Based on your data, here's what I found regarding "${query}":\n\n${items.join('\n\n')}`;
  if (results.length > FALLBACK_ITEMS) {
    text += `\n\n...and ${results.length - FALLBACK_ITEMS} more related entries in your data.`;
  }
  return text;
}
