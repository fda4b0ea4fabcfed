/**
 * Pulls actionable lines out of a generated answer.
 */

const LIST_ITEM = /^(?:[-*•]|\d+[.)])\s+/;
const ADVICE_MARKER = /\b(?:should|try|consider|recommend\w*|avoid|aim to|start|reduce|increase)\b|建议|尝试|应该/i;

/**
 * List items that read as recommendations, or undefined when there are none.
 */
export function extractAdvice(text: string): string | undefined {
  const lines = text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => LIST_ITEM.test(line) && ADVICE_MARKER.test(line));
  return lines.length > 0 ? lines.join('\n') : undefined;
}
