/**
 * LLM intent classifier
 *
 * Asks the chat model for a JSON verdict; falls back to a keyword heuristic
 * when no model is configured or the reply cannot be used.
 */

import { z } from 'zod';
import { createComponentLogger } from '../../utils/logger.js';
import { config } from '../../config/index.js';
import { createLlmResponseParseError, getErrorMessage } from '../../core/errors.js';
import type { ChatCompleter, ChatMessage, QueryContext } from '../../core/types.js';
import { describeTimeRange } from '../query/time-range.js';
import { INTENT_TYPES, type IntentScores, type LlmClassification } from './types.js';

const logger = createComponentLogger('classification:llm');

const HEURISTIC_CONFIDENCE = 0.7;
const CLASSIFY_TEMPERATURE = 0.1;

const llmVerdictSchema = z.object({
  intent: z.enum(INTENT_TYPES),
  confidence: z.number().min(0).max(1),
  slots: z.record(z.unknown()).optional(),
  reasoning: z.string().optional(),
});

const SYSTEM_PROMPT = `You classify questions a user asks about their personal life data.
Intents:
- aggregate: the user wants a number (total, average, count) computed from records
- retrieval: the user wants records found, explained or advice drawn from them
- reminder: the user wants to schedule or be reminded of something

Reply with JSON only:
{"intent": "aggregate" | "retrieval" | "reminder", "confidence": 0.0-1.0, "slots": {...}, "reasoning": "..."}`;

/**
 * Strip markdown fences and parse the first JSON object in the reply.
 */
export function parseLlmVerdict(raw: string): z.infer<typeof llmVerdictSchema> {
  const unfenced = raw.replace(/```(?:json)?/gi, '').trim();
  const match = /\{[\s\S]*\}/.exec(unfenced);
  if (!match) {
    throw createLlmResponseParseError('no JSON object found', raw);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(match[0]);
  } catch (error) {
    throw createLlmResponseParseError(getErrorMessage(error), raw);
  }

  const result = llmVerdictSchema.safeParse(parsed);
  if (!result.success) {
    throw createLlmResponseParseError(result.error.issues.map((i) => i.message).join('; '), raw);
  }
  return result.data;
}

/**
 * Keyword fallback used when the model is unavailable or unusable.
 */
export function heuristicClassification(query: string, context?: QueryContext): LlmClassification {
  const lower = query.toLowerCase();

  if (['much', 'total', 'spend'].some((word) => lower.includes(word))) {
    return {
      stage: 'llm',
      intent: 'aggregate',
      confidence: HEURISTIC_CONFIDENCE,
      scores: { aggregate: HEURISTIC_CONFIDENCE },
      slots: {
        operation: 'sum',
        domain: 'finance',
        timeframe: context?.timeRange ? describeTimeRange(context.timeRange) : 'unspecified',
      },
      source: 'heuristic',
    };
  }

  const slots =
    ['tell', 'explain', 'show'].some((word) => lower.includes(word))
      ? { domains: [...(context?.targetDomains ?? [])], searchType: 'descriptive' }
      : {};

  return {
    stage: 'llm',
    intent: 'retrieval',
    confidence: HEURISTIC_CONFIDENCE,
    scores: { retrieval: HEURISTIC_CONFIDENCE },
    slots,
    source: 'heuristic',
  };
}

export interface LlmClassifierOptions {
  useLlm?: boolean;
}

export class LlmClassifier {
  constructor(
    private readonly chat: ChatCompleter | null,
    private readonly options: LlmClassifierOptions = {}
  ) {}

  async classify(query: string, context?: QueryContext): Promise<LlmClassification> {
    const useLlm = this.options.useLlm ?? config.classification.useLlm;
    if (!this.chat || !useLlm) {
      return heuristicClassification(query, context);
    }

    const messages: ChatMessage[] = [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: query },
    ];

    try {
      const reply = await this.chat.chat(messages, { temperature: CLASSIFY_TEMPERATURE });
      const verdict = parseLlmVerdict(reply);
      const scores: IntentScores = {};
      scores[verdict.intent] = verdict.confidence;
      return {
        stage: 'llm',
        intent: verdict.intent,
        confidence: verdict.confidence,
        scores,
        slots: verdict.slots ?? {},
        reasoning: verdict.reasoning,
        source: 'llm',
      };
    } catch (error) {
      logger.warn({ error: getErrorMessage(error) }, 'LLM classification failed, using heuristic');
      return heuristicClassification(query, context);
    }
  }
}
