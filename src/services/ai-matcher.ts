import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { EngineConfig } from '../config.js';
import { MatchTimeout, errorMessage } from '../errors.js';
import { ATTRIBUTE_SCHEMA, isAttributeName, type AttributeName } from '../schema/attributes.js';
import type { ControlKind, MatchCandidate } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { NO_MATCH, roundConfidence } from './rule-matcher.js';

export interface AiMatchRequest {
  label: string;
  controlKind: ControlKind;
  options?: readonly string[];
  candidates: readonly AttributeName[];
}

/**
 * Fallback classifier for labels the rules are unsure about. Implementations
 * must resolve (never reject) and answer `NO_MATCH` when they have nothing.
 */
export interface AiMatcher {
  readonly enabled: boolean;
  match(request: AiMatchRequest): Promise<MatchCandidate>;
}

export const disabledAiMatcher: AiMatcher = {
  enabled: false,
  async match(): Promise<MatchCandidate> {
    return NO_MATCH;
  },
};

/**
 * Sends a prompt and returns the model's text reply. Must stop when `signal` aborts.
 */
export type CompletionFn = (prompt: string, signal: AbortSignal) => Promise<string>;

export function createAnthropicCompletion(apiKey: string, model: string): CompletionFn {
  const client = new Anthropic({ apiKey, maxRetries: 0 });

  return async (prompt, signal) => {
    const message = await client.messages.create(
      {
        model,
        max_tokens: 200,
        messages: [{ role: 'user', content: prompt }],
      },
      { signal }
    );
    const first = message.content[0];
    return first && first.type === 'text' ? first.text : '';
  };
}

const aiAnswerSchema = z.object({
  attribute: z.string(),
  confidence: z.coerce.number(),
  rationale: z.string().optional(),
});

export function buildMatchPrompt(request: AiMatchRequest): string {
  const candidates = request.candidates
    .map((name) => `- ${name}: ${ATTRIBUTE_SCHEMA[name].description}`)
    .join('\n');
  const options =
    request.options && request.options.length > 0
      ? `\n**Options:** ${request.options.map((o) => `"${o}"`).join(', ')}`
      : '';
  const label = request.label.trim() ? `"${request.label.trim()}"` : '(empty, judge from the control type alone)';

  return `You classify job-application form fields against a personal data profile.

## Form Field
**Label:** ${label}
**Control type:** ${request.controlKind}${options}

## Profile Attributes
${candidates}

## Your Task
Pick the single attribute this field asks for, or "none" if it asks for anything else
(free-text questions, company-specific questions, consent boxes).

Respond in this exact JSON format:
{
  "attribute": "<attribute name or none>",
  "confidence": <number 0-1>,
  "rationale": "<one short sentence>"
}

Respond with ONLY the JSON, no other text.`;
}

/**
 * Reads the model reply. Anything that is not valid JSON naming one of the
 * candidates counts as no match.
 */
export function parseMatchResponse(
  responseText: string,
  candidates: readonly AttributeName[]
): MatchCandidate {
  // The model sometimes wraps the JSON in a markdown code block
  const jsonMatch = responseText.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new Error('No JSON found in response');
  }

  const answer = aiAnswerSchema.parse(JSON.parse(jsonMatch[0]));
  const attribute = answer.attribute.trim().toLowerCase();

  if (attribute === 'none' || !isAttributeName(attribute) || !candidates.includes(attribute)) {
    return NO_MATCH;
  }
  if (!Number.isFinite(answer.confidence)) {
    throw new Error(`Confidence is not a number: ${answer.confidence}`);
  }

  return { attribute, confidence: roundConfidence(answer.confidence) };
}

export class RemoteAiMatcher implements AiMatcher {
  readonly enabled = true;

  constructor(
    private readonly complete: CompletionFn,
    private readonly timeoutMs: number
  ) {}

  async match(request: AiMatchRequest): Promise<MatchCandidate> {
    try {
      const text = await this.completeWithTimeout(buildMatchPrompt(request));
      return parseMatchResponse(text, request.candidates);
    } catch (error) {
      logger.warn(`AI matcher gave no answer for "${request.label}": ${errorMessage(error)}`);
      return NO_MATCH;
    }
  }

  private async completeWithTimeout(prompt: string): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new MatchTimeout(this.timeoutMs));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([this.complete(prompt, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Without an API key the engine runs rule-only and never touches the network.
 */
export function createAiMatcher(config: EngineConfig, complete?: CompletionFn): AiMatcher {
  if (!config.anthropicApiKey) {
    return disabledAiMatcher;
  }
  return new RemoteAiMatcher(
    complete ?? createAnthropicCompletion(config.anthropicApiKey, config.aiModel),
    config.aiTimeoutMs
  );
}
