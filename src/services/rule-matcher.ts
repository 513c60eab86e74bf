import { ATTRIBUTE_SCHEMA, expectsControl } from '../schema/attributes.js';
import type { ControlKind, MatchCandidate } from '../types/index.js';
import { FIELD_RULES, type FieldRule } from './field-rules.js';

export const NO_MATCH: MatchCandidate = Object.freeze({ attribute: null, confidence: 0 });

export interface RuleMatcherOptions {
  rules?: readonly FieldRule[];
  // Subtracted from a rule's confidence when the control kind is unexpected for its attribute
  kindMismatchPenalty: number;
}

// Labels this long that ask a question, or that sit on a textarea, are free-text prompts
const PROSE_MIN_WORDS = 6;
const QUESTION_CUES = /\b(why|how|describe|explain|tell us|tell me)\b/;

/**
 * Long questions mention attribute words in passing ("please state why...").
 * Only document rules still apply to them.
 */
export function isProsePrompt(normalizedLabel: string, kind: ControlKind): boolean {
  const words = normalizedLabel.split(' ').length;
  if (words < PROSE_MIN_WORDS) return false;
  return kind === 'textarea' || QUESTION_CUES.test(normalizedLabel);
}

export class RuleMatcher {
  private readonly rules: readonly FieldRule[];
  private readonly kindMismatchPenalty: number;

  constructor(options: RuleMatcherOptions) {
    this.rules = options.rules ?? FIELD_RULES;
    this.kindMismatchPenalty = options.kindMismatchPenalty;
  }

  match(normalizedLabel: string, kind: ControlKind): MatchCandidate {
    if (normalizedLabel.length === 0) return NO_MATCH;

    const prose = isProsePrompt(normalizedLabel, kind);
    const rule = this.rules.find(
      (r) =>
        (!prose || ATTRIBUTE_SCHEMA[r.attribute].type === 'file') &&
        r.pattern.test(normalizedLabel) &&
        !(r.unless && r.unless.test(normalizedLabel))
    );
    if (!rule) return NO_MATCH;

    const confidence = expectsControl(rule.attribute, kind)
      ? rule.baseConfidence
      : Math.max(0, rule.baseConfidence - this.kindMismatchPenalty);

    return { attribute: rule.attribute, confidence: roundConfidence(confidence) };
  }
}

// 0.85 - 0.3 should read as 0.55, not 0.5499999999999999
export function roundConfidence(value: number): number {
  return Math.round(Math.min(1, Math.max(0, value)) * 1000) / 1000;
}
