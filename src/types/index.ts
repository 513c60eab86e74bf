import type { AttributeName } from '../schema/attributes.js';

export const CONTROL_KINDS = ['text', 'textarea', 'select', 'checkbox', 'radio', 'file'] as const;

export type ControlKind = (typeof CONTROL_KINDS)[number];

export interface FormField {
  // Opaque to the engine: a CSS selector for web forms, `screen:x,y` for screen forms
  id: string;
  label: string;
  kind: ControlKind;
  options?: string[];
  required?: boolean;
}

export type MatchSource = 'rule' | 'ai' | 'none';

export const UNMATCHED = 'unmatched' as const;

/**
 * What a single matcher thinks a label is. `attribute: null` means no opinion.
 */
export interface MatchCandidate {
  attribute: AttributeName | null;
  confidence: number;
}

export interface MatchResult {
  fieldId: string;
  attribute: AttributeName | typeof UNMATCHED;
  confidence: number;
  source: MatchSource;
  // Set on unmatched results when a matcher had an answer that was rejected
  candidate?: { attribute: AttributeName; confidence: number; source: Exclude<MatchSource, 'none'> };
}

export type RenderedValueKind = 'text' | 'file-path' | 'option-selection';

export interface RenderedValue {
  fieldId: string;
  value: string;
  kind: RenderedValueKind;
}

export type PreviewStatus = 'ready' | 'unmatched' | 'no-value';

export interface PreviewEntry {
  fieldId: string;
  label: string;
  kind: ControlKind;
  attribute: AttributeName | typeof UNMATCHED;
  value: RenderedValue | null;
  confidence: number;
  source: MatchSource;
  status: PreviewStatus;
  note?: string;
}

export interface FillPreview {
  entries: readonly PreviewEntry[];
  createdAt: Date;
}

export interface FillStats {
  detected: number;
  ready: number;
  unmatched: number;
  noValue: number;
  aiCalls: number;
}
