import fs from 'fs';
import path from 'path';
import { NoValueError } from '../errors.js';
import {
  UNMATCHED,
  type FillPreview,
  type FormField,
  type MatchResult,
  type PreviewEntry,
  type RenderedValue,
} from '../types/index.js';

export type RenderOutcome = { ok: true; value: RenderedValue } | { ok: false; error: NoValueError };

function describeRejection(match: MatchResult): string {
  if (!match.candidate) return 'no match found';
  const { attribute, confidence, source } = match.candidate;
  return `best guess ${attribute} (${confidence.toFixed(2)} from ${source}) is below the acceptance threshold`;
}

export function createPreviewEntry(
  field: FormField,
  match: MatchResult,
  outcome: RenderOutcome | null
): PreviewEntry {
  const base = { fieldId: field.id, label: field.label, kind: field.kind };

  if (match.attribute === UNMATCHED || !outcome) {
    return {
      ...base,
      attribute: UNMATCHED,
      value: null,
      confidence: 0,
      source: 'none',
      status: 'unmatched',
      note: describeRejection(match),
    };
  }

  if (!outcome.ok) {
    return {
      ...base,
      attribute: UNMATCHED,
      value: null,
      confidence: 0,
      source: 'none',
      status: 'no-value',
      note: `matched ${match.attribute} (${match.source}) but ${outcome.error.reason}`,
    };
  }

  return {
    ...base,
    attribute: match.attribute,
    value: outcome.value,
    confidence: match.confidence,
    source: match.source,
    status: 'ready',
  };
}

/**
 * Entries keep the order they arrive in, which is the detection order.
 */
export function createPreview(entries: readonly PreviewEntry[], createdAt = new Date()): FillPreview {
  return Object.freeze({ entries: Object.freeze(entries.map((e) => Object.freeze({ ...e }))), createdAt });
}

export function countPreview(preview: FillPreview): { ready: number; unmatched: number; noValue: number } {
  return {
    ready: preview.entries.filter((e) => e.status === 'ready').length,
    unmatched: preview.entries.filter((e) => e.status === 'unmatched').length,
    noValue: preview.entries.filter((e) => e.status === 'no-value').length,
  };
}

export function previewToJson(preview: FillPreview): string {
  return JSON.stringify({ createdAt: preview.createdAt.toISOString(), entries: preview.entries }, null, 2) + '\n';
}

export function writePreviewJson(preview: FillPreview, filePath: string): string {
  const absolutePath = path.resolve(filePath);
  fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
  fs.writeFileSync(absolutePath, previewToJson(preview));
  return absolutePath;
}

export interface InjectionItem {
  fieldId: string;
  label: string;
  value: RenderedValue;
}

export interface ApprovalOptions {
  // Field ids the reviewer chose not to fill
  skip?: readonly string[];
}

/**
 * A preview the user has explicitly approved. The private constructor keeps
 * injection code from being handed anything else.
 */
export class ApprovedFill {
  private constructor(
    private readonly entries: readonly InjectionItem[],
    readonly approvedAt: Date
  ) {}

  static fromPreview(preview: FillPreview, options: ApprovalOptions = {}): ApprovedFill {
    const skip = new Set(options.skip ?? []);
    const items: InjectionItem[] = [];
    for (const entry of preview.entries) {
      if (entry.status !== 'ready' || !entry.value || skip.has(entry.fieldId)) continue;
      items.push({ fieldId: entry.fieldId, label: entry.label, value: entry.value });
    }
    return new ApprovedFill(Object.freeze(items), new Date());
  }

  items(): readonly InjectionItem[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }
}
