import { z } from 'zod';
import { CONTROL_KINDS, type ControlKind, type FormField } from '../types/index.js';

const boxSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number().positive(),
  height: z.number().positive(),
});

/**
 * What an external screenshot + OCR step hands over: the control boxes it
 * found and every recognized text block, in screen pixels.
 */
export const screenLayoutSchema = z.object({
  controls: z.array(
    boxSchema.extend({
      kind: z.enum(CONTROL_KINDS).optional(),
      confidence: z.number().min(0).max(1).default(0.7),
    })
  ),
  texts: z.array(
    boxSchema.extend({
      text: z.string(),
      // OCR confidence, 0-100 as most engines report it
      confidence: z.number().default(100),
    })
  ),
});

export type ScreenLayout = z.infer<typeof screenLayoutSchema>;
type Box = z.infer<typeof boxSchema>;
type ScreenControl = ScreenLayout['controls'][number];
type TextBlock = ScreenLayout['texts'][number];
// Upload controls found from their own text carry that text as the label
type DetectedControl = ScreenControl & { label?: string };

const LEFT_SEARCH = 200;
const ABOVE_SEARCH = 40;
const RIGHT_SEARCH = 200;
const VERTICAL_MARGIN = 20;
const MIN_OCR_CONFIDENCE = 30;
const UPLOAD_KEYWORDS = ['upload', 'choose file', 'browse', 'attach', 'select file'];

/**
 * Guesses a control kind from its box when OCR layout did not say.
 */
export function classifyBox(box: Box): ControlKind {
  if (box.height > 80) return 'textarea';
  if (box.width <= 30 && box.height <= 30) return 'checkbox';
  if (box.width > 100 && box.width < 200 && box.height > 20 && box.height < 40) return 'select';
  return 'text';
}

function overlaps(a: Box, b: Box): number {
  const overlapX = Math.max(0, Math.min(a.x + a.width, b.x + b.width) - Math.max(a.x, b.x));
  const overlapY = Math.max(0, Math.min(a.y + a.height, b.y + b.height) - Math.max(a.y, b.y));
  return (overlapX * overlapY) / Math.min(a.width * a.height, b.width * b.height);
}

function cleanText(text: string): string {
  return text.replace(/[^\p{L}\p{N}\s]/gu, '').replace(/\s+/g, ' ').trim();
}

function usableLabel(text: string): boolean {
  return text.length > 2 && text.length < 50;
}

function centerY(box: Box): number {
  return box.y + box.height / 2;
}

/**
 * Nearest readable text to the left, then above, then (for checkboxes and
 * radios, whose label usually follows them) to the right.
 */
export function findLabel(control: Box & { kind: ControlKind }, texts: readonly TextBlock[]): string {
  const readable = texts
    .filter((t) => t.confidence >= MIN_OCR_CONFIDENCE)
    .map((t) => ({ ...t, text: cleanText(t.text) }))
    .filter((t) => usableLabel(t.text));

  const sameRow = (t: Box) =>
    t.y + t.height >= control.y - VERTICAL_MARGIN && t.y <= control.y + control.height + VERTICAL_MARGIN;

  const left = readable
    .filter((t) => sameRow(t) && t.x + t.width <= control.x && control.x - (t.x + t.width) <= LEFT_SEARCH)
    .sort((a, b) => control.x - (a.x + a.width) - (control.x - (b.x + b.width)));

  const above = readable
    .filter(
      (t) =>
        t.y + t.height <= control.y &&
        control.y - (t.y + t.height) <= ABOVE_SEARCH &&
        t.x < control.x + control.width &&
        t.x + t.width > control.x
    )
    .sort((a, b) => b.y + b.height - (a.y + a.height));

  const right =
    control.kind === 'checkbox' || control.kind === 'radio'
      ? readable
          .filter(
            (t) =>
              sameRow(t) &&
              t.x >= control.x + control.width &&
              t.x - (control.x + control.width) <= RIGHT_SEARCH
          )
          .sort((a, b) => a.x - b.x || Math.abs(centerY(a) - centerY(control)) - Math.abs(centerY(b) - centerY(control)))
      : [];

  const ordered = control.kind === 'checkbox' || control.kind === 'radio' ? [right, left, above] : [left, above];
  for (const candidates of ordered) {
    if (candidates.length > 0) return candidates[0].text;
  }
  return '';
}

function uploadControls(texts: readonly TextBlock[]): DetectedControl[] {
  return texts
    .filter((t) => t.confidence >= MIN_OCR_CONFIDENCE)
    .filter((t) => {
      const lower = t.text.toLowerCase();
      return UPLOAD_KEYWORDS.some((keyword) => lower.includes(keyword));
    })
    .map((t) => ({
      x: Math.max(0, t.x - 20),
      y: Math.max(0, t.y - 10),
      width: t.width + 40,
      height: t.height + 20,
      kind: 'file' as const,
      confidence: t.confidence / 100,
      label: cleanText(t.text),
    }));
}

/**
 * Drops boxes that overlap a more confident box by more than half.
 */
export function removeOverlapping<T extends ScreenControl>(controls: readonly T[]): T[] {
  const byConfidence = [...controls].sort((a, b) => b.confidence - a.confidence);
  const kept: T[] = [];
  for (const control of byConfidence) {
    if (!kept.some((existing) => overlaps(control, existing) > 0.5)) {
      kept.push(control);
    }
  }
  return kept;
}

/**
 * Turns an OCR layout into FormFields in reading order (top to bottom, then
 * left to right). Ids are the box origin, which the pointer-injection side
 * turns back into a click target.
 */
export function detectScreenFields(layout: ScreenLayout): FormField[] {
  const controls = removeOverlapping<DetectedControl>([...layout.controls, ...uploadControls(layout.texts)]);

  return controls
    .sort((a, b) => a.y - b.y || a.x - b.x)
    .map((control) => {
      const kind = control.kind ?? classifyBox(control);
      return {
        id: `screen:${Math.round(control.x)},${Math.round(control.y)}`,
        label: control.label ?? findLabel({ ...control, kind }, layout.texts),
        kind,
      };
    });
}
