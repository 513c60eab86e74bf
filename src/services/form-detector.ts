import type { Page } from 'playwright';
import { DetectionFailure } from '../errors.js';
import type { ControlKind, FormField } from '../types/index.js';
import { logger } from '../utils/logger.js';

export const MARKER_ATTRIBUTE = 'data-formfill-id';

/**
 * One control as read from the page, before grouping and kind mapping.
 */
export interface RawControl {
  tag: 'input' | 'textarea' | 'select';
  type: string;
  id: string | null;
  name: string | null;
  marker: string;
  label: string;
  groupLabel: string;
  options: string[];
  required: boolean;
  visible: boolean;
}

const SKIPPED_INPUT_TYPES = new Set(['hidden', 'submit', 'button', 'reset', 'image', 'password']);

function quoteAttribute(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function inputKind(control: RawControl): ControlKind | null {
  if (control.tag === 'textarea') return 'textarea';
  if (control.tag === 'select') return 'select';
  const type = control.type.toLowerCase();
  if (SKIPPED_INPUT_TYPES.has(type)) return null;
  if (type === 'file') return 'file';
  if (type === 'checkbox') return 'checkbox';
  if (type === 'radio') return 'radio';
  return 'text';
}

function selectorFor(control: RawControl, nameCounts: Map<string, number>): string {
  if (control.id) return `[id=${quoteAttribute(control.id)}]`;
  if (control.name && nameCounts.get(control.name) === 1) return `[name=${quoteAttribute(control.name)}]`;
  return `[${MARKER_ATTRIBUTE}=${quoteAttribute(control.marker)}]`;
}

/**
 * Maps raw page controls to FormFields in document order. Radios sharing a
 * name become one field whose options are the individual radio labels.
 */
export function toFormFields(controls: readonly RawControl[]): FormField[] {
  const nameCounts = new Map<string, number>();
  for (const control of controls) {
    if (control.name) nameCounts.set(control.name, (nameCounts.get(control.name) ?? 0) + 1);
  }

  const fields: FormField[] = [];
  const radioGroups = new Map<string, FormField>();

  for (const control of controls) {
    if (!control.visible) continue;
    const kind = inputKind(control);
    if (!kind) continue;

    if (kind === 'radio') {
      const groupKey = control.name ?? control.marker;
      const existing = radioGroups.get(groupKey);
      if (existing) {
        existing.options?.push(control.label);
        continue;
      }
      const group: FormField = {
        id: control.name
          ? `input[type="radio"][name=${quoteAttribute(control.name)}]`
          : `[${MARKER_ATTRIBUTE}=${quoteAttribute(control.marker)}]`,
        label: control.groupLabel || control.name || '',
        kind,
        options: [control.label],
        required: control.required,
      };
      radioGroups.set(groupKey, group);
      fields.push(group);
      continue;
    }

    fields.push({
      id: selectorFor(control, nameCounts),
      label: control.label,
      kind,
      ...(kind === 'select' ? { options: control.options } : {}),
      required: control.required,
    });
  }

  return fields;
}

/**
 * Reads every input, textarea and select on the page. Each control is tagged
 * with a marker attribute so it can be found again for the rest of the run.
 */
export async function readPageControls(page: Page): Promise<RawControl[]> {
  return page.evaluate((markerAttribute): RawControl[] => {
    const textOf = (el: Element | null | undefined): string => (el?.textContent ?? '').replace(/\s+/g, ' ').trim();

    const labelFor = (el: HTMLInputElement | HTMLTextAreaElement | HTMLSelectElement): string => {
      const labels = el.labels ? Array.from(el.labels) : [];
      const fromLabel = labels.map((l) => textOf(l)).find((t) => t.length > 0);
      if (fromLabel) return fromLabel;

      const aria = el.getAttribute('aria-label');
      if (aria && aria.trim()) return aria.trim();

      const labelledBy = el.getAttribute('aria-labelledby');
      if (labelledBy) {
        const text = labelledBy
          .split(/\s+/)
          .map((id) => textOf(document.getElementById(id)))
          .join(' ')
          .trim();
        if (text) return text;
      }

      const placeholder = el.getAttribute('placeholder');
      if (placeholder && placeholder.trim()) return placeholder.trim();

      const previous = el.previousElementSibling;
      if (previous && previous.tagName !== 'INPUT' && textOf(previous)) return textOf(previous);

      return el.getAttribute('name') ?? el.id ?? '';
    };

    const controls = Array.from(
      document.querySelectorAll<HTMLInputElement | HTMLTextAreaElement | HTMLSelectElement>('input, textarea, select')
    );

    return controls.map((el, index) => {
      const marker = `f${index}`;
      el.setAttribute(markerAttribute, marker);

      const rect = el.getBoundingClientRect();
      const style = window.getComputedStyle(el);
      const isFile = el instanceof HTMLInputElement && el.type === 'file';
      // File inputs are often styled away behind a custom button but still accept files
      const visible = isFile || (rect.width > 0 && rect.height > 0 && style.visibility !== 'hidden' && style.display !== 'none');

      const fieldset = el.closest('fieldset');
      const radioGroup = el.closest('[role="radiogroup"]');
      const groupLabel =
        textOf(fieldset?.querySelector('legend')) ||
        radioGroup?.getAttribute('aria-label') ||
        textOf(radioGroup?.previousElementSibling);

      const tag: RawControl['tag'] =
        el.tagName.toLowerCase() === 'select' ? 'select' : el.tagName.toLowerCase() === 'textarea' ? 'textarea' : 'input';

      return {
        tag,
        type: el instanceof HTMLInputElement ? el.type : tag,
        id: el.id || null,
        name: el.getAttribute('name'),
        marker,
        label: labelFor(el),
        groupLabel: groupLabel ?? '',
        options:
          el instanceof HTMLSelectElement
            ? Array.from(el.options)
                .filter((o) => o.value !== '' && !o.disabled)
                .map((o) => textOf(o))
            : [],
        required: el.required,
        visible,
      };
    });
  }, MARKER_ATTRIBUTE);
}

export async function detectWebFields(page: Page): Promise<FormField[]> {
  logger.action('Scanning page for form fields...');
  const raw = await readPageControls(page);
  const fields = toFormFields(raw);

  if (fields.length === 0) {
    throw new DetectionFailure(page.url());
  }

  logger.success(`Found ${fields.length} fillable fields`);
  return fields;
}
