import type { Locator, Page } from 'playwright';
import { errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';
import {
  humanBreakBetweenFields,
  humanFillInput,
  humanSelectOption,
  humanSetChecked,
  humanUploadFile,
} from '../utils/human.js';
import type { ApprovedFill, InjectionItem } from './fill-preview.js';

export interface InjectionResult {
  fieldId: string;
  label: string;
  status: 'filled' | 'failed';
  message?: string;
}

async function radioWithLabel(group: Locator, label: string): Promise<Locator | null> {
  const wanted = label.trim().toLowerCase();
  for (const radio of await group.all()) {
    const text = await radio.evaluate((el) => {
      const input = el instanceof HTMLInputElement ? el : null;
      const labels = input?.labels ? Array.from(input.labels) : [];
      return labels.map((l) => (l.textContent ?? '').replace(/\s+/g, ' ').trim()).join(' ');
    });
    if (text.toLowerCase() === wanted) return radio;
  }
  return null;
}

async function writeItem(page: Page, item: InjectionItem): Promise<void> {
  const target = page.locator(item.fieldId);
  const { value, kind } = item.value;

  if (kind === 'file-path') {
    await humanUploadFile(target.first(), value);
    return;
  }

  if (kind === 'text') {
    await humanFillInput(target.first(), value);
    return;
  }

  const control = target.first();
  const tagName = await control.evaluate((el) => el.tagName.toLowerCase());
  const inputType = await control.getAttribute('type');

  if (tagName === 'select') {
    await humanSelectOption(control, value);
  } else if (inputType === 'checkbox') {
    await humanSetChecked(control, value === 'true');
  } else if (inputType === 'radio') {
    const radio = await radioWithLabel(target, value);
    if (!radio) {
      throw new Error(`No radio button labelled "${value}"`);
    }
    await humanSetChecked(radio, true);
  } else {
    await humanFillInput(control, value);
  }
}

/**
 * Writes approved values one field at a time, in preview order. Stops short
 * of submitting: the form is left for the user to check and send.
 */
export async function injectApprovedFill(page: Page, approved: ApprovedFill): Promise<InjectionResult[]> {
  logger.divider('Filling Form');
  const results: InjectionResult[] = [];

  for (const item of approved.items()) {
    try {
      logger.action(`Filling "${item.label}"`);
      await writeItem(page, item);
      results.push({ fieldId: item.fieldId, label: item.label, status: 'filled' });
    } catch (error) {
      logger.warn(`Could not fill "${item.label}": ${errorMessage(error)}`);
      results.push({ fieldId: item.fieldId, label: item.label, status: 'failed', message: errorMessage(error) });
    }
    await humanBreakBetweenFields(page);
  }

  const filled = results.filter((r) => r.status === 'filled').length;
  logger.success(`Filled ${filled} of ${approved.size} approved fields. Review the page and submit it yourself.`);
  return results;
}
