import fs from 'fs';
import path from 'path';
import { NoValueError } from '../errors.js';
import {
  ADDRESS_PARTS,
  ATTRIBUTE_SCHEMA,
  type AttributeName,
  type PersonalRecord,
} from '../schema/attributes.js';
import type { FormField, RenderedValue } from '../types/index.js';

export type FileExists = (filePath: string) => boolean;

const defaultFileExists: FileExists = (filePath) => {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
};

type StoredValue = string | boolean | undefined;

function readStored(attribute: AttributeName, record: PersonalRecord): StoredValue {
  const source = ATTRIBUTE_SCHEMA[attribute].source;
  switch (source.from) {
    case 'scalar':
    case 'boolean':
    case 'file':
      return record[source.key];
    case 'address-part':
      return record.address[source.part];
    case 'address':
      return ADDRESS_PARTS.map((part) => record.address[part]?.trim() ?? '')
        .filter((part) => part.length > 0)
        .join(', ');
    case 'full-name':
      return [record.first_name, record.last_name]
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .join(' ');
  }
}

function wordsOf(value: string): string[] {
  return value
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((w) => w.length > 0);
}

function containsWords(haystack: string[], needle: string[]): boolean {
  if (needle.length === 0 || needle.length > haystack.length) return false;
  for (let start = 0; start + needle.length <= haystack.length; start++) {
    if (needle.every((word, i) => haystack[start + i] === word)) return true;
  }
  return false;
}

/**
 * Case-insensitive option lookup: an exact match first, then an option whose
 * words contain the value's words (or the other way round). Word level only,
 * so "CA" never picks "California".
 */
export function matchOption(value: string, options: readonly string[]): string | undefined {
  const wanted = value.trim().toLowerCase();
  if (wanted.length === 0) return undefined;

  const exact = options.find((option) => option.trim().toLowerCase() === wanted);
  if (exact !== undefined) return exact;

  const wantedWords = wordsOf(wanted);
  return options.find((option) => {
    const optionWords = wordsOf(option);
    return containsWords(optionWords, wantedWords) || containsWords(wantedWords, optionWords);
  });
}

/**
 * Produces the exact value to write into `field` for `attribute`. Throws
 * NoValueError when the record has nothing usable for this control.
 */
export function renderValue(
  field: FormField,
  attribute: AttributeName,
  record: PersonalRecord,
  fileExists: FileExists = defaultFileExists
): RenderedValue {
  const spec = ATTRIBUTE_SCHEMA[attribute];
  const stored = readStored(attribute, record);

  if (stored === undefined || stored === '') {
    throw new NoValueError(attribute, 'not set in the personal record');
  }

  if (spec.type === 'file' || field.kind === 'file') {
    if (spec.type !== 'file') {
      throw new NoValueError(attribute, 'a file upload control needs a file attribute');
    }
    if (field.kind !== 'file') {
      throw new NoValueError(attribute, `a file cannot be written into a ${field.kind} control`);
    }
    const filePath = path.resolve(String(stored));
    if (!fileExists(filePath)) {
      throw new NoValueError(attribute, `file not found: ${filePath}`);
    }
    return { fieldId: field.id, value: filePath, kind: 'file-path' };
  }

  if (field.kind === 'checkbox') {
    if (typeof stored !== 'boolean') {
      throw new NoValueError(attribute, 'only yes/no attributes can tick a checkbox');
    }
    return { fieldId: field.id, value: String(stored), kind: 'option-selection' };
  }

  const text = typeof stored === 'boolean' ? (stored ? 'Yes' : 'No') : stored;

  if (field.kind === 'select' || field.kind === 'radio') {
    const option = matchOption(text, field.options ?? []);
    if (option === undefined) {
      throw new NoValueError(attribute, `no option matches "${text}"`);
    }
    return { fieldId: field.id, value: option, kind: 'option-selection' };
  }

  return { fieldId: field.id, value: text, kind: 'text' };
}
