import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'crypto';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { SchemaViolation } from '../errors.js';
import { personalRecordSchema, type PersonalRecord } from '../schema/attributes.js';
import { logger } from '../utils/logger.js';

const ALGORITHM = 'aes-256-gcm';
const KEY_LENGTH = 32;

const envelopeSchema = z.object({
  version: z.literal(1),
  algorithm: z.literal(ALGORITHM),
  salt: z.string(),
  iv: z.string(),
  tag: z.string(),
  data: z.string(),
});

type Envelope = z.infer<typeof envelopeSchema>;

function deriveKey(passphrase: string, salt: Buffer): Buffer {
  return scryptSync(passphrase, salt, KEY_LENGTH);
}

export function encryptRecord(record: PersonalRecord, passphrase: string): Envelope {
  const salt = randomBytes(16);
  const iv = randomBytes(12);
  const cipher = createCipheriv(ALGORITHM, deriveKey(passphrase, salt), iv);
  const data = Buffer.concat([cipher.update(JSON.stringify(record), 'utf8'), cipher.final()]);

  return {
    version: 1,
    algorithm: ALGORITHM,
    salt: salt.toString('base64'),
    iv: iv.toString('base64'),
    tag: cipher.getAuthTag().toString('base64'),
    data: data.toString('base64'),
  };
}

export function decryptEnvelope(envelope: Envelope, passphrase: string): unknown {
  const decipher = createDecipheriv(
    ALGORITHM,
    deriveKey(passphrase, Buffer.from(envelope.salt, 'base64')),
    Buffer.from(envelope.iv, 'base64')
  );
  decipher.setAuthTag(Buffer.from(envelope.tag, 'base64'));

  let plaintext: string;
  try {
    plaintext = Buffer.concat([
      decipher.update(Buffer.from(envelope.data, 'base64')),
      decipher.final(),
    ]).toString('utf8');
  } catch {
    throw new Error('Could not decrypt personal data: wrong passphrase or corrupted file');
  }
  return JSON.parse(plaintext);
}

function freezeRecord(record: z.infer<typeof personalRecordSchema>): PersonalRecord {
  Object.freeze(record.address);
  return Object.freeze(record);
}

/**
 * Validates raw data against the closed attribute schema. Unknown keys are a
 * SchemaViolation, not something to ignore.
 */
export function parsePersonalRecord(raw: unknown, source = 'personal record'): PersonalRecord {
  const parsed = personalRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw SchemaViolation.fromZodError(parsed.error, source);
  }
  return freezeRecord(parsed.data);
}

export function loadPersonalRecord(filePath: string, passphrase?: string): PersonalRecord {
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Personal data file not found: ${absolutePath}. Run "form-autofill setup" first.`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(absolutePath, 'utf8'));
  } catch {
    throw new SchemaViolation(`Personal data file is not valid JSON: ${absolutePath}`);
  }

  const envelope = envelopeSchema.safeParse(raw);
  if (envelope.success) {
    if (!passphrase) {
      throw new Error('Personal data is encrypted. Set PERSONAL_DATA_PASSPHRASE to unlock it.');
    }
    raw = decryptEnvelope(envelope.data, passphrase);
  } else if (passphrase) {
    logger.warn('Personal data file is stored in plain text; save it again with --encrypt to protect it');
  }

  return parsePersonalRecord(raw, absolutePath);
}

export function savePersonalRecord(filePath: string, record: PersonalRecord, passphrase?: string): void {
  const absolutePath = path.resolve(filePath);
  fs.mkdirSync(path.dirname(absolutePath), { recursive: true });

  const payload = passphrase ? encryptRecord(record, passphrase) : record;
  fs.writeFileSync(absolutePath, JSON.stringify(payload, null, 2) + '\n', { mode: 0o600 });
}

/**
 * File references that point nowhere. Reported at setup time only; rendering
 * checks again so a stale path never blocks unrelated fields.
 */
export function missingFiles(record: PersonalRecord): Array<{ key: string; path: string }> {
  const keys = ['resume_path', 'cover_letter_path', 'transcript_path'] as const;
  const missing: Array<{ key: string; path: string }> = [];
  for (const key of keys) {
    const value = record[key];
    if (value && !fs.existsSync(path.resolve(value))) {
      missing.push({ key, path: value });
    }
  }
  return missing;
}
