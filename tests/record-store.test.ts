import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { SchemaViolation } from '../src/errors.js';
import {
  loadPersonalRecord,
  missingFiles,
  parsePersonalRecord,
  savePersonalRecord,
} from '../src/services/record-store.js';
import { testRecord } from './fixtures.js';

describe('record store', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'autofill-store-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('saves and loads a plain record', () => {
    const file = path.join(dir, 'personal-data.json');
    const record = testRecord();

    savePersonalRecord(file, record);

    expect(loadPersonalRecord(file)).toEqual(record);
  });

  it('encrypts the record with a passphrase', () => {
    const file = path.join(dir, 'personal-data.json');
    const record = testRecord();

    savePersonalRecord(file, record, 'test-secret');
    const raw = fs.readFileSync(file, 'utf8');

    expect(JSON.parse(raw).algorithm).toBe('aes-256-gcm');
    expect(raw).not.toContain('jane@example.com');
    expect(loadPersonalRecord(file, 'test-secret')).toEqual(record);
  });

  it('rejects a wrong passphrase', () => {
    const file = path.join(dir, 'personal-data.json');
    savePersonalRecord(file, testRecord(), 'test-secret');

    expect(() => loadPersonalRecord(file, 'not-the-secret')).toThrow(
      'Could not decrypt personal data: wrong passphrase or corrupted file'
    );
  });

  it('asks for a passphrase for encrypted files', () => {
    const file = path.join(dir, 'personal-data.json');
    savePersonalRecord(file, testRecord(), 'test-secret');

    expect(() => loadPersonalRecord(file)).toThrow('Personal data is encrypted');
  });

  it('reports a missing file', () => {
    expect(() => loadPersonalRecord(path.join(dir, 'nope.json'))).toThrow('Personal data file not found');
  });

  it('rejects invalid JSON', () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{ not json');

    expect(() => loadPersonalRecord(file)).toThrow(SchemaViolation);
  });
});

describe('parsePersonalRecord', () => {
  const base = { first_name: 'Jane', last_name: 'Doe', email: 'jane@example.com', phone: '555-0100' };

  it('fills in an empty address and freezes the record', () => {
    const record = parsePersonalRecord(base);
    expect(record.address).toEqual({});
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.address)).toBe(true);
  });

  it('rejects unknown attributes', () => {
    expect(() => parsePersonalRecord({ ...base, favourite_color: 'blue' })).toThrow(SchemaViolation);
    expect(() => parsePersonalRecord({ ...base, favourite_color: 'blue' })).toThrow(
      'Invalid personal record in personal record: Unknown attribute(s): favourite_color'
    );
  });

  it('rejects missing required attributes', () => {
    const { first_name: _omitted, ...rest } = base;
    expect(() => parsePersonalRecord(rest, 'test.json')).toThrow('Invalid personal record in test.json: first_name');
  });

  it('rejects wrongly typed values', () => {
    expect(() => parsePersonalRecord({ ...base, remote_work: 'yes' })).toThrow(SchemaViolation);
  });
});

describe('missingFiles', () => {
  it('lists file references that do not exist', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'autofill-files-'));
    const resume = path.join(dir, 'resume.pdf');
    fs.writeFileSync(resume, 'test');
    const transcript = path.join(dir, 'transcript.pdf');

    const record = testRecord({ resume_path: resume, transcript_path: transcript });

    expect(missingFiles(record)).toEqual([{ key: 'transcript_path', path: transcript }]);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
