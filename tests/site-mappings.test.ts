import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { hostOf, loadSiteMapping, mappingFromMatches, saveSiteMapping } from '../src/services/site-mappings.js';

const url = 'https://Jobs.Example.com/apply?ref=42';

describe('site mappings', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'autofill-mappings-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('keys mappings by lowercase host', () => {
    expect(hostOf(url)).toBe('jobs.example.com');
  });

  it('keeps only accepted matches', () => {
    const mapping = mappingFromMatches(url, [
      { fieldId: '#email', attribute: 'email', confidence: 0.95, source: 'rule' },
      { fieldId: '#notes', attribute: 'unmatched', confidence: 0, source: 'none' },
    ]);
    expect(mapping.host).toBe('jobs.example.com');
    expect(mapping.fields).toEqual({ '#email': 'email' });
  });

  it('saves and loads a mapping per host', () => {
    const mapping = mappingFromMatches(url, [
      { fieldId: '#email', attribute: 'email', confidence: 0.95, source: 'rule' },
    ]);

    const file = saveSiteMapping(dir, url, mapping);

    expect(path.basename(file)).toBe('jobs.example.com.json');
    expect(loadSiteMapping(dir, 'https://jobs.example.com/other-form')).toEqual(mapping);
  });

  it('returns undefined when the host has no mapping', () => {
    expect(loadSiteMapping(dir, url)).toBeUndefined();
  });

  it('rejects mappings to unknown attributes', () => {
    fs.writeFileSync(
      path.join(dir, 'jobs.example.com.json'),
      JSON.stringify({ host: 'jobs.example.com', createdAt: '2024-01-01T00:00:00.000Z', fields: { '#x': 'shoe_size' } })
    );
    expect(() => loadSiteMapping(dir, url)).toThrow('Invalid site mapping');
  });
});
