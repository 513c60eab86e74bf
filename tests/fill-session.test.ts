import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createEngineConfig } from '../src/config.js';
import { runScreenFill } from '../src/fill-session.js';
import { FillEngine } from '../src/services/fill-engine.js';
import { testRecord } from './fixtures.js';

const layout = {
  controls: [
    { x: 200, y: 100, width: 300, height: 30 },
    { x: 200, y: 160, width: 300, height: 30 },
  ],
  texts: [
    { x: 50, y: 105, width: 120, height: 20, text: 'First Name' },
    { x: 50, y: 165, width: 120, height: 20, text: 'Email' },
    { x: 200, y: 300, width: 120, height: 30, text: 'Upload Resume', confidence: 90 },
  ],
};

describe('runScreenFill', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'autofill-session-'));
    fs.writeFileSync(path.join(dir, 'layout.json'), JSON.stringify(layout));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function options(confirm: (question: string) => Promise<boolean>) {
    const config = createEngineConfig();
    return {
      config,
      record: testRecord(),
      mappingsDir: path.join(dir, 'mappings'),
      engine: new FillEngine(config, { fileExists: () => false }),
      confirm,
      layoutPath: path.join(dir, 'layout.json'),
      outPath: path.join(dir, 'plan.json'),
      previewPath: path.join(dir, 'preview.json'),
    };
  }

  it('writes the approved plan after confirmation', async () => {
    const confirm = vi.fn(async () => true);

    const stats = await runScreenFill(options(confirm));

    expect(stats).toEqual({ detected: 3, ready: 2, unmatched: 0, noValue: 1, aiCalls: 0 });
    expect(confirm).toHaveBeenCalledWith('Fill 2 field(s) as shown?');

    const plan = JSON.parse(fs.readFileSync(path.join(dir, 'plan.json'), 'utf8'));
    expect(plan.items).toEqual([
      { fieldId: 'screen:200,100', label: 'First Name', value: { fieldId: 'screen:200,100', value: 'Jane', kind: 'text' } },
      {
        fieldId: 'screen:200,160',
        label: 'Email',
        value: { fieldId: 'screen:200,160', value: 'jane@example.com', kind: 'text' },
      },
    ]);

    const preview = JSON.parse(fs.readFileSync(path.join(dir, 'preview.json'), 'utf8'));
    expect(preview.entries).toHaveLength(3);
  });

  it('writes nothing when the user declines', async () => {
    const stats = await runScreenFill(options(async () => false));

    expect(stats?.ready).toBe(2);
    expect(fs.existsSync(path.join(dir, 'plan.json'))).toBe(false);
  });
});
