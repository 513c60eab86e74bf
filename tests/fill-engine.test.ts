import { describe, it, expect, vi } from 'vitest';
import { createEngineConfig } from '../src/config.js';
import type { AiMatchRequest, AiMatcher } from '../src/services/ai-matcher.js';
import { FillEngine } from '../src/services/fill-engine.js';
import { NO_MATCH } from '../src/services/rule-matcher.js';
import type { FormField, MatchCandidate } from '../src/types/index.js';
import { testRecord } from './fixtures.js';

const fields: FormField[] = [
  { id: '#first', label: 'First Name', kind: 'text', required: true },
  { id: '#q', label: '', kind: 'text' },
  { id: '#company', label: 'Company Name', kind: 'text' },
  { id: '#gpa', label: 'GPA', kind: 'text' },
];

function fakeAi() {
  const match = vi.fn(
    async (request: AiMatchRequest): Promise<MatchCandidate> =>
      request.label === '' ? { attribute: 'phone', confidence: 0.8 } : NO_MATCH
  );
  const matcher: AiMatcher = { enabled: true, match };
  return { matcher, match };
}

describe('FillEngine', () => {
  const record = testRecord();

  it('builds a preview in detection order', async () => {
    const { matcher } = fakeAi();
    const engine = new FillEngine(createEngineConfig(), { aiMatcher: matcher, fileExists: () => true });

    const { preview, stats } = await engine.buildPreview(fields, record);

    expect(preview.entries.map((e) => e.fieldId)).toEqual(['#first', '#q', '#company', '#gpa']);
    expect(preview.entries.map((e) => e.status)).toEqual(['ready', 'ready', 'unmatched', 'no-value']);
    expect(preview.entries[0].value?.value).toBe('Jane');
    expect(preview.entries[1]).toMatchObject({ attribute: 'phone', source: 'ai', confidence: 0.8 });
    expect(preview.entries[1].value?.value).toBe('555-0100');
    expect(stats).toEqual({ detected: 4, ready: 2, unmatched: 1, noValue: 1, aiCalls: 2 });
  });

  it('only consults the AI matcher for uncertain labels', async () => {
    const { matcher, match } = fakeAi();
    const engine = new FillEngine(createEngineConfig(), { aiMatcher: matcher });

    await engine.buildPreview(fields, record);

    expect(match.mock.calls.map(([request]) => request.label)).toEqual(['', 'Company Name']);
  });

  it('runs rule-only without an API key', async () => {
    const engine = new FillEngine(createEngineConfig());
    expect(engine.aiEnabled).toBe(false);

    const { preview, stats } = await engine.buildPreview(fields, record);

    expect(preview.entries[1].status).toBe('unmatched');
    expect(stats.aiCalls).toBe(0);
  });

  it('treats a saved site mapping as a certain rule match', async () => {
    const { matcher } = fakeAi();
    const engine = new FillEngine(createEngineConfig(), { aiMatcher: matcher });

    const { result, aiConsulted } = await engine.matchField(fields[1], { siteMapping: { '#q': 'email' } });

    expect(result).toEqual({ fieldId: '#q', attribute: 'email', confidence: 1, source: 'rule' });
    expect(aiConsulted).toBe(false);
  });

  it('leaves low-confidence matches unmatched', async () => {
    const engine = new FillEngine(createEngineConfig({ minAcceptConfidence: 0.95 }));

    const { result } = await engine.matchField({ id: '#n', label: 'Name', kind: 'text' });

    expect(result).toEqual({
      fieldId: '#n',
      attribute: 'unmatched',
      confidence: 0,
      source: 'none',
      candidate: { attribute: 'full_name', confidence: 0.6, source: 'rule' },
    });
  });

  it('does not fill a free-text question from a word it mentions', async () => {
    const engine = new FillEngine(createEngineConfig());

    const { preview } = await engine.buildPreview(
      [{ id: '#why', label: 'Please state why you want this job', kind: 'textarea' }],
      record
    );

    expect(preview.entries[0]).toMatchObject({ fieldId: '#why', attribute: 'unmatched', status: 'unmatched' });
  });
});
