import { describe, it, expect, vi } from 'vitest';
import { createEngineConfig } from '../src/config.js';
import { ATTRIBUTE_NAMES } from '../src/schema/attributes.js';
import {
  RemoteAiMatcher,
  type CompletionFn,
  buildMatchPrompt,
  createAiMatcher,
  disabledAiMatcher,
  parseMatchResponse,
} from '../src/services/ai-matcher.js';
import { NO_MATCH } from '../src/services/rule-matcher.js';

describe('createAiMatcher', () => {
  it('is disabled without an API key and never calls out', async () => {
    const complete = vi.fn<CompletionFn>(async () => '{"attribute":"email","confidence":0.9}');
    const matcher = createAiMatcher(createEngineConfig(), complete);

    expect(matcher.enabled).toBe(false);
    await expect(matcher.match({ label: 'Email', controlKind: 'text', candidates: ATTRIBUTE_NAMES })).resolves.toEqual(
      NO_MATCH
    );
    expect(complete).not.toHaveBeenCalled();
  });

  it('uses the given completion when a key is set', () => {
    const matcher = createAiMatcher(createEngineConfig({ anthropicApiKey: 'test-secret' }), async () => '');
    expect(matcher.enabled).toBe(true);
  });
});

describe('disabledAiMatcher', () => {
  it('answers no match', async () => {
    await expect(disabledAiMatcher.match({ label: 'x', controlKind: 'text', candidates: [] })).resolves.toEqual(NO_MATCH);
  });
});

describe('parseMatchResponse', () => {
  it('reads JSON wrapped in a code block', () => {
    const text = '```json\n{"attribute": "email", "confidence": 0.82, "rationale": "asks for email"}\n```';
    expect(parseMatchResponse(text, ATTRIBUTE_NAMES)).toEqual({ attribute: 'email', confidence: 0.82 });
  });

  it('coerces and clamps the confidence', () => {
    expect(parseMatchResponse('{"attribute":"phone","confidence":"0.9"}', ATTRIBUTE_NAMES)).toEqual({
      attribute: 'phone',
      confidence: 0.9,
    });
    expect(parseMatchResponse('{"attribute":"phone","confidence":1.4}', ATTRIBUTE_NAMES)).toEqual({
      attribute: 'phone',
      confidence: 1,
    });
  });

  it('treats none, unknown and non-candidate attributes as no match', () => {
    expect(parseMatchResponse('{"attribute":"none","confidence":0.9}', ATTRIBUTE_NAMES)).toEqual(NO_MATCH);
    expect(parseMatchResponse('{"attribute":"favourite_color","confidence":0.9}', ATTRIBUTE_NAMES)).toEqual(NO_MATCH);
    expect(parseMatchResponse('{"attribute":"phone","confidence":0.9}', ['email'])).toEqual(NO_MATCH);
  });

  it('throws on replies without JSON', () => {
    expect(() => parseMatchResponse('I think this is an email field', ATTRIBUTE_NAMES)).toThrow(
      'No JSON found in response'
    );
  });
});

describe('buildMatchPrompt', () => {
  it('describes the field and its options', () => {
    const prompt = buildMatchPrompt({
      label: 'Mobile',
      controlKind: 'select',
      options: ['Yes', 'No'],
      candidates: ['phone'],
    });
    expect(prompt).toContain('**Label:** "Mobile"');
    expect(prompt).toContain('**Options:** "Yes", "No"');
    expect(prompt).toContain('- phone: phone number');
  });

  it('marks empty labels', () => {
    const prompt = buildMatchPrompt({ label: '  ', controlKind: 'file', candidates: ['resume'] });
    expect(prompt).toContain('**Label:** (empty, judge from the control type alone)');
  });
});

describe('RemoteAiMatcher', () => {
  it('returns the parsed answer', async () => {
    const complete = vi.fn<CompletionFn>(async () => '{"attribute":"phone","confidence":0.8}');
    const matcher = new RemoteAiMatcher(complete, 1000);

    const result = await matcher.match({ label: 'Mobile', controlKind: 'text', candidates: ATTRIBUTE_NAMES });

    expect(result).toEqual({ attribute: 'phone', confidence: 0.8 });
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete.mock.calls[0][0]).toContain('**Label:** "Mobile"');
  });

  it('gives up after the timeout and aborts the request', async () => {
    let seenSignal: AbortSignal | undefined;
    const matcher = new RemoteAiMatcher((_prompt, signal) => {
      seenSignal = signal;
      return new Promise<string>(() => undefined);
    }, 20);

    const result = await matcher.match({ label: 'Mobile', controlKind: 'text', candidates: ATTRIBUTE_NAMES });

    expect(result).toEqual(NO_MATCH);
    expect(seenSignal?.aborted).toBe(true);
  });

  it('answers no match when the call fails', async () => {
    const matcher = new RemoteAiMatcher(async () => {
      throw new Error('connection refused');
    }, 1000);
    await expect(matcher.match({ label: 'Mobile', controlKind: 'text', candidates: ATTRIBUTE_NAMES })).resolves.toEqual(
      NO_MATCH
    );
  });

  it('answers no match for malformed replies', async () => {
    const matcher = new RemoteAiMatcher(async () => 'not json at all', 1000);
    await expect(matcher.match({ label: 'Mobile', controlKind: 'text', candidates: ATTRIBUTE_NAMES })).resolves.toEqual(
      NO_MATCH
    );
  });
});
