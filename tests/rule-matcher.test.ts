import { describe, it, expect } from 'vitest';
import { NO_MATCH, RuleMatcher, isProsePrompt, roundConfidence } from '../src/services/rule-matcher.js';

describe('RuleMatcher', () => {
  const matcher = new RuleMatcher({ kindMismatchPenalty: 0.3 });

  it('matches common labels', () => {
    expect(matcher.match('first name', 'text')).toEqual({ attribute: 'first_name', confidence: 0.9 });
    expect(matcher.match('field of study', 'text')).toEqual({ attribute: 'field_of_study', confidence: 0.85 });
    expect(matcher.match('do you require visa sponsorship', 'checkbox')).toEqual({
      attribute: 'requires_sponsorship',
      confidence: 0.85,
    });
  });

  it('prefers specific rules over generic ones', () => {
    expect(matcher.match('email address', 'text')).toEqual({ attribute: 'email', confidence: 0.95 });
    expect(matcher.match('name', 'text')).toEqual({ attribute: 'full_name', confidence: 0.6 });
  });

  it('skips the generic name rule for other kinds of names', () => {
    expect(matcher.match('company name', 'text')).toEqual(NO_MATCH);
    const otherNames = [
      'middle name',
      'maiden name',
      'nick name',
      'preferred name',
      'emergency contact name',
      'father s name',
      'mother s name',
      'parent name',
      'spouse name',
      'recruiter name',
      'referrer name',
      'referral name',
    ];
    for (const label of otherNames) {
      expect(matcher.match(label, 'text')).toEqual(NO_MATCH);
    }
  });

  it('leaves secondary address lines to the whole-address rule only', () => {
    expect(matcher.match('address line 2', 'text')).toEqual(NO_MATCH);
    expect(matcher.match('address line 3', 'text')).toEqual(NO_MATCH);
    expect(matcher.match('address apt suite unit', 'text')).toEqual(NO_MATCH);
    expect(matcher.match('apartment address', 'text')).toEqual(NO_MATCH);
    expect(matcher.match('address', 'text')).toEqual({ attribute: 'address', confidence: 0.7 });
    expect(matcher.match('home address', 'text')).toEqual({ attribute: 'address', confidence: 0.7 });
    expect(matcher.match('address line 1', 'text')).toEqual({ attribute: 'street', confidence: 0.85 });
  });

  it('does not read attribute words out of free-text questions', () => {
    expect(matcher.match('please state why you want this job', 'textarea')).toEqual(NO_MATCH);
    expect(matcher.match('please state why you want this job', 'text')).toEqual(NO_MATCH);
    expect(matcher.match('tell us about a time you worked remote', 'text')).toEqual(NO_MATCH);
  });

  it('still matches documents and short questions', () => {
    expect(matcher.match('please upload your resume so we can see why you fit', 'file')).toEqual({
      attribute: 'resume',
      confidence: 0.85,
    });
    expect(matcher.match('i am willing to relocate for this position', 'checkbox')).toEqual({
      attribute: 'willing_to_relocate',
      confidence: 0.8,
    });
    expect(matcher.match('state', 'textarea')).toEqual({ attribute: 'state', confidence: 0.8 });
  });

  it('penalizes an unexpected control kind', () => {
    expect(matcher.match('upload your resume', 'file')).toEqual({ attribute: 'resume', confidence: 0.85 });
    expect(matcher.match('resume', 'text')).toEqual({ attribute: 'resume', confidence: 0.55 });
  });

  it('never goes below zero', () => {
    const harsh = new RuleMatcher({ kindMismatchPenalty: 1 });
    expect(harsh.match('resume', 'text')).toEqual({ attribute: 'resume', confidence: 0 });
  });

  it('returns no match for empty labels', () => {
    expect(matcher.match('', 'text')).toEqual(NO_MATCH);
  });

  it('uses the first matching rule', () => {
    const custom = new RuleMatcher({
      kindMismatchPenalty: 0.3,
      rules: [
        { attribute: 'email', pattern: /contact/, baseConfidence: 0.5 },
        { attribute: 'phone', pattern: /contact/, baseConfidence: 0.9 },
      ],
    });
    expect(custom.match('contact', 'text')).toEqual({ attribute: 'email', confidence: 0.5 });
  });
});

describe('isProsePrompt', () => {
  it('needs six words and either a textarea or a question word', () => {
    expect(isProsePrompt('please state why you want this job', 'text')).toBe(true);
    expect(isProsePrompt('anything else we should know about you', 'textarea')).toBe(true);
    expect(isProsePrompt('anything else we should know about you', 'text')).toBe(false);
    expect(isProsePrompt('why this job', 'textarea')).toBe(false);
  });
});

describe('roundConfidence', () => {
  it('clamps and rounds', () => {
    expect(roundConfidence(0.85 - 0.3)).toBe(0.55);
    expect(roundConfidence(1.2)).toBe(1);
    expect(roundConfidence(-0.1)).toBe(0);
  });
});
