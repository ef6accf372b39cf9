import { describe, it, expect } from 'vitest';

import { detectStyleFeatures, detectStyleVariance, shouldNormalize } from '../src/council/style.js';

describe('detectStyleFeatures', () => {
  it('spots headings, bullets and code fences', () => {
    expect(detectStyleFeatures('## Answer\n- one\n```ts\nconst x = 1;\n```')).toEqual({
      length: 38,
      hasHeadings: true,
      hasBullets: true,
      hasCodeFences: true
    });
  });

  it('treats numbered lists as bullets and hashtags as text', () => {
    const features = detectStyleFeatures('#hashtag\n1. first');

    expect(features.hasHeadings).toBe(false);
    expect(features.hasBullets).toBe(true);
  });
});

describe('detectStyleVariance', () => {
  it('does not diverge for a single answer', () => {
    expect(detectStyleVariance(['Paris.'])).toEqual({ diverges: false, lengthRatio: 1, mixedFeatures: [] });
  });

  it('does not diverge for similar plain answers', () => {
    expect(detectStyleVariance(['Paris is the capital.', 'The capital is Paris.'])).toEqual({
      diverges: false,
      lengthRatio: 1,
      mixedFeatures: []
    });
  });

  it('diverges when one answer is more than twice as long', () => {
    const variance = detectStyleVariance(['Paris.', 'The capital of France is Paris.']);

    expect(variance.diverges).toBe(true);
    expect(variance.lengthRatio).toBe(31 / 6);
  });

  it('diverges when only some answers use a formatting feature', () => {
    expect(detectStyleVariance(['# Answer\nParis is the capital', 'Paris is the capital here'])).toEqual({
      diverges: true,
      lengthRatio: 29 / 25,
      mixedFeatures: ['headings']
    });
  });

  it('reports an infinite ratio against an empty answer', () => {
    expect(detectStyleVariance(['', 'Paris.']).lengthRatio).toBe(Infinity);
  });
});

describe('shouldNormalize', () => {
  const divergent = ['Paris.', 'The capital of France is Paris.'];
  const similar = ['Paris is the capital.', 'The capital is Paris.'];

  it('never normalizes when off', () => {
    expect(shouldNormalize('off', divergent)).toBe(false);
  });

  it('always normalizes when asked to', () => {
    expect(shouldNormalize('always', similar)).toBe(true);
    expect(shouldNormalize('always', [])).toBe(false);
  });

  it('normalizes only divergent answers in auto mode', () => {
    expect(shouldNormalize('auto', divergent)).toBe(true);
    expect(shouldNormalize('auto', similar)).toBe(false);
  });
});
