/**
 * Stage 1.5 style checks.
 *
 * Reviewers favour long, heavily formatted answers. When answers differ in
 * style, they can be rewritten into plain prose before peer review.
 */

import type { StyleNormalizationMode } from '../config.js';

export interface StyleFeatures {
  length: number;
  hasHeadings: boolean;
  hasBullets: boolean;
  hasCodeFences: boolean;
}

export interface StyleVariance {
  diverges: boolean;
  /** Longest answer length over shortest */
  lengthRatio: number;
  /** Formatting features present in some answers but not all */
  mixedFeatures: Array<'headings' | 'bullets' | 'codeFences'>;
}

export const MAX_LENGTH_RATIO = 2;

export function detectStyleFeatures(text: string): StyleFeatures {
  return {
    length: text.trim().length,
    hasHeadings: /^\s{0,3}#{1,6}\s+\S/m.test(text),
    hasBullets: /^\s*(?:[-*+]|\d+[.)])\s+\S/m.test(text),
    hasCodeFences: /```/.test(text)
  };
}

export function detectStyleVariance(answers: readonly string[]): StyleVariance {
  if (answers.length < 2) {
    return { diverges: false, lengthRatio: 1, mixedFeatures: [] };
  }

  const features = answers.map(detectStyleFeatures);
  const lengths = features.map(f => f.length);
  const shortest = Math.min(...lengths);
  const longest = Math.max(...lengths);
  const lengthRatio = shortest > 0 ? longest / shortest : longest > 0 ? Infinity : 1;

  const mixed = (pick: (f: StyleFeatures) => boolean): boolean => {
    const count = features.filter(pick).length;
    return count > 0 && count < features.length;
  };

  const mixedFeatures: StyleVariance['mixedFeatures'] = [];
  if (mixed(f => f.hasHeadings)) mixedFeatures.push('headings');
  if (mixed(f => f.hasBullets)) mixedFeatures.push('bullets');
  if (mixed(f => f.hasCodeFences)) mixedFeatures.push('codeFences');

  return {
    diverges: lengthRatio > MAX_LENGTH_RATIO || mixedFeatures.length > 0,
    lengthRatio,
    mixedFeatures
  };
}

export function shouldNormalize(mode: StyleNormalizationMode, answers: readonly string[]): boolean {
  if (mode === 'always') return answers.length > 0;
  if (mode === 'auto') return detectStyleVariance(answers).diverges;
  return false;
}
