import { describe, it, expect } from 'vitest';

import type { RubricScores } from '../src/council/ranking.js';
import {
  applyConfidenceThreshold,
  buildVerificationResult,
  calculateConfidenceFromAgreement,
  extractBlockingIssues,
  extractVerdictFromSynthesis,
  type ScoredReview
} from '../src/council/verdict.js';

function uniform(score: number): RubricScores {
  return { accuracy: score, relevance: score, completeness: score, conciseness: score, clarity: score };
}

/** One review per entry in scores, each scoring one answer uniformly */
function reviews(...scores: number[]): ScoredReview[] {
  return scores.map(score => ({ entries: [{ label: 'Response A', scores: uniform(score) }] }));
}

describe('extractVerdictFromSynthesis', () => {
  it('passes on a lone approval marker', () => {
    expect(extractVerdictFromSynthesis('APPROVED')).toEqual({ verdict: 'pass', confidence: 0.8 });
  });

  it('adds 0.10 per marker up to 0.95', () => {
    expect(extractVerdictFromSynthesis('The tests passed and the change is recommended.'))
      .toEqual({ verdict: 'pass', confidence: 0.9 });
    expect(extractVerdictFromSynthesis('Approved. Accepted. Passed.'))
      .toEqual({ verdict: 'pass', confidence: 0.95 });
  });

  it('caps mixed signals at 0.75', () => {
    expect(extractVerdictFromSynthesis('APPROVED in part. The reviewers APPROVED the design but REJECTED the tests.'))
      .toEqual({ verdict: 'pass', confidence: 0.6 });
  });

  it('reads NOT RECOMMENDED as a rejection only', () => {
    expect(extractVerdictFromSynthesis('This change is NOT RECOMMENDED.'))
      .toEqual({ verdict: 'fail', confidence: 0.8 });
  });

  it('is unclear without markers or with balanced markers', () => {
    expect(extractVerdictFromSynthesis('The council could not agree.')).toEqual({ verdict: 'unclear', confidence: 0.5 });
    expect(extractVerdictFromSynthesis('APPROVED by one, REJECTED by another.'))
      .toEqual({ verdict: 'unclear', confidence: 0.5 });
  });
});

describe('calculateConfidenceFromAgreement', () => {
  it('is neutral without scores', () => {
    expect(calculateConfidenceFromAgreement([], 'pass')).toBe(0.5);
    expect(calculateConfidenceFromAgreement([{ entries: [] }], 'pass')).toBe(0.5);
  });

  it('rewards high scores for a pass and each reviewer', () => {
    expect(calculateConfidenceFromAgreement(reviews(9, 9, 9), 'pass')).toBe(0.86);
  });

  it('rewards low scores for a fail, capped at 1', () => {
    expect(calculateConfidenceFromAgreement(reviews(2), 'fail')).toBe(1);
  });

  it('penalizes spread between scores', () => {
    const spread: ScoredReview[] = [{
      entries: [
        { label: 'Response A', scores: { accuracy: 4 } },
        { label: 'Response B', scores: { accuracy: 8 } }
      ]
    }];

    expect(calculateConfidenceFromAgreement(spread, 'pass')).toBe(0.12);
  });
});

describe('applyConfidenceThreshold', () => {
  it('downgrades only a weak pass', () => {
    expect(applyConfidenceThreshold('pass', 0.65, 0.7)).toBe('unclear');
    expect(applyConfidenceThreshold('pass', 0.7, 0.7)).toBe('pass');
    expect(applyConfidenceThreshold('fail', 0.3, 0.7)).toBe('fail');
  });
});

describe('extractBlockingIssues', () => {
  it('reads severity lines and their locations', () => {
    const text = [
      'REJECTED',
      'CRITICAL: null dereference in src/app.ts:12',
      '- **MAJOR** - missing tests for the retry path',
      'Minor: typo at docs/readme.md',
      'Critical thinking is required here.'
    ].join('\n');

    expect(extractBlockingIssues(text)).toEqual([
      { severity: 'critical', description: 'null dereference in src/app.ts:12', location: 'src/app.ts:12' },
      { severity: 'major', description: 'missing tests for the retry path' },
      { severity: 'minor', description: 'typo at docs/readme.md', location: 'docs/readme.md' }
    ]);
  });

  it('reads numbered, heading and worded severity lines', () => {
    const text = [
      'REJECTED',
      '1. CRITICAL: SQL injection in src/db.ts:40',
      '2. MAJOR issue: no tests',
      '### Minor: typo',
      '- **Major problem** - retries never back off'
    ].join('\n');

    expect(extractBlockingIssues(text)).toEqual([
      { severity: 'critical', description: 'SQL injection in src/db.ts:40', location: 'src/db.ts:40' },
      { severity: 'major', description: 'no tests' },
      { severity: 'minor', description: 'typo' },
      { severity: 'major', description: 'retries never back off' }
    ]);
  });

  it('feeds a failing verdict', () => {
    const result = buildVerificationResult('REJECTED\n1. CRITICAL: SQL injection in src/db.ts:40', []);

    expect(result.verdict).toBe('fail');
    expect(result.blockingIssues).toEqual([
      { severity: 'critical', description: 'SQL injection in src/db.ts:40', location: 'src/db.ts:40' }
    ]);
  });
});

describe('buildVerificationResult', () => {
  it('reports a pass below the threshold as unclear', () => {
    const result = buildVerificationResult('APPROVED', reviews(7.65), 0.7);

    expect(result.verdict).toBe('unclear');
    expect(result.confidence).toBe(0.65);
  });

  it('blends text and agreement confidence', () => {
    const result = buildVerificationResult('APPROVED\nMINOR: rename a variable', reviews(9, 9, 9));

    expect(result).toEqual({
      verdict: 'pass',
      confidence: 0.84,
      rubricScores: uniform(9),
      blockingIssues: [],
      rationale: 'APPROVED\nMINOR: rename a variable'
    });
  });

  it('lists blocking issues for a fail', () => {
    const result = buildVerificationResult('REJECTED\nCRITICAL: null dereference in src/app.ts:12', reviews(3, 3, 3));

    expect(result.verdict).toBe('fail');
    expect(result.confidence).toBe(0.9);
    expect(result.blockingIssues).toEqual([
      { severity: 'critical', description: 'null dereference in src/app.ts:12', location: 'src/app.ts:12' }
    ]);
  });

  it('falls back to a placeholder rationale', () => {
    expect(buildVerificationResult('   ', []).rationale).toBe('No synthesis available.');
  });
});
