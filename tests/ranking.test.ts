import { describe, it, expect } from 'vitest';

import {
  ParseError,
  aggregateRankings,
  aggregateRubricScores,
  assignReviewers,
  createLabel,
  extractJsonFromText,
  parseReview
} from '../src/council/ranking.js';

const LABELS = ['Response A', 'Response B', 'Response C'];

describe('createLabel', () => {
  it('letters labels from A', () => {
    expect([0, 1, 25].map(createLabel)).toEqual(['Response A', 'Response B', 'Response Z']);
  });

  it('continues with two letters past Z', () => {
    expect([26, 27, 51, 52].map(i => createLabel(i))).toEqual([
      'Response AA',
      'Response AB',
      'Response AZ',
      'Response BA'
    ]);
  });
});

describe('aggregateRankings', () => {
  it('scores n - 1 - position per ballot', () => {
    const result = aggregateRankings(
      [
        { ranking: ['A', 'B', 'C'] },
        { ranking: ['B', 'A', 'C'] },
        { ranking: ['A', 'C', 'B'] }
      ],
      { labels: LABELS }
    );

    expect(result).toEqual([
      { label: 'Response A', model: undefined, score: 5, ballots: 3, rank: 1 },
      { label: 'Response B', model: undefined, score: 3, ballots: 3, rank: 2 },
      { label: 'Response C', model: undefined, score: 1, ballots: 3, rank: 3 }
    ]);
  });

  it('drops self votes and skips ballots left empty', () => {
    const labelToModel = { 'Response A': 'm1', 'Response B': 'm2' };
    const result = aggregateRankings(
      [
        { reviewerModel: 'm1', ranking: ['Response A'] },
        { reviewerModel: 'm2', ranking: ['Response A', 'Response B'] }
      ],
      { labels: ['Response A', 'Response B'], labelToModel }
    );

    expect(result).toEqual([
      { label: 'Response A', model: 'm1', score: 0, ballots: 1, rank: 1 },
      { label: 'Response B', model: 'm2', score: 0, ballots: 0, rank: 2 }
    ]);
  });

  it('counts self votes when exclusion is off', () => {
    const result = aggregateRankings(
      [{ reviewerModel: 'm1', ranking: ['Response A', 'Response B'] }],
      { labels: ['Response A', 'Response B'], labelToModel: { 'Response A': 'm1' }, excludeSelfVotes: false }
    );

    expect(result.map(r => [r.label, r.score])).toEqual([['Response A', 1], ['Response B', 0]]);
  });

  it('ignores unknown and repeated labels before scoring', () => {
    const result = aggregateRankings(
      [{ ranking: ['Response A', 'Response Z', 'Response A', 'Response B'] }],
      { labels: ['Response A', 'Response B'] }
    );

    expect(result.map(r => [r.label, r.score, r.ballots])).toEqual([
      ['Response A', 1, 1],
      ['Response B', 0, 1]
    ]);
  });

  it('averages points per ballot in mean mode', () => {
    const result = aggregateRankings(
      [
        { ranking: ['A', 'B', 'C'] },
        { ranking: ['B', 'A', 'C'] },
        { ranking: ['A', 'B'] }
      ],
      { labels: LABELS, mode: 'mean' }
    );

    expect(result.map(r => r.label)).toEqual(LABELS);
    expect(result[0].score).toBeCloseTo(4 / 3);
    expect(result[1].score).toBe(1);
    expect(result[2].score).toBe(0);
  });

  it('breaks ties by label order', () => {
    const result = aggregateRankings(
      [{ ranking: ['C', 'A'] }, { ranking: ['A', 'C'] }],
      { labels: LABELS }
    );

    expect(result.map(r => r.label)).toEqual(['Response A', 'Response C', 'Response B']);
  });
});

describe('assignReviewers', () => {
  const models = ['m1', 'm2', 'm3', 'm4'];
  const labels = ['Response A', 'Response B', 'Response C', 'Response D'];
  const labelToModel = Object.fromEntries(labels.map((label, i) => [label, models[i]]));

  it('shows every answer to every reviewer without a cap', () => {
    expect(assignReviewers(models, labels, labelToModel, null)).toEqual({
      m1: labels, m2: labels, m3: labels, m4: labels
    });
  });

  it('shows every answer when the pool fits under the cap', () => {
    expect(assignReviewers(models, labels, labelToModel, 4).m1).toEqual(labels);
  });

  it('deals reviewers round-robin and never assigns a reviewer its own answer', () => {
    const assignments = assignReviewers(models, labels, labelToModel, 2);

    expect(assignments).toEqual({
      m1: ['Response B', 'Response D'],
      m2: ['Response A', 'Response C', 'Response D'],
      m3: ['Response A'],
      m4: ['Response B', 'Response C']
    });
    for (const label of labels) {
      const reviewers = models.filter(m => assignments[m].includes(label));
      expect(reviewers).toHaveLength(2);
      expect(reviewers).not.toContain(labelToModel[label]);
    }
  });
});

describe('parseReview', () => {
  it('reads fenced reviewer JSON and drops out-of-range scores', () => {
    const text = [
      'Here is my review.',
      '```json',
      JSON.stringify({
        evaluations: {
          'Response A': { accuracy: 8, clarity: 11 },
          B: { accuracy: '9', relevance: 6 }
        },
        ranking: ['Response B', 'a', 'Response Q']
      }),
      '```'
    ].join('\n');

    expect(parseReview(text, LABELS)).toEqual({
      ranking: ['Response B', 'Response A'],
      entries: [
        { label: 'Response A', scores: { accuracy: 8 } },
        { label: 'Response B', scores: { relevance: 6 } }
      ]
    });
  });

  it('falls back to a FINAL RANKING list', () => {
    const text = 'B was thorough.\n\nFINAL RANKING:\n1. Response C\n2. Response A\n3. Response C';

    expect(parseReview(text, LABELS)).toEqual({ ranking: ['Response C', 'Response A'], entries: [] });
  });

  it('keeps rubric scores from JSON without a ranking', () => {
    const text = JSON.stringify({
      evaluations: { 'Response A': { accuracy: 9, clarity: 8 }, 'Response B': { accuracy: 6 } }
    });

    expect(parseReview(text, LABELS)).toEqual({
      ranking: [],
      entries: [
        { label: 'Response A', scores: { accuracy: 9, clarity: 8 } },
        { label: 'Response B', scores: { accuracy: 6 } }
      ]
    });
  });

  it('reads two-letter labels from a FINAL RANKING list', () => {
    const labels = Array.from({ length: 28 }, (_, i) => createLabel(i));

    expect(parseReview('FINAL RANKING:\n1. Response AB\n2. Response A', labels)).toEqual({
      ranking: ['Response AB', 'Response A'],
      entries: []
    });
  });

  it('throws ParseError when there is nothing to parse', () => {
    expect(() => parseReview('They all look fine to me.', LABELS)).toThrow(ParseError);
  });

  it('throws ParseError for JSON with neither ranking nor usable scores', () => {
    const text = JSON.stringify({ evaluations: { 'Response A': { accuracy: 'great' } }, ranking: ['Response Q'] });

    expect(() => parseReview(text, LABELS)).toThrow('Review contained neither a ranking nor rubric scores');
  });
});

describe('extractJsonFromText', () => {
  it('finds a bare object inside prose', () => {
    expect(extractJsonFromText('Scores follow: {"ranking": ["A"]} thanks')).toEqual({ ranking: ['A'] });
  });

  it('returns null when nothing parses', () => {
    expect(extractJsonFromText('no json here')).toBeNull();
  });
});

describe('aggregateRubricScores', () => {
  it('averages the scores supplied and leaves unscored dimensions out', () => {
    const result = aggregateRubricScores([
      { label: 'Response A', scores: { accuracy: 7, clarity: 7 } },
      { label: 'Response B', scores: { accuracy: 8 } },
      { label: 'Response C', scores: { accuracy: 8 } }
    ]);

    expect(result).toEqual({ accuracy: 7.7, clarity: 7 });
    expect(result).not.toHaveProperty('relevance');
  });
});
