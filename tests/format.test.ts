import { describe, it, expect } from 'vitest';

import { formatDeliberationMarkdown, formatVerificationMarkdown } from '../src/format.js';
import type { CouncilVerification, DeliberationResult } from '../src/types.js';
import { UsageTracker } from '../src/usage.js';

function deliberation(): DeliberationResult {
  const aggregateRanking = [
    { label: 'Response B', model: 'anthropic/claude-3.5-sonnet', score: 2, ballots: 2, rank: 1 },
    { label: 'Response A', model: 'openai/gpt-4o', score: 1.5, ballots: 2, rank: 2 }
  ];
  const failure = {
    stage: 1 as const,
    modelId: 'x-ai/grok-4',
    status: 'timeout' as const,
    message: 'Call to x-ai/grok-4 timed out after 50ms',
    attempts: 2,
    recoverable: true
  };

  return {
    stage1: {
      answers: [
        { label: 'Response A', model: 'openai/gpt-4o', content: 'Paris.', attempts: 1 },
        { label: 'Response B', model: 'anthropic/claude-3.5-sonnet', content: 'It is Paris.', attempts: 1 }
      ],
      complete: false,
      errors: [failure]
    },
    stage2: {
      mode: 'peer_review',
      reviews: [],
      aggregateRanking,
      rubricScores: { accuracy: 8, clarity: 7.5 },
      errors: []
    },
    stage3: { model: 'openai/gpt-4o', content: '  Paris is the capital of France.\n', usedFallback: false, errors: [] },
    metadata: {
      sessionId: 'session-1',
      tier: 'balanced',
      mode: 'synthesis',
      query: 'What is the capital of France?',
      labelToModel: { 'Response A': 'openai/gpt-4o', 'Response B': 'anthropic/claude-3.5-sonnet' },
      aggregateRanking,
      failedModels: [failure],
      reviewerAssignments: {},
      normalized: false,
      aggregatorModel: 'openai/gpt-4o',
      usage: new UsageTracker('session-1', () => 0).getSummary(),
      durationMs: 0,
      timestamp: '2026-01-01T00:00:00.000Z'
    }
  };
}

describe('formatDeliberationMarkdown', () => {
  it('renders the synthesis, ranking, rubric and failures', () => {
    expect(formatDeliberationMarkdown(deliberation()).split('\n')).toEqual([
      '# Council deliberation (balanced tier)',
      '',
      '## Synthesis',
      '',
      'Paris is the capital of France.',
      '',
      '_Synthesized by openai/gpt-4o_',
      '',
      '## Ranking',
      '',
      '| Rank | Answer | Model | Points | Ballots |',
      '|---|---|---|---|---|',
      '| 1 | Response B | anthropic/claude-3.5-sonnet | 2 | 2 |',
      '| 2 | Response A | openai/gpt-4o | 1.50 | 2 |',
      '',
      '## Rubric scores',
      '',
      '- accuracy: 8',
      '- clarity: 7.5',
      '',
      '## Failed calls',
      '',
      '- x-ai/grok-4 (stage 1, timeout): Call to x-ai/grok-4 timed out after 50ms',
      '',
      '---',
      '2 answers | 0 tokens | $0.0000 | 0.0s'
    ]);
  });

  it('notes a stand-in aggregator', () => {
    const result = deliberation();
    result.stage3 = { ...result.stage3, model: 'anthropic/claude-3.5-sonnet', usedFallback: true };

    expect(formatDeliberationMarkdown(result)).toContain(
      '_Synthesized by anthropic/claude-3.5-sonnet (stand-in for the tier aggregator)_'
    );
  });
});

describe('formatVerificationMarkdown', () => {
  it('renders the verdict, blocking issues and rationale', () => {
    const verification: CouncilVerification = {
      verdict: 'fail',
      confidence: 0.9,
      rubricScores: {},
      blockingIssues: [
        { severity: 'critical', description: 'null dereference in src/app.ts:12', location: 'src/app.ts:12' },
        { severity: 'minor', description: 'typo in a comment' }
      ],
      rationale: 'REJECTED',
      tier: 'high',
      threshold: 0.7,
      deliberation: deliberation()
    };

    expect(formatVerificationMarkdown(verification).split('\n')).toEqual([
      '# Verdict: FAIL',
      '',
      'Confidence 0.90 (threshold 0.70, high tier)',
      '',
      '## Blocking issues',
      '',
      '- **critical** null dereference in src/app.ts:12 (`src/app.ts:12`)',
      '- **minor** typo in a comment',
      '',
      '## Rationale',
      '',
      'REJECTED'
    ]);
  });
});
