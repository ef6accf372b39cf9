/**
 * Markdown rendering of council results, for files, chat surfaces and the
 * CLI's --markdown flag.
 */

import type { RubricScores } from './council/ranking.js';
import type { CouncilVerification, DeliberationResult, StageError } from './types.js';
import { formatUsageCompact } from './usage.js';

function formatPoints(score: number): string {
  return Number.isInteger(score) ? String(score) : score.toFixed(2);
}

function rubricLines(scores: RubricScores): string[] {
  return Object.entries(scores).map(([dimension, score]) => `- ${dimension}: ${score}`);
}

function failureLines(failures: readonly StageError[]): string[] {
  return failures.map(f => `- ${f.modelId} (stage ${f.stage}, ${f.status}): ${f.message}`);
}

export function formatDeliberationMarkdown(result: DeliberationResult): string {
  const { stage1, stage2, stage3, metadata } = result;
  const lines: string[] = [];

  lines.push(`# Council ${metadata.mode === 'verification' ? 'verification' : 'deliberation'} (${metadata.tier} tier)`, '');

  lines.push('## Synthesis', '', stage3.content.trim(), '');
  lines.push(`_Synthesized by ${stage3.model}${stage3.usedFallback ? ' (stand-in for the tier aggregator)' : ''}_`, '');

  if (stage2.mode === 'peer_review' && stage2.aggregateRanking.length > 0) {
    lines.push('## Ranking', '');
    lines.push('| Rank | Answer | Model | Points | Ballots |');
    lines.push('|---|---|---|---|---|');
    for (const entry of stage2.aggregateRanking) {
      lines.push(`| ${entry.rank} | ${entry.label} | ${entry.model ?? '-'} | ${formatPoints(entry.score)} | ${entry.ballots} |`);
    }
    lines.push('');
  }

  const rubric = rubricLines(stage2.rubricScores);
  if (rubric.length > 0) {
    lines.push('## Rubric scores', '', ...rubric, '');
  }

  if (metadata.failedModels.length > 0) {
    lines.push('## Failed calls', '', ...failureLines(metadata.failedModels), '');
  }

  lines.push('---');
  lines.push(`${stage1.answers.length} answers | ${formatUsageCompact(metadata.usage)}`);

  return lines.join('\n');
}

export function formatVerificationMarkdown(verification: CouncilVerification): string {
  const lines: string[] = [];

  lines.push(
    `# Verdict: ${verification.verdict.toUpperCase()}`,
    '',
    `Confidence ${verification.confidence.toFixed(2)} (threshold ${verification.threshold.toFixed(2)}, ${verification.tier} tier)`,
    ''
  );

  if (verification.blockingIssues.length > 0) {
    lines.push('## Blocking issues', '');
    for (const issue of verification.blockingIssues) {
      const location = issue.location ? ` (\`${issue.location}\`)` : '';
      lines.push(`- **${issue.severity}** ${issue.description}${location}`);
    }
    lines.push('');
  }

  const rubric = rubricLines(verification.rubricScores);
  if (rubric.length > 0) {
    lines.push('## Rubric scores', '', ...rubric, '');
  }

  lines.push('## Rationale', '', verification.rationale);

  return lines.join('\n');
}
