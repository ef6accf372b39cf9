/**
 * Verdict Extractor
 *
 * Turns the aggregator's free-text synthesis plus reviewer rubric scores
 * into a pass/fail/unclear verdict with a confidence score.
 *
 * Marker matching over LLM text is best-effort. The constants below are
 * tuned policy and are kept as they are.
 */

import { aggregateRubricScores, type RankingEntry, type RubricScores } from './ranking.js';

export type Verdict = 'pass' | 'fail' | 'unclear';

export type IssueSeverity = 'critical' | 'major' | 'minor';

export interface BlockingIssue {
  severity: IssueSeverity;
  description: string;
  /** Source location such as "src/app.ts:12", when the line names one */
  location?: string;
}

export interface VerificationResult {
  verdict: Verdict;
  /** Blended confidence in [0, 1], two decimals */
  confidence: number;
  rubricScores: RubricScores;
  /** Only ever non-empty for fail or unclear */
  blockingIssues: BlockingIssue[];
  rationale: string;
}

/** What the extractor needs from one Stage 2 review */
export interface ScoredReview {
  entries: readonly RankingEntry[];
}

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;

const APPROVAL_PATTERNS = [
  /\bAPPROVED\b/gi,
  /\bPASS(?:ED)?\b/gi,
  /\bACCEPTED\b/gi,
  /(?<!\bNOT\s+)\bRECOMMENDED\b/gi
];

const REJECTION_PATTERNS = [
  /\bREJECTED\b/gi,
  /\bFAIL(?:ED)?\b/gi,
  /\bDENIED\b/gi,
  /\bNOT\s+RECOMMENDED\b/gi
];

// Optional heading, numbered or bulleted prefix; one optional word may sit
// between the severity and the separator ("MAJOR issue: ...")
const ISSUE_LINE = /^\s*(?:#{1,6}\s+|\d+[.)]\s+|[-*•]\s+)?(?:\*\*)?(CRITICAL|MAJOR|MINOR)(?:\s+[a-z]+)?(?:\*\*)?\s*[:-]\s*(?:\*\*)?\s*(\S.*)$/gim;
const LOCATION = /\b(?:in|at)\s+([\w./-]+\.\w+(?::\d+)?)/i;

const SEVERITIES: readonly IssueSeverity[] = ['critical', 'major', 'minor'];

function isSeverity(value: string): value is IssueSeverity {
  return (SEVERITIES as readonly string[]).includes(value);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function countMatches(text: string, patterns: readonly RegExp[]): number {
  return patterns.reduce((total, pattern) => total + (text.match(pattern)?.length ?? 0), 0);
}

/**
 * Verdict and text-signal confidence from marker counts
 */
export function extractVerdictFromSynthesis(text: string): { verdict: Verdict; confidence: number } {
  const approvals = countMatches(text, APPROVAL_PATTERNS);
  const rejections = countMatches(text, REJECTION_PATTERNS);

  if (approvals > 0 && rejections === 0) {
    return { verdict: 'pass', confidence: round2(Math.min(0.95, 0.70 + 0.10 * approvals)) };
  }
  if (rejections > 0 && approvals === 0) {
    return { verdict: 'fail', confidence: round2(Math.min(0.95, 0.70 + 0.10 * rejections)) };
  }
  if (approvals > rejections) {
    return { verdict: 'pass', confidence: round2(Math.min(0.75, 0.55 + 0.05 * (approvals - rejections))) };
  }
  if (rejections > approvals) {
    return { verdict: 'fail', confidence: round2(Math.min(0.75, 0.55 + 0.05 * (rejections - approvals))) };
  }
  return { verdict: 'unclear', confidence: 0.5 };
}

/**
 * Confidence from reviewer rubric scores.
 *
 * High scores support a pass, low scores support a fail. Spread between
 * scores costs up to 0.20; each reviewer adds 0.02, up to 0.10.
 */
export function calculateConfidenceFromAgreement(reviews: readonly ScoredReview[], verdict: Verdict): number {
  if (reviews.length === 0) return 0.5;

  const scores: number[] = [];
  for (const review of reviews) {
    for (const entry of review.entries) {
      for (const value of Object.values(entry.scores)) {
        if (typeof value === 'number') scores.push(value);
      }
    }
  }
  if (scores.length === 0) return 0.5;

  const mean = scores.reduce((a, b) => a + b, 0) / scores.length;
  const variance = scores.length > 1
    ? scores.reduce((sum, s) => sum + (s - mean) ** 2, 0) / (scores.length - 1)
    : 0;

  let scoreConfidence: number;
  if (verdict === 'pass') {
    scoreConfidence = clamp((mean - 5) / 5, 0.3, 1);
  } else if (verdict === 'fail') {
    scoreConfidence = clamp((5 - mean) / 5 + 0.5, 0.3, 1);
  } else {
    scoreConfidence = 0.5;
  }

  const confidence = scoreConfidence
    - Math.min(0.2, variance / 10)
    + Math.min(0.1, reviews.length * 0.02);

  return round2(clamp(confidence, 0, 1));
}

/**
 * A pass that does not reach the threshold is reported as unclear
 */
export function applyConfidenceThreshold(
  verdict: Verdict,
  confidence: number,
  threshold = DEFAULT_CONFIDENCE_THRESHOLD
): Verdict {
  return verdict === 'pass' && confidence < threshold ? 'unclear' : verdict;
}

/**
 * Lines such as "CRITICAL: null dereference in src/app.ts:12" or
 * "- **MAJOR** - missing tests"
 */
export function extractBlockingIssues(text: string): BlockingIssue[] {
  const issues: BlockingIssue[] = [];
  for (const match of text.matchAll(ISSUE_LINE)) {
    const severity = match[1].toLowerCase();
    if (!isSeverity(severity)) continue;

    const description = match[2].trim();
    const location = description.match(LOCATION)?.[1];
    issues.push(location ? { severity, description, location } : { severity, description });
  }
  return issues;
}

export function buildVerificationResult(
  synthesis: string,
  reviews: readonly ScoredReview[],
  threshold = DEFAULT_CONFIDENCE_THRESHOLD
): VerificationResult {
  const text = extractVerdictFromSynthesis(synthesis);
  const agreement = calculateConfidenceFromAgreement(reviews, text.verdict);
  const confidence = round2(clamp(0.4 * text.confidence + 0.6 * agreement, 0, 1));
  const verdict = applyConfidenceThreshold(text.verdict, confidence, threshold);

  return {
    verdict,
    confidence,
    rubricScores: aggregateRubricScores(reviews.flatMap(review => review.entries)),
    blockingIssues: verdict === 'pass' ? [] : extractBlockingIssues(synthesis),
    rationale: synthesis.trim() || 'No synthesis available.'
  };
}
