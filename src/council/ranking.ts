/**
 * Rank Aggregator
 *
 * Reduces reviewer ballots into one consensus ordering (Borda count) and
 * reviewer rubric scores into one score per dimension.
 */

import { CouncilError } from '../gateway/errors.js';
import {
  RUBRIC_DIMENSIONS,
  ReviewerResponseSchema,
  RubricScoreSchema,
  type RubricDimension
} from '../schemas.js';

export type RubricScores = Partial<Record<RubricDimension, number>>;

export interface RankingEntry {
  /** Candidate label, e.g. "Response B" */
  label: string;
  scores: RubricScores;
}

export interface ParsedReview {
  /** Known labels, best first, duplicates removed */
  ranking: string[];
  entries: RankingEntry[];
}

export interface Ballot {
  /** Model that cast the ballot; needed for self-vote exclusion */
  reviewerModel?: string;
  ranking: readonly string[];
}

export interface AggregateRanking {
  label: string;
  model?: string;
  /** Borda points (sum or mean, depending on the mode) */
  score: number;
  /** Number of ballots that ranked this candidate */
  ballots: number;
  /** 1-based position in the consensus order */
  rank: number;
}

export type BordaMode = 'sum' | 'mean';

export interface AggregateRankingsOptions {
  labels: readonly string[];
  labelToModel?: Readonly<Record<string, string>>;
  excludeSelfVotes?: boolean;
  mode?: BordaMode;
}

/**
 * Reviewer output that cannot be reduced to a ranking or rubric scores
 */
export class ParseError extends CouncilError {
  reviewer?: string;

  constructor(message: string, reviewer?: string) {
    super(message, 'parse_error');
    this.name = 'ParseError';
    this.reviewer = reviewer;
  }
}

/**
 * Labels shown to reviewers: "Response A" ... "Response Z", "Response AA", ...
 */
export function createLabel(index: number): string {
  let letters = '';
  for (let n = index + 1; n > 0; n = Math.floor((n - 1) / 26)) {
    letters = String.fromCharCode(65 + ((n - 1) % 26)) + letters;
  }
  return `Response ${letters}`;
}

/**
 * Extract a JSON value from model text: a ```json fence, then the outermost
 * {...}, then the whole text
 */
export function extractJsonFromText(text: string): unknown {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (fenced) {
    try {
      return JSON.parse(fenced[1]);
    } catch {
      // Fall through to the bare object
    }
  }

  const objectMatch = text.match(/\{[\s\S]*\}/);
  if (objectMatch) {
    try {
      return JSON.parse(objectMatch[0]);
    } catch {
      // Fall through
    }
  }

  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Map what a reviewer wrote ("B", "response b", "Response B") onto a known label
 */
function resolveLabel(raw: string, labels: readonly string[]): string | undefined {
  const wanted = raw.trim().toLowerCase();
  return labels.find(label => {
    const lower = label.toLowerCase();
    return lower === wanted || lower === `response ${wanted}`;
  });
}

function uniqueKnownLabels(raw: readonly string[], labels: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const item of raw) {
    const label = resolveLabel(item, labels);
    if (label) seen.add(label);
  }
  return [...seen];
}

/**
 * Keep only scores that are numbers in [0, 10]; anything else is dropped
 */
export function parseRubricScores(raw: Readonly<Record<string, unknown>>): RubricScores {
  const scores: RubricScores = {};
  for (const dimension of RUBRIC_DIMENSIONS) {
    const parsed = RubricScoreSchema.safeParse(raw[dimension]);
    if (parsed.success) {
      scores[dimension] = parsed.data;
    }
  }
  return scores;
}

/**
 * Parse one reviewer's response.
 *
 * Reviewers are asked for JSON; either a ranking or rubric scores in it is
 * enough. Otherwise a "FINAL RANKING:" list of labels is accepted instead,
 * without rubric scores.
 *
 * @throws ParseError when there is neither a ranking nor a single score
 */
export function parseReview(text: string, labels: readonly string[]): ParsedReview {
  const parsed = ReviewerResponseSchema.safeParse(extractJsonFromText(text));

  if (parsed.success) {
    const entries = Object.entries(parsed.data.evaluations ?? {}).map(([key, value]) => ({
      label: resolveLabel(key, labels) ?? key,
      scores: parseRubricScores(value)
    }));
    const ranking = uniqueKnownLabels(parsed.data.ranking, labels);
    if (ranking.length > 0 || entries.some(entry => Object.keys(entry.scores).length > 0)) {
      return { ranking, entries };
    }
  }

  const section = text.split(/FINAL RANKING:?/i)[1];
  if (section) {
    const mentioned = section.match(/Response [A-Z]+\b/g) ?? [];
    const ranking = uniqueKnownLabels(mentioned, labels);
    if (ranking.length > 0) {
      return { ranking, entries: [] };
    }
  }

  throw new ParseError('Review contained neither a ranking nor rubric scores');
}

/**
 * Borda count over reviewer ballots.
 *
 * On a ballot of n candidates, position p earns n - 1 - p points. Unknown
 * and repeated labels are dropped first, then (with excludeSelfVotes) the
 * reviewer's own answer. Ballots left empty are skipped. Ties are broken by
 * label order so the result is deterministic.
 */
export function aggregateRankings(
  ballots: readonly Ballot[],
  options: AggregateRankingsOptions
): AggregateRanking[] {
  const { labels, labelToModel = {}, excludeSelfVotes = true, mode = 'sum' } = options;
  const points = new Map<string, number>(labels.map(label => [label, 0]));
  const counts = new Map<string, number>(labels.map(label => [label, 0]));

  for (const ballot of ballots) {
    let ranking = uniqueKnownLabels(ballot.ranking, labels);
    if (excludeSelfVotes && ballot.reviewerModel !== undefined) {
      ranking = ranking.filter(label => labelToModel[label] !== ballot.reviewerModel);
    }
    if (ranking.length === 0) continue;

    const n = ranking.length;
    ranking.forEach((label, position) => {
      points.set(label, (points.get(label) ?? 0) + (n - 1 - position));
      counts.set(label, (counts.get(label) ?? 0) + 1);
    });
  }

  const scored = labels.map(label => {
    const total = points.get(label) ?? 0;
    const ballotCount = counts.get(label) ?? 0;
    return {
      label,
      model: labelToModel[label],
      score: mode === 'mean' && ballotCount > 0 ? total / ballotCount : total,
      ballots: ballotCount
    };
  });

  scored.sort((a, b) => b.score - a.score || (a.label < b.label ? -1 : a.label > b.label ? 1 : 0));

  return scored.map((entry, index) => ({ ...entry, rank: index + 1 }));
}

/**
 * Decide which labels each reviewer sees.
 *
 * Without a cap (or when the pool is no larger than it) every reviewer sees
 * every answer. Otherwise reviewers are dealt round-robin so each candidate
 * gets at most maxReviewers reviewers, never including its own author.
 */
export function assignReviewers(
  reviewers: readonly string[],
  labels: readonly string[],
  labelToModel: Readonly<Record<string, string>>,
  maxReviewers: number | null
): Record<string, string[]> {
  const assignments: Record<string, string[]> = {};
  for (const reviewer of reviewers) {
    assignments[reviewer] = [];
  }

  if (maxReviewers === null || reviewers.length <= maxReviewers) {
    for (const reviewer of reviewers) {
      assignments[reviewer] = [...labels];
    }
    return assignments;
  }

  let cursor = 0;
  for (const label of labels) {
    const eligible = reviewers.filter(reviewer => reviewer !== labelToModel[label]);
    const count = Math.min(maxReviewers, eligible.length);
    for (let k = 0; k < count; k++) {
      assignments[eligible[(cursor + k) % eligible.length]].push(label);
    }
    cursor += count;
  }

  return assignments;
}

/**
 * Average each rubric dimension over the scores actually supplied,
 * rounded to one decimal. A dimension nobody scored is absent.
 */
export function aggregateRubricScores(entries: readonly RankingEntry[]): RubricScores {
  const result: RubricScores = {};
  for (const dimension of RUBRIC_DIMENSIONS) {
    const values: number[] = [];
    for (const entry of entries) {
      const value = entry.scores[dimension];
      if (value !== undefined) values.push(value);
    }
    if (values.length > 0) {
      const mean = values.reduce((a, b) => a + b, 0) / values.length;
      result[dimension] = Math.round(mean * 10) / 10;
    }
  }
  return result;
}
