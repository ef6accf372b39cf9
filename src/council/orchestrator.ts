/**
 * Council Orchestrator
 *
 * Runs the tiered deliberation pipeline under one TierContract:
 * 1. Independent answers from every model in the tier's pool
 * 1.5 Optional style normalization of those answers
 * 2. Anonymized peer review and Borda ranking (or, on the quick tier,
 *    one lightweight verifier call)
 * 3. Aggregator synthesis
 *
 * A failed model call never fails the run: it is recorded and the pool
 * shrinks. Only an empty pool, an exceeded deadline or a synthesis that
 * nobody could produce is fatal.
 */

import { randomUUID } from 'crypto';

import { renderPrompt, type CouncilConfig, type PromptName } from '../config.js';
import {
  CallFailedError,
  CallTimeoutError,
  CircuitOpenError,
  CouncilError,
  TransportError
} from '../gateway/errors.js';
import type { GatewayRouter } from '../gateway/router.js';
import { createGatewayRequest, type CanonicalMessage, type GatewayResponse } from '../gateway/types.js';
import { createTierContract, type TierContract } from '../tier-contract.js';
import { TIERS, type Tier } from '../tiers.js';
import type {
  CouncilVerification,
  DeliberationMode,
  DeliberationResult,
  FailureStatus,
  PeerReview,
  Stage1Answer,
  Stage1Result,
  Stage2Result,
  Stage3Result,
  StageError,
  StageNumber,
  TierHealth
} from '../types.js';
import { UsageTracker, type TokenUsage, type UsageStage } from '../usage.js';
import { Deadline } from './deadline.js';
import {
  ParseError,
  aggregateRankings,
  aggregateRubricScores,
  assignReviewers,
  createLabel,
  parseReview,
  type AggregateRanking
} from './ranking.js';
import { detectStyleVariance, shouldNormalize, type StyleVariance } from './style.js';
import { DEFAULT_CONFIDENCE_THRESHOLD, buildVerificationResult } from './verdict.js';

/**
 * Execute tasks with at most `limit` in flight (all at once when null).
 * Results keep task order.
 */
async function withConcurrencyLimit<T>(
  tasks: (() => Promise<T>)[],
  limit: number | null
): Promise<T[]> {
  const results = new Array<T>(tasks.length);
  let currentIndex = 0;

  async function runNext(): Promise<void> {
    while (currentIndex < tasks.length) {
      const index = currentIndex++;
      results[index] = await tasks[index]();
    }
  }

  const workerCount = Math.min(limit ?? tasks.length, tasks.length);
  await Promise.all(Array.from({ length: workerCount }, () => runNext()));
  return results;
}

/** Progress callback for streaming UI updates */
export type ProgressCallback = (event: ProgressEvent) => void;

export interface ProgressEvent {
  stage: StageNumber;
  type: 'start' | 'model-start' | 'model-complete' | 'model-error' | 'complete';
  label?: string;
  modelId?: string;
  message?: string;
  usage?: TokenUsage;
}

// ============================================================================
// Pipeline Errors
// ============================================================================

export class PipelineDeadlineExceeded extends CouncilError {
  tier: Tier;
  deadlineMs: number;
  elapsedMs: number;
  /** Stage that was running when time ran out */
  stage: StageNumber;
  failures: StageError[];

  constructor(tier: Tier, deadlineMs: number, elapsedMs: number, stage: StageNumber, failures: StageError[]) {
    super(
      `Tier "${tier}" deadline of ${deadlineMs}ms exceeded during stage ${stage} (${elapsedMs}ms elapsed)`,
      'deadline_exceeded'
    );
    this.name = 'PipelineDeadlineExceeded';
    this.tier = tier;
    this.deadlineMs = deadlineMs;
    this.elapsedMs = elapsedMs;
    this.stage = stage;
    this.failures = failures;
  }
}

export class InsufficientModelsError extends CouncilError {
  tier: Tier;
  attempted: string[];
  failures: StageError[];

  constructor(tier: Tier, attempted: string[], failures: StageError[]) {
    super(
      `No model in tier "${tier}" produced a usable answer (${attempted.length} attempted)`,
      'insufficient_models'
    );
    this.name = 'InsufficientModelsError';
    this.tier = tier;
    this.attempted = attempted;
    this.failures = failures;
  }
}

export class SynthesisFailedError extends CouncilError {
  failures: StageError[];

  constructor(failures: StageError[]) {
    super(
      `Synthesis failed: ${failures.map(f => `${f.modelId} (${f.status})`).join(', ')}`,
      'synthesis_failed'
    );
    this.name = 'SynthesisFailedError';
    this.failures = failures;
  }
}

// ============================================================================
// Orchestrator
// ============================================================================

type CallOutcome =
  | { ok: true; response: GatewayResponse; attempts: number }
  | { ok: false; failure: StageError };

interface RunContext {
  sessionId: string;
  contract: TierContract;
  deadline: Deadline;
  usage: UsageTracker;
  failures: StageError[];
}

interface NormalizationOutcome {
  answers: Stage1Answer[];
  normalized: boolean;
  variance?: StyleVariance;
}

export interface CouncilOrchestratorOptions {
  onProgress?: ProgressCallback;
  now?: () => number;
}

function failureStatus(error: unknown): FailureStatus {
  if (error instanceof CircuitOpenError) return 'circuit_open';
  if (error instanceof CallTimeoutError) return error.cancelledByDeadline ? 'cancelled' : 'timeout';
  if (error instanceof CallFailedError) return error.status === 'rate_limited' ? 'rate_limited' : 'error';
  if (error instanceof TransportError) return error.kind === 'rate_limit' ? 'rate_limited' : 'error';
  return 'error';
}

/** Errors after which another attempt cannot help */
function isFinal(error: unknown): boolean {
  return error instanceof CircuitOpenError
    || (error instanceof CallTimeoutError && error.cancelledByDeadline)
    || (error instanceof TransportError && error.kind === 'invalid_model');
}

function formatAnswers(answers: readonly Stage1Answer[]): string {
  return answers.map(a => `--- ${a.label} ---\n${a.content}`).join('\n\n');
}

export class CouncilOrchestrator {
  private router: GatewayRouter;
  private config: CouncilConfig;
  private onProgress?: ProgressCallback;
  private now: () => number;

  constructor(
    router: GatewayRouter,
    config: CouncilConfig,  // Required - load it with loadCouncilConfig()
    options: CouncilOrchestratorOptions = {}
  ) {
    this.router = router;
    this.config = config;
    this.onProgress = options.onProgress;
    this.now = options.now ?? Date.now;
  }

  /**
   * Set progress callback
   */
  setProgressCallback(callback: ProgressCallback | undefined): void {
    this.onProgress = callback;
  }

  private emitProgress(event: ProgressEvent): void {
    if (this.onProgress) {
      this.onProgress(event);
    }
  }

  /**
   * Run the full pipeline for one query at one tier.
   *
   * @throws InvalidTierError for an unknown tier name
   * @throws InsufficientModelsError when no model answers
   * @throws PipelineDeadlineExceeded when the tier deadline passes before synthesis completes
   * @throws SynthesisFailedError when neither the aggregator nor its stand-in could synthesize
   */
  async runDeliberation(
    query: string,
    tier: string,
    options: { mode?: DeliberationMode } = {}
  ): Promise<DeliberationResult> {
    const contract = createTierContract(tier, this.config.tiers);
    if (!query.trim()) {
      throw new CouncilError('Query must not be empty', 'invalid_query');
    }

    const mode = options.mode ?? 'synthesis';
    const sessionId = randomUUID();
    const run: RunContext = {
      sessionId,
      contract,
      deadline: new Deadline(contract.deadlineMs, this.now),
      usage: new UsageTracker(sessionId, this.now),
      failures: []
    };

    this.emitProgress({
      stage: 0,
      type: 'start',
      message: `Tier ${contract.tier}: ${contract.allowedModels.length} models, ${contract.deadlineMs / 1000}s deadline`
    });

    try {
      const stage1 = await this.runStage1(query, run);
      this.assertWithinDeadline(run, 1);
      if (stage1.answers.length === 0) {
        throw new InsufficientModelsError(contract.tier, [...contract.allowedModels], [...run.failures]);
      }

      const normalization = await this.runNormalization(stage1.answers, run);
      this.assertWithinDeadline(run, 1.5);
      const answers = normalization.answers;
      stage1.answers = answers;

      const labelToModel: Record<string, string> = {};
      for (const answer of answers) {
        labelToModel[answer.label] = answer.model;
      }

      const { stage2, assignments } = contract.requiresPeerReview
        ? await this.runStage2(query, answers, labelToModel, run)
        : { stage2: await this.runVerifier(query, answers, labelToModel, run), assignments: {} };
      this.assertWithinDeadline(run, 2);

      const stage3 = await this.runStage3(query, answers, stage2, mode, run);

      const usage = run.usage.getSummary();
      return {
        stage1,
        stage2,
        stage3,
        metadata: {
          sessionId,
          tier: contract.tier,
          mode,
          query,
          labelToModel,
          aggregateRanking: stage2.aggregateRanking,
          failedModels: [...run.failures],
          reviewerAssignments: assignments,
          normalized: normalization.normalized,
          styleVariance: normalization.variance,
          verifierOutput: stage2.verifierOutput,
          aggregatorModel: contract.aggregatorModel,
          usage,
          durationMs: run.deadline.elapsed(),
          timestamp: new Date(run.deadline.startedAt).toISOString()
        }
      };
    } finally {
      run.deadline.dispose();
    }
  }

  /**
   * Deliberate in verification mode and reduce the synthesis to a verdict
   */
  async verify(
    query: string,
    tier: string,
    confidenceThreshold = DEFAULT_CONFIDENCE_THRESHOLD
  ): Promise<CouncilVerification> {
    const deliberation = await this.runDeliberation(query, tier, { mode: 'verification' });
    const scored = deliberation.stage2.reviews.filter(review => !review.parseError);
    const result = buildVerificationResult(deliberation.stage3.content, scored, confidenceThreshold);

    return {
      ...result,
      tier: deliberation.metadata.tier,
      threshold: confidenceThreshold,
      deliberation
    };
  }

  /**
   * Send a tiny prompt to every model of the given tiers (all tiers by default)
   */
  async healthCheck(tiers: readonly string[] = TIERS): Promise<TierHealth[]> {
    const report: TierHealth[] = [];

    for (const tier of tiers) {
      const contract = createTierContract(tier, this.config.tiers);
      const models = await withConcurrencyLimit(
        contract.allowedModels.map(model => async () => {
          const request = createGatewayRequest(
            model,
            [{ role: 'user', content: 'Reply with the single word OK.' }],
            { maxTokens: 16, timeoutMs: contract.perCallTimeoutMs }
          );
          try {
            const response = await this.router.complete(request);
            return { model, ok: true, latencyMs: response.latencyMs };
          } catch (error) {
            return { model, ok: false, error: error instanceof Error ? error.message : String(error) };
          }
        }),
        this.config.concurrencyLimit
      );
      report.push({ tier: contract.tier, models });
    }

    return report;
  }

  // ==========================================================================
  // Model calls
  // ==========================================================================

  /**
   * One model call with retries, bounded by the per-call timeout and the
   * remaining deadline. Never throws for a model failure.
   */
  private async callModel(
    stage: StageNumber,
    model: string,
    messages: CanonicalMessage[],
    run: RunContext,
    usageStage: UsageStage,
    maxAttempts = run.contract.maxAttempts
  ): Promise<CallOutcome> {
    const { contract, deadline } = run;
    let attempts = 0;
    let lastError: unknown;

    while (attempts < maxAttempts && !deadline.expired) {
      attempts++;
      try {
        const request = createGatewayRequest(model, messages, {
          maxTokens: contract.tokenBudget,
          timeoutMs: deadline.callTimeout(contract.perCallTimeoutMs)
        });
        const response = await this.router.complete(request, deadline.signal);
        run.usage.recordUsage(model, usageStage, response.usage);

        if (!response.content.trim()) {
          throw new CallFailedError(model, 'error', 'Empty response');
        }
        return { ok: true, response, attempts };
      } catch (error) {
        lastError = error;
        if (isFinal(error) || attempts >= maxAttempts) break;

        const retryAfterMs = error instanceof CallFailedError && error.retryAfter !== undefined
          ? error.retryAfter * 1000
          : 0;
        await deadline.sleep(Math.max(this.config.retryBackoffMs, retryAfterMs));
      }
    }

    const error = lastError ?? new CallTimeoutError(model, deadline.elapsed(), true);
    return {
      ok: false,
      failure: {
        stage,
        modelId: model,
        status: failureStatus(error),
        message: error instanceof Error ? error.message : String(error),
        attempts,
        recoverable: true
      }
    };
  }

  private reportOutcome(stage: StageNumber, model: string, outcome: CallOutcome, label?: string): void {
    if (outcome.ok) {
      this.emitProgress({
        stage,
        type: 'model-complete',
        label,
        modelId: model,
        usage: outcome.response.usage
      });
    } else {
      this.emitProgress({
        stage,
        type: 'model-error',
        label,
        modelId: model,
        message: outcome.failure.message
      });
    }
  }

  private assertWithinDeadline(run: RunContext, stage: StageNumber): void {
    if (run.deadline.expired) {
      throw new PipelineDeadlineExceeded(
        run.contract.tier,
        run.contract.deadlineMs,
        run.deadline.elapsed(),
        stage,
        [...run.failures]
      );
    }
  }

  // ==========================================================================
  // Stage 1: Independent answers
  // ==========================================================================

  private async runStage1(query: string, run: RunContext): Promise<Stage1Result> {
    const models = run.contract.allowedModels;
    this.emitProgress({ stage: 1, type: 'start', message: `Collecting answers from ${models.length} models...` });

    const outcomes = await withConcurrencyLimit(
      models.map(model => async () => {
        this.emitProgress({ stage: 1, type: 'model-start', modelId: model });
        const outcome = await this.callModel(1, model, [{ role: 'user', content: query }], run, 'answers');
        this.reportOutcome(1, model, outcome);
        return { model, outcome };
      }),
      this.config.concurrencyLimit
    );

    // Labels follow pool order over the survivors, never arrival order
    const answers: Stage1Answer[] = [];
    const errors: StageError[] = [];
    for (const { model, outcome } of outcomes) {
      if (outcome.ok) {
        answers.push({
          label: createLabel(answers.length),
          model,
          content: outcome.response.content,
          latencyMs: outcome.response.latencyMs,
          usage: outcome.response.usage,
          attempts: outcome.attempts
        });
      } else {
        errors.push(outcome.failure);
      }
    }
    run.failures.push(...errors);

    this.emitProgress({
      stage: 1,
      type: 'complete',
      message: `${answers.length} of ${models.length} models answered`
    });

    return {
      answers,
      complete: answers.length === models.length,
      errors
    };
  }

  // ==========================================================================
  // Stage 1.5: Style normalization
  // ==========================================================================

  private async runNormalization(answers: Stage1Answer[], run: RunContext): Promise<NormalizationOutcome> {
    const mode = this.config.styleNormalization;
    if (mode === 'off') {
      return { answers, normalized: false };
    }

    const contents = answers.map(a => a.content);
    const variance = detectStyleVariance(contents);
    if (!shouldNormalize(mode, contents)) {
      return { answers, normalized: false, variance };
    }

    const normalizer = this.config.normalizerModel;
    this.emitProgress({ stage: 1.5, type: 'start', message: `Normalizing answer style with ${normalizer}...` });

    const rewritten = await withConcurrencyLimit(
      answers.map(answer => async (): Promise<Stage1Answer> => {
        const outcome = await this.callModel(
          1.5,
          normalizer,
          [{ role: 'user', content: renderPrompt('normalize', { answer: answer.content }) }],
          run,
          'normalization'
        );
        this.reportOutcome(1.5, normalizer, outcome, answer.label);

        if (!outcome.ok) {
          // Keep the original wording
          run.failures.push(outcome.failure);
          return answer;
        }
        return { ...answer, content: outcome.response.content, originalContent: answer.content };
      }),
      this.config.concurrencyLimit
    );

    this.emitProgress({ stage: 1.5, type: 'complete', message: 'Normalization complete' });
    return { answers: rewritten, normalized: true, variance };
  }

  // ==========================================================================
  // Stage 2: Anonymized peer review
  // ==========================================================================

  private async runStage2(
    query: string,
    answers: Stage1Answer[],
    labelToModel: Record<string, string>,
    run: RunContext
  ): Promise<{ stage2: Stage2Result; assignments: Record<string, string[]> }> {
    const labels = answers.map(a => a.label);
    const reviewers = answers.map(a => a.model);
    const assignments = assignReviewers(reviewers, labels, labelToModel, this.config.maxReviewers);

    this.emitProgress({ stage: 2, type: 'start', message: `Peer review by ${reviewers.length} models...` });

    const tasks = answers
      .filter(reviewer => assignments[reviewer.model].length > 0)
      .map(reviewer => async () => {
        const assigned = assignments[reviewer.model];
        const shown = answers.filter(a => assigned.includes(a.label));
        const prompt = renderPrompt('review', { query, answers: formatAnswers(shown) });

        this.emitProgress({ stage: 2, type: 'model-start', label: reviewer.label, modelId: reviewer.model });
        const outcome = await this.callModel(2, reviewer.model, [{ role: 'user', content: prompt }], run, 'review');
        this.reportOutcome(2, reviewer.model, outcome, reviewer.label);

        if (!outcome.ok) {
          return outcome;
        }
        return {
          ok: true as const,
          review: this.toPeerReview(outcome.response.content, reviewer.model, assigned, reviewer.label)
        };
      });

    const outcomes = await withConcurrencyLimit(tasks, this.config.concurrencyLimit);

    const reviews: PeerReview[] = [];
    const errors: StageError[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        reviews.push(outcome.review);
      } else {
        errors.push(outcome.failure);
      }
    }
    run.failures.push(...errors);

    const aggregateRanking = aggregateRankings(
      reviews.map(r => ({ reviewerModel: r.reviewerModel, ranking: r.ranking })),
      { labels, labelToModel, excludeSelfVotes: this.config.excludeSelfVotes }
    );

    this.emitProgress({ stage: 2, type: 'complete', message: `${reviews.length} reviews complete` });

    return {
      stage2: {
        mode: 'peer_review',
        reviews,
        aggregateRanking,
        rubricScores: aggregateRubricScores(reviews.flatMap(r => r.entries)),
        errors
      },
      assignments
    };
  }

  private toPeerReview(raw: string, reviewerModel: string, labels: string[], reviewerLabel?: string): PeerReview {
    try {
      const parsed = parseReview(raw, labels);
      return { reviewerModel, reviewerLabel, assignedLabels: labels, ranking: parsed.ranking, entries: parsed.entries, raw };
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      return {
        reviewerModel,
        reviewerLabel,
        assignedLabels: labels,
        ranking: [],
        entries: [],
        raw,
        parseError: error.message
      };
    }
  }

  /**
   * Quick tier: one verifier call stands in for peer review
   */
  private async runVerifier(
    query: string,
    answers: Stage1Answer[],
    labelToModel: Record<string, string>,
    run: RunContext
  ): Promise<Stage2Result> {
    const verifier = run.contract.aggregatorModel;
    const labels = answers.map(a => a.label);
    const prompt = renderPrompt('verifier', { query, answers: formatAnswers(answers) });

    this.emitProgress({ stage: 2, type: 'start', message: `Verifier ${verifier} checking answers...` });
    const outcome = await this.callModel(2, verifier, [{ role: 'user', content: prompt }], run, 'review');
    this.reportOutcome(2, verifier, outcome);

    const reviews: PeerReview[] = [];
    const errors: StageError[] = [];
    let verifierOutput: string | undefined;

    if (outcome.ok) {
      verifierOutput = outcome.response.content;
      reviews.push(this.toPeerReview(verifierOutput, verifier, labels));
    } else {
      errors.push(outcome.failure);
      run.failures.push(outcome.failure);
    }

    this.emitProgress({ stage: 2, type: 'complete', message: outcome.ok ? 'Verification complete' : 'Verifier unavailable' });

    return {
      mode: 'verifier',
      reviews,
      aggregateRanking: aggregateRankings(
        reviews.map(r => ({ reviewerModel: r.reviewerModel, ranking: r.ranking })),
        { labels, labelToModel, excludeSelfVotes: this.config.excludeSelfVotes }
      ),
      rubricScores: aggregateRubricScores(reviews.flatMap(r => r.entries)),
      verifierOutput,
      errors
    };
  }

  // ==========================================================================
  // Stage 3: Synthesis
  // ==========================================================================

  private formatReview(stage2: Stage2Result): string {
    if (stage2.mode === 'verifier') {
      return stage2.verifierOutput ?? '(The verifier was unavailable.)';
    }
    if (stage2.reviews.length === 0) {
      return '(No peer reviews were returned.)';
    }

    const lines = stage2.aggregateRanking.map(
      (entry: AggregateRanking) => `${entry.rank}. ${entry.label}: ${entry.score} points from ${entry.ballots} ballots`
    );
    const rubric = Object.entries(stage2.rubricScores).map(([dimension, score]) => `${dimension} ${score}`);
    if (rubric.length > 0) {
      lines.push('', `Average rubric scores: ${rubric.join(', ')}`);
    }
    return lines.join('\n');
  }

  private async runStage3(
    query: string,
    answers: Stage1Answer[],
    stage2: Stage2Result,
    mode: DeliberationMode,
    run: RunContext
  ): Promise<Stage3Result> {
    const promptName: PromptName = mode === 'verification' ? 'verification' : 'synthesis';
    const messages: CanonicalMessage[] = [{
      role: 'user',
      content: renderPrompt(promptName, {
        query,
        answers: formatAnswers(answers),
        review: this.formatReview(stage2)
      })
    }];
    const errors: StageError[] = [];

    const aggregator = run.contract.aggregatorModel;
    this.emitProgress({ stage: 3, type: 'start', message: `Aggregator ${aggregator} synthesizing...` });
    const primary = await this.callModel(3, aggregator, messages, run, 'synthesis');
    this.reportOutcome(3, aggregator, primary);

    if (primary.ok) {
      this.emitProgress({ stage: 3, type: 'complete', message: 'Synthesis complete' });
      return { model: aggregator, content: primary.response.content, usedFallback: false, errors };
    }

    errors.push(primary.failure);
    run.failures.push(primary.failure);
    this.assertWithinDeadline(run, 3);

    // The best-ranked council member stands in, once
    const standIn = stage2.aggregateRanking
      .map(entry => entry.model)
      .concat(answers.map(a => a.model))
      .find((model): model is string => model !== undefined && model !== aggregator);

    if (standIn) {
      this.emitProgress({ stage: 3, type: 'model-start', modelId: standIn, message: `Falling back to ${standIn}` });
      const fallback = await this.callModel(3, standIn, messages, run, 'synthesis', 1);
      this.reportOutcome(3, standIn, fallback);

      if (fallback.ok) {
        this.emitProgress({ stage: 3, type: 'complete', message: 'Synthesis complete (fallback)' });
        return { model: standIn, content: fallback.response.content, usedFallback: true, errors };
      }
      errors.push(fallback.failure);
      run.failures.push(fallback.failure);
      this.assertWithinDeadline(run, 3);
    }

    throw new SynthesisFailedError(errors.map(e => ({ ...e, recoverable: false })));
  }
}
