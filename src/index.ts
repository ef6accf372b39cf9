/**
 * tiered-council
 *
 * Queries a panel of LLMs with the same prompt, has them review each
 * other's anonymized answers, and synthesizes one confidence-scored result.
 *
 * @example
 * ```typescript
 * import {
 *   CouncilOrchestrator,
 *   GatewayRouter,
 *   createOpenRouterTransport,
 *   loadCouncilConfig
 * } from 'tiered-council';
 *
 * const config = loadCouncilConfig();
 * const router = new GatewayRouter(createOpenRouterTransport(config.apiKey ?? ''), { breaker: config.breaker });
 * const council = new CouncilOrchestrator(router, config);
 *
 * const verdict = await council.verify('Should we ship the retry change in PR 42?', 'high');
 * console.log(verdict.verdict, verdict.confidence);
 * ```
 *
 * @packageDocumentation
 */

// Core orchestrator
export {
  CouncilOrchestrator,
  PipelineDeadlineExceeded,
  InsufficientModelsError,
  SynthesisFailedError,
  type CouncilOrchestratorOptions,
  type ProgressEvent,
  type ProgressCallback
} from './council/orchestrator.js';
export {
  verifyWithEscalation,
  type EscalationOptions,
  type EscalationResult,
  type EscalationStep
} from './council/escalation.js';

// Ranking and verdicts
export {
  ParseError,
  aggregateRankings,
  aggregateRubricScores,
  assignReviewers,
  createLabel,
  extractJsonFromText,
  parseReview,
  type AggregateRanking,
  type Ballot,
  type RankingEntry,
  type RubricScores
} from './council/ranking.js';
export {
  applyConfidenceThreshold,
  buildVerificationResult,
  calculateConfidenceFromAgreement,
  extractBlockingIssues,
  extractVerdictFromSynthesis,
  type BlockingIssue,
  type Verdict,
  type VerificationResult
} from './council/verdict.js';
export { detectStyleVariance, shouldNormalize, type StyleVariance } from './council/style.js';

// Gateway
export { CircuitBreaker, type CircuitState, type CircuitBreakerStats } from './gateway/circuit-breaker.js';
export {
  CouncilError,
  CircuitOpenError,
  CallTimeoutError,
  CallFailedError,
  TransportError
} from './gateway/errors.js';
export { GatewayRouter } from './gateway/router.js';
export { OpenRouterTransport, createOpenRouterTransport } from './gateway/openrouter.js';
export {
  createGatewayRequest,
  type CanonicalMessage,
  type GatewayRequest,
  type GatewayResponse,
  type Transport
} from './gateway/types.js';

// Tiers and configuration
export {
  TIERS,
  getTierModels,
  getTierTimeout,
  nextTier,
  previousTier,
  type Tier
} from './tiers.js';
export {
  createTierContract,
  checkAggregatorCapability,
  DEFAULT_TIER_CONTRACTS,
  InvalidTierError,
  type TierContract
} from './tier-contract.js';
export {
  loadCouncilConfig,
  validateConfig,
  ConfigurationError,
  DEFAULT_COUNCIL_CONFIG,
  type CouncilConfig
} from './config.js';
export { StaticRegistryProvider, type MetadataProvider, type ModelInfo } from './metadata.js';

// Output
export { formatDeliberationMarkdown, formatVerificationMarkdown } from './format.js';
export { UsageTracker, formatUsageSummary, type UsageSummary } from './usage.js';

export type {
  CouncilVerification,
  DeliberationMetadata,
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
} from './types.js';
