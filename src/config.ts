/**
 * Council Configuration
 *
 * ARCHITECTURE PRINCIPLE: This file defines STRUCTURE, not INTELLIGENCE.
 *
 * The code knows there are tiers, pools and an aggregator seat per tier.
 * Which models fill them is decided at deployment, with this precedence:
 *
 *   environment variables > user config file > built-in defaults
 *
 * Nothing here is a process-wide singleton: loadCouncilConfig() returns a
 * plain value that callers pass to the orchestrator.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { CouncilError } from './gateway/errors.js';
import { StaticRegistryProvider, type MetadataProvider } from './metadata.js';
import { UserConfigFileSchema, type UserConfigFile } from './schemas.js';
import { checkAggregatorCapability } from './tier-contract.js';
import {
  DEFAULT_TIER_SETTINGS,
  TIERS,
  mapTiers,
  type TierSettings,
  type TierTimeout
} from './tiers.js';

// ============================================================================
// Council Structure
// ============================================================================

export type StyleNormalizationMode = 'off' | 'always' | 'auto';

export interface BreakerSettings {
  failureThreshold: number;
  successThreshold: number;
  timeoutSeconds: number;
}

export interface CouncilConfig {
  /** OpenRouter API key (only the OpenRouter transport needs it) */
  apiKey?: string;

  /** Per-tier model pools, timeouts and aggregators */
  tiers: TierSettings;

  /** Drop a reviewer's vote for its own answer before Borda scoring */
  excludeSelfVotes: boolean;

  /**
   * Maximum reviewers per candidate. null means every model reviews every
   * answer; a number enables stratified sampling when the pool is larger.
   */
  maxReviewers: number | null;

  /** Stage 1.5 style normalization */
  styleNormalization: StyleNormalizationMode;

  /** Fast/cheap model used to rewrite answers into a neutral style */
  normalizerModel: string;

  /** Maximum concurrent calls per stage; null = all at once */
  concurrencyLimit: number | null;

  /** Wait between retry attempts of one model call */
  retryBackoffMs: number;

  breaker: BreakerSettings;

  /** Path of the user config file that was applied, if any */
  configFile?: string;
}

export const DEFAULT_COUNCIL_CONFIG: CouncilConfig = {
  tiers: DEFAULT_TIER_SETTINGS,
  excludeSelfVotes: true,
  maxReviewers: null,
  styleNormalization: 'off',
  normalizerModel: 'google/gemini-2.0-flash-001',
  concurrencyLimit: null,
  retryBackoffMs: 1000,
  breaker: {
    failureThreshold: 5,
    successThreshold: 1,
    timeoutSeconds: 60
  }
};

export const DEFAULT_CONFIG_FILE = path.join(os.homedir(), '.config', 'tiered-council', 'config.json');

export class ConfigurationError extends CouncilError {
  constructor(message: string) {
    super(message, 'configuration');
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Loading
// ============================================================================

type Env = Record<string, string | undefined>;

function parseModelList(raw: string | undefined): string[] | undefined {
  if (!raw?.trim()) return undefined;
  const models = raw.split(',').map(m => m.trim()).filter(Boolean);
  return models.length > 0 ? models : undefined;
}

const TRUE_VALUES = ['true', '1', 'yes'];
const FALSE_VALUES = ['false', '0', 'no'];

function parseBoolean(raw: string | undefined, name: string): boolean | undefined {
  if (!raw?.trim()) return undefined;
  const value = raw.trim().toLowerCase();
  if (TRUE_VALUES.includes(value)) return true;
  if (FALSE_VALUES.includes(value)) return false;
  throw new ConfigurationError(`${name} must be true or false, got "${raw}"`);
}

function parsePositiveInt(raw: string | undefined, name: string): number | undefined {
  if (!raw?.trim()) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseStyleNormalization(raw: string | boolean | undefined, name: string): StyleNormalizationMode | undefined {
  if (raw === undefined) return undefined;
  if (typeof raw === 'boolean') return raw ? 'always' : 'off';
  const value = raw.trim().toLowerCase();
  if (!value) return undefined;
  if (value === 'auto') return 'auto';
  if (value === 'always' || TRUE_VALUES.includes(value)) return 'always';
  if (value === 'off' || FALSE_VALUES.includes(value)) return 'off';
  throw new ConfigurationError(`${name} must be off, always or auto, got "${raw}"`);
}

/**
 * Parse "total,perCall" seconds, e.g. COUNCIL_TIMEOUT_HIGH="180,90"
 */
function parseTimeout(raw: string | undefined, name: string): TierTimeout | undefined {
  if (!raw?.trim()) return undefined;
  const [total, perCall] = raw.split(',').map(part => Number(part.trim()));
  if (!(total > 0) || !(perCall > 0)) {
    throw new ConfigurationError(`${name} must look like "total,perCall" in seconds, got "${raw}"`);
  }
  return { total, perCall };
}

/**
 * Read and validate the user config file. A missing file is not an error;
 * a file that exists but does not parse is.
 */
export function loadUserConfigFile(filePath: string): UserConfigFile | undefined {
  if (!fs.existsSync(filePath)) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Config file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = UserConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `  ${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(`Config file ${filePath} is invalid:\n${issues.join('\n')}`);
  }
  return parsed.data;
}

/**
 * Load council configuration.
 *
 * Environment variables:
 *   OPENROUTER_API_KEY            - API key for the OpenRouter transport
 *   COUNCIL_CONFIG_FILE           - Alternative user config file path
 *   COUNCIL_MODELS_<TIER>         - Comma-separated model pool per tier
 *   COUNCIL_AGGREGATOR_<TIER>     - Aggregator model per tier
 *   COUNCIL_TIMEOUT_<TIER>        - "total,perCall" seconds per tier
 *   COUNCIL_EXCLUDE_SELF_VOTES    - true/false
 *   COUNCIL_MAX_REVIEWERS         - Reviewers per candidate (stratified sampling)
 *   COUNCIL_STYLE_NORMALIZATION   - off | always | auto
 *   COUNCIL_NORMALIZER_MODEL      - Model used for style normalization
 *   COUNCIL_CONCURRENCY_LIMIT     - Maximum in-flight calls per stage
 *   COUNCIL_BREAKER_FAILURES      - Failures before a circuit opens
 *   COUNCIL_BREAKER_TIMEOUT       - Seconds before an open circuit probes again
 */
export function loadCouncilConfig(
  env: Env = process.env,
  options: { configFile?: string } = {}
): CouncilConfig {
  const configFile = options.configFile ?? (env.COUNCIL_CONFIG_FILE?.trim() || DEFAULT_CONFIG_FILE);
  const file = loadUserConfigFile(configFile) ?? {};
  const defaults = DEFAULT_COUNCIL_CONFIG;

  const modelPools = mapTiers(tier =>
    parseModelList(env[`COUNCIL_MODELS_${tier.toUpperCase()}`]) ??
    file.modelPools?.[tier] ??
    defaults.tiers.modelPools[tier]
  );
  const aggregators = mapTiers(tier =>
    env[`COUNCIL_AGGREGATOR_${tier.toUpperCase()}`]?.trim() ||
    file.aggregators?.[tier] ||
    defaults.tiers.aggregators[tier]
  );
  const timeouts = mapTiers(tier =>
    parseTimeout(env[`COUNCIL_TIMEOUT_${tier.toUpperCase()}`], `COUNCIL_TIMEOUT_${tier.toUpperCase()}`) ??
    file.timeouts?.[tier] ??
    defaults.tiers.timeouts[tier]
  );

  const maxReviewersEnv = parsePositiveInt(env.COUNCIL_MAX_REVIEWERS, 'COUNCIL_MAX_REVIEWERS');
  const concurrencyEnv = parsePositiveInt(env.COUNCIL_CONCURRENCY_LIMIT, 'COUNCIL_CONCURRENCY_LIMIT');
  const breakerFailures = parsePositiveInt(env.COUNCIL_BREAKER_FAILURES, 'COUNCIL_BREAKER_FAILURES');
  const breakerTimeout = parsePositiveInt(env.COUNCIL_BREAKER_TIMEOUT, 'COUNCIL_BREAKER_TIMEOUT');

  return {
    apiKey: env.OPENROUTER_API_KEY?.trim() || undefined,
    tiers: { modelPools, aggregators, timeouts },
    excludeSelfVotes:
      parseBoolean(env.COUNCIL_EXCLUDE_SELF_VOTES, 'COUNCIL_EXCLUDE_SELF_VOTES') ??
      file.excludeSelfVotes ??
      defaults.excludeSelfVotes,
    maxReviewers: maxReviewersEnv ?? (file.maxReviewers !== undefined ? file.maxReviewers : defaults.maxReviewers),
    styleNormalization:
      parseStyleNormalization(env.COUNCIL_STYLE_NORMALIZATION, 'COUNCIL_STYLE_NORMALIZATION') ??
      parseStyleNormalization(file.styleNormalization, 'styleNormalization') ??
      defaults.styleNormalization,
    normalizerModel:
      env.COUNCIL_NORMALIZER_MODEL?.trim() ||
      file.normalizerModel ||
      defaults.normalizerModel,
    concurrencyLimit:
      concurrencyEnv ?? (file.concurrencyLimit !== undefined ? file.concurrencyLimit : defaults.concurrencyLimit),
    retryBackoffMs: file.retryBackoffMs ?? defaults.retryBackoffMs,
    breaker: {
      failureThreshold: breakerFailures ?? file.breaker?.failureThreshold ?? defaults.breaker.failureThreshold,
      successThreshold: file.breaker?.successThreshold ?? defaults.breaker.successThreshold,
      timeoutSeconds: breakerTimeout ?? file.breaker?.timeoutSeconds ?? defaults.breaker.timeoutSeconds
    },
    configFile: fs.existsSync(configFile) ? configFile : undefined
  };
}

/**
 * Validate a loaded configuration.
 * Returns errors rather than throwing - use for pre-flight checks.
 */
export function validateConfig(
  config: CouncilConfig,
  metadata: MetadataProvider = new StaticRegistryProvider()
): { valid: boolean; errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.apiKey) {
    errors.push('OPENROUTER_API_KEY is required');
  }

  for (const tier of TIERS) {
    const pool = config.tiers.modelPools[tier];
    const providers = new Set(pool.map(model => model.split('/')[0]));

    if (pool.length < 2) {
      errors.push(`Tier "${tier}" needs at least 2 models, found ${pool.length}`);
    } else if (providers.size < 2) {
      warnings.push(`Tier "${tier}" uses a single provider (${[...providers].join('')}); add another for diversity`);
    }

    const timeout = config.tiers.timeouts[tier];
    if (timeout.perCall > timeout.total) {
      warnings.push(`Tier "${tier}" per-call timeout (${timeout.perCall}s) exceeds its total deadline (${timeout.total}s)`);
    }
  }

  const capability = checkAggregatorCapability(config.tiers, metadata);
  errors.push(...capability.problems);
  if (capability.unknownModels.length > 0) {
    warnings.push(`No metadata for: ${capability.unknownModels.join(', ')}; aggregator capability not checked for them`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}

// ============================================================================
// Prompt Templates (Structure, not model-specific)
// ============================================================================

export const councilPrompts = {
  normalize: `Rewrite the following answer in plain, neutral prose.

Keep every claim, caveat and number. Remove headings, bullet formatting, emphasis,
greetings and self-references. Do not add, judge or shorten the content.

ANSWER:
{answer}`,

  // Stage 2: Anonymized peer review
  review: `You are reviewing anonymized answers to the same question.
Judge each answer on its merits. Do NOT try to guess which model wrote it.

QUESTION:
{query}

ANSWERS:
{answers}

Score every answer from 0 to 10 on accuracy, relevance, completeness, conciseness and clarity,
then rank the answers from best to worst.

Respond with JSON only:
{
  "evaluations": { "<label>": { "accuracy": n, "relevance": n, "completeness": n, "conciseness": n, "clarity": n } },
  "ranking": ["<best label>", "...", "<worst label>"]
}`,

  // Quick tier: one lightweight check instead of full peer review
  verifier: `You are checking answers to a question for errors before they are synthesized.

QUESTION:
{query}

ANSWERS:
{answers}

List any factual errors, contradictions between answers, or missing caveats.
Then give JSON with your rubric scores for the answers taken together:
{ "evaluations": { "overall": { "accuracy": n, "relevance": n, "completeness": n, "conciseness": n, "clarity": n } }, "ranking": [] }`,

  // Stage 3: Aggregator synthesis
  synthesis: `You are the aggregator of a council of models that answered the same question.

QUESTION:
{query}

ANSWERS:
{answers}

PEER REVIEW:
{review}

Write the single best answer to the question. Use the strongest points of the
highest-ranked answers, correct errors the reviewers found, and state plainly
where the council disagreed.`,

  verification: `You are the aggregator of a council verifying the following request.

REQUEST:
{query}

ANSWERS:
{answers}

PEER REVIEW:
{review}

Decide whether the request should be approved. State your verdict with the word
APPROVED or REJECTED. List each blocking issue on its own line starting with
CRITICAL:, MAJOR: or MINOR:, naming the location (for example "in src/app.ts:12") when known.
Then explain your reasoning.`
};

export type PromptName = keyof typeof councilPrompts;

/**
 * Fill {placeholders} in a prompt template
 */
export function renderPrompt(name: PromptName, values: Record<string, string>): string {
  return councilPrompts[name].replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}
