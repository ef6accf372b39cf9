#!/usr/bin/env node
/**
 * tiered-council - CLI Interface
 *
 * Usage:
 *   tiered-council deliberate --tier high "Your question here"
 *   tiered-council verify --tier balanced --file change.md
 *   tiered-council verify --escalate "Is this migration safe?"
 *   tiered-council health --tier quick
 *
 * Environment:
 *   OPENROUTER_API_KEY - Required (can be in .env file)
 *   COUNCIL_*          - Optional overrides, see config.ts
 */

import 'dotenv/config';
import chalk from 'chalk';
import { Command } from 'commander';
import * as fs from 'fs';

import { loadCouncilConfig, validateConfig, ConfigurationError, type CouncilConfig } from './config.js';
import { verifyWithEscalation } from './council/escalation.js';
import {
  CouncilOrchestrator,
  InsufficientModelsError,
  PipelineDeadlineExceeded,
  SynthesisFailedError,
  type ProgressEvent
} from './council/orchestrator.js';
import { formatDeliberationMarkdown, formatVerificationMarkdown } from './format.js';
import { CouncilError } from './gateway/errors.js';
import { createOpenRouterTransport } from './gateway/openrouter.js';
import { GatewayRouter } from './gateway/router.js';
import { createTierContract, type TierContract } from './tier-contract.js';
import { TIERS } from './tiers.js';
import type { CouncilVerification, DeliberationResult, StageError } from './types.js';
import { formatUsageSummary } from './usage.js';

interface RunOptions {
  tier: string;
  file?: string;
  progress: boolean;
  markdown?: boolean;
  json?: boolean;
}

interface VerifyOptions extends RunOptions {
  threshold: string;
  escalate?: boolean;
}

function fail(message: string): never {
  console.error(chalk.red(message));
  process.exit(1);
}

/**
 * Load and validate configuration, exiting with a readable message on errors
 */
function loadConfiguration(options: { requireKey?: boolean } = {}): CouncilConfig {
  let config: CouncilConfig;
  try {
    config = loadCouncilConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      fail(`\nConfiguration Error:\n${error.message}`);
    }
    throw error;
  }

  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    console.warn(chalk.yellow(`⚠ ${warning}`));
  }

  const errors = options.requireKey === false
    ? validation.errors.filter(e => !e.startsWith('OPENROUTER_API_KEY'))
    : validation.errors;
  if (errors.length > 0) {
    console.error(chalk.red('\nConfiguration Error:'));
    for (const error of errors) {
      console.error(chalk.red(`  • ${error}`));
    }
    console.error();
    console.error(chalk.dim('Create a .env file with at least:'));
    console.error(chalk.dim('  OPENROUTER_API_KEY=your_key_here'));
    process.exit(1);
  }

  return config;
}

function createOrchestrator(config: CouncilConfig, showProgress: boolean): CouncilOrchestrator {
  const transport = createOpenRouterTransport(config.apiKey ?? '');
  const router = new GatewayRouter(transport, { breaker: config.breaker });
  return new CouncilOrchestrator(router, config, {
    onProgress: showProgress ? createProgressHandler() : undefined
  });
}

function readQuery(queryParts: string[], options: RunOptions): string {
  if (options.file) {
    if (!fs.existsSync(options.file)) {
      fail(`Error: File not found: ${options.file}`);
    }
    return fs.readFileSync(options.file, 'utf-8').trim();
  }
  return queryParts.join(' ').trim();
}

function logSection(title: string): void {
  console.log();
  console.log(chalk.cyan('═'.repeat(60)));
  console.log(chalk.bold(`  ${title}`));
  console.log(chalk.cyan('═'.repeat(60)));
}

/**
 * Display progress during deliberation
 */
function createProgressHandler(): (event: ProgressEvent) => void {
  const stageNames: Record<string, string> = {
    '0': 'Init',
    '1': 'Answers',
    '1.5': 'Style',
    '2': 'Review',
    '3': 'Synthesis'
  };

  return (event: ProgressEvent) => {
    const stageName = stageNames[String(event.stage)] ?? 'Unknown';
    const who = event.label ? `${event.label} (${event.modelId})` : event.modelId;

    switch (event.type) {
      case 'start':
        if (event.stage === 0) {
          console.log(chalk.dim(`  ${event.message}`));
        } else {
          console.log(chalk.blue(`\n▶ Stage ${event.stage} (${stageName}): ${event.message}`));
        }
        break;
      case 'model-start':
        console.log(chalk.dim(`  ◦ ${event.message ?? who}`));
        break;
      case 'model-complete':
        console.log(chalk.green(`  ✓ ${who}${event.usage ? chalk.dim(` ${event.usage.totalTokens} tokens`) : ''}`));
        break;
      case 'model-error':
        console.log(chalk.red(`  ✗ ${who}: ${event.message}`));
        break;
      case 'complete':
        console.log(chalk.green(`✓ Stage ${event.stage} complete: ${event.message}`));
        break;
    }
  };
}

function printFailures(failures: readonly StageError[]): void {
  for (const f of failures) {
    console.log(chalk.dim(`  - ${f.modelId} (stage ${f.stage}, ${f.status}): ${f.message}`));
  }
}

function printDeliberation(result: DeliberationResult): void {
  const { stage1, stage2, stage3, metadata } = result;

  logSection('COUNCIL DELIBERATION COMPLETE');
  console.log();
  console.log(chalk.dim(`Session ID: ${metadata.sessionId}`));
  console.log(chalk.dim(`Tier: ${metadata.tier} | Duration: ${(metadata.durationMs / 1000).toFixed(1)}s`));
  console.log(chalk.dim(`Answers: ${stage1.answers.length} | Aggregator: ${stage3.model}${stage3.usedFallback ? ' (stand-in)' : ''}`));
  if (metadata.normalized) {
    console.log(chalk.dim('Answers were style-normalized before review'));
  }

  if (stage2.aggregateRanking.length > 0 && stage2.mode === 'peer_review') {
    logSection('RANKING');
    for (const entry of stage2.aggregateRanking) {
      console.log(`  ${entry.rank}. ${entry.label} ${chalk.dim(`(${entry.model ?? '?'})`)} ${entry.score} points`);
    }
  }

  logSection('SYNTHESIS');
  console.log();
  console.log(stage3.content);

  if (metadata.failedModels.length > 0) {
    logSection('FAILED CALLS');
    printFailures(metadata.failedModels);
  }

  logSection('TOKEN USAGE');
  console.log(formatUsageSummary(metadata.usage));
}

function printVerification(result: CouncilVerification): void {
  const color = result.verdict === 'pass' ? chalk.green : result.verdict === 'fail' ? chalk.red : chalk.yellow;

  logSection('VERDICT');
  console.log();
  console.log(color.bold(`  ${result.verdict.toUpperCase()}`) + chalk.dim(`  confidence ${result.confidence.toFixed(2)} (threshold ${result.threshold})`));

  if (result.blockingIssues.length > 0) {
    logSection('BLOCKING ISSUES');
    for (const issue of result.blockingIssues) {
      const issueColor = issue.severity === 'critical' ? chalk.red : issue.severity === 'major' ? chalk.yellow : chalk.dim;
      console.log(issueColor(`[${issue.severity.toUpperCase()}] ${issue.description}`));
    }
  }

  const rubric = Object.entries(result.rubricScores);
  if (rubric.length > 0) {
    logSection('RUBRIC SCORES');
    for (const [dimension, score] of rubric) {
      console.log(`  ${dimension.padEnd(14)} ${score}`);
    }
  }

  logSection('RATIONALE');
  console.log();
  console.log(result.rationale);
}

function handleRunError(error: unknown): never {
  if (error instanceof PipelineDeadlineExceeded) {
    console.error(chalk.red(`\nDeadline Error: ${error.message}`));
    printFailures(error.failures);
  } else if (error instanceof InsufficientModelsError) {
    console.error(chalk.red(`\nNo usable answers: ${error.message}`));
    printFailures(error.failures);
  } else if (error instanceof SynthesisFailedError) {
    console.error(chalk.red(`\nSynthesis Error: ${error.message}`));
  } else if (error instanceof CouncilError) {
    console.error(chalk.red(`\nError (${error.code}): ${error.message}`));
  } else {
    console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : String(error)}`));
  }
  process.exit(1);
}

const program = new Command();

program
  .name('tiered-council')
  .description('Query a council of LLMs, have them review each other, and synthesize one answer')
  .version('0.1.0');

program
  .command('deliberate')
  .description('Run the full deliberation pipeline and print the synthesis')
  .argument('[query...]', 'Question to deliberate on')
  .option('-t, --tier <tier>', `Confidence tier (${TIERS.join(', ')})`, 'balanced')
  .option('-f, --file <path>', 'Read the question from a file')
  .option('--markdown', 'Print the result as Markdown')
  .option('--json', 'Print the raw result as JSON')
  .option('--no-progress', 'Disable progress output')
  .action(async (queryParts: string[], options: RunOptions) => {
    const query = readQuery(queryParts, options);
    if (!query) {
      program.help();
    }

    const config = loadConfiguration();
    const quiet = !options.progress || options.json === true || options.markdown === true;
    const orchestrator = createOrchestrator(config, !quiet);

    try {
      const result = await orchestrator.runDeliberation(query, options.tier);
      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else if (options.markdown) {
        console.log(formatDeliberationMarkdown(result));
      } else {
        printDeliberation(result);
      }
    } catch (error) {
      handleRunError(error);
    }
  });

program
  .command('verify')
  .description('Ask the council to approve or reject a request and report a confidence-scored verdict')
  .argument('[query...]', 'What to verify')
  .option('-t, --tier <tier>', `Confidence tier (${TIERS.join(', ')})`, 'balanced')
  .option('-f, --file <path>', 'Read the request from a file')
  .option('--threshold <n>', 'Minimum confidence for a pass verdict', '0.7')
  .option('--escalate', 'Re-run at the next tier when the verdict is unclear or weak')
  .option('--markdown', 'Print the result as Markdown')
  .option('--json', 'Print the raw result as JSON')
  .option('--no-progress', 'Disable progress output')
  .action(async (queryParts: string[], options: VerifyOptions) => {
    const query = readQuery(queryParts, options);
    if (!query) {
      program.help();
    }

    const threshold = Number(options.threshold);
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      fail(`--threshold must be a number between 0 and 1, got "${options.threshold}"`);
    }

    const config = loadConfiguration();
    const quiet = !options.progress || options.json === true || options.markdown === true;
    const orchestrator = createOrchestrator(config, !quiet);

    try {
      let result: CouncilVerification;
      if (options.escalate) {
        const escalation = await verifyWithEscalation(orchestrator, query, options.tier, { confidenceThreshold: threshold });
        result = escalation.result;
        if (!quiet) {
          for (const step of escalation.steps.filter(s => s.escalatedTo)) {
            console.log(chalk.yellow(`↑ ${step.tier} was ${step.verdict} at ${step.confidence.toFixed(2)}; escalated to ${step.escalatedTo}`));
          }
          if (escalation.recommendedTier) {
            console.log(chalk.dim(`Consensus was strong; the ${escalation.recommendedTier} tier would likely suffice next time`));
          }
        }
      } else {
        result = await orchestrator.verify(query, options.tier, threshold);
      }

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else if (options.markdown) {
        console.log(formatVerificationMarkdown(result));
      } else {
        printVerification(result);
      }
      process.exitCode = result.verdict === 'pass' ? 0 : 2;
    } catch (error) {
      handleRunError(error);
    }
  });

program
  .command('health')
  .description('Check configuration and ping every model of a tier')
  .option('-t, --tier <tier>', 'Only check this tier')
  .option('--offline', 'Check configuration only, without calling any model')
  .action(async (options: { tier?: string; offline?: boolean }) => {
    const config = loadConfiguration({ requireKey: options.offline !== true });
    console.log(chalk.green('✓ Configuration valid'));
    if (config.configFile) {
      console.log(chalk.dim(`  Config file: ${config.configFile}`));
    }

    let contracts: TierContract[];
    try {
      contracts = (options.tier ? [options.tier] : [...TIERS]).map(tier => createTierContract(tier, config.tiers));
    } catch (error) {
      handleRunError(error);
    }

    for (const contract of contracts) {
      console.log(chalk.dim(`  ${contract.tier}: ${contract.allowedModels.join(', ')} → ${contract.aggregatorModel}`));
    }

    if (options.offline) return;

    const orchestrator = createOrchestrator(config, false);
    try {
      const report = await orchestrator.healthCheck(contracts.map(c => c.tier));
      let healthy = true;
      for (const tier of report) {
        logSection(`TIER ${tier.tier.toUpperCase()}`);
        for (const model of tier.models) {
          healthy &&= model.ok;
          console.log(model.ok
            ? chalk.green(`  ✓ ${model.model}`) + chalk.dim(` ${model.latencyMs ?? '?'}ms`)
            : chalk.red(`  ✗ ${model.model}: ${model.error}`));
        }
      }
      process.exitCode = healthy ? 0 : 1;
    } catch (error) {
      handleRunError(error);
    }
  });

await program.parseAsync();
