/**
 * CLI Handler
 * Parses arguments, runs one triage and maps the outcome to an exit code:
 * 0 report produced, 1 target or search failure, 2 configuration error
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config';
import { LeakTriageConfig } from '../config/schema';
import { parseTarget } from '../models/target.model';
import { createAIProvider, createPipeline, LeakTriagePipeline } from '../services/pipeline/pipeline.driver';
import { RiskClassifier } from '../services/ai/risk.classifier';
import { RateLimiter } from '../utils/concurrency';
import { buildJsonReport, buildPlainTextReport } from '../templates/report.text';
import { logger, isLogLevel } from '../utils/logger';
import { ConfigurationError, SearchFailure, TargetError, errorMessage } from '../utils/errors';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIGURATION = 2;

export const VERSION = '1.0.0';

type CliOptions = {
  json?: boolean;
  color: boolean;
  concurrency?: string;
  maxRecords?: string;
  logLevel?: string;
  health?: boolean;
};

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  isTTY: boolean;
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  io?: CliIO;
  loadConfig?: (env: NodeJS.ProcessEnv) => Promise<LeakTriageConfig>;
  createPipeline?: (config: LeakTriageConfig) => LeakTriagePipeline;
  createAIProvider?: typeof createAIProvider;
}

const processIO: CliIO = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
  isTTY: Boolean(process.stdout.isTTY),
};

function buildProgram(io: CliIO): Command {
  return new Command()
    .name('leak-triage')
    .description('Search leak intelligence for an email, domain or IP address and rank what was exposed')
    .version(VERSION)
    .argument('[target]', 'email address, domain or IP address to investigate')
    .option('--json', 'print the report as JSON')
    .option('--no-color', 'disable colored output')
    .option('--concurrency <n>', 'records processed in parallel')
    .option('--max-records <n>', 'maximum records requested from the search provider')
    .option('--log-level <level>', 'debug, info, warn or error')
    .option('--health', 'check the classification providers and exit')
    .exitOverride()
    .configureOutput({
      writeOut: text => io.stdout(text),
      writeErr: text => io.stderr(text),
    });
}

/**
 * Run the CLI with user arguments (process.argv without node and script)
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const io = deps.io ?? processIO;
  const program = buildProgram(io);

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  const paint = new chalk.Instance({ level: options.color && io.isTTY ? 1 : 0 });
  const fail = (message: string): void => io.stderr(`${paint.red(`Error: ${message}`)}\n`);

  const env: NodeJS.ProcessEnv = { ...(deps.env ?? process.env) };
  if (options.concurrency !== undefined) env.LEAK_TRIAGE_CONCURRENCY = options.concurrency;
  if (options.maxRecords !== undefined) env.LEAK_TRIAGE_MAX_RECORDS = options.maxRecords;
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      fail(`Invalid log level "${options.logLevel}": expected debug, info, warn or error`);
      return EXIT_CONFIGURATION;
    }
    env.LOG_LEVEL = options.logLevel;
    logger.setLevel(options.logLevel);
  }

  const rawTarget = program.args[0] ?? '';

  try {
    // Configuration problems win over a malformed target
    const config = await (deps.loadConfig ?? loadConfig)(env);
    logger.setLevel(config.logLevel);

    if (!options.health) {
      parseTarget(rawTarget);
    }

    if (options.health) {
      return await runHealthCheck(config, deps.createAIProvider ?? createAIProvider, io, paint);
    }

    const pipeline = (deps.createPipeline ?? createPipeline)(config);
    const report = await pipeline.run(rawTarget);

    io.stdout(options.json ? `${buildJsonReport(report)}\n` : buildPlainTextReport(report, { color: options.color && io.isTTY }));
    return EXIT_OK;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      fail(error.issues.length > 0 ? 'Invalid configuration' : error.message);
      for (const issue of error.issues) {
        io.stderr(`  - ${issue}\n`);
      }
      return EXIT_CONFIGURATION;
    }

    if (error instanceof TargetError || error instanceof SearchFailure) {
      fail(error.message);
      return EXIT_FAILURE;
    }

    logger.error('Unexpected failure', { error: errorMessage(error) });
    fail(errorMessage(error));
    return EXIT_FAILURE;
  }
}

async function runHealthCheck(
  config: LeakTriageConfig,
  factory: typeof createAIProvider,
  io: CliIO,
  paint: chalk.Chalk
): Promise<number> {
  const classifier = new RiskClassifier({
    primaryProvider: factory(config.ai.provider, config),
    fallbackProvider: config.ai.fallbackProvider ? factory(config.ai.fallbackProvider, config) : undefined,
    limiter: new RateLimiter('ai', config.rateLimits.ai),
  });

  let healthy = true;
  for (const { provider, model, health } of await classifier.getHealthStatus()) {
    const label = `${provider} (${model})`;

    if (health.available) {
      io.stdout(`${paint.green('ok')} ${label} ${health.latencyMs ?? 0}ms\n`);
    } else {
      healthy = false;
      io.stdout(`${paint.red('unavailable')} ${label}: ${health.lastError ?? 'no response'}\n`);
    }
  }

  return healthy ? EXIT_OK : EXIT_FAILURE;
}
