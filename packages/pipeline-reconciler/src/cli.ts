/**
 * pipeline-reconciler CLI.
 *
 * Sub-commands:
 *   apply: Converge the pipeline to the desired state
 *   plan:  Show the action apply would take, without changing anything
 *
 * The desired state comes from a YAML file (--file), from flags, or both;
 * flags win over file values.
 *
 * @module cli
 */

import { Command, Option } from 'commander';
import { createRequire } from 'node:module';
import type { Logger } from 'pino';
import { buildRuntimeConfig } from './config.js';
import type { RuntimeConfig } from './config.js';
import { LIFECYCLE_STATES, OUTPUT_FORMATS } from './constants.js';
import { parseDesiredState, readDesiredStateFile } from './desired-state.js';
import { DesiredStateError } from './errors.js';
import { createLogger } from './logger.js';
import { parseNotificationPair, resolveNotificationEvent } from './notifications.js';
import { formatFailure, formatPlan, formatResult } from './output.js';
import { createPipelineClient } from './pipeline-client.js';
import type { PipelineClient } from './pipeline-client.js';
import { PipelineReconciler } from './reconciler.js';
import type { DesiredPipelineState, OutputFormat, ValidationIssue } from './types.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Options shared by apply and plan, as commander hands them over */
export interface CommandOptions {
  file?: string;
  name?: string;
  state?: string;
  inputBucket?: string;
  outputBucket?: string;
  role?: string;
  notification?: string[];
  region?: string;
  endpoint?: string;
  logLevel?: string;
  output?: string;
}

/** Result returned by each sub-command handler */
export interface CliResult {
  success: boolean;
  output: string;
  exitCode: number;
}

/** Collaborators the handlers need; replaced in tests */
export interface CliDependencies {
  createClient: (config: RuntimeConfig, logger: Logger) => Promise<PipelineClient>;
  createLogger: (config: RuntimeConfig) => Logger;
}

export const defaultDependencies: CliDependencies = {
  createClient: createPipelineClient,
  createLogger: (config) => createLogger({ level: config.logLevel, pretty: config.logPretty }),
};

// ---------------------------------------------------------------------------
// Desired state from file + flags
// ---------------------------------------------------------------------------

/**
 * Merge the YAML file (if any) and the flags into one raw desired-state
 * mapping. Flags replace file values; --notification pairs replace the
 * file's topic for the same event kind.
 */
export function buildDesiredInput(
  options: CommandOptions,
): { success: true; raw: Record<string, unknown> } | { success: false; errors: ValidationIssue[] } {
  let raw: Record<string, unknown> = {};
  if (options.file) {
    const document = readDesiredStateFile(options.file);
    if (!document.success) {
      return document;
    }
    raw = { ...document.raw };
  }

  const flagValues: Array<[string, string | undefined]> = [
    ['name', options.name],
    ['state', options.state],
    ['input-bucket', options.inputBucket],
    ['output-bucket', options.outputBucket],
    ['role', options.role],
  ];
  for (const [key, value] of flagValues) {
    if (value !== undefined) {
      // Drop other spellings of the same field so the flag is the one read
      if (key === 'input-bucket') {
        delete raw['inputBucket'];
        delete raw['input_bucket'];
      } else if (key === 'output-bucket') {
        delete raw['outputBucket'];
        delete raw['output_bucket'];
      }
      raw[key] = value;
    }
  }

  const pairs = options.notification ?? [];
  if (pairs.length > 0) {
    const errors: ValidationIssue[] = [];
    const existing = raw['notifications'];
    const notifications: Record<string, unknown> =
      typeof existing === 'object' && existing !== null && !Array.isArray(existing) ? { ...existing } : {};

    for (const pair of pairs) {
      const parsed = parseNotificationPair(pair);
      if (!parsed) {
        errors.push({ field: 'notification', message: `Expected event=topic, got "${pair}"` });
        continue;
      }
      const event = resolveNotificationEvent(parsed.key);
      if (event) {
        for (const key of Object.keys(notifications)) {
          if (resolveNotificationEvent(key) === event) {
            delete notifications[key];
          }
        }
      }
      notifications[parsed.key] = parsed.topic;
    }

    if (errors.length > 0) {
      return { success: false, errors };
    }
    raw['notifications'] = notifications;
  }

  return { success: true, raw };
}

function parseOutputFormat(value: string | undefined): OutputFormat {
  return OUTPUT_FORMATS.find((format) => format === value) ?? 'json';
}

function resolveDesiredState(options: CommandOptions): DesiredPipelineState {
  const input = buildDesiredInput(options);
  if (!input.success) {
    throw new DesiredStateError(input.errors);
  }
  const parsed = parseDesiredState(input.raw);
  if (!parsed.success) {
    throw new DesiredStateError(parsed.errors);
  }
  return parsed.desired;
}

async function createReconciler(options: CommandOptions, deps: CliDependencies): Promise<PipelineReconciler> {
  const config = buildRuntimeConfig({
    region: options.region,
    endpoint: options.endpoint,
    logLevel: options.logLevel,
  });
  const logger = deps.createLogger(config);
  const client = await deps.createClient(config, logger);
  return new PipelineReconciler(client, logger);
}

// ---------------------------------------------------------------------------
// Sub-command handlers
// ---------------------------------------------------------------------------

/**
 * Handle `apply`: converge the pipeline and report changed/name/id.
 */
export async function runApply(
  options: CommandOptions,
  deps: CliDependencies = defaultDependencies,
): Promise<CliResult> {
  const format = parseOutputFormat(options.output);
  try {
    const desired = resolveDesiredState(options);
    const reconciler = await createReconciler(options, deps);
    const result = await reconciler.reconcile(desired);
    return { success: true, output: formatResult(result, format), exitCode: 0 };
  } catch (err) {
    return { success: false, output: formatFailure(err, format), exitCode: 1 };
  }
}

/**
 * Handle `plan`: report the action apply would take.
 */
export async function runPlan(
  options: CommandOptions,
  deps: CliDependencies = defaultDependencies,
): Promise<CliResult> {
  const format = parseOutputFormat(options.output);
  try {
    const desired = resolveDesiredState(options);
    const reconciler = await createReconciler(options, deps);
    const plan = await reconciler.plan(desired);
    return { success: true, output: formatPlan(plan, format), exitCode: 0 };
  } catch (err) {
    return { success: false, output: formatFailure(err, format), exitCode: 1 };
  }
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function addDesiredStateOptions(command: Command): Command {
  return command
    .option('-f, --file <path>', 'YAML file describing the desired pipeline')
    .option('--name <name>', 'Pipeline name (lookup key)')
    .addOption(new Option('--state <state>', 'Target lifecycle state').choices([...LIFECYCLE_STATES]))
    .option('--input-bucket <bucket>', 'Bucket holding the source media')
    .option('--output-bucket <bucket>', 'Bucket for transcoded files (used on create only)')
    .option('--role <arn>', 'IAM role ARN the transcoder assumes')
    .option(
      '--notification <event=topic>',
      'Topic ARN for Progressing, Completed, Warning or Error (repeatable, empty topic allowed)',
      collect,
      [],
    )
    .option('--region <region>', 'Region (default: AWS_REGION or AWS_DEFAULT_REGION)')
    .option('--endpoint <url>', 'Custom control-plane endpoint')
    .option('--log-level <level>', 'Log level (default: LOG_LEVEL or info)')
    .addOption(new Option('--output <format>', 'Output format').choices([...OUTPUT_FORMATS]).default('json'));
}

/**
 * Build the commander program. Results go to `write`; the exit code is
 * set on the process.
 */
export function createProgram(
  deps: CliDependencies = defaultDependencies,
  write: (line: string) => void = (line) => process.stdout.write(`${line}\n`),
): Command {
  const program = new Command();

  program
    .name('pipeline-reconciler')
    .description('Converge a transcoder pipeline to a declared present/absent state')
    .version(pkg.version);

  addDesiredStateOptions(
    program.command('apply').description('Create, update or delete the pipeline to match the desired state'),
  ).action(async (options: CommandOptions) => {
    const result = await runApply(options, deps);
    write(result.output);
    process.exitCode = result.exitCode;
  });

  addDesiredStateOptions(
    program.command('plan').description('Show what apply would do, without changing anything'),
  ).action(async (options: CommandOptions) => {
    const result = await runPlan(options, deps);
    write(result.output);
    process.exitCode = result.exitCode;
  });

  return program;
}
