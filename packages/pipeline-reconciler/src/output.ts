import chalk from 'chalk';
import { errorMessage } from './errors.js';
import type { OutputFormat, ReconcilePlan, ReconcileResult } from './types.js';

/**
 * Render an apply result. JSON carries exactly changed, name and id;
 * id is left out when nothing exists.
 */
export function formatResult(result: ReconcileResult, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify({ changed: result.changed, name: result.name, id: result.id });
  }

  const target = describeTarget(result.name, result.id);
  switch (result.action) {
    case 'create':
      return chalk.yellow(`changed: created ${target}`);
    case 'update':
      return chalk.yellow(`changed: updated ${target}`);
    case 'delete':
      return chalk.yellow(`changed: deleted ${target}`);
    case 'none':
      return result.id
        ? chalk.green(`ok: ${target} is up to date`)
        : chalk.green(`ok: ${target} is absent`);
  }
}

/** Render a plan */
export function formatPlan(plan: ReconcilePlan, format: OutputFormat): string {
  const id = plan.existing?.id;

  if (format === 'json') {
    return JSON.stringify({
      action: plan.action,
      name: plan.name,
      id,
      differingFields: plan.differingFields,
    });
  }

  const target = describeTarget(plan.name, id);
  switch (plan.action) {
    case 'create':
      return chalk.yellow(`create: ${target}`);
    case 'update':
      return chalk.yellow(`update: ${target} (${plan.differingFields.join(', ')})`);
    case 'delete':
      return chalk.yellow(`delete: ${target}`);
    case 'none':
      return id ? chalk.green(`none: ${target} is up to date`) : chalk.green(`none: ${target} is absent`);
  }
}

/** Render a failure */
export function formatFailure(err: unknown, format: OutputFormat): string {
  const msg = errorMessage(err);
  if (format === 'json') {
    return JSON.stringify({ failed: true, msg });
  }
  return chalk.red(`error: ${msg}`);
}

function describeTarget(name: string, id: string | undefined): string {
  return id ? `pipeline "${name}" (${id})` : `pipeline "${name}"`;
}
