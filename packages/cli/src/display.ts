import { errorMessage, type ResolvedValue, StateLockedError } from '@stratum/contracts';
import type { ApplyResult, ExecutorEvent, OperationResult } from '@stratum/orchestrator';
import { addressOf, type AttributeChange, type PlanAction } from '@stratum/planner';
import chalk from 'chalk';
import inquirer from 'inquirer';

const KNOWN_AFTER_APPLY = '(known after apply)';

const PROGRESS: Record<PlanAction['type'], { running: string; noun: string; verb: string }> = {
  CREATE: { running: 'Creating...', noun: 'Creation', verb: 'create' },
  UPDATE: { running: 'Modifying...', noun: 'Modifications', verb: 'update' },
  DELETE: { running: 'Destroying...', noun: 'Destruction', verb: 'destroy' },
};

function render(value: ResolvedValue | undefined): string {
  return value === undefined ? 'null' : JSON.stringify(value);
}

function symbolOf(action: PlanAction): string {
  if (action.replace) return chalk.magenta('-/+');
  if (action.type === 'CREATE') return chalk.green('+');
  if (action.type === 'UPDATE') return chalk.yellow('~');
  return chalk.red('-');
}

function intentOf(action: PlanAction): string {
  if (action.replace) return 'must be replaced';
  if (action.type === 'CREATE') return 'will be created';
  if (action.type === 'UPDATE') return 'will be updated in-place';
  return 'will be destroyed';
}

function changeLine(name: string, change: AttributeChange, created: boolean): string {
  const next = change.computed ? KNOWN_AFTER_APPLY : render(change.new);
  return created ? `      ${name} = ${next}` : `      ${name}: ${render(change.old)} -> ${next}`;
}

/** Plan in execution order. A replacement is listed once, where it is recreated. */
export function displayPlan(actions: PlanAction[]): void {
  console.log(chalk.bold('\nStratum will perform the following actions:\n'));

  for (const action of actions) {
    if (action.type === 'DELETE' && action.replace) continue;

    console.log(`  ${symbolOf(action)} ${addressOf(action)} ${intentOf(action)}`);
    const created = action.type === 'CREATE' && !action.replace;
    for (const [name, change] of Object.entries(action.changes ?? {})) console.log(changeLine(name, change, created));
  }

  const count = (type: PlanAction['type']) => actions.filter((action) => action.type === type).length;
  console.log(chalk.bold(`\nPlan: ${count('CREATE')} to add, ${count('UPDATE')} to change, ${count('DELETE')} to destroy.`));
}

/** One line per executor event */
export function printEvent(event: ExecutorEvent): void {
  const progress = PROGRESS[event.action.type];

  switch (event.type) {
    case 'start': {
      console.log(`${event.address}: ${progress.running}${event.attempt > 1 ? ` (attempt ${event.attempt})` : ''}`);
      break;
    }
    case 'retry': {
      console.log(chalk.yellow(`${event.address}: ${event.error.message}; retrying in ${event.delayMs}ms`));
      break;
    }
    case 'success': {
      console.log(chalk.green(`${event.address}: ${progress.noun} complete${event.id ? ` [id=${event.id}]` : ''}`));
      break;
    }
    case 'failure': {
      console.log(chalk.red(`${event.address}: ${progress.noun} failed after ${event.attempts} attempt(s): ${event.error.message}`));
      break;
    }
  }
}

function resultLine(result: OperationResult): string {
  const label = `${result.address} (${PROGRESS[result.action.type].verb})`;
  if (result.status === 'SUCCEEDED') return chalk.green(`  ✓ ${label}`);
  if (result.status === 'FAILED') return chalk.red(`  ✗ ${label}: ${result.error?.message ?? 'unknown error'}`);
  return chalk.gray(`  · ${label} pending`);
}

export function displayOutputs(outputs: Record<string, ResolvedValue>): void {
  if (Object.keys(outputs).length === 0) return;

  console.log(chalk.cyan('\nOutputs:\n'));
  for (const [key, value] of Object.entries(outputs)) console.log(`${key} = ${JSON.stringify(value)}`);
}

/** Summary of a finished run; every operation is listed when it did not complete */
export function displayResult(result: ApplyResult, title: string): void {
  const succeeded = (type: PlanAction['type']) => result.results.filter((item) => item.status === 'SUCCEEDED' && item.action.type === type).length;

  if (result.complete) {
    console.log(
      chalk.bold.green(`\n${title} complete! Resources: ${succeeded('CREATE')} added, ${succeeded('UPDATE')} changed, ${succeeded('DELETE')} destroyed.`)
    );
    displayOutputs(result.outputs);
    return;
  }

  const count = (status: OperationResult['status']) => result.results.filter((item) => item.status === status).length;
  const state = result.cancelled ? 'cancelled' : 'failed';
  console.log(chalk.bold.red(`\n${title} ${state}: ${count('SUCCEEDED')} succeeded, ${count('FAILED')} failed, ${count('PENDING')} pending.`));
  for (const item of result.results) console.log(resultLine(item));
}

export function reportError(title: string, error: unknown): void {
  console.error(chalk.red(`${title}:`), errorMessage(error));
  if (error instanceof StateLockedError) console.error(chalk.yellow('If no other run is in progress, release the lock with `stratum force-unlock`.'));
}

export async function confirm(message: string, autoApprove: boolean): Promise<boolean> {
  if (autoApprove) return true;

  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([{ type: 'confirm', name: 'confirmed', message, default: false }]);
  return confirmed;
}
