import type { ApplyOptions } from '@stratum/orchestrator';
import chalk from 'chalk';
import { type Command, InvalidArgumentError } from 'commander';

import { printEvent } from './display';

export interface RunOptions {
  autoApprove: boolean;
  parallelism?: number;
  maxAttempts?: number;
  timeout?: number;
}

function positiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) throw new InvalidArgumentError('Expected a positive integer.');
  return parsed;
}

export function addRunOptions(command: Command): Command {
  return command
    .option('-y, --auto-approve', 'skip interactive approval', false)
    .option('--parallelism <n>', 'maximum concurrent operations', positiveInteger)
    .option('--max-attempts <n>', 'attempts per operation, including the first', positiveInteger)
    .option('--timeout <ms>', 'timeout of a single provider call', positiveInteger);
}

/**
 * Executor options for one run. Ctrl+C stops scheduling new operations and
 * lets the running ones finish; the handler is removed by `release`.
 */
export function runControl(options: RunOptions): { options: ApplyOptions; release: () => void } {
  const controller = new AbortController();
  const onSigint = () => {
    console.log(chalk.yellow('\nInterrupt received: waiting for running operations to finish...'));
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  return {
    options: {
      parallelism: options.parallelism,
      maxAttempts: options.maxAttempts,
      operationTimeoutMs: options.timeout,
      signal: controller.signal,
      onEvent: printEvent,
    },
    release: () => {
      process.off('SIGINT', onSigint);
    },
  };
}
