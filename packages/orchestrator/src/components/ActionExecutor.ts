import { type IProvider, ProviderError, type ResolvedAttributes, type ResourceState } from '@stratum/contracts';
import { addressOf, type PlanAction } from '@stratum/planner';
import type { IState, StateManager } from '@stratum/state';

import { DEFAULT_OPERATION_TIMEOUT_MS, DEFAULT_PARALLELISM } from '../constants';
import { backoffDelay, RETRY_DEFAULTS, RetryConfig, shouldRetry, sleep, withTimeout } from '../retry';
import { StateResolver } from './StateResolver';

export type OperationStatus = 'SUCCEEDED' | 'FAILED' | 'PENDING';

export interface OperationResult {
  action: PlanAction;
  address: string;
  status: OperationStatus;
  attempts: number;
  id?: string;
  error?: Error;
}

export interface ApplyReport {
  /** One entry per operation, in plan order */
  results: OperationResult[];
  state: IState;
  /** Every operation succeeded */
  complete: boolean;
  cancelled: boolean;
}

interface EventBase {
  address: string;
  action: PlanAction;
}

export type ExecutorEvent =
  | (EventBase & { type: 'start'; attempt: number })
  | (EventBase & { type: 'retry'; attempt: number; delayMs: number; error: Error })
  | (EventBase & { type: 'success'; attempts: number; id?: string })
  | (EventBase & { type: 'failure'; attempts: number; error: Error });

export interface ExecutorOptions extends Partial<RetryConfig> {
  parallelism?: number;
  operationTimeoutMs?: number;
  /** Stops scheduling; operations already running finish */
  signal?: AbortSignal;
  onEvent?: (event: ExecutorEvent) => void;
}

const VERBS: Record<PlanAction['type'], string> = { CREATE: 'Creation', UPDATE: 'Update', DELETE: 'Destruction' };

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * For each operation, the earlier operations it has to wait for: a create or
 * update waits on operations on itself and on its dependencies, a delete waits
 * on the deletes of its dependents and on updates that release it.
 */
export function gatingOf(actions: PlanAction[]): number[][] {
  const addresses = actions.map((action) => addressOf(action));

  return actions.map((action, index) => {
    const waits: number[] = [];
    for (let earlier = 0; earlier < index; earlier++) {
      const other = actions[earlier];
      const connected =
        action.type === 'DELETE'
          ? (other.type === 'DELETE' && other.dependencies.includes(addresses[index])) ||
            (other.type === 'UPDATE' && (other.released ?? []).includes(addresses[index]))
          : addresses[earlier] === addresses[index] || action.dependencies.includes(addresses[earlier]);
      if (connected) waits.push(earlier);
    }
    return waits;
  });
}

/**
 * Applies a plan through a provider with a bounded worker pool.
 *
 * Every success is checkpointed to the state store before dependents are
 * released. The first fatal failure stops scheduling: running operations
 * finish, nothing is rolled back and operations never started stay PENDING.
 */
export class ActionExecutor {
  private readonly parallelism: number;
  private readonly retry: RetryConfig;
  private readonly timeoutMs: number;

  constructor(
    private provider: IProvider,
    private stateManager: StateManager,
    private options: ExecutorOptions = {}
  ) {
    this.parallelism = Math.max(1, options.parallelism ?? DEFAULT_PARALLELISM);
    this.retry = {
      maxAttempts: Math.max(1, options.maxAttempts ?? RETRY_DEFAULTS.maxAttempts),
      minDelayMs: options.minDelayMs ?? RETRY_DEFAULTS.minDelayMs,
      maxDelayMs: options.maxDelayMs ?? RETRY_DEFAULTS.maxDelayMs,
      jitterFactor: options.jitterFactor ?? RETRY_DEFAULTS.jitterFactor,
    };
    this.timeoutMs = options.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS;
  }

  async execute(actions: PlanAction[]): Promise<ApplyReport> {
    const results = actions.map((action): OperationResult => ({ action, address: addressOf(action), status: 'PENDING', attempts: 0 }));
    const waitsOn = gatingOf(actions);
    const remaining = waitsOn.map((waits) => waits.length);
    const followers: number[][] = actions.map(() => []);
    for (const [index, waits] of waitsOn.entries()) for (const earlier of waits) followers[earlier].push(index);

    const ready = remaining.flatMap((count, index) => (count === 0 ? [index] : []));
    let running = 0;
    let halted = false;

    await new Promise<void>((resolve, reject) => {
      const pump = () => {
        if (this.options.signal?.aborted) halted = true;

        while (!halted && running < this.parallelism) {
          const index = ready.shift();
          if (index === undefined) break;

          running++;
          this.run(results[index])
            .then((succeeded) => {
              running--;
              if (!succeeded) halted = true;
              else
                for (const follower of followers[index]) {
                  remaining[follower]--;
                  if (remaining[follower] === 0) ready.push(follower);
                }
              // Plan order among ready operations
              ready.sort((a, b) => a - b);
              pump();
            })
            .catch(reject);
        }

        if (running === 0) resolve();
      };

      pump();
    });

    return {
      results,
      state: await this.stateManager.snapshot(),
      complete: results.every((result) => result.status === 'SUCCEEDED'),
      cancelled: this.options.signal?.aborted ?? false,
    };
  }

  /** Runs one operation to completion; never rejects */
  private async run(result: OperationResult): Promise<boolean> {
    const { action, address } = result;
    try {
      await this.perform(result);
      result.status = 'SUCCEEDED';
      this.emit({ type: 'success', action, address, attempts: result.attempts, id: result.id });
      return true;
    } catch (error) {
      result.status = 'FAILED';
      result.error = toError(error);
      this.emit({ type: 'failure', action, address, attempts: result.attempts, error: result.error });
      return false;
    }
  }

  private async perform(result: OperationResult): Promise<void> {
    const { action, address } = result;
    const { resourceType, name } = action;

    switch (action.type) {
      case 'CREATE': {
        const inputs = await this.resolveInputs(action, address);
        const created = await this.withRetry(result, () => this.provider.create(resourceType, inputs));
        result.id = created.id;
        await this.stateManager.save(this.record(action, created.id, inputs, created.attributes));
        break;
      }
      case 'UPDATE': {
        const id = action.id;
        if (!id) throw new Error(`UPDATE action for "${address}" missing resource ID`);

        const inputs = await this.resolveInputs(action, address);
        const attributes = await this.withRetry(result, () => this.provider.update(resourceType, id, inputs));
        result.id = id;
        await this.stateManager.save(this.record(action, id, inputs, attributes));
        break;
      }
      case 'DELETE': {
        const id = action.id;
        if (!id) throw new Error(`DELETE action for "${address}" missing resource ID`);

        await this.withRetry(result, () => this.deleteResource(resourceType, id));
        result.id = id;
        await this.stateManager.remove(`${resourceType}.${name}`);
        break;
      }
    }
  }

  private async deleteResource(resourceType: string, id: string): Promise<void> {
    try {
      await this.provider.delete(resourceType, id);
    } catch (error) {
      // Already gone
      if (error instanceof ProviderError && error.code === 'NotFound') return;
      throw error;
    }
  }

  private async resolveInputs(action: PlanAction, address: string): Promise<ResolvedAttributes> {
    const resolver = new StateResolver(await this.stateManager.snapshot());
    return resolver.resolveAttributes(action.attributes ?? {}, address);
  }

  private record(action: PlanAction, id: string, inputs: ResolvedAttributes, attributes: ResolvedAttributes): ResourceState {
    return {
      resourceType: action.resourceType,
      name: action.name,
      id,
      inputs,
      attributes: { ...inputs, ...attributes },
      dependencies: action.dependencies,
    };
  }

  private async withRetry<T>(result: OperationResult, call: () => Promise<T>): Promise<T> {
    const { action, address } = result;

    for (let attempt = 1; ; attempt++) {
      result.attempts = attempt;
      this.emit({ type: 'start', action, address, attempt });

      try {
        return await withTimeout(call(), this.timeoutMs, `${VERBS[action.type]} of ${address}`);
      } catch (error) {
        if (attempt >= this.retry.maxAttempts || !shouldRetry(error)) throw error;

        const delayMs = backoffDelay(attempt, this.retry);
        this.emit({ type: 'retry', action, address, attempt, delayMs, error: toError(error) });
        await sleep(delayMs);
      }
    }
  }

  private emit(event: ExecutorEvent): void {
    this.options.onEvent?.(event);
  }
}
