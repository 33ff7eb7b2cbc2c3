import { type LockInfo, type ResolvedValue, type ResourceState, StratumError } from '@stratum/contracts';
import crypto from 'node:crypto';
import os from 'node:os';

import { cloneState, IState } from './IState';
import { IStateBackend } from './IStateBackend';

export function stateKey(resourceType: string, name: string): string {
  return `${resourceType}.${name}`;
}

/**
 * Applied state of one workspace. Every mutation is serialized through an
 * in-process queue and written through to the backend before it resolves,
 * so concurrent executor workers can checkpoint independently.
 */
export class StateManager {
  private state: IState | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private heldLock: LockInfo | null = null;

  constructor(private backend: IStateBackend) {}

  /** Reads the state from the backend, replacing the cached copy */
  async load(): Promise<IState> {
    return this.exclusive(async () => {
      this.state = await this.backend.read();
      return cloneState(this.state);
    });
  }

  /** Deep copy of the current state, consistent with every completed save */
  async snapshot(): Promise<IState> {
    return this.exclusive(async () => cloneState(await this.current()));
  }

  /** Upserts one resource record */
  async save(record: ResourceState): Promise<void> {
    await this.mutate((state) => {
      state.resources[stateKey(record.resourceType, record.name)] = structuredClone(record);
    });
  }

  async remove(address: string): Promise<boolean> {
    let removed = false;
    await this.mutate((state) => {
      removed = address in state.resources;
      delete state.resources[address];
    });
    return removed;
  }

  async setOutputs(outputs: Record<string, ResolvedValue>): Promise<void> {
    await this.mutate((state) => {
      state.outputs = structuredClone(outputs);
    });
  }

  /** Replaces the whole state, keeping serial and lineage monotonic */
  async write(next: IState): Promise<void> {
    await this.mutate((state) => {
      state.resources = structuredClone(next.resources);
      state.outputs = structuredClone(next.outputs);
    });
  }

  /**
   * Takes the single-writer lock for `operation`. Throws StateLockedError
   * when another process holds it.
   */
  async lock(operation: string): Promise<LockInfo> {
    if (this.heldLock) throw new StratumError(`State lock already held by this process for "${this.heldLock.operation}"`);

    const info: LockInfo = {
      id: crypto.randomUUID(),
      operation,
      who: `${process.env.USER ?? 'unknown'}@${os.hostname()}`,
      created: new Date().toISOString(),
    };
    await this.backend.lock(info);
    this.heldLock = info;
    return info;
  }

  async unlock(): Promise<void> {
    if (!this.heldLock) return;
    const { id } = this.heldLock;
    this.heldLock = null;
    await this.backend.unlock(id);
  }

  async forceUnlock(): Promise<LockInfo | null> {
    const holder = await this.backend.getLock();
    await this.backend.forceUnlock();
    this.heldLock = null;
    return holder;
  }

  async withLock<T>(operation: string, task: () => Promise<T>): Promise<T> {
    await this.lock(operation);
    try {
      return await task();
    } finally {
      await this.unlock();
    }
  }

  private async current(): Promise<IState> {
    if (!this.state) this.state = await this.backend.read();
    return this.state;
  }

  /** Applies `change` to a copy; the cached state only advances once the backend write succeeded */
  private mutate(change: (state: IState) => void): Promise<void> {
    return this.exclusive(async () => {
      const next = cloneState(await this.current());
      change(next);
      next.serial++;
      await this.backend.write(next);
      this.state = next;
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }
}
