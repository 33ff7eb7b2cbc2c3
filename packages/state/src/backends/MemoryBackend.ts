import { type LockInfo, StateLockedError } from '@stratum/contracts';

import { cloneState, emptyState, IState } from '../IState';
import { IStateBackend } from '../IStateBackend';

/** Keeps state in process memory. Used by tests and when embedding the engine. */
export class MemoryBackend implements IStateBackend {
  private state: IState | null;
  private lockInfo: LockInfo | null = null;
  public writes: number = 0;

  constructor(initial?: IState) {
    this.state = initial ? cloneState(initial) : null;
  }

  async read(): Promise<IState> {
    return this.state ? cloneState(this.state) : emptyState();
  }

  async write(state: IState): Promise<void> {
    this.state = cloneState(state);
    this.writes++;
  }

  async lock(info: LockInfo): Promise<void> {
    if (this.lockInfo) throw new StateLockedError(this.lockInfo);
    this.lockInfo = { ...info };
  }

  async unlock(id: string): Promise<void> {
    if (this.lockInfo?.id === id) this.lockInfo = null;
  }

  async forceUnlock(): Promise<void> {
    this.lockInfo = null;
  }

  async getLock(): Promise<LockInfo | null> {
    return this.lockInfo ? { ...this.lockInfo } : null;
  }
}
