import type { ResolvedValue, ResourceState } from '@stratum/contracts';
import crypto from 'node:crypto';

export const STATE_FORMAT_VERSION = 1;

export interface IState {
  version: number;
  /** Incremented on every write */
  serial: number;
  /** Identifies the history a state file belongs to; set once when the state is first created */
  lineage: string;
  resources: Record<string, ResourceState>;
  outputs: Record<string, ResolvedValue>;
}

export function emptyState(): IState {
  return { version: STATE_FORMAT_VERSION, serial: 0, lineage: crypto.randomUUID(), resources: {}, outputs: {} };
}

export function cloneState(state: IState): IState {
  return structuredClone(state);
}
