export { LocalBackend, STATE_FILENAME } from './backends/LocalBackend';
export { MemoryBackend } from './backends/MemoryBackend';
export { cloneState, emptyState, STATE_FORMAT_VERSION } from './IState';
export type { IState } from './IState';
export type { IStateBackend } from './IStateBackend';
export { lockInfoSchema, parseState, resolvedValueSchema, stateSchema } from './schema';
export { StateManager, stateKey } from './StateManager';
