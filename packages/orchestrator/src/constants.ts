/** Operations that may run at the same time */
export const DEFAULT_PARALLELISM = 10;

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_MIN_DELAY_MS = 200;
export const DEFAULT_MAX_DELAY_MS = 5000;
export const DEFAULT_JITTER_FACTOR = 0.2;

/** Per provider call */
export const DEFAULT_OPERATION_TIMEOUT_MS = 60_000;

/** Attribute every applied resource exposes, whatever its schema */
export const ID_ATTRIBUTE = 'id';

/** Resource attributes that configure the engine and never reach a provider */
export const META_ARGUMENTS = ['count', 'depends_on'] as const;
