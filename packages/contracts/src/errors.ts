export class StratumError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ParseError extends StratumError {
  constructor(
    public readonly reason: string,
    public readonly line: number,
    public readonly column: number,
    public readonly file?: string
  ) {
    super(`${file ? `${file}: ` : ''}[Line ${line}, Column ${column}] ${reason}`);
  }
}

/** A declaration violates its resource type's schema */
export class SchemaError extends StratumError {
  constructor(
    public readonly address: string | undefined,
    public readonly issues: string[]
  ) {
    super(address ? `Invalid resource "${address}": ${issues.join('; ')}` : issues.join('; '));
  }
}

export class UnresolvedReferenceError extends StratumError {
  constructor(
    public readonly address: string,
    public readonly reference: string,
    reason: string
  ) {
    super(`Unresolved reference "${reference}" in "${address}": ${reason}`);
  }
}

export class CycleError extends StratumError {
  constructor(public readonly path: string[]) {
    super(`Dependency cycle detected: ${path.join(' -> ')}`);
  }
}

/** Error raised by a provider call; `retryable` marks transient failures */
export class ProviderError extends StratumError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly code?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class OperationTimeoutError extends ProviderError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, true, 'ETIMEDOUT');
  }
}

export interface LockInfo {
  id: string;
  operation: string;
  who: string;
  created: string;
}

export class StateLockedError extends StratumError {
  constructor(public readonly lockInfo?: LockInfo) {
    super(
      lockInfo
        ? `State is locked by another process (lock ${lockInfo.id}, ${lockInfo.operation} by ${lockInfo.who} since ${lockInfo.created}).`
        : 'State is locked by another process.'
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
