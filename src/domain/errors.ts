/**
 * Error taxonomy for the engine.
 *
 * Every error is recoverable at some boundary (per rule file, per rule run,
 * per clock write, per HTTP request); none of them should end the process.
 */

/** A symbol resolved to no variable and no local binding. */
export class UndefinedSymbolError extends Error {
  constructor(public readonly symbol: string) {
    super(`undefined symbol: ${symbol}`);
    this.name = 'UndefinedSymbolError';
  }
}

/** A persisted variable record could not be decoded. */
export class DecodeError extends Error {
  constructor(
    public readonly variable: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`cannot decode variable ${variable}: ${reason}`, options);
    this.name = 'DecodeError';
  }
}

/** Rule code tried to store something outside the value domain. */
export class NotStorableError extends Error {
  constructor(public readonly variable: string, what: string) {
    super(`cannot store ${what} in variable ${variable}`);
    this.name = 'NotStorableError';
  }
}

export type ScopeOperation = 'create' | 'branch' | 'enclose';

/**
 * The variable-backed global scope sits at the root of the scope chain and
 * has no lexical layer of its own.
 */
export class UnsupportedScopeOperationError extends Error {
  constructor(public readonly operation: ScopeOperation) {
    super(`${operation} is not supported at global scope`);
    this.name = 'UnsupportedScopeOperationError';
  }
}

export type BuiltinArgumentReason = 'count' | 'type';

export class BuiltinArgumentError extends Error {
  constructor(
    public readonly builtin: string,
    public readonly reason: BuiltinArgumentReason,
    message: string,
  ) {
    super(message);
    this.name = 'BuiltinArgumentError';
  }
}

export class ChannelClosedError extends Error {
  constructor() {
    super('channel closed');
    this.name = 'ChannelClosedError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}
