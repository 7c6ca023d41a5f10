export type AclCacheErrorCode =
  | "INVALID_ARGUMENT"
  | "STRATEGY_NOT_BOUND"
  | "CODEC"
  | "CONFIG";

export class AclCacheError extends Error {
  readonly code: AclCacheErrorCode;

  constructor(code: AclCacheErrorCode, message: string) {
    super(message);
    this.name = "AclCacheError";
    this.code = code;
  }
}

/** A required key, entry or identifier is missing. Raised before any cache access. */
export class InvalidArgumentError extends AclCacheError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
    this.name = "InvalidArgumentError";
  }
}

export class CyclicParentChainError extends InvalidArgumentError {
  constructor(id: unknown) {
    super(`Cyclic parent chain detected at ACL ${String(id)}`);
    this.name = "CyclicParentChainError";
  }
}

export class StrategyNotBoundError extends AclCacheError {
  constructor(strategy: string) {
    super("STRATEGY_NOT_BOUND", `${strategy} is not bound to this ACL`);
    this.name = "StrategyNotBoundError";
  }
}

/** A cached payload could not be decoded into an ACL. */
export class AclCodecError extends AclCacheError {
  constructor(message: string) {
    super("CODEC", message);
    this.name = "AclCodecError";
  }
}

export class ConfigError extends AclCacheError {
  constructor(message: string) {
    super("CONFIG", message);
    this.name = "ConfigError";
  }
}

/** Throws InvalidArgumentError when value is null or undefined. */
export function requireValue<T>(value: T | null | undefined, message: string): T {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(message);
  }
  return value;
}
