export class WmregError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WmregError';
  }
}

/** Invalid construction parameters or configuration file. Fatal to the instance. */
export class ConfigurationError extends WmregError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * A key remapping met an explicit entry it cannot map. Signals a broken
 * internal contract, never bad user input.
 */
export class KeyMappingError extends WmregError {
  constructor(public readonly key: string) {
    super(`No key mapping for entry: ${key}`);
    this.name = 'KeyMappingError';
  }
}

export class DomainError extends WmregError {
  constructor(
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(`Incompatible key kinds: expected ${expected}, got ${actual}`);
    this.name = 'DomainError';
  }
}

export class CommandError extends WmregError {
  constructor(
    public readonly dim: string,
    message: string,
  ) {
    super(`Invalid command '${dim}': ${message}`);
    this.name = 'CommandError';
  }
}
