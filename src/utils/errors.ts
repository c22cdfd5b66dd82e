class ChunkingError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Raised for option values the pipeline cannot run with. This is the only
 * error class the chunking core surfaces to callers.
 */
class ConfigurationError extends ChunkingError {
  constructor(
    message: string,
    public readonly option?: string,
  ) {
    super(message);
  }
}

class InvalidStrategyError extends ConfigurationError {
  constructor(
    public readonly strategy: string,
    public readonly validStrategies: readonly string[],
  ) {
    super(
      `Invalid chunking strategy '${strategy}'. Valid strategies: ${validStrategies.join(", ")}`,
      "strategy",
    );
  }
}

class InputError extends ChunkingError {
  constructor(
    public readonly source: string,
    message: string,
    cause?: Error,
  ) {
    super(`Failed to load ${source}: ${message}`, cause);
  }
}

export { ChunkingError, ConfigurationError, InputError, InvalidStrategyError };
