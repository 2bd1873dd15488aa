/**
 * Error types. Configuration problems are fatal at load time; invariant
 * violations mean an upstream stage produced something it must not.
 */

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source?: string,
  ) {
    super(source ? `${source}: ${message}` : message);
    this.name = "ConfigError";
  }
}

export class RenderInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RenderInvariantError";
  }
}
