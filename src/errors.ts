/**
 * Error hierarchy. Every error the CLI reports as a user-facing message
 * extends TubeTrailError.
 */

export class TubeTrailError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'TubeTrailError';
  }
}

/** Invalid or missing configuration: empty branch schedule, negative depth, bad option value. */
export class ConfigError extends TubeTrailError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

/** Malformed seed specification or unknown search mode. */
export class InputError extends TubeTrailError {
  constructor(message: string) {
    super(message, 'INPUT_ERROR');
    this.name = 'InputError';
  }
}

export class AuthError extends TubeTrailError {
  constructor(message: string, cause?: Error) {
    super(message, 'AUTH_ERROR', cause);
    this.name = 'AuthError';
  }
}

/** A remote API call failed: transport, quota, not found, malformed body. */
export class CollaboratorError extends TubeTrailError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly reason?: string,
    cause?: Error
  ) {
    super(message, 'COLLABORATOR_ERROR', cause);
    this.name = 'CollaboratorError';
  }
}
