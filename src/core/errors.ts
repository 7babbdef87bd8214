/**
 * A mandatory prerequisite (Windows host, elevated rights) is missing.
 * Fails the critical step and ends the process with exit code 1.
 */
export class PrerequisiteMissingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PrerequisiteMissingError';
  }
}

/**
 * A status probe could not determine state. Never fatal: the probe result
 * is downgraded to `unknown`.
 */
export class ProbeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProbeError';
  }
}

/**
 * One step's action failed. Reported by the orchestrator; the run only halts
 * when the step is critical.
 */
export class StepExecutionError extends Error {
  constructor(
    public readonly step: string,
    message: string,
    public readonly critical = false,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StepExecutionError';
  }
}

/**
 * The terminal settings document could not be parsed, has an unexpected
 * shape or nests deeper than the merge allows.
 */
export class ConfigParseError extends Error {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConfigParseError';
  }
}

export class NetworkUnavailableError extends Error {
  constructor(
    public readonly host: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot reach ${host}; downloads will likely fail`, options);
    this.name = 'NetworkUnavailableError';
  }
}

/**
 * The installer's own configuration file is invalid.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly path: string,
    public readonly issues: string[],
    options?: { cause?: unknown },
  ) {
    super(`Invalid configuration in ${path}: ${issues.join('; ')}`, options);
    this.name = 'ConfigValidationError';
  }
}

/**
 * One-line description of an unknown thrown value, including its cause.
 */
export function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  if (err.cause instanceof Error && err.cause.message !== err.message) {
    return `${err.message} (${err.cause.message})`;
  }
  return err.message;
}
