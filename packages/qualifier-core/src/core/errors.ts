export abstract class RuntimeError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface ValidationDetail {
  field: string;
  message: string;
}

/** The configuration text is not JSON, or not a configuration object. */
export class ConfigurationFormatError extends RuntimeError {
  readonly code = "CONFIGURATION_FORMAT";

  constructor(
    message: string,
    readonly details: ValidationDetail[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class RequestValidationError extends RuntimeError {
  readonly code = "VALIDATION_ERROR";

  constructor(
    message: string,
    readonly details: ValidationDetail[]
  ) {
    super(message);
  }
}

export class ExecutorUnavailableError extends RuntimeError {
  readonly code = "EXECUTOR_UNAVAILABLE";

  constructor(
    readonly modulePath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}
