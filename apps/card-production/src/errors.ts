/**
 * A parameter value does not have the required shape. The operator has to fix
 * the input; nothing was sent to the card.
 */
export class ValidationError extends Error {
  constructor(
    readonly field: string,
    readonly expected: string,
    readonly actual: string
  ) {
    super(`Invalid ${field}: expected ${expected}, got '${actual}'`);
    this.name = 'ValidationError';
  }
}

/**
 * A procedure file or parameter file is missing or malformed.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * A native tool exited with a non-zero status.
 */
export class ToolExecutionError extends Error {
  constructor(
    readonly tool: string,
    readonly exitCode: number,
    detail?: string
  ) {
    super(
      `${tool} failed with exit code ${exitCode}${detail ? `: ${detail}` : ''}`
    );
    this.name = 'ToolExecutionError';
  }
}
