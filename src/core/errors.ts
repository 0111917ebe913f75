/**
 * vexcmd error type with exit code integration.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/**
 * Structured error for every vexcmd failure: missing files, malformed JSON,
 * schema violations and id collisions.
 * Carries an exit code, human-readable message, and optional fix suggestion.
 */
export class ConfigError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;
  /** File the error was raised for, when there is one. */
  readonly file?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      file?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ConfigError';
    this.code = code;
    this.fix = options?.fix;
    this.file = options?.file;
  }

  /** Structured JSON body used by the CLI error envelope. */
  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      name: getExitCodeName(this.code),
      message: this.message,
      ...(this.fix && { fix: this.fix }),
      ...(this.file && { file: this.file }),
    };
  }
}

/** Narrow an unknown thrown value to a ConfigError with the given code. */
export function isConfigError(err: unknown, code?: ExitCode): err is ConfigError {
  return err instanceof ConfigError && (code === undefined || err.code === code);
}
