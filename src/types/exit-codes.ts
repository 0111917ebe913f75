/**
 * vexcmd exit codes.
 * Ranges: 0 = success, 1-99 = errors, 100+ = special (non-error) states.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  VALIDATION_ERROR = 6,
  LOCK_TIMEOUT = 7,
  CONFIG_ERROR = 8,

  // === IDENTITY ERRORS (20-29) ===
  ID_COLLISION = 22,

  // === SPECIAL CODES (100+) - NOT errors ===
  NO_DATA = 100,
  ALREADY_EXISTS = 101,
}

/** Check if an exit code represents an error (1-99). */
export function isErrorCode(code: ExitCode): boolean {
  return code >= 1 && code < 100;
}

/** Check if an exit code represents success (0 or 100+). */
export function isSuccessCode(code: ExitCode): boolean {
  return code === 0 || code >= 100;
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
