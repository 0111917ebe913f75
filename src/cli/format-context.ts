/**
 * CLI output format resolution context.
 *
 * Singleton that holds the resolved output format for the current CLI invocation.
 * Set once in the Commander.js preAction hook; read by cliOutput() and renderers.
 */

import type { OutputFormat } from '../types/config.js';

/** Where the resolved format came from. */
export type FormatSource = 'flag' | 'config' | 'default';

/** Resolved output format for one invocation. */
export interface FlagResolution {
  format: OutputFormat;
  source: FormatSource;
  quiet: boolean;
}

/**
 * Current resolved format for this CLI invocation.
 * Defaults to JSON until resolved by the preAction hook.
 */
let currentResolution: FlagResolution = {
  format: 'json',
  source: 'default',
  quiet: false,
};

/**
 * Set the resolved format for this CLI invocation.
 * Called once from the preAction hook in src/cli/index.ts.
 */
export function setFormatContext(resolution: FlagResolution): void {
  currentResolution = resolution;
}

/** Get the current resolved format. */
export function getFormatContext(): FlagResolution {
  return currentResolution;
}
