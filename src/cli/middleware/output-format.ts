/**
 * CLI middleware for resolving output format from --human/--json/--quiet flags.
 *
 * Precedence: explicit flag > configured output.defaultFormat > json.
 */

import { ConfigError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { OutputFormat } from '../../types/config.js';
import type { FlagResolution } from '../format-context.js';

export type { FlagResolution };

/**
 * Resolve output format from Commander.js option values.
 *
 * @param opts - Commander.js parsed options object
 * @param configDefault - output.defaultFormat from the resolved config
 * @throws ConfigError INVALID_INPUT when --json and --human are both given
 */
export function resolveFormat(
  opts: Record<string, unknown>,
  configDefault?: OutputFormat,
): FlagResolution {
  const jsonFlag = opts['json'] === true;
  const humanFlag = opts['human'] === true;
  const quiet = opts['quiet'] === true;

  if (jsonFlag && humanFlag) {
    throw new ConfigError(
      ExitCode.INVALID_INPUT,
      '--json and --human cannot be used together',
    );
  }
  if (humanFlag) return { format: 'human', source: 'flag', quiet };
  if (jsonFlag) return { format: 'json', source: 'flag', quiet };
  if (configDefault) return { format: configDefault, source: 'config', quiet };
  return { format: 'json', source: 'default', quiet };
}
