/**
 * Per-invocation CLI context: project root, resolved config and data dirs.
 */

import type { Command } from 'commander';
import { loadConfig, resolveDataDirs, type DataDirs } from '../core/config.js';
import { ConfigError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import type { VexcmdConfig } from '../types/config.js';

export interface CliContext extends DataDirs {
  config: VexcmdConfig;
}

/** Value of the global --root option, if given. */
export function getRootOption(cmd: Command): string | undefined {
  const root: unknown = cmd.optsWithGlobals()['root'];
  return typeof root === 'string' && root.length > 0 ? root : undefined;
}

/** Load config for the project the command runs against. */
export async function loadCliContext(cmd: Command): Promise<CliContext> {
  const root = getRootOption(cmd);
  const config = await loadConfig(root);
  return { config, ...resolveDataDirs(config, root) };
}

/**
 * Season argument, falling back to the configured defaultSeason.
 * @throws ConfigError INVALID_INPUT when neither is set
 */
export function requireSeason(season: string | undefined, config: VexcmdConfig): string {
  const chosen = season ?? config.defaultSeason;
  if (!chosen) {
    throw new ConfigError(ExitCode.INVALID_INPUT, 'No season given and no defaultSeason configured', {
      fix: 'Pass a season or run: vexcmd config set defaultSeason <season>',
    });
  }
  return chosen;
}
