/**
 * CLI resolve command: merge a season's categories, overrides and additions.
 */

import type { Command } from 'commander';
import { resolveSeason } from '../../core/resolver/index.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { loadCliContext, requireSeason } from '../context.js';

export function registerResolveCommand(program: Command): void {
  program
    .command('resolve [season]')
    .description('Resolve the full command set of a season (defaults to defaultSeason)')
    .action(async (seasonArg: string | undefined, _opts: Record<string, unknown>, cmd: Command) => {
      try {
        const ctx = await loadCliContext(cmd);
        const season = requireSeason(seasonArg, ctx.config);
        const resolved = await resolveSeason(season, ctx);
        cliOutput(resolved, {
          command: 'resolve',
          operation: 'season.resolve',
          message: `Resolved ${resolved.commands.length} commands for ${season}`,
          warnings: resolved.warnings,
        });
      } catch (err) {
        exitWithError(err, 'season.resolve');
      }
    });
}
