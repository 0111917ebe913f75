/**
 * CLI commands command: list a season's resolved commands grouped by category.
 */

import type { Command } from 'commander';
import { groupByCategory, resolveSeason } from '../../core/resolver/index.js';
import { ConfigError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import type { CommandGroupsResult } from '../renderers/commands.js';
import { loadCliContext, requireSeason } from '../context.js';

export function registerCommandsCommand(program: Command): void {
  program
    .command('commands [season]')
    .description('List resolved commands grouped by category')
    .option('-c, --category <name>', 'Only show commands of one category (display name)')
    .action(async (seasonArg: string | undefined, opts: { category?: string }, cmd: Command) => {
      try {
        const ctx = await loadCliContext(cmd);
        const season = requireSeason(seasonArg, ctx.config);
        const resolved = await resolveSeason(season, ctx);

        const groups: CommandGroupsResult['groups'] = [];
        for (const [category, commands] of groupByCategory(resolved.commands)) {
          if (opts.category === undefined || category.toLowerCase() === opts.category.toLowerCase()) {
            groups.push({ category, commands });
          }
        }
        if (opts.category !== undefined && groups.length === 0) {
          throw new ConfigError(
            ExitCode.NOT_FOUND,
            `No commands in category '${opts.category}' for season '${season}'`,
          );
        }

        cliOutput({ season, groups }, {
          command: 'commands',
          operation: 'commands.list',
          warnings: resolved.warnings,
        });
      } catch (err) {
        exitWithError(err, 'commands.list');
      }
    });
}
