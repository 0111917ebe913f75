/**
 * CLI season command group: list and scaffold season configs.
 */

import type { Command } from 'commander';
import { initSeason, listSeasons } from '../../core/seasons/index.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { loadCliContext } from '../context.js';

export function registerSeasonCommand(program: Command): void {
  const season = program
    .command('season')
    .description('Season config management');

  season
    .command('list')
    .description('List seasons that have a config.json')
    .action(async (_opts: Record<string, unknown>, cmd: Command) => {
      try {
        const ctx = await loadCliContext(cmd);
        const seasons = await listSeasons(ctx);
        cliOutput({ seasonsDir: ctx.seasonsDir, seasons }, { command: 'season.list', operation: 'season.list' });
      } catch (err) {
        exitWithError(err, 'season.list');
      }
    });

  season
    .command('init <season>')
    .description('Create a season config that includes every library category')
    .option('--name <name>', 'Display name for the season')
    .option('--force', 'Overwrite an existing config')
    .action(async (id: string, opts: { name?: string; force?: boolean }, cmd: Command) => {
      try {
        const ctx = await loadCliContext(cmd);
        const result = await initSeason(id, {
          seasonsDir: ctx.seasonsDir,
          libraryDir: ctx.libraryDir,
          name: opts.name,
          force: opts.force === true,
        });
        cliOutput(result, {
          command: 'season.init',
          operation: 'season.init',
          message: `Season ${id} initialized`,
        });
      } catch (err) {
        exitWithError(err, 'season.init');
      }
    });
}
