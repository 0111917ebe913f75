/**
 * CLI sequence command: expand a season's command sequence into code lines.
 */

import type { Command } from 'commander';
import { resolveSeason } from '../../core/resolver/index.js';
import { expandSequence } from '../../core/codegen/index.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { loadCliContext } from '../context.js';

export function registerSequenceCommand(program: Command): void {
  program
    .command('sequence <season> <sequenceId>')
    .description('Expand a command sequence into code lines')
    .action(async (season: string, sequenceId: string, _opts: Record<string, unknown>, cmd: Command) => {
      try {
        const ctx = await loadCliContext(cmd);
        const resolved = await resolveSeason(season, ctx);
        const lines = expandSequence(resolved, sequenceId);
        cliOutput({ season, sequence: sequenceId, lines }, { command: 'sequence', operation: 'sequence.expand' });
      } catch (err) {
        exitWithError(err, 'sequence.expand');
      }
    });
}
