/**
 * CLI code command: render one command's code template.
 */

import type { Command } from 'commander';
import { resolveSeason } from '../../core/resolver/index.js';
import { generateCommandCode, parseParamPairs } from '../../core/codegen/index.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { loadCliContext } from '../context.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function registerCodeCommand(program: Command): void {
  program
    .command('code <season> <commandId>')
    .description('Generate code for a command, filling its parameters')
    .option('-p, --param <name=value>', 'Parameter value (repeatable)', collect, [])
    .action(async (season: string, commandId: string, opts: { param: string[] }, cmd: Command) => {
      try {
        const ctx = await loadCliContext(cmd);
        const values = parseParamPairs(opts.param);
        const resolved = await resolveSeason(season, ctx);
        const code = generateCommandCode(resolved, commandId, values);
        cliOutput({ season, command: commandId, code }, { command: 'code', operation: 'code.generate' });
      } catch (err) {
        exitWithError(err, 'code.generate');
      }
    });
}
