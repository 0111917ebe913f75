/**
 * CLI category command group: inspect the command library.
 */

import type { Command } from 'commander';
import { listCategories, loadCategory } from '../../core/library/index.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { loadCliContext } from '../context.js';

export function registerCategoryCommand(program: Command): void {
  const category = program
    .command('category')
    .description('Command library categories');

  category
    .command('list')
    .description('List category files in the library directory')
    .action(async (_opts: Record<string, unknown>, cmd: Command) => {
      try {
        const ctx = await loadCliContext(cmd);
        const categories = await listCategories(ctx);
        cliOutput({ libraryDir: ctx.libraryDir, categories }, { command: 'category.list', operation: 'category.list' });
      } catch (err) {
        exitWithError(err, 'category.list');
      }
    });

  category
    .command('show <name>')
    .description('Show the validated commands of one category')
    .action(async (name: string, _opts: Record<string, unknown>, cmd: Command) => {
      try {
        const ctx = await loadCliContext(cmd);
        const loaded = await loadCategory(name, ctx);
        cliOutput(loaded, { command: 'category.show', operation: 'category.show' });
      } catch (err) {
        exitWithError(err, 'category.show');
      }
    });
}
