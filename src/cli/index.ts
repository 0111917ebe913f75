#!/usr/bin/env node
/**
 * vexcmd CLI entry point.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { registerResolveCommand } from './commands/resolve.js';
import { registerCommandsCommand } from './commands/commands.js';
import { registerCodeCommand } from './commands/code.js';
import { registerSequenceCommand } from './commands/sequence.js';
import { registerSeasonCommand } from './commands/season.js';
import { registerCategoryCommand } from './commands/category.js';
import { registerConfigCommand } from './commands/config.js';

// Output format resolution
import { resolveFormat } from './middleware/output-format.js';
import { setFormatContext } from './format-context.js';
import { cliOutput, exitWithError } from './renderers/index.js';
import { setColorsEnabled } from './renderers/colors.js';
import { getRootOption } from './context.js';

// Centralized pino logger
import { initLogger, getLogger, closeLogger } from '../core/logger.js';
import { loadConfig, getDefaultConfig } from '../core/config.js';
import { getStateDir } from '../core/paths.js';
import type { VexcmdConfig } from '../types/config.js';

/** Read version from package.json (single source of truth). */
function getPackageVersion(): string {
  try {
    // dist/cli/index.js and src/cli/index.ts both sit two levels below the package root
    const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
      return raw.version;
    }
  } catch (err) {
    getLogger('cli').debug({ err }, 'package.json not readable');
  }
  return '0.0.0';
}

const CLI_VERSION = getPackageVersion();
const program = new Command();

program
  .name('vexcmd')
  .description('Resolve VEX season command libraries and generate command code')
  .version(CLI_VERSION)
  .option('--json', 'Output in JSON format (default)')
  .option('--human', 'Output in human-readable format')
  .option('--quiet', 'Suppress non-essential output for scripting')
  .option('--root <dir>', 'Project root (defaults to VEXCMD_ROOT or the current directory)');

program
  .command('version')
  .description('Display vexcmd version')
  .action(() => {
    cliOutput({ version: CLI_VERSION }, { command: 'version' });
  });

registerResolveCommand(program);
registerCommandsCommand(program);
registerCodeCommand(program);
registerSequenceCommand(program);
registerSeasonCommand(program);
registerCategoryCommand(program);
registerConfigCommand(program);

// Load config once, then set up logging, colors and output format before any command.
// A broken config file still lets the format resolve; the command itself reports it.
program.hook('preAction', async (_thisCommand, actionCommand) => {
  const opts = actionCommand.optsWithGlobals();
  const root = getRootOption(actionCommand);

  let config: VexcmdConfig = getDefaultConfig();
  try {
    config = await loadConfig(root);
    initLogger(getStateDir(root), config.logging);
  } catch (err) {
    getLogger('cli').warn({ err }, 'Logger init skipped; using stderr fallback');
  }

  if (!config.output.showColor) {
    setColorsEnabled(false);
  }

  try {
    setFormatContext(resolveFormat(opts, config.output.defaultFormat));
  } catch (err) {
    exitWithError(err, 'cli.flags');
  }
});

program.hook('postAction', () => {
  closeLogger();
});

program.parseAsync().catch((err: unknown) => {
  exitWithError(err, 'cli');
});
