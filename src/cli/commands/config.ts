/**
 * CLI config command - configuration management.
 */

import type { Command } from 'commander';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { getConfigValue, setConfigValue } from '../../core/config.js';
import { getRootOption } from '../context.js';

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Configuration management');

  config
    .command('get <key>')
    .description('Get a configuration value and where it came from')
    .action(async (key: string, _opts: Record<string, unknown>, cmd: Command) => {
      try {
        const resolved = await getConfigValue(key, getRootOption(cmd));
        cliOutput({
          key,
          value: resolved.value,
          source: resolved.source,
        }, { command: 'config', operation: 'config.get' });
      } catch (err) {
        exitWithError(err, 'config.get');
      }
    });

  config
    .command('set <key> <value>')
    .description('Set a configuration value')
    .option('--global', 'Set in global config instead of project config')
    .action(async (key: string, value: string, opts: { global?: boolean }, cmd: Command) => {
      try {
        const result = await setConfigValue(key, value, getRootOption(cmd), { global: opts.global === true });
        cliOutput(result, { command: 'config', operation: 'config.set' });
      } catch (err) {
        exitWithError(err, 'config.set');
      }
    });
}
