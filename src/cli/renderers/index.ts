/**
 * Central output dispatch for vexcmd CLI commands.
 *
 * Provides cliOutput(), which checks the resolved format (JSON/human/quiet)
 * and dispatches to either the JSON envelope (formatSuccess) or a
 * human-readable renderer.
 *
 * Commands call:
 *   cliOutput(data, { command: 'resolve', message, operation, warnings })
 */

import { getFormatContext } from '../format-context.js';
import { formatError, formatSuccess, type FormatOptions } from '../../core/output.js';
import { ConfigError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Category, ResolvedSeason } from '../../types/command.js';
import type { InitSeasonResult } from '../../core/seasons/index.js';
import {
  renderResolve, renderCommandGroups, renderCode, renderSequenceCode,
  renderSeasonList, renderSeasonInit, renderCategoryList, renderCategory,
  renderConfigValue, renderVersion,
  type CommandGroupsResult, type CodeResult, type SequenceCodeResult,
  type SeasonListResult, type CategoryListResult, type ConfigValueResult,
  type VersionResult,
} from './commands.js';

// ---------------------------------------------------------------------------
// Renderer registry: maps command name to its result type and human renderer
// ---------------------------------------------------------------------------

/** Result payload of each command. */
export interface CommandResults {
  'resolve': ResolvedSeason;
  'commands': CommandGroupsResult;
  'code': CodeResult;
  'sequence': SequenceCodeResult;
  'season.list': SeasonListResult;
  'season.init': InitSeasonResult;
  'category.list': CategoryListResult;
  'category.show': Category;
  'config': ConfigValueResult;
  'version': VersionResult;
}

export type CliCommandName = keyof CommandResults;

type HumanRenderers = {
  [K in CliCommandName]: (data: CommandResults[K], quiet: boolean) => string;
};

const renderers: HumanRenderers = {
  'resolve': renderResolve,
  'commands': renderCommandGroups,
  'code': renderCode,
  'sequence': renderSequenceCode,
  'season.list': renderSeasonList,
  'season.init': renderSeasonInit,
  'category.list': renderCategoryList,
  'category.show': renderCategory,
  'config': renderConfigValue,
  'version': renderVersion,
};

// ---------------------------------------------------------------------------
// Options for cliOutput
// ---------------------------------------------------------------------------

export interface CliOutputOptions<K extends CliCommandName> {
  /** Command name (used to pick the human renderer). */
  command: K;
  /** Optional success message for the JSON envelope. */
  message?: string;
  /** Operation name for envelope _meta. Defaults to the command name. */
  operation?: string;
  /** Non-fatal warnings to surface in _meta. */
  warnings?: string[];
}

/** Render a result for humans without printing it. */
export function renderHuman<K extends CliCommandName>(
  command: K,
  data: CommandResults[K],
  quiet: boolean,
): string {
  const renderer = renderers[command];
  return renderer(data, quiet);
}

/**
 * Output data to stdout in the resolved format (JSON or human-readable).
 */
export function cliOutput<K extends CliCommandName>(data: CommandResults[K], opts: CliOutputOptions<K>): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    const text = renderHuman(opts.command, data, ctx.quiet);
    if (text) {
      console.log(text);
    }
    return;
  }

  const formatOpts: FormatOptions = {
    operation: opts.operation ?? opts.command,
    ...(opts.warnings && { warnings: opts.warnings }),
  };
  console.log(formatSuccess(data, opts.message, formatOpts));
}

/**
 * Output an error in the resolved format on stderr.
 * JSON: error envelope. Human: "Error: message (CODE)" plus the fix hint.
 */
export function cliError(error: ConfigError, operation?: string): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    console.error(`Error: ${error.message} (${error.code})`);
    if (error.fix && !ctx.quiet) {
      console.error(`  Fix: ${error.fix}`);
    }
    return;
  }

  console.error(formatError(error, operation));
}

/**
 * Report a failed command and exit with its code.
 * Unknown errors are wrapped as GENERAL_ERROR.
 */
export function exitWithError(err: unknown, operation?: string): never {
  const error = err instanceof ConfigError
    ? err
    : new ConfigError(
      ExitCode.GENERAL_ERROR,
      err instanceof Error ? err.message : String(err),
      { cause: err },
    );
  getLogger('cli').error({ err: error, operation }, error.message);
  cliError(error, operation);
  process.exit(error.code);
}
