/**
 * Human-readable renderers for vexcmd CLI commands.
 *
 * Quiet mode prints bare values (ids, code lines) for scripting.
 */

import type { Category, CommandDefinition, ResolvedSeason, StartingPosition } from '../../types/command.js';
import type { InitSeasonResult } from '../../core/seasons/index.js';
import { bold, dim, green, yellow, cyan, swatch, pad, hRule } from './colors.js';

/** Commands of a season grouped by category. */
export interface CommandGroupsResult {
  season: string;
  groups: Array<{ category: string; commands: CommandDefinition[] }>;
}

export interface CodeResult {
  season: string;
  command: string;
  code: string;
}

export interface SequenceCodeResult {
  season: string;
  sequence: string;
  lines: string[];
}

export interface SeasonListResult {
  seasonsDir: string;
  seasons: string[];
}

export interface CategoryListResult {
  libraryDir: string;
  categories: string[];
}

export interface ConfigValueResult {
  key: string;
  value: unknown;
  source?: string;
  scope?: string;
}

export interface VersionResult {
  version: string;
}

// ---------------------------------------------------------------------------
// Shared pieces
// ---------------------------------------------------------------------------

function idWidth(commands: ReadonlyArray<{ id: string }>): number {
  return commands.reduce((max, cmd) => Math.max(max, cmd.id.length), 0);
}

function renderCommandLine(cmd: CommandDefinition, width: number): string {
  const params = cmd.parameters.length > 0
    ? dim(` (${cmd.parameters.map((p) => p.name).join(', ')})`)
    : '';
  return `  ${swatch(cmd.color)} ${pad(cmd.id, width)}  ${cmd.name}${params}  ${dim(cmd.code_template)}`;
}

function renderPosition(pos: StartingPosition): string {
  return `  ${pos.name}  ${pos.alliance}/${pos.side}  (${pos.x}, ${pos.y}) @ ${pos.heading}°`;
}

// ---------------------------------------------------------------------------
// resolve
// ---------------------------------------------------------------------------

export function renderResolve(data: ResolvedSeason, quiet: boolean): string {
  if (quiet) {
    return data.commands.map((cmd) => cmd.id).join('\n');
  }

  const lines: string[] = [];
  lines.push(`${bold('Season:')} ${data.name} ${dim(`(${data.season})`)}`);
  if (data.description) lines.push(dim(data.description));
  lines.push(`${bold('Categories:')} ${data.categories.join(', ') || dim('none')}`);
  lines.push(hRule());

  lines.push(bold(`Commands (${data.commands.length})`));
  const width = idWidth(data.commands);
  for (const cmd of data.commands) {
    lines.push(renderCommandLine(cmd, width));
  }

  if (data.sequences.length > 0) {
    lines.push('');
    lines.push(bold(`Sequences (${data.sequences.length})`));
    for (const seq of data.sequences) {
      lines.push(`  ${swatch(seq.color)} ${seq.id}  ${seq.name}  ${dim(seq.commands.join(' -> '))}`);
    }
  }

  if (data.startPositions.length > 0) {
    lines.push('');
    lines.push(bold('Start positions'));
    for (const pos of data.startPositions) {
      lines.push(renderPosition(pos));
    }
  }

  if (data.warnings.length > 0) {
    lines.push('');
    for (const warning of data.warnings) {
      lines.push(yellow(`⚠ ${warning}`));
    }
  }

  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// commands: grouped listing
// ---------------------------------------------------------------------------

export function renderCommandGroups(data: CommandGroupsResult, quiet: boolean): string {
  if (quiet) {
    return data.groups.flatMap((g) => g.commands.map((cmd) => cmd.id)).join('\n');
  }

  const lines: string[] = [];
  for (const group of data.groups) {
    lines.push(`${cyan(bold(group.category))} ${dim(`(${group.commands.length})`)}`);
    const width = idWidth(group.commands);
    for (const cmd of group.commands) {
      lines.push(renderCommandLine(cmd, width));
    }
  }
  if (lines.length === 0) {
    lines.push(dim(`No commands in season ${data.season}`));
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// code / sequence
// ---------------------------------------------------------------------------

export function renderCode(data: CodeResult, _quiet: boolean): string {
  return data.code;
}

export function renderSequenceCode(data: SequenceCodeResult, _quiet: boolean): string {
  return data.lines.join('\n');
}

// ---------------------------------------------------------------------------
// season / category
// ---------------------------------------------------------------------------

export function renderSeasonList(data: SeasonListResult, quiet: boolean): string {
  if (quiet) return data.seasons.join('\n');
  if (data.seasons.length === 0) return dim(`No seasons in ${data.seasonsDir}`);
  return [bold(`Seasons (${data.seasons.length})`), ...data.seasons.map((s) => `  ${s}`)].join('\n');
}

export function renderSeasonInit(data: InitSeasonResult, quiet: boolean): string {
  if (quiet) return data.file;
  const verb = data.overwritten ? 'Rewrote' : 'Created';
  return [
    `${green('✓')} ${verb} season ${bold(data.season)}`,
    `  ${dim('File:')} ${data.file}`,
    `  ${dim('Categories:')} ${data.includeCommandsFrom.join(', ') || 'none'}`,
  ].join('\n');
}

export function renderCategoryList(data: CategoryListResult, quiet: boolean): string {
  if (quiet) return data.categories.join('\n');
  if (data.categories.length === 0) return dim(`No categories in ${data.libraryDir}`);
  return [bold(`Categories (${data.categories.length})`), ...data.categories.map((c) => `  ${c}`)].join('\n');
}

export function renderCategory(data: Category, quiet: boolean): string {
  if (quiet) {
    return data.commands.map((cmd) => cmd.id).join('\n');
  }
  const lines = [`${cyan(bold(data.category))} ${dim(`[${data.key}]`)}`];
  if (data.description) lines.push(dim(data.description));
  const width = idWidth(data.commands);
  for (const cmd of data.commands) {
    lines.push(renderCommandLine(cmd, width));
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// config / version
// ---------------------------------------------------------------------------

export function renderConfigValue(data: ConfigValueResult, quiet: boolean): string {
  const value = data.value === undefined
    ? ''
    : typeof data.value === 'string' ? data.value : JSON.stringify(data.value);
  if (quiet) return value;
  const where = data.source ?? data.scope;
  return `${data.key} = ${value}${where ? dim(` (${where})`) : ''}`;
}

export function renderVersion(data: VersionResult, quiet: boolean): string {
  if (quiet) return data.version;
  return `vexcmd v${data.version}`;
}
