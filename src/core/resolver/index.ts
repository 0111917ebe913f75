/**
 * Season resolution: merges the library categories a season includes with
 * the season's overrides, custom commands and sequences into one command set.
 */

import { ConfigError } from '../errors.js';
import { getLogger } from '../logger.js';
import { assertUniqueIds, loadCategory } from '../library/index.js';
import { loadSeasonConfig } from '../seasons/index.js';
import { ExitCode } from '../../types/exit-codes.js';
import type {
  Category,
  CommandDefinition,
  CommandOverride,
  CommandSequence,
  ResolvedSeason,
  SeasonConfig,
} from '../../types/command.js';

/** Directories the resolver reads from. */
export interface ResolveOptions {
  libraryDir: string;
  seasonsDir: string;
}

/** Where a command in the working set came from. */
interface Slot {
  command: CommandDefinition;
  /** Category keys that defined this id, in load order. */
  definedBy: string[];
}

/**
 * Shallow-merge an override over a base command.
 * Only fields present on the override change; id and category never do.
 */
export function applyOverride(base: CommandDefinition, override: CommandOverride): CommandDefinition {
  const merged: CommandDefinition = { ...base };
  if (override.name !== undefined) merged.name = override.name;
  if (override.code_template !== undefined) merged.code_template = override.code_template;
  if (override.color !== undefined) merged.color = override.color;
  if (override.description !== undefined) merged.description = override.description;
  if (override.parameters !== undefined) merged.parameters = override.parameters.map((p) => ({ ...p }));
  return merged;
}

/**
 * Collect category commands in order. A later category redefining an id
 * replaces the earlier definition in place and records the clash.
 */
function collectCategoryCommands(categories: Category[]): Map<string, Slot> {
  const slots = new Map<string, Slot>();
  for (const category of categories) {
    for (const command of category.commands) {
      const existing = slots.get(command.id);
      if (existing) {
        existing.command = command;
        existing.definedBy.push(category.key);
      } else {
        slots.set(command.id, { command, definedBy: [category.key] });
      }
    }
  }
  return slots;
}

/**
 * Fail on ids defined by more than one category unless the season
 * resolves them with an override or a custom command of the same id.
 */
function assertClashesResolved(slots: Map<string, Slot>, config: SeasonConfig): void {
  const customIds = new Set(config.customCommands.map((cmd) => cmd.id));
  for (const [id, slot] of slots) {
    if (slot.definedBy.length < 2) continue;
    if (Object.hasOwn(config.commandOverrides, id) || customIds.has(id)) continue;
    throw new ConfigError(
      ExitCode.ID_COLLISION,
      `Command id '${id}' is defined by multiple categories: ${slot.definedBy.join(', ')}`,
      {
        fix: `Add '${id}' to command_overrides or custom_commands in season '${config.season}', or rename it in one category`,
      },
    );
  }
}

/** Check sequence ids and the command ids they reference. */
function validateSequences(sequences: CommandSequence[], commandIds: Set<string>, season: string): void {
  const seen = new Set<string>();
  for (const sequence of sequences) {
    if (seen.has(sequence.id)) {
      throw new ConfigError(
        ExitCode.VALIDATION_ERROR,
        `Duplicate sequence id '${sequence.id}' in season '${season}'`,
      );
    }
    seen.add(sequence.id);
    if (commandIds.has(sequence.id)) {
      throw new ConfigError(
        ExitCode.VALIDATION_ERROR,
        `Sequence id '${sequence.id}' clashes with a command id in season '${season}'`,
      );
    }
    const missing = sequence.commands.filter((id) => !commandIds.has(id));
    if (missing.length > 0) {
      throw new ConfigError(
        ExitCode.VALIDATION_ERROR,
        `Sequence '${sequence.id}' references unknown command(s): ${missing.join(', ')}`,
        { fix: `Include the categories that define them or add them to custom_commands` },
      );
    }
  }
}

/** Load each referenced category once, in the order the season lists them. */
async function loadIncludedCategories(config: SeasonConfig, opts: ResolveOptions): Promise<Category[]> {
  const keys = [...new Set(config.includeCommandsFrom)];
  const categories: Category[] = [];
  for (const key of keys) {
    categories.push(await loadCategory(key, { libraryDir: opts.libraryDir }));
  }
  return categories;
}

/**
 * Merge already-loaded categories with a season config.
 * Pure: inputs are not mutated.
 */
export function mergeSeason(config: SeasonConfig, categories: Category[]): ResolvedSeason {
  const warnings: string[] = [];
  const slots = collectCategoryCommands(categories);
  assertClashesResolved(slots, config);

  for (const [id, override] of Object.entries(config.commandOverrides)) {
    const slot = slots.get(id);
    if (!slot) {
      warnings.push(`Override for '${id}' ignored: no included category defines it`);
      continue;
    }
    slot.command = applyOverride(slot.command, override);
  }

  assertUniqueIds(config.customCommands, `custom_commands of season '${config.season}'`);
  for (const command of config.customCommands) {
    const slot = slots.get(command.id);
    if (slot) {
      slot.command = command;
    } else {
      slots.set(command.id, { command, definedBy: [] });
    }
  }

  const commands = [...slots.values()].map((slot) => slot.command);
  validateSequences(config.commandSequences, new Set(slots.keys()), config.season);

  return {
    season: config.season,
    name: config.name,
    description: config.description,
    categories: categories.map((c) => c.key),
    commands,
    sequences: config.commandSequences,
    startPositions: config.startPositions,
    warnings,
  };
}

/**
 * Produce the final command set for a season.
 *
 * Loads the season config, loads every category it includes, applies
 * overrides, then custom commands (season wins on duplicate ids), and
 * validates sequences. Fails fast with ConfigError; nothing partial is returned.
 */
export async function resolveSeason(season: string, opts: ResolveOptions): Promise<ResolvedSeason> {
  const log = getLogger('resolver');
  const config = await loadSeasonConfig(season, { seasonsDir: opts.seasonsDir });
  const categories = await loadIncludedCategories(config, opts);
  const resolved = mergeSeason(config, categories);

  for (const warning of resolved.warnings) {
    log.warn({ season }, warning);
  }
  log.info(
    { season, categories: resolved.categories.length, commands: resolved.commands.length },
    'Resolved season',
  );
  return resolved;
}

/** Group commands by category, keeping first-seen category order. */
export function groupByCategory(commands: CommandDefinition[]): Map<string, CommandDefinition[]> {
  const groups = new Map<string, CommandDefinition[]>();
  for (const command of commands) {
    const group = groups.get(command.category);
    if (group) {
      group.push(command);
    } else {
      groups.set(command.category, [command]);
    }
  }
  return groups;
}

/** Look up a resolved command by id. */
export function findCommand(resolved: ResolvedSeason, id: string): CommandDefinition | undefined {
  return resolved.commands.find((cmd) => cmd.id === id);
}

/** Look up a resolved sequence by id. */
export function findSequence(resolved: ResolvedSeason, id: string): CommandSequence | undefined {
  return resolved.sequences.find((seq) => seq.id === id);
}
