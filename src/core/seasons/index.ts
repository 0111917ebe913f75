/**
 * Season configs: seasons/<season>/config.json picks library categories,
 * overrides their commands, and adds season-only commands, sequences and
 * starting positions.
 */

import { existsSync } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigError } from '../errors.js';
import { getLogger } from '../logger.js';
import { CUSTOM_CATEGORY, DEFAULT_COMMAND_COLOR, listCategories, normalizeCommand } from '../library/index.js';
import { getSeasonConfigPath, SEASON_CONFIG_FILE } from '../paths.js';
import { checkSchema, validateAgainstSchema } from '../schema.js';
import { readJsonRequired, saveJson } from '../../store/json.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { CommandSequence, CommandSequenceInput, SeasonConfig, SeasonFile } from '../../types/command.js';

export const DEFAULT_SEQUENCE_CATEGORY = 'Sequences';

const SEASON_ID_PATTERN = /^[A-Za-z0-9_.-]+$/;

/** Options shared by season operations. */
export interface SeasonOptions {
  /** Absolute path of the seasons directory. */
  seasonsDir: string;
}

/** Reject season ids that could escape the seasons directory. */
export function assertSeasonId(season: string): void {
  if (!SEASON_ID_PATTERN.test(season) || season === '.' || season === '..') {
    throw new ConfigError(
      ExitCode.INVALID_INPUT,
      `Invalid season id '${season}'`,
      { fix: 'Use letters, digits, dot, dash or underscore (e.g. pushback_2026)' },
    );
  }
}

function normalizeSequence(input: CommandSequenceInput): CommandSequence {
  return {
    id: input.id,
    name: input.name,
    commands: [...input.commands],
    color: input.color ?? DEFAULT_COMMAND_COLOR,
    category: input.category ?? DEFAULT_SEQUENCE_CATEGORY,
    description: input.description ?? '',
  };
}

/** Fill every optional collection of a validated season file. */
export function normalizeSeason(season: string, data: SeasonFile): SeasonConfig {
  return {
    season: data.season ?? season,
    name: data.name ?? season,
    description: data.description ?? '',
    includeCommandsFrom: [...(data.include_commands_from ?? [])],
    commandOverrides: { ...(data.command_overrides ?? {}) },
    customCommands: (data.custom_commands ?? []).map((cmd) => normalizeCommand(cmd, cmd.category ?? CUSTOM_CATEGORY)),
    commandSequences: (data.command_sequences ?? []).map(normalizeSequence),
    startPositions: (data.start_positions ?? []).map((pos) => ({ ...pos })),
  };
}

/**
 * Load and validate a season config.
 *
 * @throws ConfigError NOT_FOUND when the config is missing,
 *   VALIDATION_ERROR when it is malformed or breaks the schema.
 */
export async function loadSeasonConfig(season: string, opts: SeasonOptions): Promise<SeasonConfig> {
  assertSeasonId(season);
  const file = getSeasonConfigPath(opts.seasonsDir, season);
  const raw = await readJsonRequired(file, `Season config '${season}'`);
  const data = validateAgainstSchema(raw, 'season', file);
  const config = normalizeSeason(season, data);

  getLogger('seasons').debug(
    { season, file, categories: config.includeCommandsFrom },
    'Loaded season config',
  );
  return config;
}

/**
 * List seasons (directories holding a config.json), sorted.
 * A missing seasons directory yields an empty list.
 */
export async function listSeasons(opts: SeasonOptions): Promise<string[]> {
  if (!existsSync(opts.seasonsDir)) return [];

  const entries = await readdir(opts.seasonsDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .filter((name) => existsSync(join(opts.seasonsDir, name, SEASON_CONFIG_FILE)))
    .sort();
}

/** Options for initSeason. */
export interface InitSeasonOptions extends SeasonOptions {
  /** Library directory whose categories the new season includes. */
  libraryDir: string;
  /** Display name. Defaults to the season id. */
  name?: string;
  /** Overwrite an existing config. */
  force?: boolean;
}

/** Result of initSeason. */
export interface InitSeasonResult {
  season: string;
  file: string;
  includeCommandsFrom: string[];
  overwritten: boolean;
}

/**
 * Write a skeleton config for a new season that includes every library category.
 *
 * @throws ConfigError ALREADY_EXISTS when the config exists and force is not set.
 */
export async function initSeason(season: string, opts: InitSeasonOptions): Promise<InitSeasonResult> {
  assertSeasonId(season);
  const file = getSeasonConfigPath(opts.seasonsDir, season);
  const exists = existsSync(file);
  if (exists && !opts.force) {
    throw new ConfigError(
      ExitCode.ALREADY_EXISTS,
      `Season config already exists: ${file}`,
      { file, fix: 'Pass --force to overwrite it' },
    );
  }

  const includeCommandsFrom = await listCategories({ libraryDir: opts.libraryDir });
  const skeleton: SeasonFile = {
    season,
    name: opts.name ?? season,
    description: '',
    include_commands_from: includeCommandsFrom,
    command_overrides: {},
    custom_commands: [],
    command_sequences: [],
    start_positions: [],
  };

  await saveJson(file, skeleton, {
    validate: (data) => {
      const errors = checkSchema(data, 'season');
      if (errors.length > 0) {
        throw new ConfigError(
          ExitCode.VALIDATION_ERROR,
          `Generated season config is invalid: ${errors.join('; ')}`,
          { file },
        );
      }
    },
  });

  getLogger('seasons').info({ season, file, overwritten: exists }, 'Initialized season config');
  return { season, file, includeCommandsFrom, overwritten: exists };
}
