/**
 * Command library type definitions matching category.schema.json and
 * season.schema.json.
 */

/** Value types a command parameter can take. */
export type ParameterType = 'int' | 'float' | 'bool' | 'string';

/** Scalar value accepted for a command parameter. */
export type ParameterValue = number | boolean | string;

/** A parameter substituted into a command's code template (e.g. velocity). */
export interface CommandParameter {
  name: string;
  type: ParameterType;
  default: ParameterValue;
  min?: number;
  max?: number;
  description?: string;
}

/** A command as written in a category or season file. */
export interface CommandDefinitionInput {
  id: string;
  name: string;
  code_template: string;
  color?: string;
  category?: string;
  description?: string;
  parameters?: CommandParameter[];
}

/** A command with defaults applied and its category stamped. */
export interface CommandDefinition {
  id: string;
  name: string;
  code_template: string;
  color: string;
  category: string;
  description: string;
  parameters: CommandParameter[];
}

/** Contents of a command_library/<name>.json file. */
export interface CategoryFile {
  category: string;
  description?: string;
  commands: CommandDefinitionInput[];
}

/** A loaded category. Owns its commands. */
export interface Category {
  /** File stem the category was loaded from. */
  key: string;
  category: string;
  description: string;
  commands: CommandDefinition[];
}

/** Season-level replacement of fields on a library command. */
export type CommandOverride = Partial<
  Pick<CommandDefinition, 'name' | 'code_template' | 'color' | 'description' | 'parameters'>
>;

/** A sequence of commands run together, as written in a season file. */
export interface CommandSequenceInput {
  id: string;
  name: string;
  commands: string[];
  color?: string;
  category?: string;
  description?: string;
}

/** A sequence with defaults applied. */
export interface CommandSequence {
  id: string;
  name: string;
  commands: string[];
  color: string;
  category: string;
  description: string;
}

export type Alliance = 'red' | 'blue';

/** Which half of the field a routine runs on; 'full' is skills. */
export type FieldSide = 'left' | 'right' | 'full';

/** A default robot starting pose. x/y in field inches from center, heading in degrees. */
export interface StartingPosition {
  name: string;
  alliance: Alliance;
  side: FieldSide;
  x: number;
  y: number;
  heading: number;
}

/** Contents of a seasons/<season>/config.json file. */
export interface SeasonFile {
  season?: string;
  name?: string;
  description?: string;
  include_commands_from?: string[];
  command_overrides?: Record<string, CommandOverride>;
  custom_commands?: CommandDefinitionInput[];
  command_sequences?: CommandSequenceInput[];
  start_positions?: StartingPosition[];
}

/** A loaded season config with every collection present. */
export interface SeasonConfig {
  season: string;
  name: string;
  description: string;
  includeCommandsFrom: string[];
  commandOverrides: Record<string, CommandOverride>;
  customCommands: CommandDefinition[];
  commandSequences: CommandSequence[];
  startPositions: StartingPosition[];
}

/** Final command set for a season. */
export interface ResolvedSeason {
  season: string;
  name: string;
  description: string;
  categories: string[];
  commands: CommandDefinition[];
  sequences: CommandSequence[];
  startPositions: StartingPosition[];
  /** Non-fatal problems found while resolving (e.g. overrides with no target). */
  warnings: string[];
}
