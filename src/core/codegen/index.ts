/**
 * Code generation from command templates.
 *
 * Templates reference parameters as {name}: "chassis.turnTo({angle}, {speed});".
 */

import { ConfigError } from '../errors.js';
import { findCommand, findSequence } from '../resolver/index.js';
import { ExitCode } from '../../types/exit-codes.js';
import type {
  CommandDefinition,
  CommandParameter,
  ParameterValue,
  ResolvedSeason,
} from '../../types/command.js';

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

function invalid(command: CommandDefinition, param: CommandParameter, detail: string): ConfigError {
  return new ConfigError(
    ExitCode.INVALID_INPUT,
    `Invalid value for parameter '${param.name}' of '${command.id}': ${detail}`,
  );
}

function checkRange(command: CommandDefinition, param: CommandParameter, value: number): number {
  if (param.min !== undefined && value < param.min) {
    throw invalid(command, param, `${value} is below minimum ${param.min}`);
  }
  if (param.max !== undefined && value > param.max) {
    throw invalid(command, param, `${value} is above maximum ${param.max}`);
  }
  return value;
}

/**
 * Coerce a supplied value (CLI values arrive as strings) to the
 * parameter's type and check its range.
 */
export function coerceParameter(
  command: CommandDefinition,
  param: CommandParameter,
  value: ParameterValue,
): ParameterValue {
  switch (param.type) {
    case 'int': {
      const num = typeof value === 'number' ? value : Number(value);
      if (typeof value === 'boolean' || !Number.isInteger(num) || (typeof value === 'string' && value.trim() === '')) {
        throw invalid(command, param, `expected an integer, got '${String(value)}'`);
      }
      return checkRange(command, param, num);
    }
    case 'float': {
      const num = typeof value === 'number' ? value : Number(value);
      if (typeof value === 'boolean' || !Number.isFinite(num) || (typeof value === 'string' && value.trim() === '')) {
        throw invalid(command, param, `expected a number, got '${String(value)}'`);
      }
      return checkRange(command, param, num);
    }
    case 'bool': {
      if (typeof value === 'boolean') return value;
      if (value === 'true') return true;
      if (value === 'false') return false;
      throw invalid(command, param, `expected true or false, got '${String(value)}'`);
    }
    case 'string':
      return String(value);
  }
}

/**
 * Render a command's code with parameter values filled in.
 * Missing values fall back to parameter defaults; placeholders with no
 * declared parameter are left untouched.
 *
 * @throws ConfigError INVALID_INPUT for unknown parameter names or bad values.
 */
export function generateCode(
  command: CommandDefinition,
  values: Record<string, ParameterValue> = {},
): string {
  const params = new Map(command.parameters.map((p) => [p.name, p]));
  for (const name of Object.keys(values)) {
    if (!params.has(name)) {
      throw new ConfigError(
        ExitCode.INVALID_INPUT,
        `Command '${command.id}' has no parameter '${name}'`,
        {
          fix: params.size > 0
            ? `Known parameters: ${[...params.keys()].join(', ')}`
            : 'This command takes no parameters',
        },
      );
    }
  }

  const filled = new Map<string, ParameterValue>();
  for (const param of command.parameters) {
    const supplied = Object.hasOwn(values, param.name) ? values[param.name] : undefined;
    filled.set(param.name, coerceParameter(command, param, supplied ?? param.default));
  }

  return command.code_template.replace(PLACEHOLDER, (match: string, name: string) => {
    const value = filled.get(name);
    return value === undefined ? match : String(value);
  });
}

/**
 * Parse "name=value" pairs from the command line.
 * @throws ConfigError INVALID_INPUT for pairs without '='.
 */
export function parseParamPairs(pairs: string[]): Record<string, string> {
  const values = new Map<string, string>();
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new ConfigError(
        ExitCode.INVALID_INPUT,
        `Invalid parameter '${pair}': expected name=value`,
      );
    }
    values.set(pair.slice(0, eq).trim(), pair.slice(eq + 1));
  }
  // fromEntries defines own properties, so '__proto__' stays an ordinary key
  return Object.fromEntries(values);
}

/**
 * Generate code for one command of a resolved season.
 * @throws ConfigError NOT_FOUND when the season has no such command.
 */
export function generateCommandCode(
  resolved: ResolvedSeason,
  commandId: string,
  values?: Record<string, ParameterValue>,
): string {
  const command = findCommand(resolved, commandId);
  if (!command) {
    throw new ConfigError(
      ExitCode.NOT_FOUND,
      `Command '${commandId}' not found in season '${resolved.season}'`,
    );
  }
  return generateCode(command, values);
}

/**
 * Expand a sequence into one line of code per command, using parameter defaults.
 * @throws ConfigError NOT_FOUND when the season has no such sequence.
 */
export function expandSequence(resolved: ResolvedSeason, sequenceId: string): string[] {
  const sequence = findSequence(resolved, sequenceId);
  if (!sequence) {
    throw new ConfigError(
      ExitCode.NOT_FOUND,
      `Sequence '${sequenceId}' not found in season '${resolved.season}'`,
    );
  }
  return sequence.commands.map((id) => generateCommandCode(resolved, id));
}
