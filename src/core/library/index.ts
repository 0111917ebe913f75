/**
 * Command category library: one JSON file per mechanism under the
 * library directory (command_library/intake.json, conveyor.json, ...).
 */

import { readdir } from 'node:fs/promises';
import { ConfigError } from '../errors.js';
import { getLogger } from '../logger.js';
import { getCategoryPath } from '../paths.js';
import { validateAgainstSchema } from '../schema.js';
import { readJsonRequired } from '../../store/json.js';
import { ExitCode } from '../../types/exit-codes.js';
import type {
  Category,
  CommandDefinition,
  CommandDefinitionInput,
} from '../../types/command.js';

export const DEFAULT_COMMAND_COLOR = '#FFFFFF';

/** Category assigned to season commands that do not name one. */
export const CUSTOM_CATEGORY = 'Custom';

/** Options shared by library operations. */
export interface LibraryOptions {
  /** Absolute path of the command library directory. */
  libraryDir: string;
}

/**
 * Apply defaults to a command read from disk and stamp it with `category`.
 * Library files pass their own category; season custom commands pass
 * theirs or CUSTOM_CATEGORY.
 */
export function normalizeCommand(
  input: CommandDefinitionInput,
  category: string,
): CommandDefinition {
  return {
    id: input.id,
    name: input.name,
    code_template: input.code_template,
    color: input.color ?? DEFAULT_COMMAND_COLOR,
    category,
    description: input.description ?? '',
    parameters: (input.parameters ?? []).map((p) => ({ ...p })),
  };
}

/**
 * Throw ID_COLLISION if any id appears twice.
 * `where` names the file or section in the message.
 */
export function assertUniqueIds(items: ReadonlyArray<{ id: string }>, where: string, file?: string): void {
  const seen = new Set<string>();
  for (const { id } of items) {
    if (seen.has(id)) {
      throw new ConfigError(
        ExitCode.ID_COLLISION,
        `Duplicate command id '${id}' in ${where}`,
        { file, fix: `Rename or remove one of the '${id}' entries` },
      );
    }
    seen.add(id);
  }
}

/**
 * Load and validate one category file.
 *
 * @param name - File stem, e.g. 'intake' for command_library/intake.json
 * @throws ConfigError NOT_FOUND when the file is missing,
 *   VALIDATION_ERROR when it is malformed or breaks the schema,
 *   ID_COLLISION when two commands share an id.
 */
export async function loadCategory(name: string, opts: LibraryOptions): Promise<Category> {
  const file = getCategoryPath(opts.libraryDir, name);
  const raw = await readJsonRequired(file, `Command category '${name}'`);
  const data = validateAgainstSchema(raw, 'category', file);

  assertUniqueIds(data.commands, `category '${name}'`, file);

  const commands = data.commands.map((cmd) => normalizeCommand(cmd, data.category));
  getLogger('library').debug({ category: name, file, count: commands.length }, 'Loaded command category');

  return {
    key: name,
    category: data.category,
    description: data.description ?? '',
    commands,
  };
}

/**
 * List category names (file stems) available in the library, sorted.
 * A missing library directory yields an empty list.
 */
export async function listCategories(opts: LibraryOptions): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(opts.libraryDir);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return [];
    }
    throw new ConfigError(
      ExitCode.FILE_ERROR,
      `Failed to read command library: ${opts.libraryDir}`,
      { file: opts.libraryDir, cause: err },
    );
  }
  return entries
    .filter((entry) => entry.endsWith('.json'))
    .map((entry) => entry.slice(0, -'.json'.length))
    .sort();
}
