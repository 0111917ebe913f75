/**
 * Tests for season resolution: category merge, overrides, custom commands
 * and sequence validation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  resolveSeason,
  mergeSeason,
  applyOverride,
  groupByCategory,
  findCommand,
  findSequence,
} from '../index.js';
import { loadCategory } from '../../library/index.js';
import { ExitCode } from '../../../types/exit-codes.js';
import type { CommandDefinition, SeasonConfig } from '../../../types/command.js';

const INTAKE = {
  category: 'Intake',
  commands: [
    { id: 'intake_in', name: 'Intake In', code_template: 'mech.intakeIn();', color: '#00FF00', description: 'Spin inward' },
    { id: 'intake_out', name: 'Intake Out', code_template: 'mech.intakeOut();', color: '#FF6600' },
  ],
};

const TIMING = {
  category: 'Timing',
  commands: [
    { id: 'wait_250', name: 'Wait 250ms', code_template: 'pros::delay(250);', color: '#888888' },
  ],
};

describe('resolveSeason', () => {
  let tempDir: string;
  let libraryDir: string;
  let seasonsDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'vexcmd-resolver-'));
    libraryDir = join(tempDir, 'command_library');
    seasonsDir = join(tempDir, 'seasons');
    await mkdir(libraryDir, { recursive: true });
    await writeFile(join(libraryDir, 'intake.json'), JSON.stringify(INTAKE));
    await writeFile(join(libraryDir, 'timing.json'), JSON.stringify(TIMING));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function writeSeason(season: string, data: unknown): Promise<void> {
    await mkdir(join(seasonsDir, season), { recursive: true });
    await writeFile(join(seasonsDir, season, 'config.json'), JSON.stringify(data));
  }

  function resolve(season: string) {
    return resolveSeason(season, { libraryDir, seasonsDir });
  }

  it('returns the category commands unchanged when there are no overrides', async () => {
    await writeSeason('plain', { include_commands_from: ['intake', 'timing'] });

    const resolved = await resolve('plain');
    const intake = await loadCategory('intake', { libraryDir });
    const timing = await loadCategory('timing', { libraryDir });
    expect(resolved.commands).toEqual([...intake.commands, ...timing.commands]);
    expect(resolved.categories).toEqual(['intake', 'timing']);
    expect(resolved.warnings).toEqual([]);
  });

  it('changes only the overridden fields', async () => {
    await writeSeason('pushback_2026', {
      include_commands_from: ['intake'],
      command_overrides: { intake_in: { name: 'Intake Fast', code_template: 'mech.intakeIn(127);' } },
    });

    const resolved = await resolve('pushback_2026');
    expect(findCommand(resolved, 'intake_in')).toEqual({
      id: 'intake_in',
      name: 'Intake Fast',
      code_template: 'mech.intakeIn(127);',
      color: '#00FF00',
      category: 'Intake',
      description: 'Spin inward',
      parameters: [],
    });
    expect(findCommand(resolved, 'intake_out')?.name).toBe('Intake Out');
  });

  it('fails with NOT_FOUND when an included category does not exist', async () => {
    await writeSeason('bad_ref', { include_commands_from: ['intake', 'lift'] });
    await expect(resolve('bad_ref')).rejects.toMatchObject({ code: ExitCode.NOT_FOUND });
  });

  it('fails with NOT_FOUND when the season does not exist', async () => {
    await expect(resolve('missing')).rejects.toMatchObject({ code: ExitCode.NOT_FOUND });
  });

  it('loads a category listed twice only once', async () => {
    await writeSeason('twice', { include_commands_from: ['intake', 'intake'] });
    const resolved = await resolve('twice');
    expect(resolved.categories).toEqual(['intake']);
    expect(resolved.commands.map((c) => c.id)).toEqual(['intake_in', 'intake_out']);
  });

  describe('ids defined by two categories', () => {
    beforeEach(async () => {
      await writeFile(join(libraryDir, 'rollers.json'), JSON.stringify({
        category: 'Rollers',
        commands: [{ id: 'intake_in', name: 'Roller In', code_template: 'mech.rollerIn();' }],
      }));
    });

    it('fail with ID_COLLISION when the season does not resolve them', async () => {
      await writeSeason('clash', { include_commands_from: ['intake', 'rollers'] });
      await expect(resolve('clash')).rejects.toMatchObject({
        code: ExitCode.ID_COLLISION,
        message: "Command id 'intake_in' is defined by multiple categories: intake, rollers",
      });
    });

    it('resolve to the season custom command', async () => {
      await writeSeason('season_wins', {
        include_commands_from: ['intake', 'rollers'],
        custom_commands: [{ id: 'intake_in', name: 'Season Intake', code_template: 'mech.seasonIntake();' }],
      });

      const resolved = await resolve('season_wins');
      expect(resolved.commands.map((c) => c.id)).toEqual(['intake_in', 'intake_out']);
      expect(findCommand(resolved, 'intake_in')).toMatchObject({
        name: 'Season Intake',
        code_template: 'mech.seasonIntake();',
        category: 'Custom',
      });
    });

    it('resolve with an override applied over the later category', async () => {
      await writeSeason('override_wins', {
        include_commands_from: ['intake', 'rollers'],
        command_overrides: { intake_in: { color: '#123456' } },
      });

      const resolved = await resolve('override_wins');
      expect(findCommand(resolved, 'intake_in')).toMatchObject({
        name: 'Roller In',
        category: 'Rollers',
        color: '#123456',
      });
    });
  });

  it('replaces a category command with a custom command of the same id in place', async () => {
    await writeSeason('replace', {
      include_commands_from: ['intake', 'timing'],
      custom_commands: [
        { id: 'intake_in', name: 'Custom In', code_template: 'x();', category: 'Intake' },
        { id: 'descore', name: 'Descore', code_template: 'mech.descore();' },
      ],
    });

    const resolved = await resolve('replace');
    expect(resolved.commands.map((c) => c.id)).toEqual(['intake_in', 'intake_out', 'wait_250', 'descore']);
    expect(findCommand(resolved, 'intake_in')?.name).toBe('Custom In');
    expect(findCommand(resolved, 'descore')?.category).toBe('Custom');
  });

  it('fails with ID_COLLISION on duplicate custom command ids', async () => {
    await writeSeason('dup_custom', {
      custom_commands: [
        { id: 'descore', name: 'A', code_template: 'a();' },
        { id: 'descore', name: 'B', code_template: 'b();' },
      ],
    });
    await expect(resolve('dup_custom')).rejects.toMatchObject({
      code: ExitCode.ID_COLLISION,
      message: "Duplicate command id 'descore' in custom_commands of season 'dup_custom'",
    });
  });

  it('records a warning for an override with no target', async () => {
    await writeSeason('stale', {
      include_commands_from: ['intake'],
      command_overrides: { wait_250: { name: 'Wait' } },
    });

    const resolved = await resolve('stale');
    expect(resolved.warnings).toEqual(["Override for 'wait_250' ignored: no included category defines it"]);
    expect(findCommand(resolved, 'wait_250')).toBeUndefined();
  });

  describe('sequences', () => {
    it('keep valid sequences', async () => {
      await writeSeason('seq', {
        include_commands_from: ['intake', 'timing'],
        command_sequences: [{ id: 'grab', name: 'Grab', commands: ['intake_in', 'wait_250', 'intake_out'] }],
      });
      const resolved = await resolve('seq');
      expect(findSequence(resolved, 'grab')?.commands).toEqual(['intake_in', 'wait_250', 'intake_out']);
    });

    it('reject references to unknown commands', async () => {
      await writeSeason('seq_bad', {
        include_commands_from: ['intake'],
        command_sequences: [{ id: 'grab', name: 'Grab', commands: ['intake_in', 'wait_250'] }],
      });
      await expect(resolve('seq_bad')).rejects.toMatchObject({
        code: ExitCode.VALIDATION_ERROR,
        message: "Sequence 'grab' references unknown command(s): wait_250",
      });
    });

    it('reject ids that clash with a command id', async () => {
      await writeSeason('seq_clash', {
        include_commands_from: ['intake'],
        command_sequences: [{ id: 'intake_in', name: 'Grab', commands: ['intake_out'] }],
      });
      await expect(resolve('seq_clash')).rejects.toMatchObject({ code: ExitCode.VALIDATION_ERROR });
    });

    it('reject duplicate sequence ids', async () => {
      await writeSeason('seq_dup', {
        include_commands_from: ['intake'],
        command_sequences: [
          { id: 'grab', name: 'Grab', commands: ['intake_in'] },
          { id: 'grab', name: 'Grab 2', commands: ['intake_out'] },
        ],
      });
      await expect(resolve('seq_dup')).rejects.toMatchObject({
        code: ExitCode.VALIDATION_ERROR,
        message: "Duplicate sequence id 'grab' in season 'seq_dup'",
      });
    });
  });
});

function command(id: string, category: string): CommandDefinition {
  return { id, name: id, code_template: `${id}();`, color: '#FFFFFF', category, description: '', parameters: [] };
}

function seasonConfig(overrides: Partial<SeasonConfig> = {}): SeasonConfig {
  return {
    season: 'test',
    name: 'test',
    description: '',
    includeCommandsFrom: [],
    commandOverrides: {},
    customCommands: [],
    commandSequences: [],
    startPositions: [],
    ...overrides,
  };
}

describe('mergeSeason', () => {
  it('does not mutate its inputs', () => {
    const base = command('arm_toggle', 'Pneumatics');
    const categories = [{ key: 'pneumatics', category: 'Pneumatics', description: '', commands: [base] }];
    const config = seasonConfig({ commandOverrides: { arm_toggle: { name: 'Arm' } } });

    const resolved = mergeSeason(config, categories);
    expect(resolved.commands[0]?.name).toBe('Arm');
    expect(base.name).toBe('arm_toggle');
    expect(categories[0]?.commands[0]).toBe(base);
  });

  it('detects clashes on ids named like Object members', () => {
    const categories = [
      { key: 'a', category: 'A', description: '', commands: [command('constructor', 'A')] },
      { key: 'b', category: 'B', description: '', commands: [command('constructor', 'B')] },
    ];
    try {
      mergeSeason(seasonConfig(), categories);
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toMatchObject({
        code: ExitCode.ID_COLLISION,
        message: "Command id 'constructor' is defined by multiple categories: a, b",
      });
    }
  });

  it('accepts a clash on such an id once the season overrides it', () => {
    const categories = [
      { key: 'a', category: 'A', description: '', commands: [command('toString', 'A')] },
      { key: 'b', category: 'B', description: '', commands: [command('toString', 'B')] },
    ];
    const resolved = mergeSeason(seasonConfig({ commandOverrides: { toString: { name: 'Stringify' } } }), categories);
    expect(resolved.commands).toEqual([{ ...command('toString', 'B'), name: 'Stringify' }]);
  });
});

describe('applyOverride', () => {
  it('copies override parameters', () => {
    const parameters = [{ name: 'ms', type: 'int' as const, default: 10 }];
    const merged = applyOverride(command('wait', 'Timing'), { parameters });
    expect(merged.parameters).toEqual(parameters);
    expect(merged.parameters[0]).not.toBe(parameters[0]);
  });
});

describe('groupByCategory', () => {
  it('groups in first-seen category order', () => {
    const groups = groupByCategory([
      command('intake_in', 'Intake'),
      command('wait_250', 'Timing'),
      command('intake_out', 'Intake'),
    ]);
    expect([...groups.keys()]).toEqual(['Intake', 'Timing']);
    expect(groups.get('Intake')?.map((c) => c.id)).toEqual(['intake_in', 'intake_out']);
  });
});
