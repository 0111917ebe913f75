/**
 * Tests for human-readable renderers (colors disabled).
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import {
  renderResolve,
  renderCommandGroups,
  renderCode,
  renderSequenceCode,
  renderSeasonList,
  renderSeasonInit,
  renderCategoryList,
  renderCategory,
  renderConfigValue,
  renderVersion,
} from '../commands.js';
import { areColorsEnabled, setColorsEnabled, swatch, pad } from '../colors.js';
import type { CommandDefinition, ResolvedSeason } from '../../../types/command.js';

const INTAKE_IN: CommandDefinition = {
  id: 'intake_in',
  name: 'Intake In',
  code_template: 'mech.intakeIn();',
  color: '#00FF00',
  category: 'Intake',
  description: '',
  parameters: [],
};

const WAIT: CommandDefinition = {
  id: 'wait',
  name: 'Wait',
  code_template: 'pros::delay({ms});',
  color: '#888888',
  category: 'Timing',
  description: '',
  parameters: [{ name: 'ms', type: 'int', default: 100 }],
};

const RESOLVED: ResolvedSeason = {
  season: 'pushback_2026',
  name: 'Push Back',
  description: '',
  categories: ['intake', 'timing'],
  commands: [INTAKE_IN, WAIT],
  sequences: [{
    id: 'grab',
    name: 'Grab',
    commands: ['intake_in', 'wait'],
    color: '#FFFFFF',
    category: 'Sequences',
    description: '',
  }],
  startPositions: [{ name: 'Red Left', alliance: 'red', side: 'left', x: -60, y: -24, heading: 90 }],
  warnings: ["Override for 'lift' ignored: no included category defines it"],
};

describe('human renderers', () => {
  let colorsBefore: boolean;

  beforeAll(() => {
    colorsBefore = areColorsEnabled();
    setColorsEnabled(false);
  });

  afterAll(() => {
    setColorsEnabled(colorsBefore);
  });

  it('renders a resolved season', () => {
    expect(renderResolve(RESOLVED, false).split('\n')).toEqual([
      'Season: Push Back (pushback_2026)',
      'Categories: intake, timing',
      '-'.repeat(60),
      'Commands (2)',
      '  # intake_in  Intake In  mech.intakeIn();',
      '  # wait       Wait (ms)  pros::delay({ms});',
      '',
      'Sequences (1)',
      '  # grab  Grab  intake_in -> wait',
      '',
      'Start positions',
      '  Red Left  red/left  (-60, -24) @ 90°',
      '',
      "⚠ Override for 'lift' ignored: no included category defines it",
    ]);
  });

  it('prints only ids in quiet mode', () => {
    expect(renderResolve(RESOLVED, true)).toBe('intake_in\nwait');
  });

  it('renders command groups', () => {
    const text = renderCommandGroups({
      season: 'pushback_2026',
      groups: [
        { category: 'Intake', commands: [INTAKE_IN] },
        { category: 'Timing', commands: [WAIT] },
      ],
    }, false);
    expect(text).toBe([
      'Intake (1)',
      '  # intake_in  Intake In  mech.intakeIn();',
      'Timing (1)',
      '  # wait  Wait (ms)  pros::delay({ms});',
    ].join('\n'));
    expect(renderCommandGroups({ season: 'empty', groups: [] }, false)).toBe('No commands in season empty');
  });

  it('renders generated code as bare lines', () => {
    expect(renderCode({ season: 's', command: 'wait', code: 'pros::delay(100);' }, false)).toBe('pros::delay(100);');
    expect(renderSequenceCode({ season: 's', sequence: 'grab', lines: ['a();', 'b();'] }, false)).toBe('a();\nb();');
  });

  it('renders season and category lists', () => {
    expect(renderSeasonList({ seasonsDir: '/s', seasons: ['a', 'b'] }, false)).toBe('Seasons (2)\n  a\n  b');
    expect(renderSeasonList({ seasonsDir: '/s', seasons: [] }, false)).toBe('No seasons in /s');
    expect(renderCategoryList({ libraryDir: '/l', categories: ['intake'] }, true)).toBe('intake');
    expect(renderCategoryList({ libraryDir: '/l', categories: [] }, false)).toBe('No categories in /l');
  });

  it('renders season init results', () => {
    const result = { season: 'new_game', file: '/s/new_game/config.json', includeCommandsFrom: [], overwritten: false };
    expect(renderSeasonInit(result, false)).toBe(
      '✓ Created season new_game\n  File: /s/new_game/config.json\n  Categories: none',
    );
    expect(renderSeasonInit(result, true)).toBe('/s/new_game/config.json');
  });

  it('renders a category', () => {
    expect(renderCategory({ key: 'intake', category: 'Intake', description: 'Rollers', commands: [INTAKE_IN] }, false))
      .toBe('Intake [intake]\nRollers\n  # intake_in  Intake In  mech.intakeIn();');
  });

  it('renders config values and version', () => {
    expect(renderConfigValue({ key: 'defaultSeason', value: 'pushback_2026', source: 'project' }, false))
      .toBe('defaultSeason = pushback_2026 (project)');
    expect(renderConfigValue({ key: 'logging.maxFiles', value: 9, scope: 'global' }, true)).toBe('9');
    expect(renderVersion({ version: '1.2.3' }, false)).toBe('vexcmd v1.2.3');
  });
});

describe('colors', () => {
  afterAll(() => {
    setColorsEnabled(false);
  });

  it('renders a 24-bit swatch when colors are on', () => {
    setColorsEnabled(true);
    expect(swatch('#FF8000')).toBe('\x1b[38;2;255;128;0m■\x1b[0m');
    expect(swatch('orange')).toBe('#');
  });

  it('pads to a width', () => {
    expect(pad('ab', 4)).toBe('ab  ');
    expect(pad('abcdef', 4)).toBe('abcdef');
  });
});
