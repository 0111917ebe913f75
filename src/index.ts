/**
 * vexcmd - season command library resolver for VEX robotics autonomous routines.
 */

// Types
export * from './types/index.js';

// Core
export { ConfigError, isConfigError } from './core/errors.js';
export { buildSuccess, buildError, formatSuccess, formatError } from './core/output.js';
export type { SuccessEnvelope, ErrorEnvelope, EnvelopeMeta } from './core/output.js';
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  getDefaultConfig,
  resolveDataDirs,
} from './core/config.js';
export { initLogger, getLogger, closeLogger } from './core/logger.js';
export { validateAgainstSchema, checkSchema } from './core/schema.js';

// Command library
export { loadCategory, listCategories, DEFAULT_COMMAND_COLOR, CUSTOM_CATEGORY } from './core/library/index.js';
export type { LibraryOptions } from './core/library/index.js';

// Seasons
export { loadSeasonConfig, listSeasons, initSeason } from './core/seasons/index.js';
export type { SeasonOptions, InitSeasonOptions, InitSeasonResult } from './core/seasons/index.js';

// Resolution
export {
  resolveSeason,
  mergeSeason,
  applyOverride,
  groupByCategory,
  findCommand,
  findSequence,
} from './core/resolver/index.js';
export type { ResolveOptions } from './core/resolver/index.js';

// Code generation
export { generateCode, generateCommandCode, expandSequence, parseParamPairs } from './core/codegen/index.js';
