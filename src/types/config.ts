/**
 * Configuration type definitions for vexcmd.
 * Covers project and global config with cascade resolution.
 */

/** Output format options. */
export type OutputFormat = 'json' | 'human';

/** Output configuration. */
export interface OutputConfig {
  defaultFormat: OutputFormat;
  showColor: boolean;
}

/** Where command libraries and season configs live, relative to the project root. */
export interface PathsConfig {
  libraryDir: string;
  seasonsDir: string;
}

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to .vexcmd/ (default: 'logs/vexcmd.log') */
  filePath: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** vexcmd project configuration (.vexcmd/config.json). */
export interface VexcmdConfig {
  version: string;
  /** Season used when a command is run without one. Empty = none. */
  defaultSeason: string;
  paths: PathsConfig;
  output: OutputConfig;
  logging: LoggingConfig;
}

/** Configuration resolution priority. */
export type ConfigSource = 'env' | 'project' | 'global' | 'default';

/** A resolved config value with its source. */
export interface ResolvedValue<T> {
  value: T;
  source: ConfigSource;
}
