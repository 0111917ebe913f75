/**
 * JSON envelope formatter for vexcmd CLI output.
 *
 * Every command prints one machine-parseable envelope by default:
 *   { success, result, message?, _meta }
 * Errors use the same shape with success: false and an error body.
 */

import { randomUUID } from 'node:crypto';
import { ConfigError } from './errors.js';

/** Envelope metadata. */
export interface EnvelopeMeta {
  operation: string;
  timestamp: string;
  requestId: string;
  warnings?: string[];
}

export interface SuccessEnvelope<T> {
  success: true;
  result: T;
  message?: string;
  _meta: EnvelopeMeta;
}

export interface ErrorEnvelope {
  success: false;
  result: null;
  error: Record<string, unknown>;
  _meta: EnvelopeMeta;
}

/** Options for envelope formatting. */
export interface FormatOptions {
  operation?: string;
  warnings?: string[];
}

function createMeta(operation: string, warnings?: string[]): EnvelopeMeta {
  return {
    operation,
    timestamp: new Date().toISOString(),
    requestId: randomUUID(),
    ...(warnings && warnings.length > 0 && { warnings }),
  };
}

/** Build a success envelope. */
export function buildSuccess<T>(data: T, message?: string, opts: FormatOptions = {}): SuccessEnvelope<T> {
  return {
    success: true,
    result: data,
    ...(message && { message }),
    _meta: createMeta(opts.operation ?? 'cli.output', opts.warnings),
  };
}

/** Build an error envelope. */
export function buildError(error: ConfigError, operation?: string): ErrorEnvelope {
  return {
    success: false,
    result: null,
    error: error.toJSON(),
    _meta: createMeta(operation ?? 'cli.output'),
  };
}

/** Format a successful result as a JSON envelope string. */
export function formatSuccess<T>(data: T, message?: string, opts?: FormatOptions): string {
  return JSON.stringify(buildSuccess(data, message, opts));
}

/** Format an error as a JSON envelope string. */
export function formatError(error: ConfigError, operation?: string): string {
  return JSON.stringify(buildError(error, operation));
}
