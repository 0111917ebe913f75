/**
 * vexcmd type exports.
 */

export * from './exit-codes.js';
export * from './command.js';
export * from './config.js';
