/**
 * Terminal color utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain text when color is not supported.
 */

/** Whether ANSI color escape codes should be used. */
let colorsEnabled: boolean = (() => {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return process.stdout.isTTY === true;
})();

/** Override color detection (config output.showColor, tests). */
export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled;
}

export function areColorsEnabled(): boolean {
  return colorsEnabled;
}

// ---------------------------------------------------------------------------
// ANSI escape helpers
// ---------------------------------------------------------------------------

function wrap(code: string, text: string): string {
  return colorsEnabled ? `${code}${text}\x1b[0m` : text;
}

export const bold = (text: string): string => wrap('\x1b[1m', text);
export const dim = (text: string): string => wrap('\x1b[2m', text);
export const red = (text: string): string => wrap('\x1b[0;31m', text);
export const green = (text: string): string => wrap('\x1b[0;32m', text);
export const yellow = (text: string): string => wrap('\x1b[1;33m', text);
export const cyan = (text: string): string => wrap('\x1b[0;36m', text);

const HEX_COLOR = /^#([0-9A-Fa-f]{2})([0-9A-Fa-f]{2})([0-9A-Fa-f]{2})$/;

/**
 * A colored block in a command's own hex color (24-bit escape).
 * Plain '#' when colors are off or the value is not #RRGGBB.
 */
export function swatch(hex: string): string {
  const match = HEX_COLOR.exec(hex);
  if (!colorsEnabled || !match) return '#';
  const [, r = '0', g = '0', b = '0'] = match;
  return `\x1b[38;2;${parseInt(r, 16)};${parseInt(g, 16)};${parseInt(b, 16)}m■\x1b[0m`;
}

/** Create a horizontal rule. */
export function hRule(width: number = 60): string {
  return '-'.repeat(width);
}

/** Right-pad a string to a width. */
export function pad(text: string, width: number): string {
  return text.length >= width ? text : text + ' '.repeat(width - text.length);
}
