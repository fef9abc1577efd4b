/**
 * Value Parser
 *
 * Extracts the numeric magnitude and unit suffix from a raw cell such as
 * "12.3 us", "1,204.5" or "450 B". A cell without a number yields
 * undefined, never zero, so missing data stays distinguishable.
 *
 * @module value-parser
 */

/**
 * First number in a cell: sign, digits with thousands separators,
 * optional fraction and exponent
 */
const NUMBER_PATTERN = /[-+]?\d[\d,]*\.?\d*(?:[eE][-+]?\d+)?/;

/**
 * Cosmetic rewrites applied to a lower-cased suffix, in order
 */
const SUFFIX_REWRITES: ReadonlyArray<readonly [string, string]> = [
  ['per second', '/s'],
  ['per sec', '/s'],
  [' per s', '/s'],
  ['μs', 'us'],
  ['µs', 'us'],
];

function matchNumber(raw: string | undefined): RegExpExecArray | null {
  if (raw === undefined) {
    return null;
  }
  const text = raw.trim();
  if (!text) {
    return null;
  }
  return NUMBER_PATTERN.exec(text);
}

/**
 * Parse the first number found in a raw cell
 *
 * @returns The magnitude, or undefined when the cell holds no number
 */
export function parseNumber(raw: string | undefined): number | undefined {
  const match = matchNumber(raw);
  if (!match) {
    return undefined;
  }
  const value = Number(match[0].replaceAll(',', ''));
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Unit suffix following the first number in a raw cell, trimmed and
 * lower-cased ("12.3 μs" -> "us", "900 per second" -> "/s").
 * Empty when the cell holds no number.
 */
export function unitSuffix(raw: string | undefined): string {
  const match = matchNumber(raw);
  if (!match) {
    return '';
  }
  const text = match.input;
  let suffix = text.slice(match.index + match[0].length).trim().toLowerCase();
  for (const [from, to] of SUFFIX_REWRITES) {
    suffix = suffix.replaceAll(from, to);
  }
  return suffix;
}
