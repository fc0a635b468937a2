/**
 * Regular Expression Utility Functions
 *
 * @module utils/regexp_utils
 */

/**
 * Escapes every character that has a meaning inside a RegExp source.
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Builds a `\b(?:a|b|c)\b` source, longest alternative first so that
 * "klondike solitaire" wins over "klondike".
 */
export function wordAlternation(values: readonly string[]): string {
  const sorted = [...new Set(values)].sort((a, b) => b.length - a.length);
  return `\\b(?:${sorted.map(escapeRegExp).join('|')})\\b`;
}

/**
 * Dotted three-part version token, not part of a longer dotted number.
 */
export const VERSION_SOURCE = String.raw`(?<![\d.])\d+\.\d+\.\d+(?!\.?\d)`;
