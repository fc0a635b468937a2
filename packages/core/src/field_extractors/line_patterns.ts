/**
 * Line-level patterns shared by the key-value step and the reply merger.
 * Lines are normalized already; Slack emphasis markers (`*`, `_`, `~`) may
 * still wrap keys and values.
 */

import { normalizeText } from '../text_normalizer';
import { VERSION_SOURCE } from '../utils/regexp_utils';

const MARKERS = '[*_~\\s]*';

export const VERSION_PATTERN = new RegExp(VERSION_SOURCE);

const BULLET = /^(?:•\s*|[-*]\s+)(.*\S)/;
const CHANGES_HEADER = new RegExp(`^${MARKERS}(?:recent|key)\\s+changes\\b`, 'i');

/**
 * Builds a `Key: value` matcher for the given key alternation.
 */
export function keyValuePattern(keys: string): RegExp {
  return new RegExp(`^${MARKERS}(?:${keys})${MARKERS}:${MARKERS}(.*\\S)`, 'i');
}

export const KEY_PATTERNS = {
  version: keyValuePattern('version'),
  build: keyValuePattern(String.raw`build(?:\s+(?:number|no\.?))?`),
  platform: keyValuePattern('platform'),
  status: keyValuePattern(String.raw`(?:current\s+)?status`),
  rollout: keyValuePattern(String.raw`(?:current\s+)?rollout`),
  buildVersion: keyValuePattern(String.raw`build\s+version`),
  buildNumber: keyValuePattern(String.raw`build\s+number`),
} as const;

/**
 * Value of a `Key: value` line with trailing emphasis markers removed, or
 * null when the line does not carry the key.
 */
export function readKeyValue(line: string, pattern: RegExp): string | null {
  const match = pattern.exec(line);
  const value = match?.[1]?.replace(/[*_~]+$/, '').trim();
  return value ? value : null;
}

/**
 * The x.y.z token inside a value, or null.
 */
export function findVersion(text: string): string | null {
  return VERSION_PATTERN.exec(text)?.[0] ?? null;
}

export function isChangesHeader(line: string): boolean {
  return CHANGES_HEADER.test(line);
}

/**
 * Collects the bullet lines that follow `lines[headerIndex]`, stopping at the
 * first non-bullet line.
 */
export function collectBullets(lines: readonly string[], headerIndex: number): string[] {
  const notes: string[] = [];
  for (const line of lines.slice(headerIndex + 1)) {
    const bullet = BULLET.exec(line);
    if (!bullet) {
      break;
    }
    const note = normalizeText(bullet[1]);
    if (note) {
      notes.push(note);
    }
  }
  return notes;
}

/**
 * Change notes of the first "Recent changes" / "Key changes" block that has
 * any bullets.
 */
export function findChangeNotes(lines: readonly string[]): string[] {
  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    if (line !== undefined && isChangesHeader(line)) {
      const notes = collectBullets(lines, index);
      if (notes.length > 0) {
        return notes;
      }
    }
  }
  return [];
}
