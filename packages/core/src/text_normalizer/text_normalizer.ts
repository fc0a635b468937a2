/**
 * Strips channel markup from a message body so that the extractors see plain
 * prose. Total and pure: absent or empty input gives "".
 *
 * Link rules run before the markup deletions, otherwise a linked label would
 * be lost together with its angle brackets.
 */

const LINKED_LABEL = /<(https?:\/\/[^|>\s]+)\|([^>]*)>/g;
const BARE_LINK = /<(https?:\/\/[^|>\s]+)>/g;
const BROADCAST = /<!(?:subteam\^[^>]*|here(?:\|[^>]*)?|channel(?:\|[^>]*)?|everyone(?:\|[^>]*)?)>/g;
const USER_MENTION = /<@[UW][A-Z0-9]+(?:\|[^>]*)?>/g;
// digits on either side mean a clock time such as 10:30:15
const EMOJI_CODE = /(?<!\d):[a-z0-9_+-]+:(?!\d)/gi;
// "#481" is a build number, not a hashtag
const HASHTAG = /(^|\s)#[A-Za-z][\w-]*/g;
const WHITESPACE = /\s+/g;

export function normalizeText(raw?: string | null): string {
  if (!raw) {
    return '';
  }

  return raw
    .replace(LINKED_LABEL, '$2')
    .replace(BARE_LINK, '$1')
    .replace(BROADCAST, '')
    .replace(USER_MENTION, '')
    .replace(EMOJI_CODE, '')
    .replace(HASHTAG, '$1')
    .replace(WHITESPACE, ' ')
    .trim();
}

/**
 * Splits a body on line breaks and normalizes each line, dropping lines that
 * end up empty.
 */
export function splitLines(raw?: string | null): string[] {
  if (!raw) {
    return [];
  }

  return raw
    .split(/\r?\n/)
    .map((line) => normalizeText(line))
    .filter((line) => line.length > 0);
}
