import { normalizeText, splitLines } from './text_normalizer';

describe('normalizeText', () => {
  it('should return an empty string for absent input', () => {
    expect(normalizeText(undefined)).toBe('');
    expect(normalizeText(null)).toBe('');
    expect(normalizeText('')).toBe('');
  });

  it('should replace linked labels with the label', () => {
    expect(normalizeText('See <https://example.com/notes|release notes> now')).toBe('See release notes now');
  });

  it('should replace bare links with the url', () => {
    expect(normalizeText('Store page: <https://example.com/app>')).toBe('Store page: https://example.com/app');
  });

  it('should delete broadcast markers and user mentions', () => {
    expect(normalizeText('<!subteam^S01234|@qa> <!here> <@U0123ABC> Spades is live')).toBe('Spades is live');
    expect(normalizeText('<!channel> heads up <@W999|kim>')).toBe('heads up');
  });

  it('should delete emoji codes', () => {
    expect(normalizeText(':rocket: Dominoes 1.4.0 :release_25:')).toBe('Dominoes 1.4.0');
  });

  it('should delete hashtags but keep build numbers', () => {
    expect(normalizeText('Build #481 ready #mobile-releases')).toBe('Build #481 ready');
  });

  it('should collapse whitespace and trim', () => {
    expect(normalizeText('  Spades \n Version:   2.5.3\t ')).toBe('Spades Version: 2.5.3');
  });

  it('should leave clean text unchanged', () => {
    const clean = 'The latest version of Klondike Solitaire (5.0.1) is ready for rollout to 10% of users on Android';
    expect(normalizeText(clean)).toBe(clean);
    expect(normalizeText(normalizeText(' <@U1> Spades  :tada: 2.5.3 '))).toBe('Spades 2.5.3');
  });

  it('should keep clock times intact', () => {
    const clean = 'Rollout started at 10:30:15 UTC';
    expect(normalizeText(clean)).toBe(clean);
    expect(normalizeText('Live at 09:45:00 :100:')).toBe('Live at 09:45:00');
  });
});

describe('splitLines', () => {
  it('should normalize each line and drop empty ones', () => {
    expect(splitLines('Spades\r\n\n  :tada:  \nVersion: 2.5.3 ')).toEqual(['Spades', 'Version: 2.5.3']);
  });

  it('should return no lines for absent input', () => {
    expect(splitLines(undefined)).toEqual([]);
  });
});
