export { normalizeText, splitLines } from './text_normalizer';
