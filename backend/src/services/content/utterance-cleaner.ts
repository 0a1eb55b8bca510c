/**
 * Utterance cleanup applied to every content source response
 */

/** Upper bound on words per utterance */
export const MAX_UTTERANCE_WORDS = 80;

const WRAPPING_QUOTES = /^["'“”‘’«»]+|["'“”‘’«»]+$/g;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Strip a leaked "Name:" / "Name —" prefix and wrapping quotes, collapse
 * whitespace and cap the word count. Words of the result joined with single
 * spaces give back the result itself.
 */
export function cleanUtterance(
  raw: string,
  speakerName: string,
  maxWords: number = MAX_UTTERANCE_WORDS
): string {
  let text = raw.replace(/\s+/g, ' ').trim();

  const prefix = new RegExp(`^[*_]*${escapeRegExp(speakerName)}[*_]*\\s*[:—–-]\\s*`, 'i');
  text = text.replace(prefix, '');
  text = text.replace(WRAPPING_QUOTES, '').trim();

  const words = text.split(' ').filter((word) => word.length > 0);
  return words.slice(0, maxWords).join(' ');
}

/**
 * Split finished text into the tokens streamed as `word` events
 */
export function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}
