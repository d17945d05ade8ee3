/**
 * Whole-word phrase matching shared by the detector, planner, assessor and
 * delivery handoff.
 *
 * @module campaign-brain/text
 */

const patternCache = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function phrasePattern(phrase: string): RegExp {
  let pattern = patternCache.get(phrase);
  if (!pattern) {
    const escaped = escapeRegExp(phrase.toLowerCase());
    pattern = new RegExp(`(?<![a-z0-9])${escaped}(?![a-z0-9])`, 'g');
    patternCache.set(phrase, pattern);
  }
  pattern.lastIndex = 0;
  return pattern;
}

/**
 * Keywords found in lower-cased text as whole words, in list order
 */
export function matchKeywords(text: string, keywords: readonly string[]): string[] {
  return keywords.filter((keyword) => countOccurrences(text, keyword) > 0);
}

/**
 * Non-overlapping whole-word occurrences of a phrase in lower-cased text
 */
export function countOccurrences(text: string, phrase: string): number {
  return text.match(phrasePattern(phrase))?.length ?? 0;
}

/**
 * Replace whole-word occurrences of a phrase in text of any case
 */
export function replaceWholeWord(
  text: string,
  phrase: string,
  replacement: string,
  { ignoreCase = true }: { ignoreCase?: boolean } = {}
): string {
  if (!phrase) return text;
  const pattern = new RegExp(
    `(?<![A-Za-z0-9])${escapeRegExp(phrase)}(?![A-Za-z0-9])`,
    ignoreCase ? 'gi' : 'g'
  );
  return text.replace(pattern, () => replacement);
}

/**
 * Whitespace-separated tokens that contain at least one letter or digit
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  if (!trimmed) return 0;
  return trimmed.split(/\s+/).filter((token) => /[a-z0-9]/i.test(token)).length;
}
