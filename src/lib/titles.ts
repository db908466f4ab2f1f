/** Tokens must be strictly longer than this to count as keywords. */
export const MIN_KEYWORD_LENGTH = 4;

export const canonicalizeTitle = (title: string): string =>
  title
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, '')
    .replace(/\s+/g, ' ')
    .trim();

/**
 * Keyword set used for duplicate matching. Short connective words
 * ("of", "the", "during") never make it in.
 */
export const normalizeTitle = (title: string): Set<string> => {
  const canonical = canonicalizeTitle(title);
  if (!canonical) {
    return new Set();
  }
  return new Set(canonical.split(' ').filter((word) => word.length > MIN_KEYWORD_LENGTH));
};
