/** Token that trips when the normalized message is empty, e.g. a message made only of whitespace. */
export const WHITESPACE_SENTINEL = " ";

/**
 * Returns every banned word contained in the normalized text. With `spacedBypass` on, words are
 * also looked up in a copy of the text with its spaces removed.
 */
export const findTrippedWords = (normalized: string, words: Iterable<string>, spacedBypass: boolean): string[] => {
  const tripped: string[] = [];
  let checkSentinel = false;
  let collapsed: string | null = null;

  for (const word of words) {
    if (word === WHITESPACE_SENTINEL) {
      checkSentinel = true;
      continue;
    }
    if (normalized.includes(word)) {
      tripped.push(word);
      continue;
    }
    if (spacedBypass) {
      collapsed ??= normalized.replaceAll(" ", "");
      if (collapsed.includes(word)) tripped.push(word);
    }
  }

  if (checkSentinel && normalized === "") {
    tripped.push(WHITESPACE_SENTINEL);
  }
  return tripped;
};
