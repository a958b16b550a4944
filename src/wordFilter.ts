import { BadWordStore } from "./badWordStore";
import { filterConfig, loadFilterConfig } from "./config";
import logger from "./logger";
import { findTrippedWords } from "./matcher";
import { normalizeText } from "./textNormalization";
import { DEFAULT_FILTER_OPTIONS, FilterOptions } from "./types";

export class WordFilter implements FilterOptions {
  disableNormalize: boolean;
  disableSpacedTab: boolean;
  disableMultiWhitespaceStripping: boolean;
  disableZeroWidthStripping: boolean;
  disableLeetSpeak: boolean;
  enableSpacedBypass: boolean;

  private readonly badWords: BadWordStore;

  constructor(options: Partial<FilterOptions> = {}, initialWords: Iterable<string> = []) {
    const resolved = { ...DEFAULT_FILTER_OPTIONS, ...options };
    this.disableNormalize = resolved.disableNormalize;
    this.disableSpacedTab = resolved.disableSpacedTab;
    this.disableMultiWhitespaceStripping = resolved.disableMultiWhitespaceStripping;
    this.disableZeroWidthStripping = resolved.disableZeroWidthStripping;
    this.disableLeetSpeak = resolved.disableLeetSpeak;
    this.enableSpacedBypass = resolved.enableSpacedBypass;
    this.badWords = new BadWordStore(initialWords);
  }

  /** Canonical form of `text` under the current options, as used by `check`. */
  normalize(text: string): string {
    try {
      return normalizeText(text, this);
    } catch (error) {
      logger.warn({ err: error }, "Failed to normalize message");
      throw error;
    }
  }

  /**
   * Returns the banned words found in `text`, in no particular order.
   * @throws MalformedInputError when `text` holds an unpaired surrogate and diacritic folding is on
   */
  check(text: string): string[] {
    if (this.badWords.size === 0) return [];

    const tripped = findTrippedWords(this.normalize(text), this.badWords, this.enableSpacedBypass);
    if (tripped.length) {
      logger.debug({ tripped }, "Message tripped word filter");
    }
    return tripped;
  }

  add(...words: string[]): void {
    const added = this.badWords.add(...words);
    logger.debug({ added, total: this.badWords.size }, "Bad words added");
  }

  delete(...words: string[]): void {
    const removed = this.badWords.delete(...words);
    logger.debug({ removed, total: this.badWords.size }, "Bad words deleted");
  }

  words(): string[] {
    return this.badWords.list();
  }
}

export const newWordFilter = (enableSpacedBypass: boolean, ...initialWords: string[]): WordFilter =>
  new WordFilter({ enableSpacedBypass }, initialWords);

/** Builds a filter from `env`, or from the configuration resolved when the package loaded. */
export const createWordFilterFromEnv = (env?: Record<string, string | undefined>): WordFilter => {
  const { options, words } = env ? loadFilterConfig(env) : filterConfig;
  return new WordFilter(options, words);
};
