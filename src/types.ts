export interface SubstitutionRule {
  pattern: string;
  replacement: string;
}

export interface AmbiguousRule {
  pattern: string;
  candidates: readonly string[];
}

export interface FilterOptions {
  /** Skips diacritic folding (à -> a). */
  disableNormalize: boolean;
  /** Keeps tab characters instead of turning each into a single space. */
  disableSpacedTab: boolean;
  /** Keeps leading, trailing and repeated whitespace. */
  disableMultiWhitespaceStripping: boolean;
  /** Keeps zero-width spaces (U+200B). */
  disableZeroWidthStripping: boolean;
  disableLeetSpeak: boolean;
  /** Also matches against the text with every space removed (h e l l o -> hello). */
  enableSpacedBypass: boolean;
}

export const DEFAULT_FILTER_OPTIONS: Readonly<FilterOptions> = Object.freeze({
  disableNormalize: false,
  disableSpacedTab: false,
  disableMultiWhitespaceStripping: false,
  disableZeroWidthStripping: false,
  disableLeetSpeak: false,
  enableSpacedBypass: false,
});

export interface FilterConfig {
  options: FilterOptions;
  words: string[];
}
