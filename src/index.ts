export { BadWordStore } from "./badWordStore";
export { filterConfig, loadFilterConfig } from "./config";
export { MalformedInputError } from "./errors";
export { AMBIGUOUS_LEET, MULTI_CHAR_LEET, SINGLE_CHAR_LEET } from "./leetTables";
export { findTrippedWords, WHITESPACE_SENTINEL } from "./matcher";
export { foldDiacritics, normalizeLeet, normalizeText, sanitizeWhitespace } from "./textNormalization";
export type { SanitizeOptions } from "./textNormalization";
export { DEFAULT_FILTER_OPTIONS } from "./types";
export type { AmbiguousRule, FilterConfig, FilterOptions, SubstitutionRule } from "./types";
export { createWordFilterFromEnv, newWordFilter, WordFilter } from "./wordFilter";
