// Utilities to rewrite obfuscated text (leet, diacritics, whitespace tricks) into a comparable form.
import { MalformedInputError } from "./errors";
import { AMBIGUOUS_LEET, MULTI_CHAR_LEET, SINGLE_CHAR_LEET } from "./leetTables";
import { FilterOptions } from "./types";

const COMBINING_MARK_RE = /\p{Mn}/gu;
// ASCII whitespace plus space separators; U+FEFF, U+2028, U+2029 and \v are not whitespace here.
const EDGE_WHITESPACE_RE = /^[\t\n\f\r \p{Zs}]+|[\t\n\f\r \p{Zs}]+$/gu;
const WHITESPACE_RUN_RE = /[\t\n\f\r \p{Zs}]{2,}/gu;
const ZERO_WIDTH_SPACE = "\u200b";

export type SanitizeOptions = Pick<
  FilterOptions,
  "disableSpacedTab" | "disableZeroWidthStripping" | "disableMultiWhitespaceStripping"
>;

/**
 * Resolves leet substitutions. When ambiguous symbols remain, every single-symbol
 * interpretation is returned joined by spaces, e.g. "h3||o" -> "heiio hello".
 */
export const normalizeLeet = (text: string): string => {
  let normalized = text.toLowerCase();

  for (const { pattern, replacement } of MULTI_CHAR_LEET) {
    normalized = normalized.replaceAll(pattern, replacement);
  }
  for (const { pattern, replacement } of SINGLE_CHAR_LEET) {
    normalized = normalized.replaceAll(pattern, replacement);
  }

  // Expands per symbol, not as a cross-product over different ambiguous symbols.
  const interpretations: string[] = [];
  for (const { pattern, candidates } of AMBIGUOUS_LEET) {
    if (!normalized.includes(pattern)) continue;
    for (const candidate of candidates) {
      interpretations.push(normalized.replaceAll(pattern, candidate));
    }
  }

  return interpretations.length ? interpretations.join(" ") : normalized;
};

const findUnpairedSurrogate = (text: string): number => {
  let index = 0;
  while (index < text.length) {
    const code = text.charCodeAt(index);
    if (code >= 0xd800 && code <= 0xdbff) {
      const next = index + 1 < text.length ? text.charCodeAt(index + 1) : -1;
      if (next < 0xdc00 || next > 0xdfff) return index;
      index += 2;
      continue;
    }
    if (code >= 0xdc00 && code <= 0xdfff) return index;
    index += 1;
  }
  return -1;
};

/** Strips combining marks so accented letters compare equal to their base letter (café -> cafe). */
export const foldDiacritics = (text: string): string => {
  const badIndex = findUnpairedSurrogate(text);
  if (badIndex !== -1) {
    throw new MalformedInputError(`Unpaired surrogate at index ${badIndex}`, badIndex);
  }
  return text.normalize("NFD").replace(COMBINING_MARK_RE, "").normalize("NFC");
};

/**
 * Tabs become spaces and zero-width spaces are dropped. Edge whitespace is trimmed, and any
 * interior run of two or more whitespace characters is deleted outright rather than reduced to a
 * single space, so "hello  world" becomes "helloworld".
 */
export const sanitizeWhitespace = (text: string, options: SanitizeOptions): string => {
  let message = text;
  if (!options.disableSpacedTab) {
    message = message.replaceAll("\t", " ");
  }
  if (!options.disableZeroWidthStripping) {
    message = message.replaceAll(ZERO_WIDTH_SPACE, "");
  }
  if (!options.disableMultiWhitespaceStripping) {
    message = message.replace(EDGE_WHITESPACE_RE, "").replace(WHITESPACE_RUN_RE, "");
  }
  return message;
};

export const normalizeText = (text: string, options: FilterOptions): string => {
  let message = text.toLowerCase();
  if (!options.disableLeetSpeak) {
    message = normalizeLeet(message);
  }
  if (!options.disableNormalize) {
    message = foldDiacritics(message);
  }
  return sanitizeWhitespace(message, options);
};
