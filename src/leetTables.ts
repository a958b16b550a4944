// Leet substitution tables. Applied in array order: multi-character rules first, then single
// characters, then ambiguous expansion.
import { AmbiguousRule, SubstitutionRule } from "./types";

const rule = (pattern: string, replacement: string): SubstitutionRule => ({ pattern, replacement });

export const MULTI_CHAR_LEET: readonly SubstitutionRule[] = Object.freeze([
  rule("vv", "w"),
  rule("uu", "w"),
  rule("\\/\\/", "w"),
  rule("><", "x"),
  rule("1<", "k"),
  rule("|<", "k"),
  rule("()", "o"),
  rule("[]", "o"),
  rule("ph", "f"),
]);

export const SINGLE_CHAR_LEET: readonly SubstitutionRule[] = Object.freeze([
  rule("4", "a"),
  rule("@", "a"),
  rule("8", "b"),
  rule("(", "c"),
  rule("<", "c"),
  rule("[", "c"),
  rule("3", "e"),
  rule("€", "e"),
  rule("6", "g"),
  rule("9", "g"),
  rule("#", "h"),
  rule("j", "i"),
  rule("0", "o"),
  rule("5", "s"),
  rule("$", "s"),
  rule("7", "t"),
  rule("+", "t"),
  rule("v", "u"),
  rule("2", "z"),
]);

const I_OR_L = Object.freeze(["i", "l"]);

export const AMBIGUOUS_LEET: readonly AmbiguousRule[] = Object.freeze([
  { pattern: "!", candidates: I_OR_L },
  { pattern: "|", candidates: I_OR_L },
  { pattern: "1", candidates: I_OR_L },
  { pattern: "]", candidates: I_OR_L },
  { pattern: "}", candidates: I_OR_L },
]);
