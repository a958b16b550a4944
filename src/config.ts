import { config as loadEnv } from "dotenv";
import path from "node:path";

import { FilterConfig } from "./types";

const envPath = path.resolve(__dirname, "../.env");
loadEnv({ path: envPath });

type Env = Record<string, string | undefined>;

const readFlag = (env: Env, key: string): boolean =>
  ["1", "true", "yes"].includes((env[key] ?? "false").trim().toLowerCase());

export const loadFilterConfig = (env: Env = process.env): FilterConfig => ({
  options: {
    disableNormalize: readFlag(env, "FILTER_DISABLE_NORMALIZE"),
    disableSpacedTab: readFlag(env, "FILTER_DISABLE_SPACED_TAB"),
    disableMultiWhitespaceStripping: readFlag(env, "FILTER_DISABLE_WHITESPACE_STRIPPING"),
    disableZeroWidthStripping: readFlag(env, "FILTER_DISABLE_ZERO_WIDTH_STRIPPING"),
    disableLeetSpeak: readFlag(env, "FILTER_DISABLE_LEET_SPEAK"),
    enableSpacedBypass: readFlag(env, "FILTER_SPACED_BYPASS"),
  },
  words: (env.FILTER_WORDS ?? "")
    .split(",")
    .map((v) => v.trim())
    .filter(Boolean),
});

export const filterConfig = loadFilterConfig();
