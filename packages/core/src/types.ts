/**
 * Core types for the bytelevel system.
 */

// ── Ids ────────────────────────────────────────────────────────────────────
/** A vocabulary id. Non-negative integer. */
export type TokenId = number;

// ── Special token names ───────────────────────────────────────────────────
/** Names the registry always knows about. Companion files may add more. */
export const WELL_KNOWN_SPECIAL_TOKENS = ["bos", "eos", "unk", "pad"] as const;

export type WellKnownSpecialToken = (typeof WELL_KNOWN_SPECIAL_TOKENS)[number];

/** `bos`, `eos`, ... or any other `<name>_token` key found in a companion file. */
export type SpecialTokenName = WellKnownSpecialToken | (string & {});

// ── Pre-tokenizer policy ───────────────────────────────────────────────────
export interface ByteLevelOptions {
  readonly addPrefixSpace: boolean;
  readonly useRegex: boolean;
  readonly trimOffsets: boolean;
}

export const defaultByteLevelOptions: ByteLevelOptions = {
  addPrefixSpace: true,
  useRegex: true,
  trimOffsets: true,
};

// ── Engine options ─────────────────────────────────────────────────────────
export interface TokenizerOptions {
  /** bos id used when no companion file configures one. */
  readonly bosId: TokenId;
  /** eos id used when no companion file configures one. */
  readonly eosId: TokenId;
  /** Max memoized pieces per instance; 0 disables the cache. */
  readonly cacheSize: number;
}

export const defaultTokenizerOptions: TokenizerOptions = {
  bosId: 0,
  eosId: 0,
  cacheSize: 10_000,
};

export function resolveTokenizerOptions(
  overrides: Partial<TokenizerOptions> = {},
): TokenizerOptions {
  return { ...defaultTokenizerOptions, ...overrides };
}

// ── Logging ────────────────────────────────────────────────────────────────
export type LogLevelName = "debug" | "info" | "warn" | "error" | "none";
