/**
 * @bytelevel/tokenizers -- byte-level BPE tokenizer engine.
 *
 * Loads a tokenizer.json (plus companion files) into immutable tables and
 * exposes encode/decode through `HfTokenizer`. The building blocks are
 * exported for callers that want a single stage, e.g. pre-tokenization
 * without BPE.
 */

// ── Facade ────────────────────────────────────────────────────────────────
export { HfTokenizer } from "./hf.js";

// ── Stages ────────────────────────────────────────────────────────────────
export { ByteAlphabet } from "./byte-alphabet.js";
export { VocabTable, VocabBuilder } from "./vocab.js";
export { MergeRuleTable, parseMerges, classifyMergeEntry } from "./merges.js";
export type { MergeRule, MergeEntry } from "./merges.js";
export { SpecialTokenRegistry, bindByContent } from "./special-tokens.js";
export type { AddedToken, SpecialTokenBinding } from "./special-tokens.js";
export { ByteLevelPreTokenizer, BYTE_LEVEL_PATTERN } from "./pre-tokenizer.js";
export type { Piece, Span } from "./pre-tokenizer.js";
export { BpeEngine } from "./bpe.js";
export type { BpeEngineOptions } from "./bpe.js";
export { incompleteTailStart, leadingContinuationEnd, sequenceLength, isContinuation } from "./utf8.js";

// ── Loading ───────────────────────────────────────────────────────────────
export { parseTokenizerDocument } from "./config.js";
export type {
  TokenizerModel,
  CompanionDocuments,
  PreTokenizerSettings,
  BpeModelSettings,
  SpecialTokenDefaults,
} from "./config.js";
export {
  loadTokenizerModel,
  readJsonDocument,
  TOKENIZER_FILE,
  SPECIAL_TOKENS_MAP_FILE,
  TOKENIZER_CONFIG_FILE,
  GENERATION_CONFIG_FILE,
} from "./persist.js";
