/**
 * tokenizer.json -> in-memory model.
 *
 * Works on already-parsed JSON trees; reading files is `persist.ts`'s job.
 * Feature selection (model type, pre-tokenizer type, normalizer) resolves to
 * a closed set here, and anything outside it fails the load instead of
 * tokenizing differently from the library that wrote the file.
 */
import { Effect } from "effect";
import {
  LoadError,
  defaultByteLevelOptions,
  type ByteLevelOptions,
  type SpecialTokenName,
  type TokenId,
} from "@bytelevel/core";
import { VocabBuilder, type VocabTable } from "./vocab.js";
import { parseMerges, type MergeRuleTable } from "./merges.js";
import {
  SpecialTokenRegistry,
  bindByContent,
  type AddedToken,
  type SpecialTokenBinding,
} from "./special-tokens.js";

// ── Parsed model ───────────────────────────────────────────────────────────

export type PreTokenizerSettings = { readonly _tag: "ByteLevel"; readonly options: ByteLevelOptions };

export interface BpeModelSettings {
  readonly _tag: "BPE";
  readonly unkToken: string | null;
  readonly ignoreMerges: boolean;
}

export interface TokenizerModel {
  readonly vocab: VocabTable;
  readonly merges: MergeRuleTable;
  readonly specials: SpecialTokenRegistry;
  readonly preTokenizer: PreTokenizerSettings;
  readonly model: BpeModelSettings;
}

/** Optional companion documents found next to tokenizer.json. */
export interface CompanionDocuments {
  readonly specialTokensMap?: unknown;
  readonly tokenizerConfig?: unknown;
  readonly generationConfig?: unknown;
}

export interface SpecialTokenDefaults {
  readonly bosId: TokenId;
  readonly eosId: TokenId;
}

// ── Helpers ────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function malformed(message: string): LoadError {
  return new LoadError({ reason: "Malformed", message });
}

function optionalBoolean(
  obj: Record<string, unknown>,
  key: string,
  fallback: boolean,
  where: string,
): Effect.Effect<boolean, LoadError> {
  const v = obj[key];
  if (v === undefined || v === null) return Effect.succeed(fallback);
  if (typeof v === "boolean") return Effect.succeed(v);
  return Effect.fail(malformed(`${where}.${key} must be a boolean`));
}

// ── Sections ───────────────────────────────────────────────────────────────

export function parseModelSettings(raw: unknown): Effect.Effect<BpeModelSettings, LoadError> {
  return Effect.gen(function* () {
    if (!isRecord(raw)) return yield* Effect.fail(malformed("Missing or invalid 'model' section"));
    if (raw.type !== "BPE") {
      return yield* Effect.fail(
        new LoadError({
          reason: "UnsupportedModel",
          message: `Unsupported model type ${JSON.stringify(raw.type)}; only "BPE" is implemented`,
        }),
      );
    }
    if (raw.byte_fallback === true) {
      return yield* Effect.fail(
        new LoadError({ reason: "UnsupportedModel", message: "model.byte_fallback is not supported" }),
      );
    }
    for (const key of ["continuing_subword_prefix", "end_of_word_suffix"]) {
      const v = raw[key];
      if (typeof v === "string" && v.length > 0) {
        return yield* Effect.fail(
          new LoadError({ reason: "UnsupportedModel", message: `model.${key} ${JSON.stringify(v)} is not supported` }),
        );
      }
    }
    if (typeof raw.dropout === "number" && raw.dropout > 0) {
      return yield* Effect.fail(
        new LoadError({ reason: "UnsupportedModel", message: "model.dropout is not supported" }),
      );
    }
    let unkToken: string | null = null;
    if (typeof raw.unk_token === "string") {
      unkToken = raw.unk_token;
    } else if (raw.unk_token !== undefined && raw.unk_token !== null) {
      return yield* Effect.fail(malformed("model.unk_token must be a string or null"));
    }
    const ignoreMerges = yield* optionalBoolean(raw, "ignore_merges", false, "model");
    return { _tag: "BPE", unkToken, ignoreMerges } satisfies BpeModelSettings;
  });
}

export function parsePreTokenizer(raw: unknown): Effect.Effect<PreTokenizerSettings, LoadError> {
  return Effect.gen(function* () {
    if (!isRecord(raw) || raw.type !== "ByteLevel") {
      const type = isRecord(raw) ? raw.type : raw;
      return yield* Effect.fail(
        new LoadError({
          reason: "UnsupportedPreTokenizer",
          message: `Unsupported pre_tokenizer ${JSON.stringify(type ?? null)}; only "ByteLevel" is implemented`,
        }),
      );
    }
    const options: ByteLevelOptions = {
      addPrefixSpace: yield* optionalBoolean(raw, "add_prefix_space", defaultByteLevelOptions.addPrefixSpace, "pre_tokenizer"),
      useRegex: yield* optionalBoolean(raw, "use_regex", defaultByteLevelOptions.useRegex, "pre_tokenizer"),
      trimOffsets: yield* optionalBoolean(raw, "trim_offsets", defaultByteLevelOptions.trimOffsets, "pre_tokenizer"),
    };
    return { _tag: "ByteLevel", options } satisfies PreTokenizerSettings;
  });
}

export function checkNormalizer(raw: unknown): Effect.Effect<void, LoadError> {
  if (raw === undefined || raw === null) return Effect.void;
  const type = isRecord(raw) ? raw.type : raw;
  return Effect.fail(
    new LoadError({
      reason: "UnsupportedNormalizer",
      message: `Normalizer ${JSON.stringify(type)} is not implemented`,
    }),
  );
}

/** `model.vocab` as an object or as a list of [token, id] pairs. */
export function vocabEntries(raw: unknown): Effect.Effect<Array<readonly [string, unknown]>, LoadError> {
  if (isRecord(raw)) return Effect.succeed(Object.entries(raw));
  if (Array.isArray(raw)) {
    const items: readonly unknown[] = raw;
    const out: Array<readonly [string, unknown]> = [];
    for (let i = 0; i < items.length; i++) {
      const item = items[i];
      if (!Array.isArray(item) || item.length !== 2 || typeof item[0] !== "string") {
        return Effect.fail(malformed(`model.vocab[${i}] must be a [token, id] pair`));
      }
      out.push([item[0], item[1]]);
    }
    return Effect.succeed(out);
  }
  return Effect.fail(malformed("model.vocab must be an object or a list of [token, id] pairs"));
}

export function parseAddedTokens(raw: unknown): Effect.Effect<AddedToken[], LoadError> {
  if (raw === undefined || raw === null) return Effect.succeed([]);
  if (!Array.isArray(raw)) return Effect.fail(malformed("added_tokens must be an array"));
  const items: readonly unknown[] = raw;
  const out: AddedToken[] = [];
  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    if (!isRecord(item) || typeof item.content !== "string" || typeof item.id !== "number") {
      return Effect.fail(malformed(`added_tokens[${i}] must have a string 'content' and a numeric 'id'`));
    }
    out.push({ content: item.content, id: item.id });
  }
  return Effect.succeed(out);
}

// ── Special tokens ─────────────────────────────────────────────────────────

/** `"<s>"` or `{ "content": "<s>", ... }` */
function tokenContent(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (isRecord(value) && typeof value.content === "string") return value.content;
  return undefined;
}

/** `<name>_token` keys of a companion document. */
function namedTokens(doc: unknown): Map<SpecialTokenName, string> {
  const out = new Map<SpecialTokenName, string>();
  if (!isRecord(doc)) return out;
  for (const [key, value] of Object.entries(doc)) {
    if (!key.endsWith("_token")) continue;
    const content = tokenContent(value);
    if (content !== undefined) out.set(key.slice(0, -"_token".length), content);
  }
  return out;
}

function generationId(doc: unknown, key: string): TokenId | undefined {
  if (!isRecord(doc)) return undefined;
  const v = doc[key];
  if (typeof v === "number") return v;
  if (Array.isArray(v) && typeof v[0] === "number") return v[0];
  return undefined;
}

/**
 * Resolve named special tokens. Precedence per name:
 * special_tokens_map.json, tokenizer_config.json, model.unk_token (unk only),
 * generation_config.json ids (bos/eos only, when present in the vocab).
 */
export function resolveSpecialBindings(
  vocab: VocabTable,
  model: BpeModelSettings,
  companions: CompanionDocuments,
): Effect.Effect<Map<SpecialTokenName, SpecialTokenBinding>> {
  return Effect.gen(function* () {
    const bindings = new Map<SpecialTokenName, SpecialTokenBinding>();
    const sources: Array<[string, Map<SpecialTokenName, string>]> = [
      ["special_tokens_map.json", namedTokens(companions.specialTokensMap)],
      ["tokenizer_config.json", namedTokens(companions.tokenizerConfig)],
    ];
    for (const [source, named] of sources) {
      for (const [name, content] of named) {
        if (bindings.has(name)) continue;
        bindings.set(name, bindByContent(content, vocab));
        yield* Effect.logDebug(`${name} -> ${JSON.stringify(content)} from ${source}`);
      }
    }

    if (!bindings.has("unk") && model.unkToken !== null) {
      bindings.set("unk", bindByContent(model.unkToken, vocab));
    }

    const generated: Array<[SpecialTokenName, string]> = [
      ["bos", "bos_token_id"],
      ["eos", "eos_token_id"],
    ];
    for (const [name, key] of generated) {
      if (bindings.has(name)) continue;
      const id = generationId(companions.generationConfig, key);
      if (id === undefined) continue;
      const content = vocab.tokenOf(id);
      if (content === undefined) {
        yield* Effect.logDebug(`generation_config.json ${key}=${id} is not in the vocab, ignored`);
        continue;
      }
      bindings.set(name, { _tag: "Resolved", content, id });
    }

    for (const [name, b] of bindings) {
      if (b._tag === "Unresolved") {
        yield* Effect.logWarning(`Special token "${name}" (${JSON.stringify(b.content)}) is not in the vocab`);
      }
    }
    return bindings;
  });
}

// ── Document ───────────────────────────────────────────────────────────────

/** Build the in-memory model from a parsed tokenizer.json and its companions. */
export function parseTokenizerDocument(
  doc: unknown,
  companions: CompanionDocuments = {},
  defaults: SpecialTokenDefaults = { bosId: 0, eosId: 0 },
): Effect.Effect<TokenizerModel, LoadError> {
  return Effect.gen(function* () {
    if (!isRecord(doc)) return yield* Effect.fail(malformed("Tokenizer document must be a JSON object"));

    const model = yield* parseModelSettings(doc.model);
    yield* checkNormalizer(doc.normalizer);
    const preTokenizer = yield* parsePreTokenizer(doc.pre_tokenizer);

    // parseModelSettings has checked that doc.model is an object.
    const modelSection = isRecord(doc.model) ? doc.model : {};

    const builder = new VocabBuilder();
    for (const [token, id] of yield* vocabEntries(modelSection.vocab)) {
      if (typeof id !== "number") {
        return yield* Effect.fail(malformed(`Vocab id for ${JSON.stringify(token)} must be a number`));
      }
      yield* builder.insert(token, id);
    }
    const added = yield* parseAddedTokens(doc.added_tokens);
    for (const tok of added) {
      yield* builder.insertAdded(tok.content, tok.id);
    }
    const vocab = builder.freeze();

    const merges = yield* parseMerges(modelSection.merges);
    const bindings = yield* resolveSpecialBindings(vocab, model, companions);
    const specials = new SpecialTokenRegistry(bindings, added, {
      bos: defaults.bosId,
      eos: defaults.eosId,
    });

    return { vocab, merges, specials, preTokenizer, model } satisfies TokenizerModel;
  }).pipe(Effect.annotateLogs("subsystem", "loader"));
}
