/**
 * tokenizer.json BPE tokenizer.
 *
 * Owns the Uninitialized -> Loaded lifecycle. `load` swaps in a complete new
 * state only after the whole model has been built; everything reachable from
 * a Loaded state is read-only, so encode/decode never lock.
 *
 * Callers must not run `load` while other calls on the same instance are in
 * flight.
 */
import { Effect } from "effect";
import {
  DecodeError,
  EncodeError,
  UninitializedError,
  resolveTokenizerOptions,
  type LoadError,
  type SpecialTokenName,
  type TokenId,
  type Tokenizer,
  type TokenizerOptions,
} from "@bytelevel/core";
import { ByteAlphabet } from "./byte-alphabet.js";
import { BpeEngine } from "./bpe.js";
import { ByteLevelPreTokenizer } from "./pre-tokenizer.js";
import { parseTokenizerDocument, type CompanionDocuments, type TokenizerModel } from "./config.js";
import { loadTokenizerModel } from "./persist.js";
import { concatBytes, incompleteTailStart, leadingContinuationEnd } from "./utf8.js";

interface LoadedState {
  readonly _tag: "Loaded";
  readonly source: string;
  readonly model: TokenizerModel;
  readonly preTokenizer: ByteLevelPreTokenizer;
  readonly engine: BpeEngine;
  /** id -> verbatim content, for added tokens */
  readonly addedById: ReadonlyMap<TokenId, string>;
}

type State = { readonly _tag: "Uninitialized" } | LoadedState;

const utf8 = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8");

function repetitions(count: number): number {
  return Number.isSafeInteger(count) && count > 0 ? count : 0;
}

export class HfTokenizer implements Tokenizer {
  readonly name = "hf-bpe";

  private _state: State = { _tag: "Uninitialized" };
  private readonly _options: TokenizerOptions;
  private readonly _alphabet = ByteAlphabet.get();

  constructor(options: Partial<TokenizerOptions> = {}) {
    this._options = resolveTokenizerOptions(options);
  }

  // ── Lifecycle ────────────────────────────────────────────────────────────

  get isLoaded(): boolean {
    return this._state._tag === "Loaded";
  }

  /** Number of vocab entries, added tokens included. 0 before load. */
  get vocabSize(): number {
    return this._state._tag === "Loaded" ? this._state.model.vocab.size : 0;
  }

  /**
   * Load a tokenizer.json file, or a directory holding tokenizer.json and its
   * companion files. Replaces any previous state; on failure the instance is
   * left Uninitialized.
   */
  load(path: string): Effect.Effect<void, LoadError> {
    return this._install(
      path,
      loadTokenizerModel(path, { bosId: this._options.bosId, eosId: this._options.eosId }),
    );
  }

  /** Load from an already-parsed document. */
  loadDocument(
    doc: unknown,
    companions: CompanionDocuments = {},
    source = "<document>",
  ): Effect.Effect<void, LoadError> {
    return this._install(
      source,
      parseTokenizerDocument(doc, companions, { bosId: this._options.bosId, eosId: this._options.eosId }),
    );
  }

  // ── Encode ───────────────────────────────────────────────────────────────

  encode(
    text: string,
    bosCount: number,
    eosCount: number,
  ): Effect.Effect<TokenId[], UninitializedError | EncodeError> {
    return Effect.suspend((): Effect.Effect<TokenId[], UninitializedError | EncodeError> => {
      const st = this._state;
      if (st._tag !== "Loaded") return Effect.fail(uninitialized("encode"));
      return encodeLoaded(st, text, repetitions(bosCount), repetitions(eosCount));
    });
  }

  // ── Decode ───────────────────────────────────────────────────────────────

  /**
   * Text attributable to `currentId`.
   *
   * The previous token's trailing incomplete UTF-8 sequence, if any, is
   * joined to the current token's bytes, and a sequence still incomplete at
   * the end is held back for the next token. Continuation bytes that open
   * the fragment with nothing carried belong to a character whose lead byte
   * an earlier token already held, so they are dropped. `previousId` may be
   * null or any id outside the vocab to mean "no previous token"; such bytes
   * then decode to U+FFFD.
   */
  decode(
    previousId: TokenId | null,
    currentId: TokenId,
  ): Effect.Effect<string, UninitializedError | DecodeError> {
    return Effect.suspend((): Effect.Effect<string, UninitializedError | DecodeError> => {
      const st = this._state;
      if (st._tag !== "Loaded") return Effect.fail(uninitialized("decode"));
      const current = this._bytesOf(st, currentId);
      if (current === undefined) return Effect.fail(invalidId(currentId));

      const previous = previousId === null ? undefined : this._bytesOf(st, previousId);
      if (previous === undefined) {
        return Effect.succeed(utf8Decoder.decode(current.subarray(0, incompleteTailStart(current))));
      }

      const carried = previous.subarray(incompleteTailStart(previous));
      const combined =
        carried.length > 0 ? concatBytes(carried, current) : current.subarray(leadingContinuationEnd(current));
      const end = incompleteTailStart(combined);
      return Effect.succeed(utf8Decoder.decode(combined.subarray(0, end)));
    });
  }

  /**
   * Decode a whole id sequence at once. An incomplete sequence at the very
   * end of the stream becomes U+FFFD.
   */
  decodeAll(ids: ArrayLike<TokenId>): Effect.Effect<string, UninitializedError | DecodeError> {
    return Effect.suspend((): Effect.Effect<string, UninitializedError | DecodeError> => {
      const st = this._state;
      if (st._tag !== "Loaded") return Effect.fail(uninitialized("decode"));
      const parts: Uint8Array[] = [];
      let total = 0;
      for (let i = 0; i < ids.length; i++) {
        const bytes = this._bytesOf(st, ids[i]);
        if (bytes === undefined) return Effect.fail(invalidId(ids[i]));
        parts.push(bytes);
        total += bytes.length;
      }
      const all = new Uint8Array(total);
      let at = 0;
      for (const p of parts) {
        all.set(p, at);
        at += p.length;
      }
      return Effect.succeed(utf8Decoder.decode(all));
    });
  }

  // ── Special tokens & lookups ─────────────────────────────────────────────

  bosTok(): TokenId {
    return this._state._tag === "Loaded" ? this._state.model.specials.bosTok() : this._options.bosId;
  }

  eosTok(): TokenId {
    return this._state._tag === "Loaded" ? this._state.model.specials.eosTok() : this._options.eosId;
  }

  specialTokenId(name: SpecialTokenName): TokenId | undefined {
    return this._state._tag === "Loaded" ? this._state.model.specials.idOf(name) : undefined;
  }

  hasSpecialToken(name: SpecialTokenName): boolean {
    return this._state._tag === "Loaded" && this._state.model.specials.binding(name) !== undefined;
  }

  tokenToId(token: string): TokenId | undefined {
    return this._state._tag === "Loaded" ? this._state.model.vocab.idOf(token) : undefined;
  }

  idToToken(id: TokenId): string | undefined {
    return this._state._tag === "Loaded" ? this._state.model.vocab.tokenOf(id) : undefined;
  }

  /** The loaded model, for inspection. */
  get model(): TokenizerModel | undefined {
    return this._state._tag === "Loaded" ? this._state.model : undefined;
  }

  // ── Internal ─────────────────────────────────────────────────────────────

  private _install(
    source: string,
    build: Effect.Effect<TokenizerModel, LoadError>,
  ): Effect.Effect<void, LoadError> {
    return build.pipe(
      Effect.tap((model) => {
        const addedById = new Map<TokenId, string>();
        for (const tok of model.specials.addedTokens) addedById.set(tok.id, tok.content);
        this._state = {
          _tag: "Loaded",
          source,
          model,
          preTokenizer: new ByteLevelPreTokenizer(model.preTokenizer.options, model.specials.addedTokens),
          engine: new BpeEngine(model.vocab, model.merges, model.specials, {
            ignoreMerges: model.model.ignoreMerges,
            cacheSize: this._options.cacheSize,
          }),
          addedById,
        };
        const unresolved = model.specials.unresolvedNames();
        return Effect.logInfo(
          `Loaded ${source}: vocab=${model.vocab.size} merges=${model.merges.size} ` +
            `added=${model.specials.addedTokens.length} bos=${model.specials.bosTok()} eos=${model.specials.eosTok()}` +
            (unresolved.length > 0 ? ` unresolved=${unresolved.join(",")}` : ""),
        );
      }),
      Effect.tapError((err) => {
        this._state = { _tag: "Uninitialized" };
        return Effect.logDebug(`Load of ${source} failed: ${err.reason}`);
      }),
      Effect.asVoid,
      Effect.withSpan("tokenizer.load", { attributes: { source } }),
      Effect.annotateLogs("subsystem", "tokenizer"),
    );
  }

  /** Raw bytes of a token, or undefined for an id outside the vocab. */
  private _bytesOf(st: LoadedState, id: TokenId): Uint8Array | undefined {
    const added = st.addedById.get(id);
    if (added !== undefined) return utf8.encode(added);
    const token = st.model.vocab.tokenOf(id);
    return token === undefined ? undefined : this._alphabet.toBytes(token);
  }
}

function encodeLoaded(
  st: LoadedState,
  text: string,
  bosCount: number,
  eosCount: number,
): Effect.Effect<TokenId[], EncodeError> {
  return Effect.gen(function* () {
    const specials = st.model.specials;
    const ids: TokenId[] = [];

    if (bosCount > 0) {
      const bos = yield* specials.require("bos");
      for (let i = 0; i < bosCount; i++) ids.push(bos);
    }

    for (const piece of st.preTokenizer.preTokenize(text)) {
      if (piece._tag === "Added") {
        ids.push(piece.id);
        continue;
      }
      for (const id of yield* st.engine.encodePiece(piece.symbols)) ids.push(id);
    }

    if (eosCount > 0) {
      const eos = yield* specials.require("eos");
      for (let i = 0; i < eosCount; i++) ids.push(eos);
    }
    return ids;
  });
}

function uninitialized(operation: string): UninitializedError {
  return new UninitializedError({ message: `Cannot ${operation}: no tokenizer loaded` });
}

function invalidId(id: TokenId): DecodeError {
  return new DecodeError({ reason: "InvalidId", message: `Id ${id} is not in the vocab` });
}
