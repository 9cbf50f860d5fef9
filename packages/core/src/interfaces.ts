/**
 * Subsystem interfaces (ports).
 */
import { Context, Effect } from "effect";
import type {
  UninitializedError,
  LoadError,
  EncodeError,
  DecodeError,
} from "./errors.js";
import type { TokenId, SpecialTokenName } from "./types.js";

// ── Tokenizer ──────────────────────────────────────────────────────────────

/**
 * A loadable tokenizer. `load` is the only operation that mutates the
 * instance; once it succeeds, `encode` and `decode` only read shared tables
 * and may be called from any number of concurrent callers.
 */
export interface Tokenizer {
  readonly name: string;
  readonly isLoaded: boolean;
  readonly vocabSize: number;

  load(path: string): Effect.Effect<void, LoadError>;

  /**
   * `bosCount` / `eosCount` are repetition counts for the registry's bos and
   * eos ids, not literal ids.
   */
  encode(
    text: string,
    bosCount: number,
    eosCount: number,
  ): Effect.Effect<TokenId[], UninitializedError | EncodeError>;

  /** Text attributable to `currentId`, given the token that preceded it. */
  decode(
    previousId: TokenId | null,
    currentId: TokenId,
  ): Effect.Effect<string, UninitializedError | DecodeError>;

  decodeAll(ids: ArrayLike<TokenId>): Effect.Effect<string, UninitializedError | DecodeError>;

  bosTok(): TokenId;
  eosTok(): TokenId;
  specialTokenId(name: SpecialTokenName): TokenId | undefined;
  /** True when the loaded files bind `name`, whether or not it resolved. */
  hasSpecialToken(name: SpecialTokenName): boolean;
  tokenToId(token: string): TokenId | undefined;
  idToToken(id: TokenId): string | undefined;
}

export class TokenizerService extends Context.Tag("TokenizerService")<
  TokenizerService,
  Tokenizer
>() {}
