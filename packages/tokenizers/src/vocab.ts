/**
 * Vocabulary: token string <-> id.
 *
 * Built once by the loader through `VocabBuilder`, then frozen into a
 * `VocabTable` that only exposes reads.
 */
import { Effect } from "effect";
import { LoadError, type TokenId } from "@bytelevel/core";

export class VocabTable {
  /** token -> id */
  private readonly _stoi: ReadonlyMap<string, TokenId>;

  /** id -> token */
  private readonly _itos: ReadonlyMap<TokenId, string>;

  constructor(stoi: ReadonlyMap<string, TokenId>, itos: ReadonlyMap<TokenId, string>) {
    this._stoi = stoi;
    this._itos = itos;
  }

  get size(): number {
    return this._stoi.size;
  }

  idOf(token: string): TokenId | undefined {
    return this._stoi.get(token);
  }

  tokenOf(id: TokenId): string | undefined {
    return this._itos.get(id);
  }
}

export class VocabBuilder {
  private readonly _stoi = new Map<string, TokenId>();
  private readonly _itos = new Map<TokenId, string>();

  /** Insert a model vocab entry. Any repeat of the token or the id fails. */
  insert(token: string, id: TokenId): Effect.Effect<void, LoadError> {
    if (!Number.isSafeInteger(id) || id < 0) {
      return Effect.fail(
        new LoadError({ reason: "Malformed", message: `Vocab id for ${JSON.stringify(token)} is not a non-negative integer: ${id}` }),
      );
    }
    if (this._stoi.has(token)) {
      return Effect.fail(
        new LoadError({ reason: "DuplicateToken", message: `Token ${JSON.stringify(token)} appears twice in the vocab` }),
      );
    }
    const holder = this._itos.get(id);
    if (holder !== undefined) {
      return Effect.fail(
        new LoadError({
          reason: "DuplicateId",
          message: `Id ${id} is shared by ${JSON.stringify(holder)} and ${JSON.stringify(token)}`,
        }),
      );
    }
    this._stoi.set(token, id);
    this._itos.set(id, token);
    return Effect.void;
  }

  /**
   * Insert an added token. tokenizer.json usually repeats special tokens in
   * both the model vocab and `added_tokens`; an exact repeat is accepted.
   */
  insertAdded(token: string, id: TokenId): Effect.Effect<void, LoadError> {
    if (this._stoi.get(token) === id && this._itos.get(id) === token) {
      return Effect.void;
    }
    return this.insert(token, id);
  }

  freeze(): VocabTable {
    return new VocabTable(new Map(this._stoi), new Map(this._itos));
  }
}
