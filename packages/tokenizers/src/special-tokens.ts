/**
 * Special token registry.
 *
 * Named bindings (`bos`, `eos`, `unk`, `pad`, ...) resolved against the vocab
 * at load time, plus the verbatim added tokens that bypass BPE. A binding
 * whose content is missing from the vocab stays `Unresolved`; the load still
 * succeeds but any encode that asks for it fails.
 */
import { Effect } from "effect";
import { EncodeError, type SpecialTokenName, type TokenId } from "@bytelevel/core";
import type { VocabTable } from "./vocab.js";

export type SpecialTokenBinding =
  | { readonly _tag: "Resolved"; readonly content: string | null; readonly id: TokenId }
  | { readonly _tag: "Unresolved"; readonly content: string };

export interface AddedToken {
  readonly content: string;
  readonly id: TokenId;
}

/** Bind `name` to `content`, resolving it through the vocab. */
export function bindByContent(content: string, vocab: VocabTable): SpecialTokenBinding {
  const id = vocab.idOf(content);
  return id === undefined
    ? { _tag: "Unresolved", content }
    : { _tag: "Resolved", content, id };
}

export class SpecialTokenRegistry {
  private readonly _bindings: ReadonlyMap<SpecialTokenName, SpecialTokenBinding>;
  private readonly _added: readonly AddedToken[];
  private readonly _defaultBos: TokenId;
  private readonly _defaultEos: TokenId;

  constructor(
    bindings: ReadonlyMap<SpecialTokenName, SpecialTokenBinding>,
    added: readonly AddedToken[],
    defaults: { readonly bos: TokenId; readonly eos: TokenId },
  ) {
    this._bindings = bindings;
    this._added = added;
    this._defaultBos = defaults.bos;
    this._defaultEos = defaults.eos;
  }

  get addedTokens(): readonly AddedToken[] {
    return this._added;
  }

  binding(name: SpecialTokenName): SpecialTokenBinding | undefined {
    return this._bindings.get(name);
  }

  unresolvedNames(): SpecialTokenName[] {
    const out: SpecialTokenName[] = [];
    for (const [name, b] of this._bindings) {
      if (b._tag === "Unresolved") out.push(name);
    }
    return out;
  }

  /** Resolved id for the name; bos/eos fall back to their defaults when unbound. */
  idOf(name: SpecialTokenName): TokenId | undefined {
    const b = this._bindings.get(name);
    if (b) return b._tag === "Resolved" ? b.id : undefined;
    if (name === "bos") return this._defaultBos;
    if (name === "eos") return this._defaultEos;
    return undefined;
  }

  /** Like `idOf`, but an explicit request for a missing token is an error. */
  require(name: SpecialTokenName): Effect.Effect<TokenId, EncodeError> {
    const id = this.idOf(name);
    if (id !== undefined) return Effect.succeed(id);
    const b = this._bindings.get(name);
    const detail = b?._tag === "Unresolved" ? ` (${JSON.stringify(b.content)} is not in the vocab)` : "";
    return Effect.fail(
      new EncodeError({
        reason: "UnresolvedSpecialToken",
        message: `Special token "${name}" is not resolved${detail}`,
      }),
    );
  }

  /** bos id, or its default when the binding is unresolved. */
  bosTok(): TokenId {
    return this.idOf("bos") ?? this._defaultBos;
  }

  eosTok(): TokenId {
    return this.idOf("eos") ?? this._defaultEos;
  }
}
