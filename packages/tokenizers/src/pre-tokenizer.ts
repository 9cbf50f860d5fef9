/**
 * ByteLevel pre-tokenizer.
 *
 * 1. Carve out added tokens, longest match first, left to right.
 * 2. Optionally prepend a space (`add_prefix_space`) to each remaining span.
 * 3. Optionally split the remaining spans with the byte-level pattern.
 * 4. Map each piece's UTF-8 bytes through the byte alphabet.
 */
import type { ByteLevelOptions, TokenId } from "@bytelevel/core";
import { ByteAlphabet } from "./byte-alphabet.js";
import type { AddedToken } from "./special-tokens.js";

/** Contractions, letter runs, digit runs, punctuation runs, whitespace runs. */
export const BYTE_LEVEL_PATTERN =
  /'s|'t|'re|'ve|'m|'ll|'d| ?\p{L}+| ?\p{N}+| ?[^\s\p{L}\p{N}]+|\s+(?!\S)|\s+/gu;

export type Piece =
  | { readonly _tag: "Added"; readonly content: string; readonly id: TokenId }
  | { readonly _tag: "Bytes"; readonly text: string; readonly symbols: readonly string[] };

export type Span =
  | { readonly _tag: "Added"; readonly token: AddedToken }
  | { readonly _tag: "Text"; readonly text: string };

const utf8 = new TextEncoder();

export class ByteLevelPreTokenizer {
  readonly options: ByteLevelOptions;

  /** First UTF-16 unit -> added tokens starting with it, longest first. */
  private readonly _addedIndex: ReadonlyMap<string, readonly AddedToken[]>;

  private readonly _alphabet = ByteAlphabet.get();

  constructor(options: ByteLevelOptions, added: readonly AddedToken[] = []) {
    this.options = options;
    const index = new Map<string, AddedToken[]>();
    for (const tok of added) {
      if (tok.content.length === 0) continue;
      const head = tok.content[0];
      const bucket = index.get(head);
      if (bucket) bucket.push(tok);
      else index.set(head, [tok]);
    }
    for (const bucket of index.values()) {
      bucket.sort((a, b) => b.content.length - a.content.length);
    }
    this._addedIndex = index;
  }

  preTokenize(text: string): Piece[] {
    const pieces: Piece[] = [];
    for (const span of this.splitAdded(text)) {
      if (span._tag === "Added") {
        pieces.push({ _tag: "Added", content: span.token.content, id: span.token.id });
        continue;
      }
      for (const part of this.splitText(this.withPrefixSpace(span.text))) {
        pieces.push({
          _tag: "Bytes",
          text: part,
          symbols: this._alphabet.toSymbols(utf8.encode(part)),
        });
      }
    }
    return pieces;
  }

  withPrefixSpace(text: string): string {
    if (!this.options.addPrefixSpace || text.length === 0 || /^\s/u.test(text)) return text;
    return ` ${text}`;
  }

  /** Split around added tokens. Adjacent plain characters form one span. */
  splitAdded(text: string): Span[] {
    if (this._addedIndex.size === 0) {
      return text.length > 0 ? [{ _tag: "Text", text }] : [];
    }

    const spans: Span[] = [];
    let spanStart = 0;
    let i = 0;
    while (i < text.length) {
      const match = this._matchAdded(text, i);
      if (!match) {
        i++;
        continue;
      }
      if (i > spanStart) spans.push({ _tag: "Text", text: text.slice(spanStart, i) });
      spans.push({ _tag: "Added", token: match });
      i += match.content.length;
      spanStart = i;
    }
    if (spanStart < text.length) spans.push({ _tag: "Text", text: text.slice(spanStart) });
    return spans;
  }

  /** Byte-level segmentation of one plain span. */
  splitText(text: string): string[] {
    if (text.length === 0) return [];
    if (!this.options.useRegex) return [text];
    const parts: string[] = [];
    for (const m of text.matchAll(BYTE_LEVEL_PATTERN)) {
      parts.push(m[0]);
    }
    return parts;
  }

  private _matchAdded(text: string, at: number): AddedToken | undefined {
    const bucket = this._addedIndex.get(text[at]);
    if (!bucket) return undefined;
    for (const tok of bucket) {
      if (text.startsWith(tok.content, at)) return tok;
    }
    return undefined;
  }
}
