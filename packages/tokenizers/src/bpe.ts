/**
 * Byte-pair encoding engine.
 *
 * Applies ranked merge rules to one pre-tokenized piece and resolves the
 * surviving symbols to vocab ids. The lowest-rank adjacent pair always merges
 * next; among equal ranks (the same pair occurring more than once) the
 * leftmost occurrence wins.
 */
import { Effect } from "effect";
import { EncodeError, type TokenId } from "@bytelevel/core";
import type { VocabTable } from "./vocab.js";
import type { MergeRuleTable } from "./merges.js";
import type { SpecialTokenRegistry } from "./special-tokens.js";

export interface BpeEngineOptions {
  /** Emit a piece that is already a vocab entry without merging it. */
  readonly ignoreMerges: boolean;
  /** Max memoized pieces; 0 disables the cache. */
  readonly cacheSize: number;
}

/**
 * Binary min-heap of (rank, position) entries, ordered by rank then by
 * position. Sized for the worst case of one piece: n-1 initial pairs plus at
 * most two new pairs per merge.
 */
class MergeHeap {
  private readonly _rank: Int32Array;
  private readonly _pos: Int32Array;
  private _size = 0;

  constructor(capacity: number) {
    this._rank = new Int32Array(capacity);
    this._pos = new Int32Array(capacity);
  }

  get size(): number {
    return this._size;
  }

  push(rank: number, pos: number): void {
    let i = this._size++;
    this._rank[i] = rank;
    this._pos[i] = pos;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this._less(i, p)) break;
      this._swap(i, p);
      i = p;
    }
  }

  /** Pop the smallest entry into `out` as [rank, pos]. */
  pop(out: [number, number]): void {
    out[0] = this._rank[0];
    out[1] = this._pos[0];
    this._size--;
    if (this._size === 0) return;
    this._rank[0] = this._rank[this._size];
    this._pos[0] = this._pos[this._size];
    let i = 0;
    while (true) {
      let s = i;
      const l = 2 * i + 1;
      const r = l + 1;
      if (l < this._size && this._less(l, s)) s = l;
      if (r < this._size && this._less(r, s)) s = r;
      if (s === i) break;
      this._swap(i, s);
      i = s;
    }
  }

  private _less(a: number, b: number): boolean {
    const ra = this._rank[a];
    const rb = this._rank[b];
    return ra < rb || (ra === rb && this._pos[a] < this._pos[b]);
  }

  private _swap(a: number, b: number): void {
    const tr = this._rank[a]; this._rank[a] = this._rank[b]; this._rank[b] = tr;
    const tp = this._pos[a]; this._pos[a] = this._pos[b]; this._pos[b] = tp;
  }
}

export class BpeEngine {
  private readonly _vocab: VocabTable;
  private readonly _merges: MergeRuleTable;
  private readonly _specials: SpecialTokenRegistry;
  private readonly _options: BpeEngineOptions;

  /** joined symbols -> ids. A memo of pure results; never read across reloads. */
  private readonly _cache = new Map<string, readonly TokenId[]>();

  constructor(
    vocab: VocabTable,
    merges: MergeRuleTable,
    specials: SpecialTokenRegistry,
    options: BpeEngineOptions,
  ) {
    this._vocab = vocab;
    this._merges = merges;
    this._specials = specials;
    this._options = options;
  }

  /**
   * Merge a symbol sequence as far as the rules allow.
   *
   * Symbols live in a doubly-linked list over their original positions; a
   * heap holds every mergeable adjacent pair keyed by (rank, left position).
   * After a merge only the two pairs touching the merged node are pushed, so
   * each step costs O(log n) instead of a full rescan. Entries whose pair
   * changed since they were pushed are skipped at pop time.
   */
  mergeSymbols(symbols: readonly string[]): string[] {
    const n = symbols.length;
    if (n <= 1) return [...symbols];

    const tok = symbols.slice();
    const next = new Int32Array(n);
    const prev = new Int32Array(n);
    const deleted = new Uint8Array(n);
    for (let i = 0; i < n; i++) {
      prev[i] = i - 1;
      next[i] = i + 1;
    }
    next[n - 1] = -1;

    const heap = new MergeHeap(3 * n);
    for (let i = 0; i < n - 1; i++) {
      const rank = this._merges.rankOf(tok[i], tok[i + 1]);
      if (rank !== undefined) heap.push(rank, i);
    }

    const top: [number, number] = [0, 0];
    while (heap.size > 0) {
      heap.pop(top);
      const [rank, pos] = top;
      if (deleted[pos]) continue;
      const nxt = next[pos];
      if (nxt === -1) continue;
      if (this._merges.rankOf(tok[pos], tok[nxt]) !== rank) continue;

      tok[pos] = tok[pos] + tok[nxt];
      deleted[nxt] = 1;
      next[pos] = next[nxt];
      if (next[nxt] !== -1) prev[next[nxt]] = pos;

      const prv = prev[pos];
      if (prv !== -1) {
        const r = this._merges.rankOf(tok[prv], tok[pos]);
        if (r !== undefined) heap.push(r, prv);
      }
      const after = next[pos];
      if (after !== -1) {
        const r = this._merges.rankOf(tok[pos], tok[after]);
        if (r !== undefined) heap.push(r, pos);
      }
    }

    // Position 0 only ever absorbs its right neighbour, so it always survives.
    const out: string[] = [];
    for (let cur = 0; cur !== -1; cur = next[cur]) {
      out.push(tok[cur]);
    }
    return out;
  }

  /** Encode one byte-mapped piece to ids. */
  encodePiece(symbols: readonly string[]): Effect.Effect<readonly TokenId[], EncodeError> {
    if (symbols.length === 0) return Effect.succeed([]);

    const key = symbols.join("");
    const hit = this._cache.get(key);
    if (hit) return Effect.succeed(hit);

    if (this._options.ignoreMerges) {
      const whole = this._vocab.idOf(key);
      if (whole !== undefined) return Effect.succeed(this._remember(key, [whole]));
    }

    const merged = this.mergeSymbols(symbols);
    const ids: TokenId[] = [];
    for (const sym of merged) {
      const id = this._vocab.idOf(sym) ?? this._specials.idOf("unk");
      if (id === undefined) {
        return Effect.fail(
          new EncodeError({
            reason: "UnknownSymbol",
            message: `Symbol ${JSON.stringify(sym)} is not in the vocab and no unk token is resolved`,
          }),
        );
      }
      ids.push(id);
    }
    return Effect.succeed(this._remember(key, ids));
  }

  private _remember(key: string, ids: readonly TokenId[]): readonly TokenId[] {
    const cap = this._options.cacheSize;
    if (cap <= 0) return ids;
    if (this._cache.size >= cap) this._cache.clear();
    this._cache.set(key, ids);
    return ids;
  }
}
