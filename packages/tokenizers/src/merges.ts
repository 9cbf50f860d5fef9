/**
 * Merge rules: (left, right) -> rank.
 *
 * tokenizer.json has carried its merge list in three shapes over time:
 *
 *   "#version: 0.2"   header line copied from merges.txt, not a rule
 *   "a b"             legacy string, split on the first space
 *   ["a", "b c"]      pair, components may contain spaces
 *
 * `parseMerges` classifies each entry once and normalizes the rules into a
 * `MergeRuleTable`; nothing downstream knows which shape a rule came from.
 */
import { Effect } from "effect";
import { LoadError } from "@bytelevel/core";

/** A single rule. Lower rank merges first. */
export interface MergeRule {
  readonly left: string;
  readonly right: string;
  readonly rank: number;
}

export type MergeEntry =
  | { readonly _tag: "Header"; readonly text: string }
  | { readonly _tag: "Legacy"; readonly left: string; readonly right: string }
  | { readonly _tag: "Pair"; readonly left: string; readonly right: string };

const SEPARATOR = " ";
const HEADER_PREFIX = "#version";

export class MergeRuleTable {
  /** left -> right -> rank */
  private readonly _ranks: ReadonlyMap<string, ReadonlyMap<string, number>>;
  private readonly _rules: readonly MergeRule[];

  constructor(rules: readonly MergeRule[]) {
    const ranks = new Map<string, Map<string, number>>();
    const kept: MergeRule[] = [];
    for (const rule of rules) {
      let inner = ranks.get(rule.left);
      if (!inner) {
        inner = new Map();
        ranks.set(rule.left, inner);
      }
      // A repeated pair keeps its first (lowest) rank.
      if (inner.has(rule.right)) continue;
      inner.set(rule.right, rule.rank);
      kept.push(rule);
    }
    this._ranks = ranks;
    this._rules = kept;
  }

  get size(): number {
    return this._rules.length;
  }

  /** Rank of the pair, or undefined when the pair never merges. */
  rankOf(left: string, right: string): number | undefined {
    return this._ranks.get(left)?.get(right);
  }

  /** Rules in rank order. */
  rules(): readonly MergeRule[] {
    return this._rules;
  }
}

/** Classify one raw `model.merges` entry. */
export function classifyMergeEntry(raw: unknown, index: number): Effect.Effect<MergeEntry, LoadError> {
  if (typeof raw === "string") {
    if (raw.startsWith(HEADER_PREFIX)) {
      return Effect.succeed({ _tag: "Header", text: raw });
    }
    const at = raw.indexOf(SEPARATOR);
    const left = at < 0 ? "" : raw.slice(0, at);
    const right = at < 0 ? "" : raw.slice(at + SEPARATOR.length);
    if (left.length === 0 || right.length === 0) {
      return Effect.fail(
        new LoadError({
          reason: "Malformed",
          message: `merges[${index}] ${JSON.stringify(raw)} is not of the form "left right"`,
        }),
      );
    }
    return Effect.succeed({ _tag: "Legacy", left, right });
  }

  if (
    Array.isArray(raw) &&
    raw.length === 2 &&
    typeof raw[0] === "string" &&
    typeof raw[1] === "string" &&
    raw[0].length > 0 &&
    raw[1].length > 0
  ) {
    return Effect.succeed({ _tag: "Pair", left: raw[0], right: raw[1] });
  }

  return Effect.fail(
    new LoadError({
      reason: "Malformed",
      message: `merges[${index}] must be a string or a pair of non-empty strings, got ${JSON.stringify(raw)}`,
    }),
  );
}

/**
 * Parse `model.merges`. Ranks follow list order with header lines skipped,
 * so the first real rule is rank 0.
 */
export function parseMerges(raw: unknown): Effect.Effect<MergeRuleTable, LoadError> {
  if (raw === undefined || raw === null) {
    return Effect.succeed(new MergeRuleTable([]));
  }
  if (!Array.isArray(raw)) {
    return Effect.fail(new LoadError({ reason: "Malformed", message: "model.merges must be an array" }));
  }
  const entries: readonly unknown[] = raw;
  return Effect.forEach(entries, (entry, i) => classifyMergeEntry(entry, i)).pipe(
    Effect.map((classified) => {
      const rules: MergeRule[] = [];
      for (const entry of classified) {
        if (entry._tag === "Header") continue;
        rules.push({ left: entry.left, right: entry.right, rank: rules.length });
      }
      return new MergeRuleTable(rules);
    }),
  );
}
