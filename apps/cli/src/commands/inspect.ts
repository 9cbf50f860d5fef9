/**
 * Command: bytelevel inspect
 */
import { Console, Effect } from "effect";
import { TokenizerService, type SpecialTokenName, type Tokenizer } from "@bytelevel/core";

const NAMES = ["bos", "eos", "unk", "pad"] as const;

/** Unbound bos/eos show the configured default id; other unbound names show (none). */
function describeBinding(tokenizer: Tokenizer, name: SpecialTokenName): string {
  const id = tokenizer.specialTokenId(name);
  if (!tokenizer.hasSpecialToken(name)) {
    return id === undefined ? "(none)" : `(default ${id})`;
  }
  if (id === undefined) return "(unresolved)";
  return `${id} ${JSON.stringify(tokenizer.idToToken(id) ?? "")}`;
}

export const inspectCmd = () =>
  Effect.gen(function* () {
    const tokenizer = yield* TokenizerService;
    const lines = [
      `vocab size: ${tokenizer.vocabSize}`,
      `bos: ${tokenizer.bosTok()}`,
      `eos: ${tokenizer.eosTok()}`,
      ...NAMES.map((name) => `${name}_token: ${describeBinding(tokenizer, name)}`),
    ];
    yield* Console.log(lines.join("\n"));
  });
