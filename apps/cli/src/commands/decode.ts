/**
 * Command: bytelevel decode
 *
 * `--stream` prints one fragment per id (each decoded against its
 * predecessor) instead of the whole text.
 */
import { Console, Effect } from "effect";
import { TokenizerService } from "@bytelevel/core";
import { idsArg, type Args } from "../parse.js";

export const decodeCmd = (kv: Args) =>
  Effect.gen(function* () {
    const ids = yield* idsArg(kv, "ids");
    const tokenizer = yield* TokenizerService;

    if (kv["stream"] === "true") {
      let prev: number | null = null;
      for (const id of ids) {
        const fragment = yield* tokenizer.decode(prev, id);
        yield* Console.log(`${id}\t${JSON.stringify(fragment)}`);
        prev = id;
      }
      return;
    }

    yield* Console.log(yield* tokenizer.decodeAll(ids));
  });
