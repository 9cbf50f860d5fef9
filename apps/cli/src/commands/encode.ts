/**
 * Command: bytelevel encode
 */
import { Console, Effect } from "effect";
import { TokenizerService } from "@bytelevel/core";
import { intArg, requireArg, type Args } from "../parse.js";

export const encodeCmd = (kv: Args) =>
  Effect.gen(function* () {
    const text = yield* requireArg(kv, "text", "text to encode");
    const bos = yield* intArg(kv, "bos", 0);
    const eos = yield* intArg(kv, "eos", 0);

    const tokenizer = yield* TokenizerService;
    const ids = yield* tokenizer.encode(text, bos, eos);

    yield* Effect.logDebug(`Encoded ${text.length} chars into ${ids.length} tokens`);
    yield* Console.log(ids.join(" "));
  });
