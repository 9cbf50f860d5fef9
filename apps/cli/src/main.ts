#!/usr/bin/env tsx
/**
 * bytelevel CLI — the main entry point.
 *
 * Commands: encode, decode, inspect
 */
import { Console, Effect } from "effect";
import type { ConfigError, TokenizerError, TokenizerService } from "@bytelevel/core";
import { loggingLayer, parseLogLevel, TokenizerLive, withSpan } from "@bytelevel/effect-runtime";
import { loadConfig, parseKV, requireArg, strArg, type Args } from "./parse.js";
import { encodeCmd } from "./commands/encode.js";
import { decodeCmd } from "./commands/decode.js";
import { inspectCmd } from "./commands/inspect.js";

const USAGE = `
bytelevel — byte-level BPE tokenizer for tokenizer.json files

Commands:
  encode           Encode text to token ids
  decode           Decode token ids to text
  inspect          Show vocab size and special tokens

Options:
  --tokenizer=<path>   tokenizer.json or a directory holding it (required)
  --config=<file>      JSON file of default options; flags override it
  --log-level=<level>  debug | info | warn | error | none (env BYTELEVEL_LOG_LEVEL)
  --help, -h           Show this help

Examples:
  bytelevel encode --tokenizer=models/llama3 --text="Hello world" --bos=1
  bytelevel decode --tokenizer=models/llama3 --ids=128000,9906,1917
  bytelevel decode --tokenizer=models/llama3 --ids=9906,1917 --stream
  bytelevel inspect --tokenizer=models/llama3/tokenizer.json
`.trim();

type Command = (kv: Args) => Effect.Effect<void, TokenizerError | ConfigError, TokenizerService>;

const COMMANDS = new Map<string, Command>([
  ["encode", encodeCmd],
  ["decode", decodeCmd],
  ["inspect", () => inspectCmd()],
]);

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    return;
  }

  const command = args[0];
  const flags = parseKV(args.slice(1));
  const level = parseLogLevel(strArg(flags, "log-level", process.env.BYTELEVEL_LOG_LEVEL ?? "info"));

  const program = Effect.gen(function* () {
    const run = COMMANDS.get(command);
    if (run === undefined) {
      yield* Console.error(`Unknown command: ${command}\n\n${USAGE}`);
      return false;
    }

    const kv = yield* loadConfig(flags);
    const tokenizerPath = yield* requireArg(kv, "tokenizer", "tokenizer.json or its directory");

    yield* withSpan(`cli.${command}`, run(kv)).pipe(Effect.provide(TokenizerLive(tokenizerPath)));
    return true;
  });

  const ok = await Effect.runPromise(
    program.pipe(
      Effect.catchAll((err) =>
        Console.error(`${err._tag}: ${err.message}`).pipe(Effect.as(false)),
      ),
      Effect.provide(loggingLayer(level)),
    ),
  );
  if (!ok) process.exitCode = 1;
}

main().catch((err: unknown) => {
  console.error("Fatal:", err);
  process.exit(1);
});
