/**
 * Loading tokenizer documents from disk.
 *
 * A path is either a tokenizer.json file or a directory holding one, in
 * which case the companion files next to it are read too. Every I/O step is
 * wrapped in `Effect.tryPromise` so callers get typed `LoadError` failures
 * instead of raw exceptions.
 */
import { readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { Effect } from "effect";
import { LoadError } from "@bytelevel/core";
import {
  parseTokenizerDocument,
  type CompanionDocuments,
  type SpecialTokenDefaults,
  type TokenizerModel,
} from "./config.js";

export const TOKENIZER_FILE = "tokenizer.json";
export const SPECIAL_TOKENS_MAP_FILE = "special_tokens_map.json";
export const TOKENIZER_CONFIG_FILE = "tokenizer_config.json";
export const GENERATION_CONFIG_FILE = "generation_config.json";

function isNotFound(cause: unknown): boolean {
  return typeof cause === "object" && cause !== null && "code" in cause && cause.code === "ENOENT";
}

function parseJson(path: string, raw: string): Effect.Effect<unknown, LoadError> {
  return Effect.try({
    try: (): unknown => JSON.parse(raw),
    catch: (cause) =>
      new LoadError({ reason: "Malformed", message: `"${path}" is not valid JSON`, cause }),
  });
}

/** Read and parse a JSON file. */
export function readJsonDocument(path: string): Effect.Effect<unknown, LoadError> {
  return Effect.tryPromise({
    try: () => readFile(path, "utf-8"),
    catch: (cause) =>
      new LoadError({ reason: "Unreadable", message: `Failed to read "${path}"`, cause }),
  }).pipe(Effect.flatMap((raw) => parseJson(path, raw)));
}

/** Like `readJsonDocument`, but a missing file is `undefined` rather than an error. */
export function readOptionalJsonDocument(path: string): Effect.Effect<unknown, LoadError> {
  return Effect.tryPromise({
    try: async () => {
      try {
        return await readFile(path, "utf-8");
      } catch (err) {
        if (isNotFound(err)) return undefined;
        throw err;
      }
    },
    catch: (cause) =>
      new LoadError({ reason: "Unreadable", message: `Failed to read "${path}"`, cause }),
  }).pipe(
    Effect.flatMap((raw): Effect.Effect<unknown, LoadError> =>
      raw === undefined ? Effect.succeed(undefined) : parseJson(path, raw),
    ),
  );
}

/** Where the document lives and, for a directory, where its companions live. */
export interface TokenizerLocation {
  readonly document: string;
  readonly directory: string | null;
}

export function locateTokenizer(path: string): Effect.Effect<TokenizerLocation, LoadError> {
  return Effect.tryPromise({
    try: () => stat(path),
    catch: (cause) =>
      new LoadError({ reason: "Unreadable", message: `No tokenizer at "${path}"`, cause }),
  }).pipe(
    Effect.map((info) =>
      info.isDirectory()
        ? { document: join(path, TOKENIZER_FILE), directory: path }
        : { document: path, directory: null },
    ),
  );
}

export function readCompanions(directory: string): Effect.Effect<CompanionDocuments, LoadError> {
  return Effect.all({
    specialTokensMap: readOptionalJsonDocument(join(directory, SPECIAL_TOKENS_MAP_FILE)),
    tokenizerConfig: readOptionalJsonDocument(join(directory, TOKENIZER_CONFIG_FILE)),
    generationConfig: readOptionalJsonDocument(join(directory, GENERATION_CONFIG_FILE)),
  }, { concurrency: "unbounded" }).pipe(
    Effect.tap((found) =>
      Effect.logDebug(
        `Companion files in "${directory}": ` +
          ([
            found.specialTokensMap !== undefined ? SPECIAL_TOKENS_MAP_FILE : null,
            found.tokenizerConfig !== undefined ? TOKENIZER_CONFIG_FILE : null,
            found.generationConfig !== undefined ? GENERATION_CONFIG_FILE : null,
          ]
            .filter((name) => name !== null)
            .join(", ") || "none"),
      ),
    ),
  );
}

/** Load a tokenizer file or directory into an in-memory model. */
export function loadTokenizerModel(
  path: string,
  defaults?: SpecialTokenDefaults,
): Effect.Effect<TokenizerModel, LoadError> {
  return Effect.gen(function* () {
    const location = yield* locateTokenizer(path);
    const doc = yield* readJsonDocument(location.document);
    const companions = location.directory === null ? {} : yield* readCompanions(location.directory);
    return yield* parseTokenizerDocument(doc, companions, defaults);
  }).pipe(Effect.annotateLogs("subsystem", "loader"));
}
