import { describe, it, expect, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import { idsArg, intArg, loadConfig, parseKV, requireArg } from "./parse.js";

describe("parseKV", () => {
  it("reads --key=value and bare flags", () => {
    expect(parseKV(["--text=a=b", "--stream", "positional", "--ids=1,2"])).toEqual({
      text: "a=b",
      stream: "true",
      ids: "1,2",
    });
  });
});

describe("argument helpers", () => {
  it("requires arguments", () => {
    expect(Effect.runSync(requireArg({ tokenizer: "t.json" }, "tokenizer"))).toBe("t.json");
    const err = Effect.runSync(Effect.flip(requireArg({}, "tokenizer", "path")));
    expect(err._tag).toBe("ConfigError");
    expect(err.message).toBe("Missing required argument: --tokenizer (path)");
  });

  it("parses integers", () => {
    expect(Effect.runSync(intArg({ bos: "2" }, "bos", 0))).toBe(2);
    expect(Effect.runSync(intArg({}, "bos", 0))).toBe(0);
    expect(Effect.runSync(Effect.flip(intArg({ bos: "two" }, "bos", 0))).message).toBe(
      '--bos must be an integer, got "two"',
    );
  });

  it("parses id lists", () => {
    expect(Effect.runSync(idsArg({ ids: "1, 2,3" }, "ids"))).toEqual([1, 2, 3]);
    expect(Effect.runSync(idsArg({ ids: "4 5" }, "ids"))).toEqual([4, 5]);
    expect(Effect.runSync(Effect.flip(idsArg({ ids: "1,-2" }, "ids"))).message).toBe(
      '--ids: "-2" is not a token id',
    );
  });
});

describe("loadConfig", () => {
  const dir = mkdtempSync(join(tmpdir(), "bytelevel-cli-"));

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns the flags when there is no config file", async () => {
    expect(await Effect.runPromise(loadConfig({ text: "hi" }))).toEqual({ text: "hi" });
  });

  it("lets flags override the file", async () => {
    const path = join(dir, "config.json");
    writeFileSync(path, JSON.stringify({ tokenizer: "models/test", bos: 1, eos: 1 }));
    const kv = await Effect.runPromise(loadConfig({ config: path, bos: "2" }));
    expect(kv).toEqual({ tokenizer: "models/test", bos: "2", eos: "1", config: path });
  });

  it("fails on a missing file", async () => {
    const err = await Effect.runPromise(Effect.flip(loadConfig({ config: join(dir, "missing.json") })));
    expect(err._tag).toBe("ConfigError");
  });

  it("fails on a file that is not an object", async () => {
    const path = join(dir, "list.json");
    writeFileSync(path, "[1, 2]");
    const err = await Effect.runPromise(Effect.flip(loadConfig({ config: path })));
    expect(err.message).toContain("config file must hold a JSON object");
  });
});
