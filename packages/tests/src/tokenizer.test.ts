import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { Effect } from "effect";
import { ByteAlphabet, HfTokenizer } from "@bytelevel/tokenizers";

const fixture = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

async function loaded(options: ConstructorParameters<typeof HfTokenizer>[0] = {}, path = "test_hf_tokenizer.json") {
  const tok = new HfTokenizer(options);
  await Effect.runPromise(tok.load(fixture(path)));
  return tok;
}

describe("HfTokenizer before load", () => {
  it("reports nothing loaded", () => {
    const tok = new HfTokenizer();
    expect(tok.isLoaded).toBe(false);
    expect(tok.vocabSize).toBe(0);
    expect(tok.tokenToId("a")).toBeUndefined();
  });

  it("fails encode and decode", () => {
    const tok = new HfTokenizer();
    expect(Effect.runSync(Effect.flip(tok.encode("hi", 0, 0)))._tag).toBe("Uninitialized");
    expect(Effect.runSync(Effect.flip(tok.decode(null, 0)))._tag).toBe("Uninitialized");
    expect(Effect.runSync(Effect.flip(tok.decodeAll([0])))._tag).toBe("Uninitialized");
  });

  it("reports the configured bos and eos", () => {
    const tok = new HfTokenizer({ bosId: 3, eosId: 4 });
    expect(tok.bosTok()).toBe(3);
    expect(tok.eosTok()).toBe(4);
  });
});

describe("HfTokenizer encode", () => {
  it("encodes with merges and a prefix space", async () => {
    const tok = await loaded();
    expect(await Effect.runPromise(tok.encode("Hello world!", 0, 0))).toEqual([21, 20, 11]);
  });

  it("wraps the ids in bos and eos repetitions", async () => {
    const tok = await loaded({ eosId: 1 });
    expect(await Effect.runPromise(tok.encode("Hello", 1, 1))).toEqual([0, 21, 1]);
    expect(await Effect.runPromise(tok.encode("Hello", 2, 2))).toEqual([0, 0, 21, 1, 1]);
    expect(await Effect.runPromise(tok.encode("Hello", -1, 0))).toEqual([21]);
  });

  it("encodes empty text to nothing but the requested specials", async () => {
    const tok = await loaded();
    expect(await Effect.runPromise(tok.encode("", 0, 0))).toEqual([]);
    expect(await Effect.runPromise(tok.encode("", 1, 0))).toEqual([0]);
  });

  it("encodes multi-byte characters", async () => {
    const tok = await loaded();
    expect(await Effect.runPromise(tok.encode("中", 0, 0))).toEqual([7, 22, 23]);
  });

  it("maps unknown symbols to unk", async () => {
    const tok = await loaded();
    expect(await Effect.runPromise(tok.encode("Hi", 0, 0))).toEqual([7, 3, 2]);
  });

  it("emits added tokens verbatim", async () => {
    const tok = await loaded();
    expect(await Effect.runPromise(tok.encode("<s>Hello", 0, 0))).toEqual([0, 21]);
    expect(await Effect.runPromise(tok.encode("Hello<s>world", 0, 0))).toEqual([21, 0, 20]);
  });

  it("gives the same ids to concurrent callers", async () => {
    const tok = await loaded();
    const runs = await Effect.runPromise(
      Effect.all(
        Array.from({ length: 8 }, () => tok.encode("Hello world!", 0, 0)),
        { concurrency: "unbounded" },
      ),
    );
    for (const ids of runs) expect(ids).toEqual([21, 20, 11]);
  });
});

describe("HfTokenizer decode", () => {
  it("decodes a token to its text", async () => {
    const tok = await loaded();
    expect(await Effect.runPromise(tok.decode(null, 21))).toBe(" Hello");
    expect(await Effect.runPromise(tok.decode(21, 20))).toBe(" world");
  });

  it("completes a character split across two tokens", async () => {
    const tok = await loaded();
    expect(await Effect.runPromise(tok.decode(null, 22))).toBe("");
    expect(await Effect.runPromise(tok.decode(22, 23))).toBe("中");
  });

  it("replaces orphan continuation bytes only without a previous token", async () => {
    const tok = await loaded();
    expect(await Effect.runPromise(tok.decode(null, 23))).toBe("\uFFFD\uFFFD");
    expect(await Effect.runPromise(tok.decode(999, 23))).toBe("\uFFFD\uFFFD");
    expect(await Effect.runPromise(tok.decode(21, 23))).toBe("");
  });

  it("treats an unknown previous id as no context", async () => {
    const tok = await loaded();
    expect(await Effect.runPromise(tok.decode(999, 21))).toBe(" Hello");
  });

  it("decodes added tokens to their content", async () => {
    const tok = await loaded();
    expect(await Effect.runPromise(tok.decode(null, 0))).toBe("<s>");
  });

  it("fails on an id outside the vocab", async () => {
    const tok = await loaded();
    const err = await Effect.runPromise(Effect.flip(tok.decode(null, 999)));
    expect(err._tag).toBe("DecodeFailure");
    if (err._tag === "DecodeFailure") expect(err.reason).toBe("InvalidId");
  });

  it("streams back the encoded text", async () => {
    const tok = await loaded();
    const ids = await Effect.runPromise(tok.encode("Hello 中 world!", 0, 0));
    let prev: number | null = null;
    let text = "";
    for (const id of ids) {
      text += await Effect.runPromise(tok.decode(prev, id));
      prev = id;
    }
    expect(text).toBe(" Hello 中 world!");
  });

  it("decodes a whole sequence", async () => {
    const tok = await loaded();
    expect(await Effect.runPromise(tok.decodeAll([21, 20, 11]))).toBe(" Hello world!");
    expect(await Effect.runPromise(tok.decodeAll([7, 22, 23]))).toBe(" 中");
    expect(await Effect.runPromise(tok.decodeAll([22]))).toBe("\uFFFD");
    expect(await Effect.runPromise(tok.decodeAll([]))).toBe("");
  });
});

describe("HfTokenizer lookups", () => {
  it("exposes the vocab", async () => {
    const tok = await loaded();
    expect(tok.isLoaded).toBe(true);
    expect(tok.vocabSize).toBe(26);
    expect(tok.tokenToId("Hello")).toBe(15);
    expect(tok.idToToken(20)).toBe("Ġworld");
    expect(tok.specialTokenId("unk")).toBe(2);
    expect(tok.specialTokenId("pad")).toBeUndefined();
  });

  it("tells bound special tokens from defaults", async () => {
    expect(new HfTokenizer().hasSpecialToken("unk")).toBe(false);
    const tok = await loaded();
    expect(tok.hasSpecialToken("unk")).toBe(true);
    expect(tok.hasSpecialToken("bos")).toBe(false);
    expect(tok.specialTokenId("bos")).toBe(0);
    const dir = await loaded({}, "hf_tokenizer_dir");
    expect(dir.hasSpecialToken("pad")).toBe(true);
    expect(dir.specialTokenId("pad")).toBeUndefined();
  });

  it("returns to uninitialized after a failed reload", async () => {
    const tok = await loaded();
    const err = await Effect.runPromise(Effect.flip(tok.load(fixture("no_such_tokenizer.json"))));
    expect(err._tag).toBe("LoadFailure");
    expect(tok.isLoaded).toBe(false);
    expect(tok.vocabSize).toBe(0);
  });
});

describe("HfTokenizer with companion files", () => {
  it("binds bos and eos from special_tokens_map.json", async () => {
    const tok = await loaded({}, "hf_tokenizer_dir");
    expect(tok.bosTok()).toBe(128000);
    expect(tok.eosTok()).toBe(128009);
    expect(await Effect.runPromise(tok.encode(" hi", 1, 1))).toEqual([128000, 4, 128009]);
  });

  it("splits added tokens out of the text", async () => {
    const tok = await loaded({}, "hf_tokenizer_dir");
    expect(await Effect.runPromise(tok.encode("<|begin_of_text|>hi", 0, 0))).toEqual([128000, 1, 2]);
    expect(await Effect.runPromise(tok.decode(4, 128009))).toBe("<|eot_id|>");
  });

  it("fails on a symbol outside the vocab without unk", async () => {
    const tok = await loaded({}, "hf_tokenizer_dir");
    const err = await Effect.runPromise(Effect.flip(tok.encode("x", 0, 0)));
    expect(err._tag).toBe("EncodeFailure");
    if (err._tag === "EncodeFailure") expect(err.reason).toBe("UnknownSymbol");
  });
});

describe("HfTokenizer.loadDocument", () => {
  const doc = {
    pre_tokenizer: { type: "ByteLevel", add_prefix_space: false },
    model: { type: "BPE", vocab: { a: 0, b: 1, c: 2, ab: 3, abc: 4 }, merges: ["a b", "ab c"] },
  };

  it("loads an in-memory document", async () => {
    const tok = new HfTokenizer();
    await Effect.runPromise(tok.loadDocument(doc));
    expect(await Effect.runPromise(tok.encode("abc", 0, 0))).toEqual([4]);
  });

  it("fails an encode that needs an unresolved bos", async () => {
    const tok = new HfTokenizer({ bosId: 0 });
    await Effect.runPromise(tok.loadDocument(doc, { specialTokensMap: { bos_token: "<nope>" } }));
    const err = await Effect.runPromise(Effect.flip(tok.encode("a", 1, 0)));
    expect(err._tag).toBe("EncodeFailure");
    if (err._tag === "EncodeFailure") expect(err.reason).toBe("UnresolvedSpecialToken");
    expect(await Effect.runPromise(tok.encode("a", 0, 0))).toEqual([0]);
    expect(tok.bosTok()).toBe(0);
  });
});

describe("HfTokenizer round trip", () => {
  const alphabet = ByteAlphabet.get();
  const vocab = Object.fromEntries(Array.from({ length: 256 }, (_, b) => [alphabet.symbolOf(b), b]));
  const doc = {
    pre_tokenizer: { type: "ByteLevel", add_prefix_space: false },
    model: { type: "BPE", vocab, merges: [] },
  };

  it("reproduces ASCII input over a complete byte vocab", async () => {
    const tok = new HfTokenizer();
    await Effect.runPromise(tok.loadDocument(doc));
    const text = "Hello, world! 123\tend\n";
    const ids = await Effect.runPromise(tok.encode(text, 0, 0));
    expect(ids).toEqual([...new TextEncoder().encode(text)]);
    expect(await Effect.runPromise(tok.decodeAll(ids))).toBe(text);
  });

  it("reproduces two-byte characters token by token", async () => {
    const tok = new HfTokenizer();
    await Effect.runPromise(tok.loadDocument(doc));
    const text = "naïve café";
    const ids = await Effect.runPromise(tok.encode(text, 0, 0));
    let prev: number | null = null;
    let out = "";
    for (const id of ids) {
      out += await Effect.runPromise(tok.decode(prev, id));
      prev = id;
    }
    expect(out).toBe(text);
  });

  it("drops the tail of a character split across three tokens", async () => {
    const tok = new HfTokenizer();
    await Effect.runPromise(tok.loadDocument(doc));
    expect(await Effect.runPromise(tok.decode(null, 0xe4))).toBe("");
    expect(await Effect.runPromise(tok.decode(0xe4, 0xb8))).toBe("");
    expect(await Effect.runPromise(tok.decode(0xb8, 0xad))).toBe("");
    expect(await Effect.runPromise(tok.decodeAll([0xe4, 0xb8, 0xad]))).toBe("中");
  });

  it("drops a continuation byte that follows a complete token", async () => {
    const tok = new HfTokenizer();
    await Effect.runPromise(tok.loadDocument(doc));
    expect(await Effect.runPromise(tok.decode(0x41, 0xad))).toBe("");
    expect(await Effect.runPromise(tok.decode(0xad, 0x41))).toBe("A");
    expect(await Effect.runPromise(tok.decode(null, 0xad))).toBe("\uFFFD");
  });
});
