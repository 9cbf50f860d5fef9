import { describe, it, expect } from "vitest";
import { ByteAlphabet } from "@bytelevel/tokenizers";

const utf8 = new TextEncoder();

describe("ByteAlphabet", () => {
  const alphabet = ByteAlphabet.get();

  it("is shared", () => {
    expect(ByteAlphabet.get()).toBe(alphabet);
  });

  it("maps printable bytes to themselves", () => {
    expect(alphabet.symbolOf(0x41)).toBe("A");
    expect(alphabet.symbolOf(0x21)).toBe("!");
    expect(alphabet.symbolOf(0xe4)).toBe("ä");
    expect(alphabet.symbolOf(0xff)).toBe("ÿ");
  });

  it("shifts the other 68 bytes above U+00FF in byte order", () => {
    expect(alphabet.symbolOf(0x00)).toBe("Ā");
    expect(alphabet.symbolOf(0x0a)).toBe("Ċ");
    expect(alphabet.symbolOf(0x20)).toBe("Ġ");
    expect(alphabet.symbolOf(0x7f)).toBe("ġ");
    expect(alphabet.symbolOf(0xa0)).toBe("ł");
    expect(alphabet.symbolOf(0xad)).toBe("Ń");
  });

  it("is a bijection over single-character symbols", () => {
    const seen = new Set<string>();
    for (let b = 0; b < 256; b++) {
      const sym = alphabet.symbolOf(b);
      expect([...sym].length).toBe(1);
      expect(alphabet.byteOf(sym)).toBe(b);
      seen.add(sym);
    }
    expect(seen.size).toBe(256);
  });

  it("does not treat raw space as a symbol", () => {
    expect(alphabet.byteOf(" ")).toBeUndefined();
    expect(alphabet.byteOf("Ġ")).toBe(0x20);
  });

  it("maps multi-byte characters one symbol per byte", () => {
    expect(alphabet.toSymbols(utf8.encode("中"))).toEqual(["ä", "¸", "Ń"]);
    expect(alphabet.toSymbols(utf8.encode(" a"))).toEqual(["Ġ", "a"]);
    expect(alphabet.toSymbols(new Uint8Array(0))).toEqual([]);
  });

  it("inverts token strings to bytes", () => {
    expect([...alphabet.toBytes("ä¸Ń")]).toEqual([0xe4, 0xb8, 0xad]);
    expect([...alphabet.toBytes("ĠHello")]).toEqual([0x20, 0x48, 0x65, 0x6c, 0x6c, 0x6f]);
    expect(alphabet.toBytes("").length).toBe(0);
  });

  it("falls back to UTF-8 for characters outside the alphabet", () => {
    expect([...alphabet.toBytes("中")]).toEqual([0xe4, 0xb8, 0xad]);
    expect([...alphabet.toBytes("a b")]).toEqual([0x61, 0x20, 0x62]);
  });
});
