/**
 * Byte-level alphabet.
 *
 * Every byte value gets a printable, distinct one-character symbol so any
 * byte string can travel through a string-keyed vocabulary. Printable
 * Latin-1 bytes map to themselves; the 68 remaining bytes (controls, space,
 * DEL, the C1 block, NBSP and the soft hyphen) map in byte order to the code
 * points starting at U+0100.
 */

const utf8 = new TextEncoder();

/** Byte ranges that are their own symbol. Inclusive. */
const PRINTABLE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x21, 0x7e], // ! .. ~
  [0xa1, 0xac], // ¡ .. ¬
  [0xae, 0xff], // ® .. ÿ
];

function isPrintable(byte: number): boolean {
  for (const [lo, hi] of PRINTABLE_RANGES) {
    if (byte >= lo && byte <= hi) return true;
  }
  return false;
}

export class ByteAlphabet {
  /** byte -> symbol */
  private readonly _symbols: readonly string[];

  /** symbol -> byte */
  private readonly _bytes: ReadonlyMap<string, number>;

  private constructor() {
    const symbols: string[] = new Array(256);
    const bytes = new Map<string, number>();
    let shifted = 0;
    for (let b = 0; b < 256; b++) {
      const sym = isPrintable(b) ? String.fromCharCode(b) : String.fromCharCode(256 + shifted++);
      symbols[b] = sym;
      bytes.set(sym, b);
    }
    this._symbols = symbols;
    this._bytes = bytes;
  }

  private static _instance: ByteAlphabet | null = null;

  /** The alphabet is a constant; every tokenizer shares one table. */
  static get(): ByteAlphabet {
    if (!ByteAlphabet._instance) {
      ByteAlphabet._instance = new ByteAlphabet();
    }
    return ByteAlphabet._instance;
  }

  symbolOf(byte: number): string {
    return this._symbols[byte & 0xff];
  }

  byteOf(symbol: string): number | undefined {
    return this._bytes.get(symbol);
  }

  /** Map raw bytes to their symbols, one symbol per byte. */
  toSymbols(bytes: Uint8Array): string[] {
    const out: string[] = new Array(bytes.length);
    for (let i = 0; i < bytes.length; i++) {
      out[i] = this._symbols[bytes[i]];
    }
    return out;
  }

  /**
   * Inverse mapping for a token string. A character outside the alphabet
   * (only possible for verbatim tokens) contributes its own UTF-8 bytes.
   */
  toBytes(token: string): Uint8Array {
    const out: number[] = [];
    for (const ch of token) {
      const b = this._bytes.get(ch);
      if (b !== undefined) {
        out.push(b);
      } else {
        for (const raw of utf8.encode(ch)) out.push(raw);
      }
    }
    return Uint8Array.from(out);
  }
}
