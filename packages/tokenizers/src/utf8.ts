/**
 * UTF-8 boundary helpers for token-at-a-time decoding.
 *
 * A token's bytes need not end on a character boundary. A fragment owns every
 * character whose last byte it contributes; a character still incomplete at
 * the end of a fragment is held back for the token that completes it.
 */

export function isContinuation(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

/** Byte length announced by a lead byte; 0 for continuation or never-valid bytes. */
export function sequenceLength(lead: number): number {
  if (lead < 0x80) return 1;
  if (lead >= 0xc2 && lead <= 0xdf) return 2;
  if (lead >= 0xe0 && lead <= 0xef) return 3;
  if (lead >= 0xf0 && lead <= 0xf4) return 4;
  return 0;
}

/**
 * Index where a trailing incomplete sequence starts, or `bytes.length` when
 * the bytes end on a character boundary.
 */
export function incompleteTailStart(bytes: Uint8Array): number {
  const n = bytes.length;
  const window = Math.min(3, n);
  for (let k = 1; k <= window; k++) {
    const b = bytes[n - k];
    if (isContinuation(b)) continue;
    return sequenceLength(b) > k ? n - k : n;
  }
  return n;
}

/** Index of the first byte that is not a continuation byte. */
export function leadingContinuationEnd(bytes: Uint8Array): number {
  let i = 0;
  while (i < bytes.length && isContinuation(bytes[i])) i++;
  return i;
}

export function concatBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}
