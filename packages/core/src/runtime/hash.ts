/**
 * packages/core/src/runtime/hash.ts — Deterministic 64-bit identifiers.
 *
 * Two independent 32-bit FNV-1a lanes over a length-prefixed encoding of the
 * parts, rendered as 16 lowercase hex digits. Stable across processes and
 * platforms; not cryptographic.
 */

export type Hash64 = string;

const FNV_PRIME = 0x01000193;
const LANE_A_OFFSET = 0x811c9dc5;
const LANE_B_OFFSET = 0x050c5d1f;

function fmix32(h: number): number {
  let x = h >>> 0;
  x ^= x >>> 16;
  x = Math.imul(x, 0x85ebca6b);
  x ^= x >>> 13;
  x = Math.imul(x, 0xc2b2ae35);
  x ^= x >>> 16;
  return x >>> 0;
}

function toHex32(v: number): string {
  return (v >>> 0).toString(16).padStart(8, "0");
}

export function hashString(text: string): Hash64 {
  let a = LANE_A_OFFSET;
  let b = LANE_B_OFFSET;
  for (let i = 0; i < text.length; i++) {
    const c = text.charCodeAt(i);
    a ^= c & 0xff;
    a = Math.imul(a, FNV_PRIME);
    a ^= c >>> 8;
    a = Math.imul(a, FNV_PRIME);
    b ^= c;
    b = Math.imul(b, FNV_PRIME);
    b ^= i & 0xff;
  }
  return `${toHex32(fmix32(a))}${toHex32(fmix32(b))}`;
}

/** Hash an ordered tuple; `["ab", "c"]` and `["a", "bc"]` hash differently. */
export function hashParts(parts: readonly (string | number)[]): Hash64 {
  let encoded = "";
  for (const part of parts) {
    const s = typeof part === "number" ? `#${String(part)}` : part;
    encoded += `${s.length}:${s};`;
  }
  return hashString(encoded);
}
