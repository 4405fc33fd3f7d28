// Uint8Array helpers: concatenation, hex, UTF-8, ordering

import { CborArgumentError, CborNotWellFormedError } from "./errors.js";

const _te = new TextEncoder();
const _td = new TextDecoder("utf-8", { fatal: true });

export const EMPTY_BYTES: Uint8Array = new Uint8Array(0);

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  let len = 0;
  for (const p of parts) len += p.length;
  const out = new Uint8Array(len);
  let off = 0;
  for (const p of parts) {
    out.set(p, off);
    off += p.length;
  }
  return out;
}

export function toHex(bytes: Uint8Array): string {
  let s = "";
  for (let i = 0; i < bytes.length; i++) {
    s += bytes[i].toString(16).padStart(2, "0");
  }
  return s;
}

/** Parse hex text. Whitespace between digit pairs is ignored. */
export function fromHex(text: string): Uint8Array {
  const hex = text.replace(/\s+/g, "");
  if (hex.length % 2 !== 0) throw new CborArgumentError("hex input has odd length");
  if (!/^[0-9a-fA-F]*$/.test(hex)) throw new CborArgumentError("hex input contains non-hex characters");
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(hex.substring(i * 2, i * 2 + 2), 16);
  }
  return out;
}

export function utf8Encode(s: string): Uint8Array {
  return _te.encode(s);
}

export function utf8Decode(bytes: Uint8Array): string {
  try {
    return _td.decode(bytes);
  } catch {
    throw new CborNotWellFormedError("invalid utf8 in text string");
  }
}

/** Unsigned byte-wise comparison (memcmp semantics, shorter prefix first). */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const m = Math.min(a.length, b.length);
  for (let i = 0; i < m; i++) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
  }
  if (a.length === b.length) return 0;
  return a.length < b.length ? -1 : 1;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return compareBytes(a, b) === 0;
}
