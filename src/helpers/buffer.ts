/**
 * Buffer utilities for working with ArrayBuffer and Uint8Array.
 */

/**
 * Copy a view into a standalone ArrayBuffer.
 *
 * Web Crypto and asn1js want a real ArrayBuffer, never a view into a
 * larger (or shared) one.
 */
export function toArrayBuffer(data: Uint8Array): ArrayBuffer {
  const copy = new Uint8Array(data.byteLength);

  copy.set(data);

  return copy.buffer;
}

/**
 * Concatenate multiple Uint8Arrays into a single Uint8Array.
 */
export function concatBytes(arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);

  let offset = 0;

  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }

  return result;
}

/**
 * Convert bytes to an uppercase hex string.
 *
 * @example
 * ```ts
 * bytesToHex(new Uint8Array([72, 101, 108, 108, 111])) // "48656C6C6F"
 * ```
 */
export function bytesToHex(bytes: Uint8Array): string {
  let hex = "";

  for (const byte of bytes) {
    hex += byte.toString(16).toUpperCase().padStart(2, "0");
  }

  return hex;
}

/**
 * Convert a hex string to bytes.
 *
 * Whitespace is ignored and an odd trailing digit is padded with 0,
 * the same way PDF hex strings are read.
 */
export function hexToBytes(hex: string): Uint8Array {
  const clean = hex.replace(/\s/g, "");
  const padded = clean.length % 2 === 1 ? `${clean}0` : clean;

  const bytes = new Uint8Array(padded.length / 2);

  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = Number.parseInt(padded.slice(i * 2, i * 2 + 2), 16);
  }

  return bytes;
}

/**
 * Encode an ASCII/Latin-1 string one byte per character.
 */
export function asciiBytes(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);

  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i) & 0xff;
  }

  return bytes;
}

/**
 * First index of `pattern` in `buffer` within `[from, to)`, or -1.
 */
export function indexOfBytes(
  buffer: Uint8Array,
  pattern: Uint8Array,
  from = 0,
  to = buffer.length,
): number {
  const last = Math.min(to, buffer.length) - pattern.length;

  outer: for (let i = Math.max(0, from); i <= last; i++) {
    for (let j = 0; j < pattern.length; j++) {
      if (buffer[i + j] !== pattern[j]) {
        continue outer;
      }
    }

    return i;
  }

  return -1;
}

/**
 * Last index of `pattern` in `buffer` within `[from, to)`, or -1.
 */
export function lastIndexOfBytes(
  buffer: Uint8Array,
  pattern: Uint8Array,
  from = 0,
  to = buffer.length,
): number {
  const start = Math.max(0, from);

  outer: for (let i = Math.min(to, buffer.length) - pattern.length; i >= start; i--) {
    for (let j = 0; j < pattern.length; j++) {
      if (buffer[i + j] !== pattern[j]) {
        continue outer;
      }
    }

    return i;
  }

  return -1;
}

/**
 * Byte-wise equality of two arrays.
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }

  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }

  return true;
}
