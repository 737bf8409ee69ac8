/**
 * Common encode/decode utilities for SMPP TLV values (all integers big-endian)
 */
import { SmppTlvError, TlvErrorCode } from "./errors.js";

export const MAX_U8 = 0xff;
export const MAX_U16 = 0xffff;
export const MAX_U32 = 0xffffffff;
export const MAX_U64 = 0xffffffffffffffffn;

export function toHex(input: ArrayBuffer | Uint8Array): string {
  const bytes = input instanceof Uint8Array ? input : new Uint8Array(input);
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

export function fromHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new Error(`Invalid hex string: '${hex}'`);
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((acc, p) => acc + p.byteLength, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.byteLength;
  }
  return out;
}

function assertUnsigned(n: number, max: number, width: string): void {
  if (!Number.isInteger(n) || n < 0 || n > max) {
    throw new SmppTlvError(
      TlvErrorCode.VALUE_OUT_OF_RANGE,
      `${width} must be an integer in [0, ${max}]; got ${n}`,
    );
  }
}

export function encodeU8(n: number): Uint8Array {
  assertUnsigned(n, MAX_U8, "u8");
  return new Uint8Array([n]);
}

export function encodeU16(n: number): Uint8Array {
  assertUnsigned(n, MAX_U16, "u16");
  const out = new Uint8Array(2);
  new DataView(out.buffer).setUint16(0, n, false);
  return out;
}

export function encodeU32(n: number): Uint8Array {
  assertUnsigned(n, MAX_U32, "u32");
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, n, false);
  return out;
}

export function encodeU64(n: bigint): Uint8Array {
  if (n < 0n || n > MAX_U64) {
    throw new SmppTlvError(
      TlvErrorCode.VALUE_OUT_OF_RANGE,
      `u64 must be in [0, ${MAX_U64}]; got ${n}`,
    );
  }
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, n, false);
  return out;
}

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

// The decoders below read exactly their width; callers check the length.
export function decodeU8(bytes: Uint8Array): number {
  return viewOf(bytes).getUint8(0);
}

export function decodeU16(bytes: Uint8Array): number {
  return viewOf(bytes).getUint16(0, false);
}

export function decodeU32(bytes: Uint8Array): number {
  return viewOf(bytes).getUint32(0, false);
}

export function decodeU64(bytes: Uint8Array): bigint {
  return viewOf(bytes).getBigUint64(0, false);
}

export function encodeUtf8(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

/**
 * Strict UTF-8 decoding.
 * @returns The decoded text, or undefined when the bytes are not valid UTF-8.
 */
export function decodeUtf8(bytes: Uint8Array): string | undefined {
  try {
    // ignoreBOM keeps a leading U+FEFF as text instead of stripping it.
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(
      bytes,
    );
  } catch {
    return undefined;
  }
}

/** UTF-8 bytes followed by a single zero terminator. */
export function encodeCString(str: string): Uint8Array {
  const text = encodeUtf8(str);
  const out = new Uint8Array(text.byteLength + 1);
  out.set(text);
  return out;
}

/**
 * Inverse of {@link encodeCString}: the terminator must be the last byte and
 * the only zero byte.
 */
export function decodeCString(bytes: Uint8Array): string | undefined {
  if (bytes.byteLength === 0 || bytes[bytes.byteLength - 1] !== 0x00) {
    return undefined;
  }
  const body = bytes.subarray(0, bytes.byteLength - 1);
  if (body.includes(0x00)) return undefined;
  return decodeUtf8(body);
}
