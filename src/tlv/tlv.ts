import {
  MAX_U16,
  decodeU16,
  decodeU32,
  decodeU64,
  decodeUtf8,
  encodeCString,
  encodeU16,
  encodeU32,
  encodeU64,
} from "../common/codecs.js";
import { SmppTlvError, TlvErrorCode } from "../common/errors.js";
import { TlvTag } from "./tag.js";
import { TlvValue } from "./value.js";

function checkLength(tag: TlvTag, length: number): number {
  if (length > MAX_U16) {
    throw new SmppTlvError(
      TlvErrorCode.VALUE_OUT_OF_RANGE,
      `${TlvTag.describe(tag)}: value length ${length} exceeds ${MAX_U16}`,
    );
  }
  return length;
}

/**
 * One optional parameter: tag, declared value length and value.
 *
 * Records are immutable. Every constructor derives the length from the value,
 * so `valueLength` always matches the encoded value; a record without a value
 * (see {@link Tlv.empty}) has length 0.
 */
export class Tlv {
  public readonly tag: TlvTag;
  public readonly valueLength: number;
  public readonly value: TlvValue | undefined;

  private constructor(
    tag: TlvTag,
    valueLength: number,
    value: TlvValue | undefined,
  ) {
    this.tag = tag;
    this.valueLength = valueLength;
    this.value = value;
  }

  /** Wraps a value, deriving the tag and length from it. */
  public static from(value: TlvValue): Tlv {
    const tag = TlvValue.tag(value);
    return new Tlv(tag, checkLength(tag, TlvValue.length(value)), value);
  }

  /**
   * Creates a raw TLV under an arbitrary numeric tag.
   * Intended for vendor tags (0x1400-0x3FFF) but no range is enforced, so
   * peers with non-standard tag assignments can still be reached.
   * @example
   * const tlv = Tlv.custom(0x1400, new Uint8Array([1, 2, 3, 4]));
   */
  public static custom(code: number, bytes: Uint8Array): Tlv {
    return Tlv.from({ kind: "Other", code, value: bytes.slice() });
  }

  public static customU16(code: number, value: number): Tlv {
    return Tlv.custom(code, encodeU16(value));
  }

  public static customU32(code: number, value: number): Tlv {
    return Tlv.custom(code, encodeU32(value));
  }

  public static customU64(code: number, value: bigint): Tlv {
    return Tlv.custom(code, encodeU64(value));
  }

  /** UTF-8 text followed by a zero terminator. */
  public static customString(code: number, value: string): Tlv {
    return Tlv.custom(code, encodeCString(value));
  }

  /** A zero-length parameter whose presence alone carries the meaning. */
  public static empty(tag: TlvTag): Tlv {
    return new Tlv(tag, 0, undefined);
  }

  /** Payload of a raw TLV; typed values are not exposed through this path. */
  public extractRawBytes(): Uint8Array | undefined {
    return this.value?.kind === "Other" ? this.value.value : undefined;
  }

  public extractU16(): number | undefined {
    const bytes = this.extractRawBytes();
    return bytes?.byteLength === 2 ? decodeU16(bytes) : undefined;
  }

  public extractU32(): number | undefined {
    const bytes = this.extractRawBytes();
    return bytes?.byteLength === 4 ? decodeU32(bytes) : undefined;
  }

  public extractU64(): bigint | undefined {
    const bytes = this.extractRawBytes();
    return bytes?.byteLength === 8 ? decodeU64(bytes) : undefined;
  }

  /** Text of a raw TLV, without one trailing zero byte if present. */
  public extractString(): string | undefined {
    const bytes = this.extractRawBytes();
    if (bytes === undefined) return undefined;
    const end =
      bytes.byteLength > 0 && bytes[bytes.byteLength - 1] === 0x00
        ? bytes.byteLength - 1
        : bytes.byteLength;
    return decodeUtf8(bytes.subarray(0, end));
  }
}
