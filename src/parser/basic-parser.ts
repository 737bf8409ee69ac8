import { SmppTlvError, TlvErrorCode } from "../common/errors.js";
import log from "../common/logging.js";
import { TlvTag } from "../tlv/tag.js";
import { Tlv } from "../tlv/tlv.js";
import { TlvValue } from "../tlv/value.js";

export interface ParseOptions {
  /**
   * Reject known tags whose value does not fit the tag's shape (default).
   * When false such values are kept as raw bytes under the numeric tag.
   */
  readonly strict?: boolean;
}

export interface TlvParseResult {
  tlv: Tlv;
  endOffset: number;
}

function checkOffset(offset: number): void {
  if (offset < 0) {
    throw new SmppTlvError(
      TlvErrorCode.TRUNCATED,
      `Offset ${offset} is before the start of the input`,
    );
  }
}

export class BasicTlvParser {
  /**
   * Parse a single TLV record.
   * @param bytes - Buffer holding the record.
   * @param offset - Position of the record's tag.
   * @returns The record and the offset just past its value.
   */
  public static parse(
    bytes: Uint8Array,
    offset = 0,
    options?: ParseOptions,
  ): TlvParseResult {
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

    const header = this.readHeader(view, offset);
    const valueInfo = this.readValue(bytes, header.newOffset, header.length);

    const tag = TlvTag.fromCode(header.code);
    // Zero length means presence only, whatever the tag's usual shape.
    if (header.length === 0) {
      return { tlv: Tlv.empty(tag), endOffset: valueInfo.newOffset };
    }
    const decoded = TlvValue.decode(tag, valueInfo.value, options);
    if (decoded.fallback) {
      log("tlv.parser", `${TlvTag.describe(tag)} kept as raw bytes`);
    }
    return { tlv: Tlv.from(decoded.value), endOffset: valueInfo.newOffset };
  }

  /** Parse consecutive records until the end of the buffer. */
  public static parseAll(bytes: Uint8Array, options?: ParseOptions): Tlv[] {
    const out: Tlv[] = [];
    let offset = 0;
    while (offset < bytes.byteLength) {
      const { tlv, endOffset } = this.parse(bytes, offset, options);
      out.push(tlv);
      offset = endOffset;
    }
    return out;
  }

  /**
   * Peek the tag of the next record without consuming it.
   * @returns The tag, or null when fewer than two bytes remain.
   * @throws SmppTlvError (TRUNCATED) for a negative offset.
   */
  public static peekTag(bytes: Uint8Array, offset = 0): TlvTag | null {
    checkOffset(offset);
    if (offset + 2 > bytes.byteLength) {
      return null;
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return TlvTag.fromCode(view.getUint16(offset, false));
  }

  /**
   * Read the tag and length fields.
   * @param view - The DataView over the input.
   * @param offset - Position of the tag field.
   * @returns The numeric tag, the declared value length and the offset of the value.
   */
  protected static readHeader(
    view: DataView,
    offset: number,
  ): { code: number; length: number; newOffset: number } {
    checkOffset(offset);
    if (offset + 4 > view.byteLength) {
      throw new SmppTlvError(
        TlvErrorCode.TRUNCATED,
        `TLV header needs 4 bytes at offset ${offset}; ${Math.max(view.byteLength - offset, 0)} available`,
      );
    }
    const code = view.getUint16(offset, false);
    const length = view.getUint16(offset + 2, false);
    return { code, length, newOffset: offset + 4 };
  }

  protected static readValue(bytes: Uint8Array, offset: number, length: number) {
    const end = offset + length;
    if (end > bytes.byteLength) {
      throw new SmppTlvError(
        TlvErrorCode.TRUNCATED,
        "Declared length exceeds available bytes",
      );
    }
    return { value: bytes.subarray(offset, end), newOffset: end };
  }
}
