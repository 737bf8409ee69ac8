import { concatBytes } from "../common/codecs.js";
import { SmppTlvError, TlvErrorCode } from "../common/errors.js";
import { TlvTag } from "../tlv/tag.js";
import type { Tlv } from "../tlv/tlv.js";
import { TlvValue } from "../tlv/value.js";

export const TLV_HEADER_LENGTH = 4;

/**
 * Serialises TLV records into the SMPP optional-parameter wire layout:
 * a 2-byte tag, a 2-byte value length (both big-endian) and the value bytes.
 */
export class BasicTlvBuilder {
  /**
   * Encode one TLV record.
   * @returns The tag, length and value bytes of the record
   * @throws SmppTlvError (LENGTH_MISMATCH) when the value does not encode to the declared length
   */
  public static build(tlv: Tlv): Uint8Array {
    const value =
      tlv.value === undefined ? new Uint8Array(0) : TlvValue.encode(tlv.value);

    if (value.byteLength !== tlv.valueLength) {
      throw new SmppTlvError(
        TlvErrorCode.LENGTH_MISMATCH,
        `${TlvTag.describe(tlv.tag)}: declared length ${tlv.valueLength} but value encodes to ${value.byteLength} byte(s)`,
      );
    }

    const result = new Uint8Array(TLV_HEADER_LENGTH + value.byteLength);
    const view = new DataView(result.buffer);
    view.setUint16(0, TlvTag.code(tlv.tag), false);
    view.setUint16(2, tlv.valueLength, false);
    result.set(value, TLV_HEADER_LENGTH);
    return result;
  }

  /** Encode records back to back, in order. */
  public static buildAll(tlvs: Iterable<Tlv>): Uint8Array {
    const parts: Uint8Array[] = [];
    for (const tlv of tlvs) parts.push(this.build(tlv));
    return concatBytes(parts);
  }
}
