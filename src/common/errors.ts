/**
 * Error codes raised by TLV construction and wire decoding.
 * Absence (a missing tag, a payload of the wrong shape) is never an error.
 */
export enum TlvErrorCode {
  /* Tag code outside the unsigned 16-bit range */
  INVALID_TAG = 1,
  /* Value does not fit its shape or the 16-bit length field */
  VALUE_OUT_OF_RANGE = 2,
  /* Input ends before the header or the declared value */
  TRUNCATED = 3,
  /* Value length disagrees with the declared length or the tag's shape */
  LENGTH_MISMATCH = 4,
  /* Short message longer than the 254 octets short_message allows */
  SHORT_MESSAGE_TOO_LONG = 5,
}

export class SmppTlvError extends Error {
  public readonly code: TlvErrorCode;
  constructor(code: TlvErrorCode, message?: string) {
    super(message ?? TlvErrorCode[code]);
    this.name = "SmppTlvError";
    this.code = code;
    Object.setPrototypeOf(this, SmppTlvError.prototype);
  }
}
