import { MAX_U16 } from "../common/codecs.js";
import { SmppTlvError, TlvErrorCode } from "../common/errors.js";

/** Payload shape of a standard optional parameter. */
export type TlvShape = "u8" | "u16" | "u32" | "cstring" | "octets";

export interface TlvShapeTypes {
  u8: number;
  u16: number;
  u32: number;
  cstring: string;
  octets: Uint8Array;
}

/**
 * Standard optional parameters recognised as typed values.
 * Names follow the SMPP parameter names; anything else is an `other` tag.
 */
export const KnownTlvTag = {
  DestAddrSubunit: { code: 0x0005, shape: "u8" },
  DestNetworkType: { code: 0x0006, shape: "u8" },
  DestBearerType: { code: 0x0007, shape: "u8" },
  DestTelematicsId: { code: 0x0008, shape: "u16" },
  SourceAddrSubunit: { code: 0x000d, shape: "u8" },
  SourceNetworkType: { code: 0x000e, shape: "u8" },
  SourceBearerType: { code: 0x000f, shape: "u8" },
  SourceTelematicsId: { code: 0x0010, shape: "u8" },
  QosTimeToLive: { code: 0x0017, shape: "u32" },
  PayloadType: { code: 0x0019, shape: "u8" },
  AdditionalStatusInfoText: { code: 0x001d, shape: "cstring" },
  ReceiptedMessageId: { code: 0x001e, shape: "cstring" },
  MsMsgWaitFacilities: { code: 0x0030, shape: "u8" },
  PrivacyIndicator: { code: 0x0201, shape: "u8" },
  SourceSubaddress: { code: 0x0202, shape: "octets" },
  DestSubaddress: { code: 0x0203, shape: "octets" },
  UserMessageReference: { code: 0x0204, shape: "u16" },
  UserResponseCode: { code: 0x0205, shape: "u8" },
  SourcePort: { code: 0x020a, shape: "u16" },
  DestinationPort: { code: 0x020b, shape: "u16" },
  SarMsgRefNum: { code: 0x020c, shape: "u16" },
  LanguageIndicator: { code: 0x020d, shape: "u8" },
  SarTotalSegments: { code: 0x020e, shape: "u8" },
  SarSegmentSeqnum: { code: 0x020f, shape: "u8" },
  ScInterfaceVersion: { code: 0x0210, shape: "u8" },
  CallbackNumPresInd: { code: 0x0302, shape: "u8" },
  CallbackNumAtag: { code: 0x0303, shape: "octets" },
  NumberOfMessages: { code: 0x0304, shape: "u8" },
  CallbackNum: { code: 0x0381, shape: "octets" },
  DpfResult: { code: 0x0420, shape: "u8" },
  SetDpf: { code: 0x0421, shape: "u8" },
  MsAvailabilityStatus: { code: 0x0422, shape: "u8" },
  NetworkErrorCode: { code: 0x0423, shape: "octets" },
  MessagePayload: { code: 0x0424, shape: "octets" },
  DeliveryFailureReason: { code: 0x0425, shape: "u8" },
  MoreMessagesToSend: { code: 0x0426, shape: "u8" },
  MessageState: { code: 0x0427, shape: "u8" },
  CongestionState: { code: 0x0428, shape: "u8" },
  UssdServiceOp: { code: 0x0501, shape: "u8" },
  AlertOnMessageDelivery: { code: 0x130c, shape: "u8" },
} as const satisfies Record<string, { code: number; shape: TlvShape }>;

export type KnownTlvTagName = keyof typeof KnownTlvTag;

export type ShapeOf<K extends KnownTlvTagName> = (typeof KnownTlvTag)[K]["shape"];

export type TlvTag =
  | { readonly kind: "known"; readonly name: KnownTlvTagName }
  | { readonly kind: "other"; readonly code: number };

export const VENDOR_TAG_MIN = 0x1400;
export const VENDOR_TAG_MAX = 0x3fff;

export function isKnownTlvTagName(name: string): name is KnownTlvTagName {
  return Object.prototype.hasOwnProperty.call(KnownTlvTag, name);
}

const namesByCode = new Map<number, KnownTlvTagName>();
for (const name of Object.keys(KnownTlvTag)) {
  if (isKnownTlvTagName(name)) namesByCode.set(KnownTlvTag[name].code, name);
}

function checkCode(code: number): number {
  if (!Number.isInteger(code) || code < 0 || code > MAX_U16) {
    throw new SmppTlvError(
      TlvErrorCode.INVALID_TAG,
      `TLV tag must be an integer in [0, 0x${MAX_U16.toString(16)}]; got ${code}`,
    );
  }
  return code;
}

function snakeCase(name: string): string {
  return name.replace(/[A-Z]/g, (c, i: number) =>
    (i === 0 ? "" : "_") + c.toLowerCase(),
  );
}

function hex16(code: number): string {
  return `0x${code.toString(16).padStart(4, "0")}`;
}

export const TlvTag = {
  known(name: KnownTlvTagName): TlvTag {
    return { kind: "known", name };
  },

  /** A tag carried as a raw number; no range partition is applied. */
  other(code: number): TlvTag {
    return { kind: "other", code: checkCode(code) };
  },

  /** The tag a decoder assigns to a numeric code read off the wire. */
  fromCode(code: number): TlvTag {
    const name = namesByCode.get(checkCode(code));
    return name === undefined ? { kind: "other", code } : { kind: "known", name };
  },

  code(tag: TlvTag): number {
    return tag.kind === "known" ? KnownTlvTag[tag.name].code : tag.code;
  },

  equals(a: TlvTag, b: TlvTag): boolean {
    if (a.kind === "known") return b.kind === "known" && a.name === b.name;
    return b.kind === "other" && a.code === b.code;
  },

  isVendorCode(code: number): boolean {
    return code >= VENDOR_TAG_MIN && code <= VENDOR_TAG_MAX;
  },

  describe(tag: TlvTag): string {
    return tag.kind === "known"
      ? `${snakeCase(tag.name)}(${hex16(KnownTlvTag[tag.name].code)})`
      : `other(${hex16(tag.code)})`;
  },
};
