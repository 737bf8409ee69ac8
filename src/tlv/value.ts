import {
  decodeCString,
  decodeU16,
  decodeU32,
  decodeU8,
  encodeCString,
  encodeU16,
  encodeU32,
  encodeU8,
} from "../common/codecs.js";
import { SmppTlvError, TlvErrorCode } from "../common/errors.js";
import {
  KnownTlvTag,
  KnownTlvTagName,
  ShapeOf,
  TlvShape,
  TlvShapeTypes,
  TlvTag,
} from "./tag.js";

/** Names of the known tags whose payload has one of the given shapes. */
export type NamesWithShape<S extends TlvShape> = {
  [K in KnownTlvTagName]: ShapeOf<K> extends S ? K : never;
}[KnownTlvTagName];

/** Payload type of a known tag, e.g. `Uint8Array` for `MessagePayload`. */
export type TlvValueType<K extends KnownTlvTagName> = TlvShapeTypes[ShapeOf<K>];

export interface NumericTlvValue {
  readonly kind: NamesWithShape<"u8" | "u16" | "u32">;
  readonly value: number;
}

export interface StringTlvValue {
  readonly kind: NamesWithShape<"cstring">;
  readonly value: string;
}

export interface OctetsTlvValue {
  readonly kind: NamesWithShape<"octets">;
  readonly value: Uint8Array;
}

/** Raw bytes under any numeric tag: vendor TLVs and standard tags without a typed shape. */
export interface OtherTlvValue {
  readonly kind: "Other";
  readonly code: number;
  readonly value: Uint8Array;
}

export type KnownTlvValue = NumericTlvValue | StringTlvValue | OctetsTlvValue;

export type TlvValue = KnownTlvValue | OtherTlvValue;

export interface DecodeValueOptions {
  /**
   * When true, a known tag whose bytes do not fit its shape is an error;
   * otherwise it falls back to the raw variant.
   */
  readonly strict?: boolean;
}

function hasShape(name: KnownTlvTagName, shapes: readonly TlvShape[]): boolean {
  return shapes.includes(KnownTlvTag[name].shape);
}

function isNumericName(
  name: KnownTlvTagName,
): name is NamesWithShape<"u8" | "u16" | "u32"> {
  return hasShape(name, ["u8", "u16", "u32"]);
}

function isStringName(name: KnownTlvTagName): name is NamesWithShape<"cstring"> {
  return hasShape(name, ["cstring"]);
}

function isOctetsName(name: KnownTlvTagName): name is NamesWithShape<"octets"> {
  return hasShape(name, ["octets"]);
}

function encodeKnown(v: KnownTlvValue): Uint8Array {
  const shape = KnownTlvTag[v.kind].shape;
  const { value } = v;
  switch (shape) {
    case "u8":
      if (typeof value === "number") return encodeU8(value);
      break;
    case "u16":
      if (typeof value === "number") return encodeU16(value);
      break;
    case "u32":
      if (typeof value === "number") return encodeU32(value);
      break;
    case "cstring":
      if (typeof value === "string") return encodeCString(value);
      break;
    case "octets":
      if (value instanceof Uint8Array) return value;
      break;
  }
  throw new SmppTlvError(
    TlvErrorCode.VALUE_OUT_OF_RANGE,
    `${v.kind} expects a ${shape} value`,
  );
}

function decodeNumber(shape: TlvShape, bytes: Uint8Array): number | undefined {
  switch (shape) {
    case "u8":
      return bytes.byteLength === 1 ? decodeU8(bytes) : undefined;
    case "u16":
      return bytes.byteLength === 2 ? decodeU16(bytes) : undefined;
    case "u32":
      return bytes.byteLength === 4 ? decodeU32(bytes) : undefined;
    default:
      return undefined;
  }
}

function decodeKnown(
  name: KnownTlvTagName,
  bytes: Uint8Array,
): KnownTlvValue | undefined {
  if (isNumericName(name)) {
    const n = decodeNumber(KnownTlvTag[name].shape, bytes);
    return n === undefined ? undefined : { kind: name, value: n };
  }
  if (isStringName(name)) {
    const s = decodeCString(bytes);
    return s === undefined ? undefined : { kind: name, value: s };
  }
  if (isOctetsName(name)) return { kind: name, value: bytes.slice() };
  return undefined;
}

export const TlvValue = {
  tag(v: TlvValue): TlvTag {
    return v.kind === "Other" ? TlvTag.other(v.code) : TlvTag.known(v.kind);
  },

  /** Value bytes as they appear on the wire after the length field. */
  encode(v: TlvValue): Uint8Array {
    return v.kind === "Other" ? v.value : encodeKnown(v);
  },

  length(v: TlvValue): number {
    return TlvValue.encode(v).byteLength;
  },

  /**
   * Rebuilds the value variant for a tag from its wire bytes.
   * @throws SmppTlvError (LENGTH_MISMATCH) in strict mode when the bytes do not fit a known tag's shape
   */
  decode(
    tag: TlvTag,
    bytes: Uint8Array,
    options?: DecodeValueOptions,
  ): { value: TlvValue; fallback: boolean } {
    if (tag.kind === "known") {
      const known = decodeKnown(tag.name, bytes);
      if (known !== undefined) return { value: known, fallback: false };
      if (options?.strict ?? true) {
        throw new SmppTlvError(
          TlvErrorCode.LENGTH_MISMATCH,
          `${TlvTag.describe(tag)}: ${bytes.byteLength} byte(s) do not form a ${KnownTlvTag[tag.name].shape} value`,
        );
      }
    }
    return {
      value: { kind: "Other", code: TlvTag.code(tag), value: bytes.slice() },
      fallback: tag.kind === "known",
    };
  },
};
