// tests/unit/common/codecs.test.ts
import { describe, it } from "vitest";
import assert from "assert";
import {
  concatBytes,
  decodeCString,
  decodeU16,
  decodeU32,
  decodeU64,
  decodeU8,
  decodeUtf8,
  encodeCString,
  encodeU16,
  encodeU32,
  encodeU64,
  encodeU8,
  fromHex,
  toHex,
} from "../../../src/common/codecs.js";
import { SmppTlvError, TlvErrorCode } from "../../../src/common/errors.js";

describe("codecs: hex helpers", () => {
  it("toHex works with ArrayBuffer and Uint8Array", () => {
    const u8 = new Uint8Array([0xde, 0xad, 0xbe, 0xef]);
    assert.strictEqual(toHex(u8), "deadbeef");
    assert.strictEqual(toHex(u8.buffer), "deadbeef");
  });

  it("fromHex accepts either case and rejects odd or non-hex input", () => {
    assert.deepStrictEqual(Array.from(fromHex("00Ff10")), [0x00, 0xff, 0x10]);
    assert.throws(() => fromHex("abc"));
    assert.throws(() => fromHex("zz"));
  });

  it("concatBytes joins parts in order", () => {
    const out = concatBytes([
      new Uint8Array([1]),
      new Uint8Array(0),
      new Uint8Array([2, 3]),
    ]);
    assert.deepStrictEqual(Array.from(out), [1, 2, 3]);
  });
});

describe("codecs: fixed-width big-endian integers", () => {
  it("encodes each width big-endian", () => {
    assert.strictEqual(toHex(encodeU8(0x7f)), "7f");
    assert.strictEqual(toHex(encodeU16(0x0102)), "0102");
    assert.strictEqual(toHex(encodeU32(0xdeadbeef)), "deadbeef");
    assert.strictEqual(
      toHex(encodeU64(0x0102030405060708n)),
      "0102030405060708",
    );
  });

  it("decodes each width big-endian", () => {
    assert.strictEqual(decodeU8(fromHex("ff")), 255);
    assert.strictEqual(decodeU16(fromHex("ffff")), 65535);
    assert.strictEqual(decodeU32(fromHex("ffffffff")), 4294967295);
    assert.strictEqual(
      decodeU64(fromHex("ffffffffffffffff")),
      18446744073709551615n,
    );
  });

  it("reads from a subarray view at its own offset", () => {
    const whole = fromHex("aa0102bb");
    assert.strictEqual(decodeU16(whole.subarray(1, 3)), 0x0102);
  });

  it("rejects values outside the width", () => {
    for (const fn of [
      () => encodeU8(256),
      () => encodeU16(-1),
      () => encodeU16(1.5),
      () => encodeU32(0x1_0000_0000),
      () => encodeU64(-1n),
      () => encodeU64(0x1_0000_0000_0000_0000n),
    ]) {
      assert.throws(fn, (e: unknown) => {
        return (
          e instanceof SmppTlvError &&
          e.code === TlvErrorCode.VALUE_OUT_OF_RANGE
        );
      });
    }
  });
});

describe("codecs: text", () => {
  it("decodeUtf8 returns undefined for invalid sequences", () => {
    assert.strictEqual(decodeUtf8(new Uint8Array([0x68, 0x69])), "hi");
    assert.strictEqual(decodeUtf8(new Uint8Array([0xc3, 0x28])), undefined);
  });

  it("encodeCString appends a single terminator", () => {
    assert.strictEqual(toHex(encodeCString("AB")), "414200");
    assert.strictEqual(toHex(encodeCString("")), "00");
    assert.strictEqual(toHex(encodeCString("é")), "c3a900");
  });

  it("decodeUtf8 keeps a leading byte-order mark", () => {
    assert.strictEqual(decodeUtf8(fromHex("efbbbf6869")), "\uFEFFhi");
    assert.strictEqual(decodeCString(fromHex("efbbbf6100")), "\uFEFFa");
  });

  it("decodeCString requires the terminator as the only zero byte", () => {
    assert.strictEqual(decodeCString(fromHex("414200")), "AB");
    assert.strictEqual(decodeCString(fromHex("00")), "");
    assert.strictEqual(decodeCString(fromHex("4142")), undefined);
    assert.strictEqual(decodeCString(fromHex("41004200")), undefined);
    assert.strictEqual(decodeCString(new Uint8Array(0)), undefined);
  });
});
