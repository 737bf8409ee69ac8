import { BasicTlvParser, TlvTag, fromHex } from "../src/index.js";

// sar_msg_ref_num = 7, then a vendor string TLV "acme"
const wire = fromHex("020c00020007" + "1401000561636d6500");

for (const tlv of BasicTlvParser.parseAll(wire)) {
  console.log(TlvTag.describe(tlv.tag), tlv.value ?? "(empty)");
}
// sar_msg_ref_num(0x020c) { kind: 'SarMsgRefNum', value: 7 }
// other(0x1401) { kind: 'Other', code: 5121, value: Uint8Array(5) [...] }

const vendor = BasicTlvParser.parseAll(wire)[1];
console.log(vendor.extractString()); // acme
