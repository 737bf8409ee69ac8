import { BasicTlvBuilder, Tlv, toHex } from "../src/index.js";

const tlv = Tlv.customU32(0x1400, 0x0000abcd);
const encoded = BasicTlvBuilder.build(tlv);
console.log(toHex(encoded)); // 140000040000abcd
