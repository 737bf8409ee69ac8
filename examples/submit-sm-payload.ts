import { SubmitSm, Tlv, TlvTag } from "../src/index.js";

const submitSm = new SubmitSm({
  shortMessage: new TextEncoder().encode("Hello"),
});

// Content longer than short_message allows goes into message_payload.
submitSm.pushTlv(
  Tlv.from({
    kind: "MessagePayload",
    value: new TextEncoder().encode("A much longer message ".repeat(20)),
  }),
);

console.log(submitSm.smLength); // 0
console.log(submitSm.getTlv(TlvTag.known("MessagePayload"))?.valueLength); // 440
