import { SmppTlvError, TlvErrorCode } from "../common/errors.js";
import log from "../common/logging.js";
import { TlvTag } from "../tlv/tag.js";
import { Tlv } from "../tlv/tlv.js";
import { TlvCollection } from "./tlv-container.js";

export const CommandId = {
  SubmitSm: 0x00000004,
  DeliverSm: 0x00000005,
  SubmitMulti: 0x00000021,
  DataSm: 0x00000103,
  SubmitSmResp: 0x80000004,
  DeliverSmResp: 0x80000005,
  DataSmResp: 0x80000103,
} as const;
export type CommandId = (typeof CommandId)[keyof typeof CommandId];

export const MAX_SHORT_MESSAGE_LENGTH = 254;

const MESSAGE_PAYLOAD = TlvTag.known("MessagePayload");

export interface TlvPduOptions {
  tlvs?: Iterable<Tlv>;
}

export interface ShortMessagePduOptions extends TlvPduOptions {
  shortMessage?: Uint8Array;
}

/**
 * A PDU carrying both a `short_message` body field and, optionally, a
 * `message_payload` TLV. Only one of them may hold the content, so pushing a
 * `message_payload` record empties the short message.
 */
export abstract class ShortMessagePdu extends TlvCollection {
  public abstract readonly commandId: CommandId;
  private body: Uint8Array = new Uint8Array(0);

  public constructor(options: ShortMessagePduOptions = {}) {
    super();
    if (options.shortMessage !== undefined) {
      this.shortMessage = options.shortMessage;
    }
    this.pushTlvs(options.tlvs ?? []);
  }

  public get shortMessage(): Uint8Array {
    return this.body;
  }

  public set shortMessage(value: Uint8Array) {
    if (value.byteLength > MAX_SHORT_MESSAGE_LENGTH) {
      throw new SmppTlvError(
        TlvErrorCode.SHORT_MESSAGE_TOO_LONG,
        `short_message is ${value.byteLength} bytes; use message_payload above ${MAX_SHORT_MESSAGE_LENGTH}`,
      );
    }
    this.body = value.slice();
  }

  public get smLength(): number {
    return this.body.byteLength;
  }

  // Removing the payload later does not bring the short message back.
  protected onInsert(tlv: Tlv): void {
    if (!TlvTag.equals(tlv.tag, MESSAGE_PAYLOAD)) return;
    if (this.body.byteLength > 0) {
      log(
        "tlv.container",
        `message_payload pushed; clearing ${this.body.byteLength}-byte short_message`,
      );
    }
    this.body = new Uint8Array(0);
  }
}

export class SubmitSm extends ShortMessagePdu {
  public readonly commandId = CommandId.SubmitSm;
}

export class DeliverSm extends ShortMessagePdu {
  public readonly commandId = CommandId.DeliverSm;
}

export class SubmitMulti extends ShortMessagePdu {
  public readonly commandId = CommandId.SubmitMulti;
}

/** A PDU with optional parameters but no short-message body field. */
export abstract class OptionalParameterPdu extends TlvCollection {
  public abstract readonly commandId: CommandId;

  public constructor(options: TlvPduOptions = {}) {
    super();
    this.pushTlvs(options.tlvs ?? []);
  }
}

export class DataSm extends OptionalParameterPdu {
  public readonly commandId = CommandId.DataSm;
}

export class SubmitSmResp extends OptionalParameterPdu {
  public readonly commandId = CommandId.SubmitSmResp;
}

export class DeliverSmResp extends OptionalParameterPdu {
  public readonly commandId = CommandId.DeliverSmResp;
}

export class DataSmResp extends OptionalParameterPdu {
  public readonly commandId = CommandId.DataSmResp;
}

export type TlvPdu =
  | SubmitSm
  | DeliverSm
  | SubmitMulti
  | DataSm
  | SubmitSmResp
  | DeliverSmResp
  | DataSmResp;
