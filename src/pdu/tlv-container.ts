import { TlvTag } from "../tlv/tag.js";
import { Tlv } from "../tlv/tlv.js";

/**
 * Operations of a PDU that carries optional parameters.
 *
 * Records keep their insertion order and duplicates are allowed; lookups
 * return the first record whose tag matches. Absence is reported as
 * `undefined`, never as an error.
 *
 * @example
 * const submitSm = new SubmitSm();
 * submitSm.pushTlv(Tlv.custom(0x1400, new Uint8Array([1, 2, 3, 4])));
 */
export interface TlvContainer {
  /** Appends a record, including raw ones under vendor tags (0x1400-0x3FFF). */
  pushTlv(tlv: Tlv): void;
  getTlv(tag: TlvTag): Tlv | undefined;
  getTlvs(): readonly Tlv[];
  /** The underlying array, for bulk edits; {@link pushTlv} hooks do not run. */
  getTlvsMut(): Tlv[];
  removeTlv(tag: TlvTag): Tlv | undefined;
  hasTlv(tag: TlvTag): boolean;
  clearTlvs(): void;
}

/**
 * Shared implementation of {@link TlvContainer}. PDU kinds whose fixed body
 * depends on the optional parameters override {@link onInsert}.
 */
export abstract class TlvCollection implements TlvContainer {
  private readonly tlvs: Tlv[] = [];

  public pushTlv(tlv: Tlv): void {
    this.tlvs.push(tlv);
    this.onInsert(tlv);
  }

  public getTlv(tag: TlvTag): Tlv | undefined {
    return this.tlvs.find((tlv) => TlvTag.equals(tlv.tag, tag));
  }

  public getTlvs(): readonly Tlv[] {
    return this.tlvs;
  }

  public getTlvsMut(): Tlv[] {
    return this.tlvs;
  }

  public removeTlv(tag: TlvTag): Tlv | undefined {
    const index = this.tlvs.findIndex((tlv) => TlvTag.equals(tlv.tag, tag));
    return index === -1 ? undefined : this.tlvs.splice(index, 1)[0];
  }

  public hasTlv(tag: TlvTag): boolean {
    return this.getTlv(tag) !== undefined;
  }

  public clearTlvs(): void {
    this.tlvs.length = 0;
  }

  /** Runs after every {@link pushTlv}; no-op unless a PDU kind needs it. */
  protected onInsert(_tlv: Tlv): void {}

  protected pushTlvs(tlvs: Iterable<Tlv>): void {
    for (const tlv of tlvs) this.pushTlv(tlv);
  }
}
