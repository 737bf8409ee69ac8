export type IsEqual<A, B> =
  (<T>() => T extends A ? 1 : 2) extends <T>() => T extends B ? 1 : 2
    ? true
    : false;
export type AssertEqual<A, B> =
  IsEqual<A, B> extends true ? true : ["TypeMismatch", A, B];

export function assertType<A>(_: A): void {
  // no runtime action needed
}

export function fromHexString(hexString: string): Uint8Array {
  const clean = hexString.replace(/\s+/g, "");
  if (clean.length % 2 !== 0) {
    throw new Error("Invalid hex string");
  }
  const out = new Uint8Array(clean.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(clean.substring(i * 2, i * 2 + 2), 16);
  }
  return out;
}

export function bytes(...values: number[]): Uint8Array {
  return new Uint8Array(values);
}

/** Runs fn and returns what it threw, failing when it returns normally. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected the call to throw");
}
