export const MAX_U64 = 0xffff_ffff_ffff_ffffn

export type SimpleFrame = { readonly kind: "simple"; readonly value: string }
export type ErrorFrame = { readonly kind: "error"; readonly message: string }
/** Unsigned 64-bit, `0 <= value <= MAX_U64` */
export type IntegerFrame = { readonly kind: "integer"; readonly value: bigint }
export type BulkFrame = { readonly kind: "bulk"; readonly value: Uint8Array }
export type NullFrame = { readonly kind: "null" }
export type ArrayFrame = { readonly kind: "array"; readonly items: readonly Frame[] }

/**
 * One RESP value.
 */
export type Frame =
  | SimpleFrame
  | ErrorFrame
  | IntegerFrame
  | BulkFrame
  | NullFrame
  | ArrayFrame

export type FrameKind = Frame["kind"]

const encoder = new TextEncoder()

export function simple(value: string): SimpleFrame {
  return { kind: "simple", value }
}

export function error(message: string): ErrorFrame {
  return { kind: "error", message }
}

export function integer(value: bigint | number): IntegerFrame {
  const big = BigInt(value)

  if (big < 0n || big > MAX_U64) {
    throw new RangeError(`Integer frame out of unsigned 64-bit range: ${big}`)
  }

  return { kind: "integer", value: big }
}

/** Strings are encoded as UTF-8. */
export function bulk(value: Uint8Array | string): BulkFrame {
  return { kind: "bulk", value: typeof value === "string" ? encoder.encode(value) : value }
}

export const nil: NullFrame = Object.freeze({ kind: "null" })

export function array(items: readonly Frame[]): ArrayFrame {
  return { kind: "array", items }
}
