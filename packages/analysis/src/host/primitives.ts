/**
 * Primitive host values that have no native JavaScript counterpart.
 */

/** A byte string constant (`b"..."`), kept as its latin-1 text form. */
export class AsciiString {
  constructor(public readonly text: string) {}

  toString(): string {
    return this.text;
  }
}

export class Complex {
  constructor(
    public readonly real: number,
    public readonly imag: number,
  ) {}

  toString(): string {
    return `(${this.real}+${this.imag}j)`;
  }
}

/** The `...` singleton. */
export const ELLIPSIS: unique symbol = Symbol("Ellipsis");

/**
 * Constant values a host or a parser can hand to the engine.
 * `null` is `None`; integral numbers are `int`, fractional ones `float`,
 * bigints `long`.
 */
export type HostPrimitive = boolean | number | bigint | string | AsciiString | Complex | typeof ELLIPSIS | null;

export function isHostPrimitive(value: unknown): value is HostPrimitive {
  switch (typeof value) {
    case "boolean":
    case "number":
    case "bigint":
    case "string":
      return true;
    case "symbol":
      return value === ELLIPSIS;
    case "object":
      return value === null || value instanceof AsciiString || value instanceof Complex;
    default:
      return false;
  }
}
