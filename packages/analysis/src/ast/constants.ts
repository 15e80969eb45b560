import { AsciiString, type HostPrimitive } from "../host/primitives.js";

/** String form of a str or bytes constant; undefined for everything else. */
export function getConstantString(value: HostPrimitive | undefined): string | undefined {
  if (typeof value === "string") return value;
  if (value instanceof AsciiString) return value.text;
  return undefined;
}
