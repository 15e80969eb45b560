import type {
  HostConstant,
  HostFunction,
  HostMemberContainer,
  HostMethodDescriptor,
  HostModule,
  HostMultipleMembers,
  HostObject,
  HostProperty,
  HostType,
} from "./types.js";
import { isHostPrimitive, type HostPrimitive } from "./primitives.js";

export type HostObjectKind = HostObject["hostKind"] | "primitive" | "none" | "unclassified";

/**
 * Result of probing a host value once. Each arm carries the value narrowed to
 * the capability it was classified by.
 */
export type HostClassification =
  | { readonly kind: "type"; readonly value: HostType }
  | { readonly kind: "function"; readonly value: HostFunction }
  | { readonly kind: "method"; readonly value: HostMethodDescriptor }
  | { readonly kind: "property"; readonly value: HostProperty }
  | { readonly kind: "module"; readonly value: HostModule }
  | { readonly kind: "constant"; readonly value: HostConstant }
  | { readonly kind: "multiple"; readonly value: HostMultipleMembers }
  | { readonly kind: "container"; readonly value: HostMemberContainer }
  | { readonly kind: "primitive"; readonly value: Exclude<HostPrimitive, null> }
  | { readonly kind: "none"; readonly value: null }
  | { readonly kind: "unclassified"; readonly value: unknown };

const HOST_KINDS: ReadonlySet<string> = new Set<HostObject["hostKind"]>([
  "type",
  "function",
  "method",
  "property",
  "module",
  "constant",
  "multiple",
  "container",
]);

export function isHostObject(value: unknown): value is HostObject {
  return (
    typeof value === "object" &&
    value !== null &&
    "hostKind" in value &&
    typeof value.hostKind === "string" &&
    HOST_KINDS.has(value.hostKind)
  );
}

export function classifyHostObject(value: unknown): HostClassification {
  if (value === null || value === undefined) {
    return { kind: "none", value: null };
  }
  if (isHostObject(value)) {
    switch (value.hostKind) {
      case "type":
        return { kind: "type", value };
      case "function":
        return { kind: "function", value };
      case "method":
        return { kind: "method", value };
      case "property":
        return { kind: "property", value };
      case "module":
        return { kind: "module", value };
      case "constant":
        return { kind: "constant", value };
      case "multiple":
        return { kind: "multiple", value };
      case "container":
        return { kind: "container", value };
    }
  }
  if (isHostPrimitive(value) && value !== null) {
    return { kind: "primitive", value };
  }
  return { kind: "unclassified", value };
}

export function probeHostObject(value: unknown): HostObjectKind {
  return classifyHostObject(value).kind;
}
