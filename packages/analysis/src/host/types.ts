/**
 * Host type-system capability.
 *
 * The engine never inspects a real interpreter. Everything it knows about
 * builtin modules, types, functions and constants comes through these
 * interfaces, implemented by a host (a compiled stub database, a live
 * interpreter bridge, a test fake).
 */

import type { AnalysisSession } from "../session.js";
import type { HostPrimitive } from "./primitives.js";

export const BUILTIN_TYPE_IDS = [
  "object",
  "type",
  "NoneType",
  "bool",
  "int",
  "long",
  "float",
  "complex",
  "str",
  "bytes",
  "list",
  "tuple",
  "dict",
  "set",
  "function",
  "builtin_function",
  "module",
  "ellipsis",
  "callable_iterator",
  "list_iterator",
  "generator",
  "unknown",
] as const;

/** Builtin types every host must be able to name. */
export type BuiltinTypeId = (typeof BUILTIN_TYPE_IDS)[number];

export function isBuiltinTypeId(value: string): value is BuiltinTypeId {
  return BUILTIN_TYPE_IDS.some((id) => id === value);
}

/** Opaque per-module lookup context handed back to the host on member queries. */
export interface HostModuleContext {
  readonly id?: string;
}

export interface HostMemberSource {
  getMember(context: HostModuleContext, name: string): HostValue | undefined;
  getMemberNames(context: HostModuleContext): readonly string[];
}

export interface HostType extends HostMemberSource {
  readonly hostKind: "type";
  readonly name: string;
  readonly typeId: BuiltinTypeId;
  /** Name of the module that declares the type, e.g. `decimal` for `Decimal`. */
  readonly declaringModule: string;
  readonly doc?: string;
  readonly bases?: readonly HostType[];
  makeGenericType?(indexTypes: readonly HostType[]): HostType | undefined;
}

export interface HostFunction {
  readonly hostKind: "function";
  readonly name: string;
  readonly declaringModule: string;
  readonly declaringType?: HostType;
  readonly doc?: string;
  readonly returnTypes: readonly HostType[];
}

export interface HostMethodDescriptor {
  readonly hostKind: "method";
  readonly name: string;
  readonly function: HostFunction;
}

export interface HostProperty {
  readonly hostKind: "property";
  readonly name: string;
  readonly type?: HostType;
  readonly doc?: string;
}

export interface HostModule extends HostMemberSource {
  readonly hostKind: "module";
  readonly name: string;
  readonly doc?: string;
}

export interface HostConstant {
  readonly hostKind: "constant";
  readonly type: HostType;
  readonly value?: HostPrimitive;
}

/** A name that may be bound to one of several host objects (platform-conditional modules, overloads). */
export interface HostMultipleMembers {
  readonly hostKind: "multiple";
  readonly members: readonly HostValue[];
}

/** A generic reflectable container that is neither a module nor a type. */
export interface HostMemberContainer extends HostMemberSource {
  readonly hostKind: "container";
  readonly name?: string;
}

export type HostObject =
  | HostType
  | HostFunction
  | HostMethodDescriptor
  | HostProperty
  | HostModule
  | HostConstant
  | HostMultipleMembers
  | HostMemberContainer;

export type HostValue = HostObject | HostPrimitive;

export interface HostInterpreter {
  /** `builtins` for Python 3 hosts, `__builtin__` for Python 2 hosts. */
  readonly builtinModuleName: string;
  getModuleNames(): readonly string[];
  importModule(name: string): HostModule | undefined;
  createModuleContext(): HostModuleContext;
  getBuiltinType(id: BuiltinTypeId): HostType;
  /** Declared type of an object the engine could not classify. */
  getTypeOfObject?(value: unknown): HostType | undefined;
  /** Called once per session start and after every reload. */
  initialize?(session: AnalysisSession): void;
  dispose?(): void;
}
