import { describe, test, expect, beforeEach } from "vitest";
import { isHostObject, type HostMemberSource, type HostObject, type HostType } from "@pyscope/analysis";
import { createStubInterpreter, StubInterpreter } from "../src/interpreter.js";

// =============================================================================
// Test Helpers
// =============================================================================

const CONTEXT = {};

function member(source: HostMemberSource | undefined, name: string): HostObject {
  const value = source?.getMember(CONTEXT, name);
  if (!isHostObject(value)) throw new Error(`'${name}' is not a host object`);
  return value;
}

function typeMember(source: HostMemberSource | undefined, name: string): HostType {
  const value = member(source, name);
  if (value.hostKind !== "type") throw new Error(`'${name}' is a ${value.hostKind}`);
  return value;
}

// =============================================================================
// Tests
// =============================================================================

describe("StubInterpreter", () => {
  let host: StubInterpreter;

  beforeEach(() => {
    host = createStubInterpreter();
  });

  test("names its builtin module and every stub module", () => {
    expect(host.builtinModuleName).toBe("builtins");
    expect(host.getModuleNames()).toEqual(expect.arrayContaining(["builtins", "os", "posixpath", "decimal"]));
  });

  test("imports modules once and ignores inherited keys", () => {
    expect(host.importModule("os")).toBe(host.importModule("os"));
    expect(host.importModule("constructor")).toBeUndefined();
    expect(host.importModule("nowhere")).toBeUndefined();
  });

  test("maps builtin ids to types, sharing types between aliases", () => {
    const int = host.getBuiltinType("int");

    expect(int.name).toBe("int");
    expect(int.typeId).toBe("int");
    expect(host.getBuiltinType("long")).toBe(int);
    expect(host.getBuiltinType("unknown")).toBe(host.getBuiltinType("object"));
    expect(host.getBuiltinType("unknown").typeId).toBe("object");
  });

  test("types outside the builtin table are unknown", () => {
    const decimal = typeMember(host.importModule("decimal"), "Decimal");

    expect(decimal.typeId).toBe("unknown");
    expect(decimal.declaringModule).toBe("decimal");
  });

  test("type members include the members of their bases", () => {
    const bool = host.getBuiltinType("bool");

    expect(member(bool, "bit_length").hostKind).toBe("method");
    expect(bool.getMemberNames(CONTEXT)).toEqual(expect.arrayContaining(["bit_length", "__add__"]));
    expect(bool.bases?.map((base) => base.name)).toEqual(["int"]);
  });

  test("methods wrap a function declared on the type", () => {
    const upper = member(host.getBuiltinType("str"), "upper");
    if (upper.hostKind !== "method") throw new Error("upper is not a method");

    expect(upper.function.declaringType).toBe(host.getBuiltinType("str"));
    expect(upper.function.returnTypes).toEqual([host.getBuiltinType("str")]);
  });

  test("generic types are specialized by index and memoized", () => {
    const list = host.getBuiltinType("list");
    const int = host.getBuiltinType("int");
    const listOfInt = list.makeGenericType?.([int]);

    expect(listOfInt?.name).toBe("list[int]");
    expect(listOfInt?.typeId).toBe("list");
    expect(list.makeGenericType?.([int])).toBe(listOfInt);
    expect(list.makeGenericType?.([])).toBeUndefined();
    expect(host.getBuiltinType("str").makeGenericType?.([int])).toBeUndefined();
  });

  test("module members bound to other modules resolve to those modules", () => {
    const path = member(host.importModule("os"), "path");
    if (path.hostKind !== "multiple") throw new Error("os.path is not a multiple");

    expect(path.members).toEqual([host.importModule("posixpath"), host.importModule("ntpath")]);
  });

  test("constants carry their type and value", () => {
    const builtins = host.importModule("builtins");
    const yes = member(builtins, "True");
    const environ = member(host.importModule("os"), "environ");
    if (yes.hostKind !== "constant" || environ.hostKind !== "constant") throw new Error("expected constants");

    expect(yes.type).toBe(host.getBuiltinType("bool"));
    expect(yes.value).toBe(true);
    expect(environ.type.name).toBe("_Environ");
    expect(environ.value).toBeUndefined();
  });

  test("every module context is distinct", () => {
    expect(host.createModuleContext()).not.toEqual(host.createModuleContext());
  });

  test("dispose drops materialized modules", () => {
    const os = host.importModule("os");
    host.dispose();
    expect(host.importModule("os")).not.toBe(os);
  });
});
