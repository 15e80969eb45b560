import { describe, test, expect } from "vitest";
import { AsciiString, ELLIPSIS } from "../../src/host/primitives.js";
import { AnalysisErrorCode, isAnalysisError } from "../../src/shared/errors.js";
import {
  BuiltinClassInfo,
  BuiltinFunctionInfo,
  ConstantInfo,
  ObjectBuiltinClassInfo,
  ReflectedNamespace,
} from "../../src/values/builtin-values.js";
import { BuiltinModule } from "../../src/values/builtin-module.js";
import { MultipleMemberInfo } from "../../src/values/multiple-member.js";
import { SequenceBuiltinClassInfo } from "../../src/values/sequence.js";
import { createTestSession, fakeConstant, fakeFunction, fakeMultiple, FakeType } from "../_helpers/fake-host.js";

describe("ValueUniverse", () => {
  test("maps a host type to one canonical class", () => {
    const { session, host } = createTestSession();
    const first = session.universe.valueOf(host.type("str"));
    expect(first).toBeInstanceOf(BuiltinClassInfo);
    expect(session.universe.valueOf(host.type("str"))).toBe(first);
    expect(session.universe.builtinClass("str")).toBe(first);
  });

  test("picks class variants by builtin id", () => {
    const { session } = createTestSession();
    expect(session.universe.builtinClass("list")).toBeInstanceOf(SequenceBuiltinClassInfo);
    expect(session.universe.builtinClass("tuple")).toBeInstanceOf(SequenceBuiltinClassInfo);
    expect(session.universe.builtinClass("object")).toBeInstanceOf(ObjectBuiltinClassInfo);
  });

  test("classifies primitives by their builtin type", () => {
    const { session } = createTestSession();
    const typeOf = (value: unknown): string | undefined => {
      const namespace = session.universe.valueOf(value);
      return namespace instanceof ConstantInfo ? namespace.classInfo.name : undefined;
    };
    expect(typeOf(3)).toBe("int");
    expect(typeOf(2.5)).toBe("float");
    expect(typeOf(10n)).toBe("long");
    expect(typeOf(true)).toBe("bool");
    expect(typeOf("s")).toBe("str");
    expect(typeOf(new AsciiString("b"))).toBe("bytes");
    expect(typeOf(ELLIPSIS)).toBe("ellipsis");
    expect(typeOf(null)).toBe("NoneType");
    expect(typeOf(undefined)).toBe("NoneType");
  });

  test("memoizes constants per value", () => {
    const { session } = createTestSession();
    expect(session.universe.valueOf(3)).toBe(session.universe.getConstant(3));
    expect(session.universe.getConstant(3).description).toBe("3");
    expect(session.universe.getConstant("s").description).toBe('"s"');
    expect(session.universe.getConstant(null).description).toBe("None");
  });

  test("a constant without a value is an instance of its type", () => {
    const { session, host } = createTestSession();
    const value = session.universe.valueOf(fakeConstant(host.type("int")));
    expect(value).toBe(session.universe.builtinClass("int").instance);
  });

  test("wraps modules and functions", () => {
    const { session, host } = createTestSession();
    const module = host.module("tools");
    expect(session.universe.valueOf(module)).toBeInstanceOf(BuiltinModule);
    expect(session.universe.valueOf(module)).toBe(session.universe.getBuiltinModule(module));

    const fn = fakeFunction("helper", "tools");
    const value = session.universe.valueOf(fn);
    expect(value).toBeInstanceOf(BuiltinFunctionInfo);
    expect(session.universe.valueOf(fn)).toBe(value);
  });

  test("aggregates alternatives", () => {
    const { session, host } = createTestSession();
    const posix = host.module("posixpath");
    const nt = host.module("ntpath");

    const both = session.universe.valueOf(fakeMultiple(posix, nt));
    expect(both).toBeInstanceOf(MultipleMemberInfo);
    expect(both instanceof MultipleMemberInfo ? both.members : []).toEqual([
      session.universe.getBuiltinModule(posix),
      session.universe.getBuiltinModule(nt),
    ]);

    expect(session.universe.valueOf(fakeMultiple(posix, posix))).toBe(session.universe.getBuiltinModule(posix));
    expect(session.universe.valueOf(fakeMultiple())).toBe(session.universe.builtinClass("object").instance);
  });

  test("reflects generic containers", () => {
    const { session } = createTestSession();
    const container = {
      hostKind: "container" as const,
      name: "registry",
      getMember: () => undefined,
      getMemberNames: () => [],
    };
    const value = session.universe.valueOf(container);
    expect(value).toBeInstanceOf(ReflectedNamespace);
    expect(value?.name).toBe("registry");
  });

  test("degrades unclassifiable objects to object with a warning", () => {
    const { session, logger } = createTestSession();
    const value = session.universe.valueOf(Symbol("opaque"));
    expect(value).toBe(session.universe.builtinClass("object").instance);
    expect(logger.messages).toEqual(["warn: Host object of type 'symbol' cannot be classified"]);
  });

  test("uses the declared type of an unclassifiable object", () => {
    const { session, host, logger } = createTestSession();
    const opaque = { handle: 1 };
    const declared = new FakeType("Handle", "unknown", "native");
    host.declaredTypes.set(opaque, declared);
    expect(session.universe.valueOf(opaque)).toBe(session.universe.getInstance(declared));
    expect(logger.messages).toEqual([]);
  });

  test("throws on unclassifiable objects under the strict contract", () => {
    const { session } = createTestSession({ strictHostContract: true });
    let caught: unknown;
    try {
      session.universe.valueOf({ handle: 2 });
    } catch (error) {
      caught = error;
    }
    expect(isAnalysisError(caught, AnalysisErrorCode.UNCLASSIFIABLE_HOST_OBJECT)).toBe(true);
  });

  test("makes generic types only for generic host types", () => {
    const { session } = createTestSession();
    const list = session.universe.builtinClass("list");
    const int = session.universe.builtinClass("int");
    const generic = session.universe.makeGenericType(list, int);
    expect(generic?.name).toBe("list[int]");
    expect(session.universe.makeGenericType(list, int)).toBe(generic);
    expect(session.universe.makeGenericType(session.universe.builtinClass("str"), int)).toBeUndefined();
  });

  test("returns one wrapper per value and override", () => {
    const { session } = createTestSession();
    const fn = session.universe.valueOf(fakeFunction("helper", "tools"));
    const info = session.specializations.register("tools", "helper", () => null);
    if (!fn) throw new Error("expected a function value");
    const wrapper = session.universe.specialize(fn, info);
    expect(session.universe.specialize(fn, info)).toBe(wrapper);
    expect(wrapper.original).toBe(fn);
  });

  test("clear drops memoized values", () => {
    const { session } = createTestSession();
    const before = session.universe.builtinClass("int");
    session.universe.clear();
    expect(session.universe.builtinClass("int")).not.toBe(before);
  });
});
