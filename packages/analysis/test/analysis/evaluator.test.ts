import { describe, test, expect } from "vitest";
import {
  assign,
  attribute,
  augAssign,
  binary,
  call,
  classDef,
  constant,
  exprStmt,
  forStmt,
  functionDef,
  list,
  name,
  ret,
  subscript,
  tuple,
} from "../../src/ast/factory.js";
import type { ProjectEntry } from "../../src/modules/project-entry.js";
import { ClassInfo, FunctionInfo } from "../../src/values/user-values.js";
import { addSource, createTestSession, descriptions } from "../_helpers/fake-host.js";

// =============================================================================
// Test Helpers
// =============================================================================

function classNamed(entry: ProjectEntry, className: string): ClassInfo {
  const [value] = entry.getTypesOf(className).toArray();
  if (!(value instanceof ClassInfo)) throw new Error(`${className} is not a class`);
  return value;
}

function methodOf(classInfo: ClassInfo, methodName: string): FunctionInfo {
  const [value] = classInfo.scope.getVariable(methodName)?.types.toArray() ?? [];
  if (!(value instanceof FunctionInfo)) throw new Error(`${methodName} is not a function`);
  return value;
}

// =============================================================================
// Statements
// =============================================================================

describe("statement evaluation", () => {
  test("tuple targets unpack by position", () => {
    const { session } = createTestSession();
    const entry = addSource(session, "m", [
      assign(tuple([name("a"), name("b")]), tuple([constant(1), constant("s")])),
    ]);
    session.analyzeQueuedEntries();

    expect(descriptions(entry.getTypesOf("a"))).toEqual(["1"]);
    expect(descriptions(entry.getTypesOf("b"))).toEqual(['"s"']);
  });

  test("augmented assignment adds the operation result", () => {
    const { session } = createTestSession();
    const entry = addSource(session, "m", [assign("x", constant(1)), augAssign(name("x"), "+", constant(2))]);
    session.analyzeQueuedEntries();

    expect(descriptions(entry.getTypesOf("x"))).toEqual(["1", "int"]);
  });

  test("appended elements flow into a for loop", () => {
    const { session } = createTestSession();
    const entry = addSource(session, "m", [
      assign("xs", list([])),
      exprStmt(call(attribute(name("xs"), "append"), [constant(1)])),
      forStmt(name("v"), name("xs"), [assign("y", name("v"))]),
    ]);
    session.analyzeQueuedEntries();

    expect(descriptions(entry.getTypesOf("xs"))).toEqual(["list of 1"]);
    expect(descriptions(entry.getTypesOf("y"))).toEqual(["1"]);
  });

  test("attributes set through self are read by other methods", () => {
    const { session } = createTestSession();
    const entry = addSource(session, "m", [
      classDef("C", [], [
        functionDef("__init__", ["self"], [assign(attribute(name("self"), "v"), constant(1))]),
        functionDef("get", ["self"], [ret(attribute(name("self"), "v"))]),
      ]),
      assign("r", call(attribute(call(name("C")), "get"))),
    ]);
    session.analyzeQueuedEntries();

    expect(descriptions(entry.getTypesOf("r"))).toEqual(["1"]);
  });

  test("the first parameter of a method is the instance unless the method is static", () => {
    const { session } = createTestSession();
    const entry = addSource(session, "m", [
      classDef("C", [], [
        functionDef("method", ["self"], [ret(name("self"))]),
        functionDef("helper", ["a"], [ret(name("a"))], [name("staticmethod")]),
      ]),
    ]);
    session.analyzeQueuedEntries();

    const c = classNamed(entry, "C");
    const [self] = methodOf(c, "method").parameters;
    const [a] = methodOf(c, "helper").parameters;
    expect(self && descriptions(self.types)).toEqual(["C instance"]);
    expect(a?.types.isEmpty).toBe(true);
  });

  test("subscripting a generic builtin class makes the generic type", () => {
    const { session } = createTestSession();
    const entry = addSource(session, "m", [assign("t", subscript(name("list"), name("int")))]);
    session.analyzeQueuedEntries();

    expect(descriptions(entry.getTypesOf("t"))).toEqual(["list[int]"]);
  });
});

// =============================================================================
// Expressions
// =============================================================================

describe("ProjectEntry.evaluate", () => {
  test("true division of ints is float on Python 3 and int on Python 2", () => {
    const py3 = createTestSession().session.addModule("m", null);
    const py2 = createTestSession({ languageVersion: "2" }).session.addModule("m", null);
    const division = binary("/", constant(1), constant(2));

    expect(descriptions(py3.evaluate(division))).toEqual(["float"]);
    expect(descriptions(py2.evaluate(division))).toEqual(["int"]);
  });

  test("comparisons produce bool", () => {
    const entry = createTestSession().session.addModule("m", null);
    expect(descriptions(entry.evaluate(binary("==", constant(1), constant("a"))))).toEqual(["bool"]);
  });

  test("boolean operators join both sides", () => {
    const entry = createTestSession().session.addModule("m", null);
    expect(descriptions(entry.evaluate(binary("or", constant(1), constant("a"))))).toEqual(["1", '"a"']);
  });

  test("names resolve against the analyzed module", () => {
    const { session } = createTestSession();
    const entry = addSource(session, "m", [assign("x", constant(1))]);
    session.analyzeQueuedEntries();

    expect(descriptions(entry.evaluate(name("x")))).toEqual(["1"]);
    expect(descriptions(entry.evaluate(call(name("len"), [name("x")])))).toEqual(["int"]);
  });
});
