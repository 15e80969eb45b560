import { describe, test, expect } from "vitest";
import { AnalysisSession, MultipleMemberInfo, ast, type NamespaceSet, type Statement } from "@pyscope/analysis";
import { createStubInterpreter } from "../src/interpreter.js";

const { assign, attribute, call, constant, importStmt, name } = ast;

// =============================================================================
// Test Helpers
// =============================================================================

function analyze(body: readonly Statement[]): (variable: string) => NamespaceSet {
  const session = new AnalysisSession({ interpreter: createStubInterpreter() });
  const entry = session.addModule("main", "/proj/main.py");
  entry.updateTree(ast.moduleNode(body));
  entry.analyze();
  session.analyzeQueuedEntries();
  return (variable) => entry.getTypesOf(variable);
}

function descriptions(values: NamespaceSet): string[] {
  return values.toArray().map((value) => value.description);
}

// =============================================================================
// Programs against the bundled database
// =============================================================================

describe("analysis over the stub database", () => {
  test("platform-dependent modules keep every alternative", () => {
    const typesOf = analyze([importStmt("os"), assign("p", attribute(name("os"), "path"))]);
    const [path] = typesOf("p").toArray();

    expect(path).toBeInstanceOf(MultipleMemberInfo);
  });

  test("builtin calls use their declared return types", () => {
    const typesOf = analyze([
      assign("n", call(name("len"), [constant("ab")])),
      assign("s", call(attribute(constant("ab"), "upper"))),
    ]);

    expect(descriptions(typesOf("n"))).toEqual(["int"]);
    expect(descriptions(typesOf("s"))).toEqual(["str"]);
  });

  test("range builds a list of int", () => {
    const typesOf = analyze([assign("r", call(name("range"), [constant(3)]))]);
    expect(descriptions(typesOf("r"))).toEqual(["list of int"]);
  });

  test("overridden library functions replace their declared results", () => {
    const typesOf = analyze([
      importStmt("decimal", "pprint", "os", "copy"),
      assign("d", call(attribute(name("decimal"), "Decimal"), [constant("1.5")])),
      assign("f", call(attribute(name("pprint"), "pformat"), [constant(1)])),
      assign("e", call(attribute(attribute(name("os"), "environ"), "get"), [constant("HOME")])),
      assign("c", call(attribute(name("copy"), "deepcopy"), [constant(1)])),
    ]);

    expect(descriptions(typesOf("d"))).toEqual(["Decimal"]);
    expect(descriptions(typesOf("f"))).toEqual(["str"]);
    expect(descriptions(typesOf("e"))).toEqual(["str"]);
    expect(descriptions(typesOf("c"))).toEqual(["1"]);
  });
});
