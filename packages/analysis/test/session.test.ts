import { describe, test, expect, vi } from "vitest";
import { assign, attribute, constant, functionDef, importStmt, name, pass } from "../src/ast/factory.js";
import { AnalysisErrorCode, isAnalysisError } from "../src/shared/errors.js";
import { MultipleMemberInfo } from "../src/values/multiple-member.js";
import {
  addSource,
  createTestSession,
  descriptions,
  fakeConstant,
  fakeFunction,
  fakeMultiple,
  FakeHost,
} from "./_helpers/fake-host.js";

// =============================================================================
// Test Helpers
// =============================================================================

function hostWithOs(): FakeHost {
  const host = new FakeHost();
  const posix = host.module("posixpath").set("join", fakeFunction("join", "posixpath"));
  const nt = host.module("ntpath").set("join", fakeFunction("join", "ntpath"));
  host
    .module("os")
    .set("path", fakeMultiple(posix, nt))
    .set("sep", fakeConstant(host.type("str"), "/"));
  return host;
}

// =============================================================================
// Project entries
// =============================================================================

describe("AnalysisSession entries", () => {
  test("addModule binds the module and indexes its path", () => {
    const { session } = createTestSession();
    const entry = session.addModule("pkg", "/p/pkg/__init__.py", "cookie");

    expect(session.modules.get("pkg")?.module).toBe(entry.moduleInfo);
    expect(session.modules.isProjectModule("pkg")).toBe(true);
    expect(session.getEntryByPath("/p/pkg/__init__.py")).toBe(entry);
    expect([...session.modulesByPath()]).toEqual([["/p/pkg/__init__.py", entry]]);
    expect(session.entries.has(entry)).toBe(true);
    expect(entry.cookie).toBe("cookie");
  });

  test("paths are looked up ignoring case and listed as added", () => {
    const { session } = createTestSession();
    const entry = session.addModule("app", "C:/Proj/App.py");
    const resource = session.addResourceFile("C:/Proj/Main.xaml");

    expect(session.getEntryByPath("c:/proj/app.py")).toBe(entry);
    expect(session.getResourceByPath("C:/PROJ/MAIN.XAML")).toBe(resource);
    expect([...session.modulesByPath()]).toEqual([["C:/Proj/App.py", entry]]);

    session.removeModule(entry);
    expect(session.getEntryByPath("C:/Proj/App.py")).toBeUndefined();
  });

  test("removeModule unbinds the entry and is idempotent", () => {
    const { session } = createTestSession();
    const entry = session.addModule("pkg", "/p/pkg/__init__.py");

    session.removeModule(entry);
    session.removeModule(entry);

    expect(entry.isRemoved).toBe(true);
    expect(session.modules.get("pkg")).toBeUndefined();
    expect(session.getEntryByPath("/p/pkg/__init__.py")).toBeUndefined();
    expect(session.entries.size).toBe(0);
  });

  test("removeModule requires an entry", () => {
    const { session } = createTestSession();
    let caught: unknown;
    try {
      session.removeModule(null);
    } catch (error) {
      caught = error;
    }
    expect(isAnalysisError(caught, AnalysisErrorCode.INVALID_ARGUMENT)).toBe(true);
    expect(caught instanceof Error ? caught.message : "").toBe("entry: a project entry is required");
  });

  test("removing a sub-module re-runs readers of the parent attribute", () => {
    const { session } = createTestSession();
    addSource(session, "pkg", [pass()], "/p/pkg/__init__.py");
    const sub = addSource(session, "pkg.sub", [pass()], "/p/pkg/sub.py");
    const reader = addSource(session, "reader", [importStmt("pkg.sub"), assign("s", attribute(name("pkg"), "sub"))]);
    session.analyzeQueuedEntries();
    expect(reader.getTypesOf("s").has(sub.moduleInfo)).toBe(true);

    session.removeModule(sub);
    expect(session.queue.size).toBe(1);
    expect(session.analyzeQueuedEntries().processed).toBe(1);
  });
});

// =============================================================================
// Queries
// =============================================================================

describe("AnalysisSession module queries", () => {
  function populated() {
    const context = createTestSession();
    const { session } = context;
    session.addModule("app", null);
    session.addModule("lib", null);
    session.addModule("lib.app", null);
    addSource(session, "util", [importStmt("ghost"), assign("app", constant(1))]);
    session.analyzeQueuedEntries();
    return context;
  }

  test("getModules lists valid modules, optionally top-level only", () => {
    const { session } = populated();
    expect(session.getModules().map((result) => result.name)).toEqual(["builtins", "app", "lib", "lib.app", "util"]);
    expect(session.getModules(true).map((result) => result.name)).toEqual(["builtins", "app", "lib", "util"]);
  });

  test("getModule loads the named module", () => {
    const { session } = populated();
    const [result, ...rest] = session.getModule("lib");
    expect(rest).toEqual([]);
    expect(result?.memberType).toBe("module");
    const lib = session.modules.get("lib")?.module;
    expect(lib).toBeTruthy();
    expect(result?.values.toArray()[0]).toBe(lib);
  });

  test("findNameInAllModules lists module matches, then member candidates", () => {
    const { session } = populated();
    expect([...session.findNameInAllModules("app")]).toEqual([
      { name: "app", resolved: true },
      { name: "lib.app", resolved: true },
      { name: "builtins.app", resolved: false },
      { name: "app.app", resolved: false },
      { name: "lib.app", resolved: false },
      { name: "lib.app.app", resolved: false },
      { name: "util.app", resolved: true },
    ]);
  });

  test("getModuleMembers lists sub-packages unless members are requested", () => {
    const { session } = createTestSession({ host: hostWithOs() });

    const packages = session.getModuleMembers(["os"]);
    expect(packages.map((result) => [result.name, result.memberType])).toEqual([["path", "module"]]);
    expect(packages[0]?.values.toArray()[0]).toBeInstanceOf(MultipleMemberInfo);

    expect(session.getModuleMembers(["os"], true).map((result) => result.name)).toEqual(["path", "sep"]);
    expect(session.getModuleMembers(["os", "path"])).toEqual([]);
    expect(session.getModuleMembers(["os", "path"], true).map((result) => result.name)).toEqual(["join"]);
    expect(session.getModuleMembers(["missing"])).toEqual([]);
    expect(session.getModuleMembers([])).toEqual([]);
  });

  test("getModuleMembers lists variables holding module aggregates", () => {
    const { session } = createTestSession({ host: hostWithOs() });
    addSource(session, "paths", [importStmt("os"), assign("p", attribute(name("os"), "path")), assign("n", constant(1))]);
    session.analyzeQueuedEntries();

    expect(session.getModuleMembers(["paths"]).map((result) => result.name)).toEqual(["p"]);
  });
});

// =============================================================================
// Analysis directories
// =============================================================================

describe("AnalysisSession analysis directories", () => {
  test("directories are case-insensitive and listeners see snapshots", () => {
    const { session } = createTestSession();
    const listener = vi.fn();
    const unsubscribe = session.onAnalysisDirectoriesChanged(listener);

    expect(session.addAnalysisDirectory("/Proj")).toBe(true);
    expect(session.addAnalysisDirectory("/proj")).toBe(false);
    expect(session.analysisDirectories).toEqual(["/Proj"]);
    expect(session.removeAnalysisDirectory("/PROJ")).toBe(true);
    expect(session.removeAnalysisDirectory("/proj")).toBe(false);
    expect(listener.mock.calls).toEqual([[["/Proj"]], [[]]]);

    unsubscribe();
    session.addAnalysisDirectory("/other");
    expect(listener).toHaveBeenCalledTimes(2);
  });

  test("a listener may unsubscribe while being notified", () => {
    const { session } = createTestSession();
    const second = vi.fn();
    const unsubscribe = session.onAnalysisDirectoriesChanged(() => unsubscribe());
    session.onAnalysisDirectoriesChanged(second);

    session.addAnalysisDirectory("/a");
    session.addAnalysisDirectory("/b");
    expect(second.mock.calls).toEqual([[["/a"]], [["/a", "/b"]]]);
  });
});

// =============================================================================
// Lifecycle
// =============================================================================

describe("AnalysisSession lifecycle", () => {
  test("reloadModules re-initializes the host and re-analyzes every entry", () => {
    const { session, host } = createTestSession();
    session.specializeFunction("m", "f", () => null);
    const entry = addSource(session, "m", [functionDef("f", [], [pass()]), assign("x", constant(1))]);
    session.analyzeQueuedEntries();
    expect(host.initializeCount).toBe(1);

    session.reloadModules();
    expect(host.initializeCount).toBe(2);
    expect(entry.getTypesOf("x").isEmpty).toBe(true);
    expect(session.queue.size).toBe(1);

    session.analyzeQueuedEntries();
    expect(descriptions(entry.getTypesOf("x"))).toEqual(["1"]);
    expect(entry.moduleInfo.specializationCount).toBe(1);
  });

  test("dispose releases the host once", () => {
    const { session, host } = createTestSession();
    session.dispose();
    session.dispose();
    expect(session.isDisposed).toBe(true);
    expect(host.disposeCount).toBe(1);
  });

  test("path helpers delegate to the module name rules", () => {
    const { session } = createTestSession();
    const exists = (filePath: string): boolean => filePath === "/p/pkg/__init__.py";
    expect(session.pathToModuleName("/p/pkg/mod.py", exists)).toBe("pkg.mod");
    expect(session.moduleNameFromUri("file:///p/pkg/mod.py", exists)).toBe("pkg.mod");
  });
});
