import { describe, test, expect } from "vitest";
import { assign, attribute, call, classDef, constant, exprStmt, functionDef, importStmt, name, pass } from "../../src/ast/factory.js";
import type { ProjectEntry } from "../../src/modules/project-entry.js";
import type { ResourceAnalysis } from "../../src/modules/resource-entry.js";
import { InstanceInfo } from "../../src/values/user-values.js";
import { addSource, createTestSession, descriptions, fakeFunction, FakeHost, FakeType } from "../_helpers/fake-host.js";

// =============================================================================
// Test Helpers
// =============================================================================

const BUTTON_AT = { line: 3, column: 5 };
const HANDLER_AT = { line: 4, column: 20 };

function uiHost(): FakeHost {
  const host = new FakeHost();
  host.module("wpf").set("LoadComponent", fakeFunction("LoadComponent", "wpf"));
  host.module("controls").set("Button", new FakeType("Button", "unknown", "controls"));
  return host;
}

function markup(buttonName: string): ResourceAnalysis {
  return {
    namedObjects: new Map([[buttonName, { typeName: "controls.Button", location: BUTTON_AT }]]),
    eventHandlers: new Map([["onClick", HANDLER_AT]]),
  };
}

/** `class Window` whose constructor loads `Window.xaml`; `w = Window()`. */
const WINDOW_MODULE = [
  importStmt("wpf"),
  classDef("Window", [], [
    functionDef("__init__", ["self"], [
      exprStmt(call(attribute(name("wpf"), "LoadComponent"), [name("self"), constant("Window.xaml")])),
    ]),
    functionDef("onClick", ["self"], [pass()]),
  ]),
  assign("w", call(name("Window"))),
];

function windowInstance(entry: ProjectEntry): InstanceInfo {
  const [instance] = entry.getTypesOf("w").toArray();
  if (!(instance instanceof InstanceInfo)) throw new Error("w is not an instance");
  return instance;
}

// =============================================================================
// Resource loading
// =============================================================================

describe("resource loading", () => {
  test("named objects become attributes located in the resource", () => {
    const { session } = createTestSession({ host: uiHost() });
    const resource = session.addResourceFile("/proj/Window.xaml");
    resource.update(markup("okButton"));
    const entry = addSource(session, "ui", WINDOW_MODULE, "/proj/ui.py");
    session.analyzeQueuedEntries();

    const okButton = windowInstance(entry).attributes.get("okButton");
    expect(okButton && descriptions(okButton.types)).toEqual(["Button"]);
    expect(okButton?.assignments).toEqual([{ owner: resource, location: BUTTON_AT }]);
    expect(resource.dependents.has(entry)).toBe(true);
  });

  test("event handlers gain a reference from the resource", () => {
    const { session } = createTestSession({ host: uiHost() });
    const resource = session.addResourceFile("/proj/Window.xaml");
    resource.update(markup("okButton"));
    const entry = addSource(session, "ui", WINDOW_MODULE, "/proj/ui.py");
    session.analyzeQueuedEntries();

    const handler = windowInstance(entry).classInfo.scope.getVariable("onClick");
    expect(handler?.references).toEqual([{ owner: resource, location: HANDLER_AT }]);
  });

  test("updating a resource re-analyzes the modules that loaded it", () => {
    const { session } = createTestSession({ host: uiHost() });
    const resource = session.addResourceFile("/proj/Window.xaml");
    resource.update(markup("okButton"));
    const entry = addSource(session, "ui", WINDOW_MODULE, "/proj/ui.py");
    session.analyzeQueuedEntries();

    resource.update(markup("cancelButton"));
    expect(session.queue.size).toBe(1);
    session.analyzeQueuedEntries();

    const instance = windowInstance(entry);
    expect(instance.attributes.has("okButton")).toBe(false);
    expect(descriptions(instance.attribute("cancelButton").types)).toEqual(["Button"]);
  });

  test("back-to-back updates before a run re-analyze with the latest content", () => {
    const { session } = createTestSession({ host: uiHost() });
    const resource = session.addResourceFile("/proj/Window.xaml");
    resource.update(markup("okButton"));
    const entry = addSource(session, "ui", WINDOW_MODULE, "/proj/ui.py");
    session.analyzeQueuedEntries();

    resource.update(markup("cancelButton"));
    resource.update(markup("applyButton"));
    expect(session.queue.size).toBe(1);
    expect(session.analyzeQueuedEntries().processed).toBeGreaterThan(0);

    const instance = windowInstance(entry);
    expect(instance.attributes.has("cancelButton")).toBe(false);
    expect(descriptions(instance.attribute("applyButton").types)).toEqual(["Button"]);
  });

  test("an update right after reloading modules still re-analyzes its dependents", () => {
    const { session } = createTestSession({ host: uiHost() });
    const resource = session.addResourceFile("/proj/Window.xaml");
    resource.update(markup("okButton"));
    const entry = addSource(session, "ui", WINDOW_MODULE, "/proj/ui.py");
    session.analyzeQueuedEntries();

    session.reloadModules();
    resource.update(markup("cancelButton"));
    expect(session.queue.size).toBe(1);
    session.analyzeQueuedEntries();

    expect(descriptions(windowInstance(entry).attribute("cancelButton").types)).toEqual(["Button"]);
  });

  test("a module without a path loads nothing", () => {
    const { session } = createTestSession({ host: uiHost() });
    const resource = session.addResourceFile("/proj/Window.xaml");
    resource.update(markup("okButton"));
    const entry = addSource(session, "ui", WINDOW_MODULE);
    session.analyzeQueuedEntries();

    expect(windowInstance(entry).attributes.has("okButton")).toBe(false);
    expect(resource.dependents.size).toBe(0);
  });

  test("removing a resource drops its dependents after re-queueing them", () => {
    const { session } = createTestSession({ host: uiHost() });
    const resource = session.addResourceFile("/proj/Window.xaml");
    resource.update(markup("okButton"));
    addSource(session, "ui", WINDOW_MODULE, "/proj/ui.py");
    session.analyzeQueuedEntries();

    session.removeResourceFile(resource);

    expect(resource.isRemoved).toBe(true);
    expect(resource.dependents.size).toBe(0);
    expect(session.getResourceByPath("/proj/Window.xaml")).toBeUndefined();
    expect(session.queue.size).toBe(1);
  });
});
