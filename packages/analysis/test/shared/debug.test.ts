/**
 * Debug channels: activation through PYSCOPE_DEBUG and message formatting.
 */
import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { configureDebug, debug, isDebugEnabled, refreshDebugChannels, DEBUG_ENV_VAR } from "../../src/shared/debug.js";
import { createTestSession } from "../_helpers/fake-host.js";

// =============================================================================
// Test Helpers
// =============================================================================

function captureOutput(): string[] {
  const messages: string[] = [];
  configureDebug({ output: (msg) => messages.push(msg) });
  return messages;
}

function setDebugEnv(value: string | undefined): void {
  if (value === undefined) {
    delete process.env[DEBUG_ENV_VAR];
  } else {
    process.env[DEBUG_ENV_VAR] = value;
  }
  refreshDebugChannels();
}

// =============================================================================
// Activation
// =============================================================================

describe("debug channel activation", () => {
  let originalEnv: string | undefined;

  beforeEach(() => {
    originalEnv = process.env[DEBUG_ENV_VAR];
  });

  afterEach(() => {
    setDebugEnv(originalEnv);
    configureDebug({ format: "pretty", timestamps: false, output: console.log });
  });

  test("channels are disabled without the env var", () => {
    setDebugEnv(undefined);
    expect(isDebugEnabled()).toBe(false);
    expect(isDebugEnabled("scheduler")).toBe(false);
  });

  test("0 and false disable every channel", () => {
    setDebugEnv("0");
    expect(isDebugEnabled()).toBe(false);
    setDebugEnv("false");
    expect(isDebugEnabled()).toBe(false);
  });

  test("a list enables the named channels only", () => {
    setDebugEnv("imports, Modules");
    expect(isDebugEnabled("imports")).toBe(true);
    expect(isDebugEnabled("modules")).toBe(true);
    expect(isDebugEnabled("scheduler")).toBe(false);
  });

  test("* enables everything", () => {
    setDebugEnv("*");
    expect(isDebugEnabled("values")).toBe(true);
    expect(isDebugEnabled("anything")).toBe(true);
  });

  test("disabled channels write nothing", () => {
    setDebugEnv(undefined);
    const messages = captureOutput();
    debug.scheduler("run.start", { queued: 3 });
    expect(messages).toEqual([]);
  });
});

// =============================================================================
// Formatting
// =============================================================================

describe("debug output format", () => {
  let originalEnv: string | undefined;

  beforeEach(() => {
    originalEnv = process.env[DEBUG_ENV_VAR];
    setDebugEnv("modules");
  });

  afterEach(() => {
    setDebugEnv(originalEnv);
    configureDebug({ format: "pretty", timestamps: false, output: console.log });
  });

  test("pretty format labels channel and point", () => {
    const messages = captureOutput();
    debug.modules("bind", { name: "pkg", count: 2, path: null });
    debug.modules("reload");
    expect(messages).toEqual(['[modules.bind] { name="pkg", count=2, path=null }', "[modules.reload]"]);
  });

  test("pretty format abbreviates arrays and objects", () => {
    const messages = captureOutput();
    debug.modules("list", { few: [1, 2], many: [1, 2, 3, 4], named: { name: "os" }, other: { x: 1 } });
    expect(messages).toEqual(['[modules.list] { few=[1, 2], many=[4 items], named=<os>, other={...} }']);
  });

  test("json format is machine-readable", () => {
    configureDebug({ format: "json" });
    const messages = captureOutput();
    debug.modules("bind", { name: "pkg" });
    expect(messages.map((message) => JSON.parse(message))).toEqual([
      { channel: "modules", point: "bind", data: { name: "pkg" } },
    ]);
  });
});

describe("engine debug points", () => {
  let originalEnv: string | undefined;

  beforeEach(() => {
    originalEnv = process.env[DEBUG_ENV_VAR];
  });

  afterEach(() => {
    setDebugEnv(originalEnv);
    configureDebug({ format: "pretty", timestamps: false, output: console.log });
  });

  test("overrides for modules that are not bound yet are reported as pending", () => {
    setDebugEnv("specialize");
    const messages = captureOutput();
    createTestSession();
    expect(messages).toContain('[specialize.register.pending] { module="copy", name="deepcopy" }');
  });
});
