/**
 * In-process host for engine tests: modules, types and functions are built
 * programmatically instead of being read from a stub database.
 */

import { AnalysisSession, type AnalysisSessionOptions } from "../../src/session.js";
import { moduleNode } from "../../src/ast/factory.js";
import type { Statement } from "../../src/ast/nodes.js";
import type { HostPrimitive } from "../../src/host/primitives.js";
import {
  BUILTIN_TYPE_IDS,
  type BuiltinTypeId,
  type HostConstant,
  type HostFunction,
  type HostInterpreter,
  type HostModule,
  type HostModuleContext,
  type HostMultipleMembers,
  type HostType,
  type HostValue,
} from "../../src/host/types.js";
import type { Logger } from "../../src/shared/logger.js";
import type { ProjectEntry } from "../../src/modules/project-entry.js";
import type { NamespaceSet } from "../../src/values/namespace-set.js";

// =============================================================================
// Host objects
// =============================================================================

export class FakeType implements HostType {
  readonly hostKind = "type";
  readonly members = new Map<string, HostValue>();
  readonly bases: HostType[] = [];
  readonly #generics = new Map<string, FakeType>();

  constructor(
    readonly name: string,
    readonly typeId: BuiltinTypeId = "unknown",
    readonly declaringModule = "builtins",
    readonly generic = false,
  ) {}

  set(name: string, value: HostValue): this {
    this.members.set(name, value);
    return this;
  }

  getMember(_context: HostModuleContext, name: string): HostValue | undefined {
    return this.members.get(name);
  }

  getMemberNames(_context: HostModuleContext): readonly string[] {
    return [...this.members.keys()];
  }

  makeGenericType(indexTypes: readonly HostType[]): HostType | undefined {
    if (!this.generic) return undefined;
    const name = `${this.name}[${indexTypes.map((type) => type.name).join(", ")}]`;
    let type = this.#generics.get(name);
    if (!type) {
      type = new FakeType(name, this.typeId, this.declaringModule);
      this.#generics.set(name, type);
    }
    return type;
  }
}

export class FakeModule implements HostModule {
  readonly hostKind = "module";
  readonly members = new Map<string, HostValue>();

  constructor(readonly name: string) {}

  set(name: string, value: HostValue): this {
    this.members.set(name, value);
    return this;
  }

  getMember(_context: HostModuleContext, name: string): HostValue | undefined {
    return this.members.get(name);
  }

  getMemberNames(_context: HostModuleContext): readonly string[] {
    return [...this.members.keys()];
  }
}

export function fakeFunction(name: string, declaringModule = "builtins", returnTypes: readonly HostType[] = []): HostFunction {
  return { hostKind: "function", name, declaringModule, returnTypes };
}

export function fakeConstant(type: HostType, value?: HostPrimitive): HostConstant {
  return value === undefined ? { hostKind: "constant", type } : { hostKind: "constant", type, value };
}

export function fakeMultiple(...members: HostValue[]): HostMultipleMembers {
  return { hostKind: "multiple", members };
}

// =============================================================================
// Interpreter
// =============================================================================

/**
 * A builtin module holding one type per builtin id plus the functions the
 * default overrides target (`range`, `getattr`, `super`, ...).
 */
export class FakeHost implements HostInterpreter {
  readonly builtinModuleName = "builtins";
  readonly modules = new Map<string, FakeModule>();
  readonly types = new Map<BuiltinTypeId, FakeType>();
  /** Declared types for objects the engine cannot classify. */
  readonly declaredTypes = new Map<unknown, HostType>();
  initializeCount = 0;
  disposeCount = 0;

  constructor() {
    const generic = new Set<BuiltinTypeId>(["list", "dict"]);
    for (const id of BUILTIN_TYPE_IDS) {
      this.types.set(id, new FakeType(id, id, this.builtinModuleName, generic.has(id)));
    }

    const builtins = this.module(this.builtinModuleName);
    for (const [id, type] of this.types) builtins.set(id, type);
    builtins.set("None", fakeConstant(this.type("NoneType"), null));
    builtins.set("super", new FakeType("super"));
    builtins.set("len", fakeFunction("len", this.builtinModuleName, [this.type("int")]));
    for (const name of ["range", "min", "max", "getattr", "next", "iter"]) {
      builtins.set(name, fakeFunction(name));
    }
  }

  /** The module called `name`, created on first use. */
  module(name: string): FakeModule {
    let module = this.modules.get(name);
    if (!module) {
      module = new FakeModule(name);
      this.modules.set(name, module);
    }
    return module;
  }

  type(id: BuiltinTypeId): FakeType {
    const type = this.types.get(id);
    if (!type) throw new Error(`no fake type '${id}'`);
    return type;
  }

  getModuleNames(): readonly string[] {
    return [...this.modules.keys()];
  }

  importModule(name: string): HostModule | undefined {
    return this.modules.get(name);
  }

  createModuleContext(): HostModuleContext {
    return {};
  }

  getBuiltinType(id: BuiltinTypeId): HostType {
    return this.type(id);
  }

  getTypeOfObject(value: unknown): HostType | undefined {
    return this.declaredTypes.get(value);
  }

  initialize(): void {
    this.initializeCount++;
  }

  dispose(): void {
    this.disposeCount++;
  }
}

// =============================================================================
// Sessions
// =============================================================================

export interface RecordingLogger extends Logger {
  readonly messages: string[];
}

/** Records every line as `<level>: <message>`. */
export function createRecordingLogger(): RecordingLogger {
  const messages: string[] = [];
  return {
    messages,
    log: (message) => messages.push(`log: ${message}`),
    info: (message) => messages.push(`info: ${message}`),
    warn: (message) => messages.push(`warn: ${message}`),
    error: (message) => messages.push(`error: ${message}`),
  };
}

export interface TestSession {
  readonly session: AnalysisSession;
  readonly host: FakeHost;
  readonly logger: RecordingLogger;
}

export function createTestSession(
  options: Partial<Omit<AnalysisSessionOptions, "interpreter" | "logger">> & { host?: FakeHost } = {},
): TestSession {
  const { host = new FakeHost(), ...rest } = options;
  const logger = createRecordingLogger();
  const session = new AnalysisSession({ ...rest, interpreter: host, logger });
  return { session, host, logger };
}

/** Registers a module with the given body and queues it. */
export function addSource(
  session: AnalysisSession,
  moduleName: string,
  body: readonly Statement[],
  filePath: string | null = null,
): ProjectEntry {
  const entry = session.addModule(moduleName, filePath);
  entry.updateTree(moduleNode(body));
  entry.analyze();
  return entry;
}

export function descriptions(values: NamespaceSet): string[] {
  return values.toArray().map((value) => value.description);
}
