/**
 * StubInterpreter: a HostInterpreter over a StubDatabase.
 *
 * Host objects are built on first access and memoized per owner and name, so
 * the engine's identity-keyed caches see one object per stub entry.
 */

import {
  AnalysisError,
  AnalysisErrorCode,
  isBuiltinTypeId,
  type BuiltinTypeId,
  type HostConstant,
  type HostFunction,
  type HostInterpreter,
  type HostMethodDescriptor,
  type HostModule,
  type HostModuleContext,
  type HostMultipleMembers,
  type HostProperty,
  type HostType,
  type HostValue,
} from "@pyscope/analysis";
import {
  loadStubDatabase,
  type StubConstantMember,
  type StubConstantValue,
  type StubDatabase,
  type StubFunctionMember,
  type StubMember,
  type StubModule,
  type StubPropertyMember,
  type StubTypeMember,
} from "./database.js";

export class StubInterpreter implements HostInterpreter {
  readonly builtinModuleName: string;
  readonly #modules = new Map<string, StubHostModule>();
  /** `module.Type` → builtin id, for types the database registers as builtins. */
  readonly #builtinIds = new Map<string, BuiltinTypeId>();
  #contexts = 0;

  constructor(readonly database: StubDatabase) {
    this.builtinModuleName = database.builtinModule;
    for (const [id, ref] of Object.entries(database.builtinTypes)) {
      if (ref !== undefined && isBuiltinTypeId(id) && !this.#builtinIds.has(ref)) this.#builtinIds.set(ref, id);
    }
  }

  getModuleNames(): readonly string[] {
    return Object.keys(this.database.modules);
  }

  importModule(name: string): HostModule | undefined {
    let module = this.#modules.get(name);
    if (!module) {
      const stub = own(this.database.modules, name);
      if (!stub) return undefined;
      module = new StubHostModule(this, name, stub);
      this.#modules.set(name, module);
    }
    return module;
  }

  createModuleContext(): HostModuleContext {
    return { id: `stub-${++this.#contexts}` };
  }

  getBuiltinType(id: BuiltinTypeId): HostType {
    const ref = this.database.builtinTypes[id] ?? this.database.builtinTypes.object;
    const type = ref === undefined ? undefined : this.resolveType(ref);
    if (!type) {
      throw new AnalysisError(`Stub database has no type for '${id}'`, AnalysisErrorCode.INVALID_STUB_DATABASE, { id });
    }
    return type;
  }

  /** The type named by `module.Type` (or `module.Outer.Inner`). */
  resolveType(ref: string): HostType | undefined {
    const parts = ref.split(".");
    for (let split = parts.length - 1; split > 0; split--) {
      const module = this.importModule(parts.slice(0, split).join("."));
      if (!module) continue;
      let current: HostValue | undefined = module;
      for (const name of parts.slice(split)) {
        current = current instanceof StubHostModule || current instanceof StubHostType ? current.getMember(ROOT, name) : undefined;
      }
      if (current instanceof StubHostType) return current;
    }
    return undefined;
  }

  resolveTypes(refs: readonly string[]): HostType[] {
    const types: HostType[] = [];
    for (const ref of refs) {
      const type = this.resolveType(ref);
      if (type) types.push(type);
    }
    return types;
  }

  typeIdOf(ref: string, stub: StubTypeMember): BuiltinTypeId {
    return stub.typeId ?? this.#builtinIds.get(ref) ?? "unknown";
  }

  /** Builds the host object for one stub entry. */
  materialize(stub: StubMember, ref: string, name: string, declaringModule: string, owner?: StubHostType): HostValue | undefined {
    switch (stub.kind) {
      case "type":
        return new StubHostType(this, ref, name, declaringModule, stub, this.typeIdOf(ref, stub));
      case "function": {
        const fn = new StubHostFunction(this, name, declaringModule, stub, owner);
        return owner ? new StubMethodDescriptor(name, fn) : fn;
      }
      case "property":
        return new StubHostProperty(this, name, stub);
      case "constant":
        return new StubHostConstant(this, stub);
      case "module":
        return this.importModule(stub.module);
      case "multiple": {
        const members: HostValue[] = [];
        for (const alternative of stub.members) {
          const value = this.materialize(alternative, ref, name, declaringModule, owner);
          if (value !== undefined) members.push(value);
        }
        return new StubMultipleMembers(members);
      }
    }
  }

  dispose(): void {
    this.#modules.clear();
  }
}

export function createStubInterpreter(database: StubDatabase = loadStubDatabase()): StubInterpreter {
  return new StubInterpreter(database);
}

// =============================================================================
// Host objects
// =============================================================================

const ROOT: HostModuleContext = {};

/** Record lookup that ignores inherited keys (`constructor`, `toString`). */
function own<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

class MemberTable {
  readonly #values = new Map<string, HostValue | undefined>();

  constructor(
    readonly host: StubInterpreter,
    readonly ref: string,
    readonly declaringModule: string,
    readonly stubs: Readonly<Record<string, StubMember>>,
    readonly owner?: StubHostType,
  ) {}

  get(name: string): HostValue | undefined {
    if (this.#values.has(name)) return this.#values.get(name);
    const stub = own(this.stubs, name);
    const value = stub && this.host.materialize(stub, `${this.ref}.${name}`, name, this.declaringModule, this.owner);
    this.#values.set(name, value);
    return value;
  }

  names(): string[] {
    return Object.keys(this.stubs);
  }
}

class StubHostModule implements HostModule {
  readonly hostKind = "module";
  readonly #members: MemberTable;

  constructor(
    host: StubInterpreter,
    readonly name: string,
    readonly stub: StubModule,
  ) {
    this.#members = new MemberTable(host, name, name, stub.members);
  }

  get doc(): string | undefined {
    return this.stub.doc;
  }

  getMember(_context: HostModuleContext, name: string): HostValue | undefined {
    return this.#members.get(name);
  }

  getMemberNames(_context: HostModuleContext): readonly string[] {
    return this.#members.names();
  }
}

class StubHostType implements HostType {
  readonly hostKind = "type";
  readonly #members: MemberTable;
  #bases: readonly HostType[] | undefined;
  readonly #generics = new Map<string, StubHostType>();

  constructor(
    readonly host: StubInterpreter,
    readonly ref: string,
    readonly name: string,
    readonly declaringModule: string,
    readonly stub: StubTypeMember,
    readonly typeId: BuiltinTypeId,
  ) {
    this.#members = new MemberTable(host, ref, declaringModule, stub.members, this);
  }

  get doc(): string | undefined {
    return this.stub.doc;
  }

  get bases(): readonly HostType[] {
    return (this.#bases ??= this.host.resolveTypes(this.stub.bases));
  }

  /** Own members first, then the bases in declaration order. */
  getMember(_context: HostModuleContext, name: string): HostValue | undefined {
    return this.#lookup(name, new Set());
  }

  getMemberNames(_context: HostModuleContext): readonly string[] {
    const names = new Set<string>();
    this.#collectNames(names, new Set());
    return [...names];
  }

  makeGenericType(indexTypes: readonly HostType[]): HostType | undefined {
    if (!this.stub.generic || indexTypes.length === 0) return undefined;
    const index = indexTypes.map((type) => type.name).join(", ");
    let generic = this.#generics.get(index);
    if (!generic) {
      generic = new StubHostType(this.host, `${this.ref}[${index}]`, `${this.name}[${index}]`, this.declaringModule, this.stub, this.typeId);
      this.#generics.set(index, generic);
    }
    return generic;
  }

  #lookup(name: string, seen: Set<StubHostType>): HostValue | undefined {
    seen.add(this);
    const value = this.#members.get(name);
    if (value !== undefined) return value;
    for (const base of this.bases) {
      if (!(base instanceof StubHostType) || seen.has(base)) continue;
      const inherited = base.#lookup(name, seen);
      if (inherited !== undefined) return inherited;
    }
    return undefined;
  }

  #collectNames(names: Set<string>, seen: Set<StubHostType>): void {
    seen.add(this);
    for (const name of this.#members.names()) names.add(name);
    for (const base of this.bases) {
      if (base instanceof StubHostType && !seen.has(base)) base.#collectNames(names, seen);
    }
  }
}

class StubHostFunction implements HostFunction {
  readonly hostKind = "function";
  #returnTypes: readonly HostType[] | undefined;

  constructor(
    readonly host: StubInterpreter,
    readonly name: string,
    readonly declaringModule: string,
    readonly stub: StubFunctionMember,
    readonly declaringType?: HostType,
  ) {}

  get doc(): string | undefined {
    return this.stub.doc;
  }

  get returnTypes(): readonly HostType[] {
    return (this.#returnTypes ??= this.host.resolveTypes(this.stub.returns));
  }
}

class StubMethodDescriptor implements HostMethodDescriptor {
  readonly hostKind = "method";
  readonly function: HostFunction;

  constructor(
    readonly name: string,
    fn: HostFunction,
  ) {
    this.function = fn;
  }
}

class StubHostProperty implements HostProperty {
  readonly hostKind = "property";

  constructor(
    readonly host: StubInterpreter,
    readonly name: string,
    readonly stub: StubPropertyMember,
  ) {}

  get doc(): string | undefined {
    return this.stub.doc;
  }

  get type(): HostType | undefined {
    return this.stub.type === undefined ? undefined : this.host.resolveType(this.stub.type);
  }
}

class StubHostConstant implements HostConstant {
  readonly hostKind = "constant";

  constructor(
    readonly host: StubInterpreter,
    readonly stub: StubConstantMember,
  ) {}

  get type(): HostType {
    return this.host.resolveType(this.stub.type) ?? this.host.getBuiltinType("object");
  }

  get value(): StubConstantValue | undefined {
    return this.stub.value;
  }
}

class StubMultipleMembers implements HostMultipleMembers {
  readonly hostKind = "multiple";

  constructor(readonly members: readonly HostValue[]) {}
}
