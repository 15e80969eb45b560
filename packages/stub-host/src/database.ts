/* =============================================================================
 * STUB DATABASE
 * -----------------------------------------------------------------------------
 * JSON description of the host's builtin modules. Type references are
 * `module.Type` strings; they are checked here and resolved lazily by the
 * interpreter, so types may refer to themselves and to each other.
 * ============================================================================= */

import fs from "node:fs";
import { AnalysisError, AnalysisErrorCode, isBuiltinTypeId, type BuiltinTypeId } from "@pyscope/analysis";
import { URI } from "vscode-uri";

export type StubConstantValue = string | number | boolean | null;

export interface StubTypeMember {
  readonly kind: "type";
  readonly doc?: string;
  readonly typeId?: BuiltinTypeId;
  readonly bases: readonly string[];
  readonly members: Readonly<Record<string, StubMember>>;
  /** Supports `Type[Index]` specialization. */
  readonly generic: boolean;
}

export interface StubFunctionMember {
  readonly kind: "function";
  readonly doc?: string;
  readonly returns: readonly string[];
}

export interface StubPropertyMember {
  readonly kind: "property";
  readonly doc?: string;
  readonly type?: string;
}

export interface StubConstantMember {
  readonly kind: "constant";
  readonly type: string;
  /** Absent: an instance of `type` whose value is not known. */
  readonly value?: StubConstantValue;
}

/** Another module of the database bound under this name (`os.path`). */
export interface StubModuleMember {
  readonly kind: "module";
  readonly module: string;
}

/** Alternatives, e.g. a platform-dependent module. */
export interface StubMultipleMember {
  readonly kind: "multiple";
  readonly members: readonly StubMember[];
}

export type StubMember =
  | StubTypeMember
  | StubFunctionMember
  | StubPropertyMember
  | StubConstantMember
  | StubModuleMember
  | StubMultipleMember;

export interface StubModule {
  readonly doc?: string;
  readonly members: Readonly<Record<string, StubMember>>;
}

export interface StubDatabase {
  /** `builtins`, or `__builtin__` for a Python 2 database. */
  readonly builtinModule: string;
  /** Builtin type id → `module.Type`. `object` is required; missing ids fall back to it. */
  readonly builtinTypes: Readonly<Partial<Record<BuiltinTypeId, string>>>;
  readonly modules: Readonly<Record<string, StubModule>>;
}

/** The database shipped with this package. */
export const DEFAULT_DATABASE_PATH = URI.parse(new URL("../data/builtins.json", import.meta.url).href).fsPath;

// =============================================================================
// Loading
// =============================================================================

export function loadStubDatabase(filePath: string = DEFAULT_DATABASE_PATH): StubDatabase {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new AnalysisError(`Cannot read stub database '${filePath}': ${message}`, AnalysisErrorCode.INVALID_STUB_DATABASE, {
      source: filePath,
    });
  }
  return parseStubDatabase(raw, filePath);
}

/** Validates a parsed JSON value. Every type reference must name a type entry. */
export function parseStubDatabase(raw: unknown, source = "<memory>"): StubDatabase {
  const reader = new Reader(source);
  const root = reader.record(raw, "$");

  const builtinModule = reader.string(root["builtinModule"], "$.builtinModule");
  const modules: Record<string, StubModule> = {};
  for (const [name, value] of Object.entries(reader.record(root["modules"], "$.modules"))) {
    modules[name] = reader.module(value, `$.modules.${name}`);
  }

  const builtinTypes: Partial<Record<BuiltinTypeId, string>> = {};
  for (const [id, value] of Object.entries(reader.record(root["builtinTypes"], "$.builtinTypes"))) {
    builtinTypes[reader.typeId(id, `$.builtinTypes.${id}`)] = reader.typeRef(value, `$.builtinTypes.${id}`);
  }

  const database: StubDatabase = { builtinModule, builtinTypes, modules };
  if (!modules[builtinModule]) reader.fail("$.builtinModule", `module '${builtinModule}' is not defined`);
  if (!builtinTypes.object) reader.fail("$.builtinTypes.object", "the object type is required");
  for (const { path, ref } of reader.typeRefs) {
    if (!findType(database, ref)) reader.fail(path, `'${ref}' does not name a type`);
  }
  return database;
}

/** The type entry `ref` names, looking through nested types (`mod.Outer.Inner`). */
export function findType(database: StubDatabase, ref: string): StubTypeMember | undefined {
  const parts = ref.split(".");
  // longest module name first: `os.path.Foo` before `os.path` + `Foo`
  for (let split = parts.length - 1; split > 0; split--) {
    const module = database.modules[parts.slice(0, split).join(".")];
    if (!module) continue;
    let members: Readonly<Record<string, StubMember>> | undefined = module.members;
    let found: StubMember | undefined;
    for (const name of parts.slice(split)) {
      found = members?.[name];
      members = found?.kind === "type" ? found.members : undefined;
    }
    if (found?.kind === "type") return found;
  }
  return undefined;
}

// =============================================================================
// Validation
// =============================================================================

class Reader {
  readonly typeRefs: { readonly path: string; readonly ref: string }[] = [];

  constructor(readonly source: string) {}

  fail(path: string, message: string): never {
    throw new AnalysisError(`Invalid stub database ${this.source} at ${path}: ${message}`, AnalysisErrorCode.INVALID_STUB_DATABASE, {
      source: this.source,
      path,
    });
  }

  record(value: unknown, path: string): Record<string, unknown> {
    if (!isRecord(value)) return this.fail(path, "expected an object");
    return value;
  }

  string(value: unknown, path: string): string {
    if (typeof value !== "string" || value === "") return this.fail(path, "expected a non-empty string");
    return value;
  }

  optionalString(value: unknown, path: string): string | undefined {
    return value === undefined ? undefined : this.string(value, path);
  }

  typeId(value: string, path: string): BuiltinTypeId {
    if (!isBuiltinTypeId(value)) return this.fail(path, `unknown builtin type id '${value}'`);
    return value;
  }

  typeRef(value: unknown, path: string): string {
    const ref = this.string(value, path);
    if (ref.lastIndexOf(".") <= 0) this.fail(path, `expected module.Type, got '${ref}'`);
    this.typeRefs.push({ path, ref });
    return ref;
  }

  typeRefList(value: unknown, path: string): string[] {
    if (value === undefined) return [];
    if (!Array.isArray(value)) return this.fail(path, "expected an array of type references");
    return value.map((item: unknown, index) => this.typeRef(item, `${path}[${index}]`));
  }

  module(value: unknown, path: string): StubModule {
    const record = this.record(value, path);
    return {
      doc: this.optionalString(record["doc"], `${path}.doc`),
      members: this.members(record["members"] ?? {}, `${path}.members`),
    };
  }

  members(value: unknown, path: string): Record<string, StubMember> {
    const members: Record<string, StubMember> = {};
    for (const [name, member] of Object.entries(this.record(value, path))) {
      members[name] = this.member(member, `${path}.${name}`);
    }
    return members;
  }

  member(value: unknown, path: string): StubMember {
    const record = this.record(value, path);
    const doc = this.optionalString(record["doc"], `${path}.doc`);
    const kind = record["kind"];
    switch (kind) {
      case "type": {
        const typeId = this.optionalString(record["typeId"], `${path}.typeId`);
        return {
          kind,
          doc,
          typeId: typeId === undefined ? undefined : this.typeId(typeId, `${path}.typeId`),
          bases: this.typeRefList(record["bases"], `${path}.bases`),
          members: this.members(record["members"] ?? {}, `${path}.members`),
          generic: record["generic"] === true,
        };
      }
      case "function":
        return { kind, doc, returns: this.typeRefList(record["returns"], `${path}.returns`) };
      case "property":
        return {
          kind,
          doc,
          type: record["type"] === undefined ? undefined : this.typeRef(record["type"], `${path}.type`),
        };
      case "constant": {
        const type = this.typeRef(record["type"], `${path}.type`);
        if (!("value" in record)) return { kind, type };
        return { kind, type, value: this.constantValue(record["value"], `${path}.value`) };
      }
      case "module":
        return { kind, module: this.string(record["module"], `${path}.module`) };
      case "multiple": {
        const alternatives = record["members"];
        if (!Array.isArray(alternatives)) return this.fail(`${path}.members`, "expected an array");
        return { kind, members: alternatives.map((item: unknown, index) => this.member(item, `${path}.members[${index}]`)) };
      }
      default:
        return this.fail(`${path}.kind`, `unknown member kind '${String(kind)}'`);
    }
  }

  constantValue(value: unknown, path: string): StubConstantValue {
    if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      return value;
    }
    return this.fail(path, "expected a string, number, boolean or null");
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
