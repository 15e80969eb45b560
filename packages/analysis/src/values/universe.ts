/**
 * ValueUniverse: host objects in, canonical namespaces out.
 *
 * Every host object is classified once (`classifyHostObject`) and each
 * classification arm builds one namespace variant. Results are memoized per
 * host object identity, so the same object always maps to the same value.
 */

import { AsciiString, Complex, ELLIPSIS, type HostPrimitive } from "../host/primitives.js";
import { classifyHostObject } from "../host/probe.js";
import type { BuiltinTypeId, HostModule, HostType } from "../host/types.js";
import type { AnalysisSession } from "../session.js";
import type { SpecializationInfo } from "../specializations/types.js";
import { AnalysisError, AnalysisErrorCode } from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import { BuiltinModule } from "./builtin-module.js";
import {
  BuiltinClassInfo,
  BuiltinFunctionInfo,
  BuiltinMethodInfo,
  BuiltinPropertyInfo,
  ConstantInfo,
  ObjectBuiltinClassInfo,
  ReflectedNamespace,
} from "./builtin-values.js";
import { MultipleMemberInfo } from "./multiple-member.js";
import type { Namespace } from "./namespace.js";
import { NamespaceSet } from "./namespace-set.js";
import { SequenceBuiltinClassInfo } from "./sequence.js";
import { SpecializedCallable } from "./specialized.js";
import { ValueCache } from "./value-cache.js";

export class ValueUniverse {
  readonly #types = new ValueCache<BuiltinClassInfo>();
  readonly #modules = new ValueCache<BuiltinModule>();
  readonly #constants = new ValueCache<ConstantInfo>();
  readonly #values = new ValueCache<Namespace>();
  #specialized = new WeakMap<SpecializationInfo, Map<Namespace, SpecializedCallable>>();

  constructor(readonly session: AnalysisSession) {}

  /**
   * The namespace for any host value. Returns null only while the same value
   * is still being built higher up the stack (a self-referential aggregate).
   */
  valueOf(value: unknown): Namespace | null {
    const classified = classifyHostObject(value);
    switch (classified.kind) {
      case "type":
        return this.getBuiltinType(classified.value);
      case "module":
        return this.getBuiltinModule(classified.value);
      case "primitive":
        return this.getConstant(classified.value);
      case "none":
        return this.getConstant(null);
      case "function": {
        const fn = classified.value;
        return this.#values.getCached(fn, () => new BuiltinFunctionInfo(fn, this.session));
      }
      case "method": {
        const method = classified.value;
        return this.#values.getCached(method, () => new BuiltinMethodInfo(method, this.session));
      }
      case "property": {
        const property = classified.value;
        return this.#values.getCached(property, () => new BuiltinPropertyInfo(property, this.session));
      }
      case "constant": {
        const constant = classified.value;
        return this.#values.getCached(constant, () =>
          constant.value === undefined
            ? this.getInstance(constant.type)
            : new ConstantInfo(this.getBuiltinType(constant.type), constant.value),
        );
      }
      case "multiple": {
        const multiple = classified.value;
        return this.#values.getCached(multiple, () => {
          const members: Namespace[] = [];
          for (const member of multiple.members) {
            const resolved = this.valueOf(member);
            if (resolved) members.push(resolved);
          }
          return MultipleMemberInfo.create(members, this.session) ?? this.builtinClass("object").instance;
        });
      }
      case "container": {
        const container = classified.value;
        return this.#values.getCached(container, () => new ReflectedNamespace(container, this.session));
      }
      case "unclassified": {
        const unknown = classified.value;
        return this.#values.getCached(unknown, () => this.#unclassified(unknown));
      }
    }
  }

  /** `valueOf` as a set; the in-progress placeholder reads as empty. */
  valueSetOf(value: unknown): NamespaceSet {
    return this.valueOf(value)?.selfSet ?? NamespaceSet.EMPTY;
  }

  valuesOf(values: Iterable<unknown>): NamespaceSet {
    const namespaces: Namespace[] = [];
    for (const value of values) {
      const namespace = this.valueOf(value);
      if (namespace) namespaces.push(namespace);
    }
    return NamespaceSet.from(namespaces, this.session.limits.maxSetSize);
  }

  unionAll(sets: Iterable<NamespaceSet>): NamespaceSet {
    return NamespaceSet.unionAll(sets, this.session.limits.maxSetSize);
  }

  getBuiltinType(type: HostType): BuiltinClassInfo {
    return required(
      this.#types.getCached(type, () => this.#makeBuiltinType(type)),
      type.name,
    );
  }

  getBuiltinModule(module: HostModule): BuiltinModule {
    return required(
      this.#modules.getCached(module, () => new BuiltinModule(module, this.session)),
      module.name,
    );
  }

  /** The builtin class the host registers under `id`. */
  builtinClass(id: BuiltinTypeId): BuiltinClassInfo {
    return this.getBuiltinType(this.session.interpreter.getBuiltinType(id));
  }

  getInstance(type: HostType): Namespace {
    return this.getBuiltinType(type).instance;
  }

  getConstant(value: HostPrimitive): ConstantInfo {
    return required(
      this.#constants.getCached(value, () => new ConstantInfo(this.getTypeFromObject(value), value)),
      String(value),
    );
  }

  /** Builtin class of a primitive: integral numbers are `int`, the rest `float`. */
  getTypeFromObject(value: HostPrimitive): BuiltinClassInfo {
    return this.builtinClass(primitiveTypeId(value));
  }

  makeGenericType(type: BuiltinClassInfo, ...indexTypes: readonly BuiltinClassInfo[]): BuiltinClassInfo | undefined {
    const generic = type.type.makeGenericType?.(indexTypes.map((index) => index.type));
    return generic ? this.getBuiltinType(generic) : undefined;
  }

  /** One wrapper per (value, override) pair. */
  specialize(original: Namespace, info: SpecializationInfo): SpecializedCallable {
    let wrappers = this.#specialized.get(info);
    if (!wrappers) {
      wrappers = new Map();
      this.#specialized.set(info, wrappers);
    }
    let wrapper = wrappers.get(original);
    if (!wrapper) {
      wrapper = new SpecializedCallable(original, info, this.session);
      wrappers.set(original, wrapper);
    }
    return wrapper;
  }

  clear(): void {
    this.#types.clear();
    this.#modules.clear();
    this.#constants.clear();
    this.#values.clear();
    this.#specialized = new WeakMap();
    debug.values("universe.clear");
  }

  #makeBuiltinType(type: HostType): BuiltinClassInfo {
    switch (type.typeId) {
      case "list":
      case "tuple":
        return new SequenceBuiltinClassInfo(type, this.session);
      case "object":
        return new ObjectBuiltinClassInfo(type, this.session);
      default:
        return new BuiltinClassInfo(type, this.session);
    }
  }

  #unclassified(value: unknown): Namespace {
    const declared = this.session.interpreter.getTypeOfObject?.(value);
    if (declared) return this.getInstance(declared);

    const message = `Host object of type '${typeof value}' cannot be classified`;
    if (this.session.strictHostContract) {
      throw new AnalysisError(message, AnalysisErrorCode.UNCLASSIFIABLE_HOST_OBJECT, { value: String(value) });
    }
    this.session.logger.warn(message);
    return this.builtinClass("object").instance;
  }
}

function primitiveTypeId(value: HostPrimitive): BuiltinTypeId {
  if (value === null) return "NoneType";
  if (value === ELLIPSIS) return "ellipsis";
  if (value instanceof AsciiString) return "bytes";
  if (value instanceof Complex) return "complex";
  switch (typeof value) {
    case "boolean":
      return "bool";
    case "number":
      return Number.isInteger(value) ? "int" : "float";
    case "bigint":
      return "long";
    default:
      return "str";
  }
}

function required<T>(value: T | null, key: string): T {
  if (value === null) {
    throw new Error(`Value for '${key}' requested while it is being constructed`);
  }
  return value;
}
