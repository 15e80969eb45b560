import type { AnalysisUnit } from "../analysis/analysis-unit.js";
import type { Node } from "../ast/nodes.js";
import type { HostModuleContext } from "../host/types.js";
import type { AnalysisSession } from "../session.js";
import type { SpecializationCall, SpecializationInfo } from "../specializations/types.js";
import { debug } from "../shared/debug.js";
import { Namespace, type MemberType } from "./namespace.js";
import { NamespaceSet } from "./namespace-set.js";

/**
 * A callable whose call behaviour is replaced (or augmented) by a registered
 * override. Everything except `call` is forwarded to the wrapped value.
 */
export class SpecializedCallable extends Namespace {
  constructor(
    readonly original: Namespace,
    readonly specialization: SpecializationInfo,
    readonly session: AnalysisSession,
  ) {
    super();
  }

  get memberType(): MemberType {
    return this.original.memberType;
  }

  get name(): string {
    return this.original.name;
  }

  get description(): string {
    return this.original.description;
  }

  get doc(): string | undefined {
    return this.original.doc;
  }

  call(
    node: Node,
    unit: AnalysisUnit,
    args: readonly NamespaceSet[],
    argNames: readonly (string | null)[],
  ): NamespaceSet {
    return invokeSpecialization(
      this.specialization,
      { node, unit, args, argNames, session: this.session },
      () => this.original.call(node, unit, args, argNames),
    );
  }

  getMember(node: Node, unit: AnalysisUnit, name: string): NamespaceSet {
    return this.original.getMember(node, unit, name);
  }

  getAllMembers(context: HostModuleContext): ReadonlyMap<string, NamespaceSet> {
    return this.original.getAllMembers(context);
  }
}

export function isSpecialized(value: Namespace): value is SpecializedCallable {
  return value instanceof SpecializedCallable;
}

/**
 * Runs an override. With `analyze` off the override result is final; with it
 * on, the result is joined with generic inference (`generic` runs only then).
 */
export function invokeSpecialization(
  info: SpecializationInfo,
  call: SpecializationCall,
  generic: () => NamespaceSet,
): NamespaceSet {
  const result = info.override(call);
  debug.specialize("call", { target: `${info.moduleName}.${info.name}`, analyze: info.analyze, overridden: result !== null });

  if (!info.analyze) return result ?? NamespaceSet.EMPTY;
  const inferred = generic();
  return result ? result.union(inferred, call.session.limits.maxSetSize) : inferred;
}
