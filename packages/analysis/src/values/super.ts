import type { AnalysisUnit } from "../analysis/analysis-unit.js";
import type { Node } from "../ast/nodes.js";
import { Namespace, type MemberType } from "./namespace.js";
import { NamespaceSet } from "./namespace-set.js";
import { InstanceInfo, type ClassInfo } from "./user-values.js";

/**
 * Result of `super(Class, self)`: member lookups skip `Class` itself and walk
 * its bases, binding user functions to the instances `self` may hold.
 */
export class SuperInfo extends Namespace {
  readonly memberType: MemberType = "instance";

  constructor(
    readonly classInfo: ClassInfo,
    readonly instances: NamespaceSet,
  ) {
    super();
  }

  get name(): string {
    return "super";
  }

  get description(): string {
    return `super(${this.classInfo.name})`;
  }

  getMember(node: Node, unit: AnalysisUnit, name: string): NamespaceSet {
    const { maxSetSize } = this.classInfo.session.limits;
    const [, ...bases] = this.classInfo.mro(unit);
    let found = NamespaceSet.EMPTY;
    for (const base of bases) {
      found = base.getMember(node, unit, name);
      if (!found.isEmpty) break;
    }

    const holders = this.instances.ofType(isInstance);
    if (holders.length === 0) return found;
    return NamespaceSet.unionAll(
      holders.map((instance) => found.flatMap((member) => instance.bind(member), maxSetSize)),
      maxSetSize,
    );
  }
}

function isInstance(value: Namespace): value is InstanceInfo {
  return value instanceof InstanceInfo;
}
