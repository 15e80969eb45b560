/**
 * Sequences with element-type tracking.
 *
 * `list(...)`, `tuple(...)` and list/tuple literals produce one SequenceInfo
 * per creating node (memoized in the creating scope), so elements added on
 * later passes flow into the same value.
 */

import type { AnalysisUnit } from "../analysis/analysis-unit.js";
import { VariableDef } from "../analysis/variable-def.js";
import type { BinaryOperator, Node } from "../ast/nodes.js";
import { BuiltinClassInfo, BuiltinInstanceInfo } from "./builtin-values.js";
import { Namespace, type MemberType } from "./namespace.js";
import { NamespaceSet } from "./namespace-set.js";

export class SequenceBuiltinClassInfo extends BuiltinClassInfo {
  protected makeInstance(): BuiltinInstanceInfo {
    return new SequenceInfo(this, null);
  }

  /** The sequence value created at `node`, memoized in the unit's scope. */
  sequenceAt(node: Node, unit: AnalysisUnit): SequenceInfo[] {
    return unit.scope.getOrMakeNodeValue(node, () => new SequenceInfo(this, node).selfSet).ofType(isSequence);
  }

  call(node: Node, unit: AnalysisUnit, args: readonly NamespaceSet[]): NamespaceSet {
    const sequences = this.sequenceAt(node, unit);
    const [source] = args;
    if (source) {
      const elements = source.flatMap((value) => value.getEnumeratorTypes(node, unit), this.session.limits.maxSetSize);
      for (const sequence of sequences) sequence.addElementTypes(unit, elements);
    }
    return NamespaceSet.from(sequences);
  }
}

export class SequenceInfo extends BuiltinInstanceInfo {
  readonly elements = new VariableDef();
  readonly #positions: VariableDef[] = [];
  readonly #methods = new Map<string, ListMutator>();
  #iterator: IteratorInfo | undefined;

  constructor(
    classInfo: BuiltinClassInfo,
    readonly node: Node | null,
  ) {
    super(classInfo);
  }

  get description(): string {
    const elements = this.elements.types;
    if (elements.isTop) return `${this.name} of *`;
    if (elements.isEmpty) return this.name;
    return `${this.name} of ${[...elements].map((e) => e.description).join(", ")}`;
  }

  /** Known length, for tuple literals whose positions are tracked. */
  get length(): number {
    return this.#positions.length;
  }

  addElementTypes(unit: AnalysisUnit, types: NamespaceSet, position?: number): boolean {
    let changed = this.elements.addTypes(unit, types);
    if (position !== undefined) {
      const slot = (this.#positions[position] ??= new VariableDef());
      changed = slot.addTypes(unit, types) || changed;
    }
    return changed;
  }

  getEnumeratorTypes(_node: Node, unit: AnalysisUnit): NamespaceSet {
    return this.elements.getTypes(unit);
  }

  getIterator(_node: Node, _unit: AnalysisUnit): NamespaceSet {
    this.#iterator ??= new IteratorInfo(this.session.universe.builtinClass("list_iterator"), this.elements);
    return this.#iterator.selfSet;
  }

  /** Constant integer indexes into tracked positions; anything else reads all elements. */
  getIndex(_node: Node, unit: AnalysisUnit, index: NamespaceSet): NamespaceSet {
    const { maxSetSize } = this.session.limits;
    const slots: VariableDef[] = [];
    for (const value of index) {
      const constant = value.getConstantValue();
      if (typeof constant !== "number" || !Number.isInteger(constant)) return this.elements.getTypes(unit);
      const slot = this.#positions[constant < 0 ? this.#positions.length + constant : constant];
      if (!slot) return this.elements.getTypes(unit);
      slots.push(slot);
    }
    if (slots.length === 0) return this.elements.getTypes(unit);
    return NamespaceSet.unionAll(
      slots.map((slot) => slot.getTypes(unit)),
      maxSetSize,
    );
  }

  getMember(node: Node, unit: AnalysisUnit, name: string): NamespaceSet {
    if (this.classInfo.typeId === "list" && isMutatorName(name)) {
      let method = this.#methods.get(name);
      if (!method) {
        method = new ListMutator(this, name);
        this.#methods.set(name, method);
      }
      return method.selfSet;
    }
    return super.getMember(node, unit, name);
  }

  binaryOperation(node: Node, unit: AnalysisUnit, op: BinaryOperator, right: NamespaceSet): NamespaceSet {
    if (op !== "+" || !(this.classInfo instanceof SequenceBuiltinClassInfo)) {
      return op === "*" ? this.selfSet : super.binaryOperation(node, unit, op, right);
    }
    const { maxSetSize } = this.session.limits;
    const elements = this.elements
      .getTypes(unit)
      .union(right.flatMap((other) => other.getEnumeratorTypes(node, unit), maxSetSize), maxSetSize);
    const sequences = this.classInfo.sequenceAt(node, unit);
    for (const sequence of sequences) sequence.addElementTypes(unit, elements);
    return NamespaceSet.from(sequences);
  }
}

export function isSequence(value: Namespace): value is SequenceInfo {
  return value instanceof SequenceInfo;
}

// =============================================================================
// Iteration
// =============================================================================

export class IteratorInfo extends BuiltinInstanceInfo {
  readonly memberType: MemberType = "iterator";
  #next: IteratorNext | undefined;

  constructor(
    classInfo: BuiltinClassInfo,
    readonly elements: VariableDef,
  ) {
    super(classInfo);
  }

  get description(): string {
    return `iterator of ${this.elements.types.toString()}`;
  }

  getEnumeratorTypes(_node: Node, unit: AnalysisUnit): NamespaceSet {
    return this.elements.getTypes(unit);
  }

  getIterator(): NamespaceSet {
    return this.selfSet;
  }

  getMember(node: Node, unit: AnalysisUnit, name: string): NamespaceSet {
    const nextName = this.session.languageVersion === "3" ? "__next__" : "next";
    if (name === nextName) return (this.#next ??= new IteratorNext(this, nextName)).selfSet;
    return super.getMember(node, unit, name);
  }
}

export function isIterator(value: Namespace): value is IteratorInfo {
  return value instanceof IteratorInfo;
}

class IteratorNext extends Namespace {
  readonly memberType: MemberType = "method";

  constructor(
    readonly iterator: IteratorInfo,
    readonly name: string,
  ) {
    super();
  }

  call(_node: Node, unit: AnalysisUnit): NamespaceSet {
    return this.iterator.elements.getTypes(unit);
  }
}

// =============================================================================
// List mutation
// =============================================================================

const MUTATORS = ["append", "extend", "insert"] as const;
type MutatorName = (typeof MUTATORS)[number];

function isMutatorName(name: string): name is MutatorName {
  return MUTATORS.some((mutator) => mutator === name);
}

/** `append`, `extend` and `insert` on a tracked list: they feed the element set. */
class ListMutator extends Namespace {
  readonly memberType: MemberType = "method";

  constructor(
    readonly sequence: SequenceInfo,
    readonly name: MutatorName,
  ) {
    super();
  }

  call(node: Node, unit: AnalysisUnit, args: readonly NamespaceSet[]): NamespaceSet {
    const session = this.sequence.classInfo.session;
    const [first, second] = args;
    switch (this.name) {
      case "append":
        if (first) this.sequence.addElementTypes(unit, first);
        break;
      case "insert":
        if (second) this.sequence.addElementTypes(unit, second);
        break;
      case "extend":
        if (first) {
          const elements = first.flatMap((value) => value.getEnumeratorTypes(node, unit), session.limits.maxSetSize);
          this.sequence.addElementTypes(unit, elements);
        }
        break;
    }
    return session.universe.getConstant(null).selfSet;
  }
}
