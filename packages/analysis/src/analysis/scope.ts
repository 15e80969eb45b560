/**
 * Lexical scopes. Each holds its variables and the values memoized for nodes
 * evaluated inside it (list literals, calls that build sequences, nested
 * definitions), so re-evaluating a node yields the same namespace.
 */

import type { Node } from "../ast/nodes.js";
import type { NamespaceSet } from "../values/namespace-set.js";
import type { ClassInfo, FunctionInfo } from "../values/user-values.js";
import type { ModuleInfo } from "../values/module-info.js";
import type { AnalysisUnit } from "./analysis-unit.js";
import { VariableDef } from "./variable-def.js";

export type ScopeKind = "module" | "class" | "function";

export abstract class Scope {
  abstract readonly kind: ScopeKind;
  abstract readonly name: string;
  abstract readonly globalScope: ModuleScope;

  readonly variables = new Map<string, VariableDef>();
  readonly #nodeValues = new Map<Node, NamespaceSet>();

  constructor(readonly outerScope: Scope | undefined) {}

  getVariable(name: string): VariableDef | undefined {
    return this.variables.get(name);
  }

  createVariable(name: string): VariableDef {
    let variable = this.variables.get(name);
    if (!variable) {
      variable = new VariableDef();
      this.variables.set(name, variable);
    }
    return variable;
  }

  /**
   * Name resolution from this scope outwards. Class bodies are visible only
   * to themselves, not to functions nested inside them.
   */
  lookup(name: string): VariableDef | undefined {
    for (const scope of this.enumerateTowardsGlobal()) {
      if (scope !== this && scope.kind === "class") continue;
      const variable = scope.variables.get(name);
      if (variable) return variable;
    }
    return undefined;
  }

  *enumerateTowardsGlobal(): Generator<Scope> {
    let scope: Scope | undefined = this;
    while (scope) {
      yield scope;
      scope = scope.outerScope;
    }
  }

  getOrMakeNodeValue(node: Node, factory: () => NamespaceSet): NamespaceSet {
    let value = this.#nodeValues.get(node);
    if (!value) {
      value = factory();
      this.#nodeValues.set(node, value);
    }
    return value;
  }

  /** Drops inferred state; returns the units that had read any of it. */
  clear(): Set<AnalysisUnit> {
    const readers = new Set<AnalysisUnit>();
    for (const variable of this.variables.values()) {
      for (const reader of variable.clear()) readers.add(reader);
    }
    this.variables.clear();
    this.#nodeValues.clear();
    return readers;
  }
}

export class ModuleScope extends Scope {
  readonly kind = "module";
  /** Bumped on every clear; units from an older generation are stale. */
  #generation = 0;

  constructor(readonly module: ModuleInfo) {
    super(undefined);
  }

  get name(): string {
    return this.module.name;
  }

  get globalScope(): ModuleScope {
    return this;
  }

  get generation(): number {
    return this.#generation;
  }

  clear(): Set<AnalysisUnit> {
    this.#generation++;
    return super.clear();
  }
}

export class ClassScope extends Scope {
  readonly kind = "class";

  constructor(
    readonly classInfo: ClassInfo,
    outerScope: Scope,
  ) {
    super(outerScope);
  }

  get name(): string {
    return this.classInfo.name;
  }

  get globalScope(): ModuleScope {
    return this.classInfo.declaringScope.globalScope;
  }
}

export class FunctionScope extends Scope {
  readonly kind = "function";

  constructor(
    readonly fn: FunctionInfo,
    outerScope: Scope,
  ) {
    super(outerScope);
  }

  get name(): string {
    return this.fn.name;
  }

  get globalScope(): ModuleScope {
    return this.fn.declaringScope.globalScope;
  }
}
