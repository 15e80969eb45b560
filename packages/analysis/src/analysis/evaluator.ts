/**
 * Expression evaluation against one analysis unit.
 *
 * Every variable read goes through `VariableDef.getTypes(unit)`, which records
 * the unit as a reader; that is how later assignments find the units to re-run.
 */

import type {
  BinaryExpression,
  CallExpression,
  Expression,
  ListExpression,
  NameExpression,
  Node,
  TupleExpression,
} from "../ast/nodes.js";
import type { AnalysisSession } from "../session.js";
import { NamespaceSet } from "../values/namespace-set.js";
import { SequenceBuiltinClassInfo } from "../values/sequence.js";
import type { AnalysisUnit } from "./analysis-unit.js";
import type { Scope } from "./scope.js";

export class ExpressionEvaluator {
  constructor(readonly unit: AnalysisUnit) {}

  get scope(): Scope {
    return this.unit.scope;
  }

  get session(): AnalysisSession {
    return this.unit.session;
  }

  evaluate(expression: Expression): NamespaceSet {
    switch (expression.kind) {
      case "name":
        return this.#name(expression);
      case "constant":
        return this.session.universe.getConstant(expression.value).selfSet;
      case "attribute":
        return this.evaluate(expression.target).flatMap(
          (target) => target.getMember(expression, this.unit, expression.name),
          this.#limit,
        );
      case "call":
        return this.#call(expression);
      case "list":
      case "tuple":
        return this.#sequence(expression);
      case "dict":
        for (const entry of expression.entries) {
          this.evaluate(entry.key);
          this.evaluate(entry.value);
        }
        return this.session.universe.builtinClass("dict").instanceSet();
      case "binary":
        return this.#binary(expression);
      case "subscript": {
        const index = this.evaluate(expression.index);
        return this.evaluate(expression.target).flatMap(
          (target) => target.getIndex(expression, this.unit, index),
          this.#limit,
        );
      }
    }
  }

  /**
   * Reads `name` the way Python resolves it: enclosing scopes, then the
   * module, then builtins. An unbound name registers the unit on a module
   * level placeholder so a later definition re-runs it.
   */
  lookupName(name: string, node: Node): NamespaceSet {
    const variable = this.scope.lookup(name) ?? this.scope.globalScope.createVariable(name);
    variable.addReference(this.unit.projectEntry, node.loc);
    const types = variable.getTypes(this.unit);
    if (variable.isDefined) return types;
    return this.session.builtinModule?.getMember(node, this.unit, name) ?? NamespaceSet.EMPTY;
  }

  get #limit(): number {
    return this.session.limits.maxSetSize;
  }

  #name(expression: NameExpression): NamespaceSet {
    return this.lookupName(expression.id, expression);
  }

  #call(expression: CallExpression): NamespaceSet {
    const callees = this.evaluate(expression.func);
    const args: NamespaceSet[] = [];
    const argNames: (string | null)[] = [];
    for (const arg of expression.args) {
      args.push(this.evaluate(arg.value));
      argNames.push(arg.name);
    }
    return callees.flatMap((callee) => callee.call(expression, this.unit, args, argNames), this.#limit);
  }

  #sequence(expression: ListExpression | TupleExpression): NamespaceSet {
    const elements = expression.elements.map((element) => this.evaluate(element));
    const classInfo = this.session.universe.builtinClass(expression.kind);
    if (!(classInfo instanceof SequenceBuiltinClassInfo)) return classInfo.instanceSet();

    const sequences = classInfo.sequenceAt(expression, this.unit);
    for (const sequence of sequences) {
      elements.forEach((types, index) => {
        sequence.addElementTypes(this.unit, types, expression.kind === "tuple" ? index : undefined);
      });
    }
    return NamespaceSet.from(sequences);
  }

  #binary(expression: BinaryExpression): NamespaceSet {
    const left = this.evaluate(expression.left);
    const right = this.evaluate(expression.right);
    if (expression.op === "and" || expression.op === "or") {
      return left.union(right, this.#limit);
    }
    return left.flatMap((value) => value.binaryOperation(expression, this.unit, expression.op, right), this.#limit);
  }
}
