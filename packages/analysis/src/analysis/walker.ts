/**
 * Statement walker: runs one unit's body, assigning values to variables and
 * creating (and enqueuing) units for nested classes and functions.
 */

import type {
  ClassDefinition,
  Expression,
  FromImportStatement,
  FunctionDefinition,
  ImportStatement,
  Node,
  Statement,
} from "../ast/nodes.js";
import type { AnalysisSession } from "../session.js";
import type { Namespace } from "../values/namespace.js";
import { NamespaceSet } from "../values/namespace-set.js";
import { ClassInfo, FunctionInfo, isClassInfo, isFunctionInfo } from "../values/user-values.js";
import type { AnalysisUnit } from "./analysis-unit.js";
import { ExpressionEvaluator } from "./evaluator.js";
import { ClassScope, FunctionScope } from "./scope.js";

/** Decorators after which the first parameter is not the instance. */
const NON_INSTANCE_DECORATORS: ReadonlySet<string> = new Set(["staticmethod", "classmethod"]);

export class StatementWalker {
  readonly #evaluator: ExpressionEvaluator;

  constructor(readonly unit: AnalysisUnit) {
    this.#evaluator = new ExpressionEvaluator(unit);
  }

  get session(): AnalysisSession {
    return this.unit.session;
  }

  walkBody(body: readonly Statement[]): void {
    for (const statement of body) this.walk(statement);
  }

  walk(statement: Statement): void {
    const evaluate = (expression: Expression): NamespaceSet => this.#evaluator.evaluate(expression);
    switch (statement.kind) {
      case "expression":
        evaluate(statement.expression);
        return;
      case "assign": {
        const value = evaluate(statement.value);
        for (const target of statement.targets) this.assignTo(target, value, statement);
        return;
      }
      case "augAssign": {
        const current = evaluate(statement.target);
        const right = evaluate(statement.value);
        const result = current.flatMap(
          (value) => value.binaryOperation(statement, this.unit, statement.op, right),
          this.session.limits.maxSetSize,
        );
        this.assignTo(statement.target, result, statement);
        return;
      }
      case "functionDef":
        this.#functionDef(statement);
        return;
      case "classDef":
        this.#classDef(statement);
        return;
      case "return": {
        const scope = this.unit.scope;
        const value = statement.value ? evaluate(statement.value) : this.session.universe.getConstant(null).selfSet;
        if (scope instanceof FunctionScope) scope.fn.returnValue.addTypes(this.unit, value);
        return;
      }
      case "if":
      case "while":
        evaluate(statement.test);
        this.walkBody(statement.body);
        this.walkBody(statement.orelse);
        return;
      case "for": {
        const elements = evaluate(statement.iter).flatMap(
          (value) => value.getEnumeratorTypes(statement, this.unit),
          this.session.limits.maxSetSize,
        );
        this.assignTo(statement.target, elements, statement);
        this.walkBody(statement.body);
        this.walkBody(statement.orelse);
        return;
      }
      case "import":
        this.#import(statement);
        return;
      case "fromImport":
        this.#fromImport(statement);
        return;
      case "pass":
        return;
    }
  }

  /** Binds `value` to an assignment target; tuple and list targets unpack by position. */
  assignTo(target: Expression, value: NamespaceSet, statement: Node): void {
    switch (target.kind) {
      case "name":
        this.assignName(target.id, value, target.loc ? target : statement);
        return;
      case "attribute":
        for (const owner of this.#evaluator.evaluate(target.target)) {
          owner.setMember(target.loc ? target : statement, this.unit, target.name, value);
        }
        return;
      case "tuple":
      case "list": {
        const { universe, limits } = this.session;
        target.elements.forEach((element, index) => {
          const position = universe.getConstant(index).selfSet;
          const item = value.flatMap((v) => v.getIndex(statement, this.unit, position), limits.maxSetSize);
          this.assignTo(element, item, statement);
        });
        return;
      }
      default:
        this.#evaluator.evaluate(target);
    }
  }

  assignName(name: string, value: NamespaceSet, node: Node): void {
    const variable = this.unit.scope.createVariable(name);
    variable.addTypes(this.unit, value);
    variable.addAssignment(this.unit.projectEntry, node.loc);
  }

  // ===========================================================================
  // Definitions
  // ===========================================================================

  #functionDef(node: FunctionDefinition): void {
    const { scope, session } = this.unit;
    let created: FunctionInfo | undefined;
    const values = scope.getOrMakeNodeValue(node, () => {
      created = new FunctionInfo(node, scope, this.unit.declaringModule, session);
      return created.selfSet;
    });

    let bindsInstance = scope instanceof ClassScope;
    for (const decorator of node.decorators) {
      this.#evaluator.evaluate(decorator);
      if (decorator.kind === "name" && NON_INSTANCE_DECORATORS.has(decorator.id)) bindsInstance = false;
    }

    for (const fn of values.ofType(isFunctionInfo)) {
      node.parameters.forEach((parameter, index) => {
        const variable = fn.parameters[index];
        if (!variable) return;
        if (parameter.defaultValue) {
          variable.addTypes(this.unit, this.#evaluator.evaluate(parameter.defaultValue));
        }
        variable.addAssignment(this.unit.projectEntry, parameter.loc ?? node.loc);
      });

      const [self] = fn.parameters;
      if (self && bindsInstance && scope instanceof ClassScope) {
        self.addTypes(this.unit, scope.classInfo.instanceSet());
      }

      if (fn === created && fn.isAnalyzed) fn.unit.enqueue(true);
    }
    this.assignName(node.name, values, node);
  }

  #classDef(node: ClassDefinition): void {
    const { scope, session } = this.unit;
    let created: ClassInfo | undefined;
    const values = scope.getOrMakeNodeValue(node, () => {
      created = new ClassInfo(node, scope, this.unit.declaringModule, session);
      return created.selfSet;
    });

    const bases = NamespaceSet.unionAll(
      node.bases.map((base) => this.#evaluator.evaluate(base)),
      session.limits.maxSetSize,
    );
    for (const classInfo of values.ofType(isClassInfo)) {
      classInfo.bases.addTypes(this.unit, bases);
      if (classInfo === created) classInfo.unit.enqueue(true);
    }
    this.assignName(node.name, values, node);
  }

  // ===========================================================================
  // Imports
  // ===========================================================================

  #import(statement: ImportStatement): void {
    const { imports } = this.session;
    for (const alias of statement.names) {
      const full = imports.resolveModule(alias.name, this.unit);
      if (alias.asName) {
        this.assignName(alias.asName, full ? full.selfSet : NamespaceSet.EMPTY, statement);
        continue;
      }
      // `import a.b.c` binds `a`
      const [head = alias.name] = alias.name.split(".");
      const top = head === alias.name ? full : imports.resolveModule(head, this.unit);
      this.assignName(head, top ? top.selfSet : NamespaceSet.EMPTY, statement);
    }
  }

  #fromImport(statement: FromImportStatement): void {
    const { imports } = this.session;
    const moduleName = imports.absoluteName(statement.module, statement.level, this.unit.projectEntry);
    const module = moduleName === undefined ? undefined : imports.resolveModule(moduleName, this.unit);

    for (const alias of statement.names) {
      if (alias.name === "*") {
        if (module) this.#importStar(module, statement);
        continue;
      }
      let values = module ? module.getMember(statement, this.unit, alias.name) : NamespaceSet.EMPTY;
      if (values.isEmpty && moduleName !== undefined) {
        const child = imports.resolveModule(`${moduleName}.${alias.name}`, this.unit);
        if (child) values = child.selfSet;
      }
      this.assignName(alias.asName ?? alias.name, values, statement);
    }
  }

  #importStar(module: Namespace, statement: FromImportStatement): void {
    for (const name of module.getAllMembers(this.unit.declaringModule.context).keys()) {
      if (name.startsWith("_")) continue;
      this.assignName(name, module.getMember(statement, this.unit, name), statement);
    }
  }
}
