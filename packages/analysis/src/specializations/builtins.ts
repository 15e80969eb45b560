/**
 * Overrides every session installs.
 *
 * Some library functions are called with every type in the program and
 * always hand back what they were given (`copy.deepcopy`); analyzing them
 * generically only grows sets. Others (`super`, `getattr`, `next`) cannot be
 * inferred from a signature at all.
 */

import path from "node:path";
import { ClassScope, FunctionScope } from "../analysis/scope.js";
import { VariableDef } from "../analysis/variable-def.js";
import { getConstantString } from "../ast/constants.js";
import { NamespaceSet } from "../values/namespace-set.js";
import { IteratorInfo, SequenceBuiltinClassInfo } from "../values/sequence.js";
import { SuperInfo } from "../values/super.js";
import type { Namespace } from "../values/namespace.js";
import { InstanceInfo, isClassInfo } from "../values/user-values.js";
import type { SpecializationRegistry } from "./registry.js";
import type { SpecializationCall, SpecializationFn } from "./types.js";

export interface ResourceLoaderTarget {
  readonly moduleName: string;
  readonly functionName: string;
}

export const DEFAULT_RESOURCE_LOADER: ResourceLoaderTarget = { moduleName: "wpf", functionName: "LoadComponent" };

export function installDefaultSpecializations(
  registry: SpecializationRegistry,
  builtinModuleName: string,
  resourceLoader: ResourceLoaderTarget = DEFAULT_RESOURCE_LOADER,
): void {
  registry.register(builtinModuleName, "range", range, false);
  registry.register(builtinModuleName, "min", unionOfInputs);
  registry.register(builtinModuleName, "max", unionOfInputs);
  registry.register(builtinModuleName, "getattr", getattr, false);
  registry.register(builtinModuleName, "next", next, false);
  registry.register(builtinModuleName, "iter", iter, false);
  registry.register(builtinModuleName, "super", superCall, false);

  registry.register("copy", "deepcopy", firstArgument, false);
  registry.register("copy", "copy", firstArgument, false);
  registry.register("pickle", "dumps", returnsInstanceOf("bytes"), false);
  registry.register("pprint", "pprint", nothing, false);
  registry.register("pprint", "pformat", returnsInstanceOf("str"), false);
  registry.register("pprint", "saferepr", returnsInstanceOf("str"), false);
  registry.register("pprint", "_safe_repr", returnsInstanceOf("str"), false);
  registry.register("pprint", "_format", returnsInstanceOf("str"), false);
  registry.register("pprint.PrettyPrinter", "_format", returnsInstanceOf("str"), false);
  registry.register("decimal.Decimal", "__new__", nothing, false);
  registry.register("threading.Thread", "__init__", nothing, false);
  registry.register("subprocess.Popen", "__init__", nothing, false);
  registry.register("weakref.WeakValueDictionary", "update", nothing, false);
  registry.register("os._Environ", "get", returnsInstanceOf("str"), false);
  registry.register("os._Environ", "update", nothing, false);
  registry.register("ntpath", "expandvars", returnsInstanceOf("str"), false);
  registry.register("posixpath", "expandvars", returnsInstanceOf("str"), false);
  registry.register("idlelib.EditorWindow.EditorWindow", "__init__", nothing, false);

  // Python 2 module names.
  if (registry.session.languageVersion === "2") {
    registry.register("UserDict.UserDict", "update", nothing, false);
    registry.register("StringIO.StringIO", "write", nothing, false);
    registry.register("Tkinter.Toplevel", "__init__", nothing, false);
  }

  registry.register(resourceLoader.moduleName, resourceLoader.functionName, loadResource);
}

const nothing: SpecializationFn = () => NamespaceSet.EMPTY;

const firstArgument: SpecializationFn = ({ args }) => args[0] ?? NamespaceSet.EMPTY;

function returnsInstanceOf(id: "str" | "bytes"): SpecializationFn {
  return ({ session }) => session.universe.builtinClass(id).instanceSet();
}

const unionOfInputs: SpecializationFn = ({ args, session }) => session.universe.unionAll(args);

/** One list of int per call site. */
const range: SpecializationFn = ({ node, unit, session }) => {
  const list = session.universe.builtinClass("list");
  if (!(list instanceof SequenceBuiltinClassInfo)) return list.instanceSet();
  const sequences = list.sequenceAt(node, unit);
  const int = session.universe.builtinClass("int").instanceSet();
  for (const sequence of sequences) sequence.addElementTypes(unit, int);
  return NamespaceSet.from(sequences);
};

/** `getattr(obj, "name"[, default])`: the member when the name is a constant. */
const getattr: SpecializationFn = ({ node, unit, args, session }) => {
  const [targets, names, fallback] = args;
  let result = fallback ?? NamespaceSet.EMPTY;
  if (!targets || !names) return result;
  const { maxSetSize } = session.limits;
  for (const target of targets) {
    for (const name of names) {
      const member = getConstantString(name.getConstantValue());
      if (member !== undefined) result = result.union(target.getMember(node, unit, member), maxSetSize);
    }
  }
  return result;
};

const next: SpecializationFn = ({ node, unit, args, argNames, session }) => {
  const [iterator, ...rest] = args;
  if (!iterator) return NamespaceSet.EMPTY;
  const method = session.languageVersion === "3" ? "__next__" : "next";
  const restNames = argNames.slice(1);
  return iterator
    .flatMap((value) => value.getMember(node, unit, method), session.limits.maxSetSize)
    .flatMap((fn) => fn.call(node, unit, rest, restNames), session.limits.maxSetSize);
};

/** `iter(x)` and `iter(callable, sentinel)`; the sentinel never comes out. */
const iter: SpecializationFn = ({ node, unit, args, session }) => {
  const [source, sentinel] = args;
  if (!source) return NamespaceSet.EMPTY;
  if (!sentinel) {
    return source.flatMap((value) => value.getIterator(node, unit), session.limits.maxSetSize);
  }
  if (args.length > 2) return NamespaceSet.EMPTY;

  const iterators = unit.scope.getOrMakeNodeValue(node, () =>
    new IteratorInfo(session.universe.builtinClass("callable_iterator"), new VariableDef()).selfSet,
  );
  const produced = source.flatMap((fn) => fn.call(node, unit, [], []), session.limits.maxSetSize);
  for (const iterator of iterators) {
    if (iterator instanceof IteratorInfo) iterator.elements.addTypes(unit, produced);
  }
  return iterators;
};

/**
 * `super(Class, self)`, or on Python 3 a bare `super()` inside a method,
 * where the class and instance come from the enclosing scopes.
 */
const superCall: SpecializationFn = ({ node, unit, args, session }) => {
  if (args.length > 2) return NamespaceSet.EMPTY;

  let classes = NamespaceSet.EMPTY;
  let instances = NamespaceSet.EMPTY;
  const [first, second] = args;
  if (first) {
    classes = first;
    instances = second ?? NamespaceSet.EMPTY;
  } else if (session.languageVersion === "3") {
    for (const scope of unit.scope.enumerateTowardsGlobal()) {
      if (!(scope instanceof FunctionScope) || !(scope.outerScope instanceof ClassScope)) continue;
      const classInfo = scope.outerScope.classInfo;
      classes = classInfo.selfSet;
      if (scope.fn.node.parameters.length > 0) instances = classInfo.instanceSet();
      break;
    }
  }

  return unit.scope.getOrMakeNodeValue(node, () =>
    NamespaceSet.from(classes.ofType(isClassInfo).map((classInfo) => new SuperInfo(classInfo, instances))),
  );
};

/**
 * `LoadComponent(self, "file")`: every named object of the resource becomes
 * an attribute of `self`. Returns `self`.
 */
const loadResource: SpecializationFn = (call) => {
  const { args } = call;
  const [self, files] = args;
  if (args.length !== 2 || !self || !files) return NamespaceSet.EMPTY;

  for (const file of files) {
    const relative = getConstantString(file.getConstantValue());
    if (relative !== undefined) applyResource(call, self, relative);
  }
  return self;
};

function applyResource({ node, unit, session }: SpecializationCall, self: NamespaceSet, relative: string): void {
  const modulePath = unit.projectEntry.filePath;
  if (modulePath === null) return;
  const resource = session.getResourceByPath(path.join(path.dirname(modulePath), relative));
  if (!resource) return;

  resource.addDependency(unit.projectEntry);
  const instances = self.ofType(isInstance);

  for (const [name, object] of resource.analysis.namedObjects) {
    const lastDot = object.typeName.lastIndexOf(".");
    const module = lastDot > 0 ? session.modules.getLoaded(object.typeName.slice(0, lastDot))?.module : undefined;
    if (module) {
      const types = module
        .getMember(node, unit, object.typeName.slice(lastDot + 1))
        .flatMap((value) => value.instanceSet(), session.limits.maxSetSize);
      for (const target of self) target.setMember(node, unit, name, types);
    }
    for (const instance of instances) instance.attribute(name).addAssignment(resource, object.location);
  }

  for (const [handler, location] of resource.analysis.eventHandlers) {
    for (const instance of instances) {
      instance.classInfo.scope.getVariable(handler)?.addReference(resource, location);
    }
  }
}

function isInstance(value: Namespace): value is InstanceInfo {
  return value instanceof InstanceInfo;
}
