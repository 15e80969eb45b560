// Session
export { AnalysisSession } from "./session.js";
export type { AnalysisSessionOptions, DirectoriesChangedListener, LanguageVersion } from "./session.js";

// Configuration
export { DEFAULT_LIMITS, resolveLimits } from "./config/limits.js";
export type { AnalysisLimits } from "./config/limits.js";

// Errors, logging, debug
export { AnalysisError, AnalysisErrorCode, invalidArgument, isAnalysisError } from "./shared/errors.js";
export type { AnalysisErrorCodeType } from "./shared/errors.js";
export { NOOP_LOGGER, createConsoleLogger } from "./shared/logger.js";
export type { Logger } from "./shared/logger.js";
export { debug, configureDebug, isDebugEnabled, refreshDebugChannels, DEBUG_ENV_VAR } from "./shared/debug.js";
export type { Debug, DebugChannel, DebugConfig, DebugData } from "./shared/debug.js";

// Host contract
export { AsciiString, Complex, ELLIPSIS, isHostPrimitive } from "./host/primitives.js";
export type { HostPrimitive } from "./host/primitives.js";
export { classifyHostObject, isHostObject, probeHostObject } from "./host/probe.js";
export type { HostClassification, HostObjectKind } from "./host/probe.js";
export { BUILTIN_TYPE_IDS, isBuiltinTypeId } from "./host/types.js";
export type {
  BuiltinTypeId,
  HostConstant,
  HostFunction,
  HostInterpreter,
  HostMemberContainer,
  HostMemberSource,
  HostMethodDescriptor,
  HostModule,
  HostModuleContext,
  HostMultipleMembers,
  HostObject,
  HostProperty,
  HostType,
  HostValue,
} from "./host/types.js";

// Trees
export * as ast from "./ast/factory.js";
export { getConstantString } from "./ast/constants.js";
export type * from "./ast/nodes.js";

// Values
export { NamespaceSet } from "./values/namespace-set.js";
export { Namespace, UnknownNamespace } from "./values/namespace.js";
export type { MemberType, ModuleValue } from "./values/namespace.js";
export { ValueCache } from "./values/value-cache.js";
export { ValueUniverse } from "./values/universe.js";
export {
  BuiltinClassInfo,
  BuiltinFunctionInfo,
  BuiltinInstanceInfo,
  BuiltinMethodInfo,
  BuiltinPropertyInfo,
  ConstantInfo,
  ObjectBuiltinClassInfo,
  ReflectedNamespace,
  formatConstant,
  isBuiltinClass,
} from "./values/builtin-values.js";
export { BuiltinModule } from "./values/builtin-module.js";
export { ModuleInfo } from "./values/module-info.js";
export { MultipleMemberInfo } from "./values/multiple-member.js";
export { IteratorInfo, SequenceBuiltinClassInfo, SequenceInfo, isIterator, isSequence } from "./values/sequence.js";
export { SpecializedCallable, isSpecialized } from "./values/specialized.js";
export { SuperInfo } from "./values/super.js";
export { BoundMethodInfo, ClassInfo, FunctionInfo, InstanceInfo, isClassInfo, isFunctionInfo } from "./values/user-values.js";

// Modules
export { ImportResolver } from "./modules/import-resolver.js";
export { MemberResult } from "./modules/member-result.js";
export type { ExportedMember } from "./modules/member-result.js";
export { ModuleReference } from "./modules/module-reference.js";
export { ModuleTable } from "./modules/module-table.js";
export { moduleNameFromUri, pathToModuleName } from "./modules/paths.js";
export type { FileExists } from "./modules/paths.js";
export { ProjectEntry } from "./modules/project-entry.js";
export { ResourceProjectEntry } from "./modules/resource-entry.js";
export type { ResourceAnalysis, ResourceNamedObject } from "./modules/resource-entry.js";

// Specializations
export { SpecializationRegistry } from "./specializations/registry.js";
export { DEFAULT_RESOURCE_LOADER, installDefaultSpecializations } from "./specializations/builtins.js";
export type { ResourceLoaderTarget } from "./specializations/builtins.js";
export type { CallHook, SpecializationCall, SpecializationFn, SpecializationInfo } from "./specializations/types.js";

// Analysis
export { AnalysisUnit } from "./analysis/analysis-unit.js";
export { ExpressionEvaluator } from "./analysis/evaluator.js";
export { Scheduler } from "./analysis/scheduler.js";
export type { QueueReporter, SchedulerOutcome, SchedulerResult, SchedulerRunOptions } from "./analysis/scheduler.js";
export { ClassScope, FunctionScope, ModuleScope, Scope } from "./analysis/scope.js";
export type { ScopeKind } from "./analysis/scope.js";
export { VariableDef } from "./analysis/variable-def.js";
export type { LocatedReference, LocationOwner } from "./analysis/variable-def.js";
export { StatementWalker } from "./analysis/walker.js";
export { WorkQueue } from "./analysis/work-queue.js";
