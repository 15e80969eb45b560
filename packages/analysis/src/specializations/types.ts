import type { AnalysisUnit } from "../analysis/analysis-unit.js";
import type { Node } from "../ast/nodes.js";
import type { AnalysisSession } from "../session.js";
import type { NamespaceSet } from "../values/namespace-set.js";

export interface SpecializationCall {
  readonly node: Node;
  readonly unit: AnalysisUnit;
  readonly args: readonly NamespaceSet[];
  /** Parallel to `args`: keyword name, or null for positional arguments. */
  readonly argNames: readonly (string | null)[];
  readonly session: AnalysisSession;
}

/**
 * Replacement call behaviour. Returning `null` means "no opinion": the call
 * falls back to generic inference.
 */
export type SpecializationFn = (call: SpecializationCall) => NamespaceSet | null;

/** Observes a call without changing its result. */
export type CallHook = (call: SpecializationCall) => void;

export interface SpecializationInfo {
  /** Module name as registered, before prefix fallback. */
  readonly moduleName: string;
  readonly name: string;
  readonly override: SpecializationFn;
  /** When false the function body is never analyzed and the override result is final. */
  readonly analyze: boolean;
}
