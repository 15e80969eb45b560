import { invalidArgument } from "../shared/errors.js";

/**
 * Bounds on analysis state. Exceeding `maxSetSize` collapses a set to
 * `NamespaceSet.TOP`; exceeding `maxUnitVisits` stops the scheduler.
 */
export interface AnalysisLimits {
  /** Largest NamespaceSet kept before it degrades to TOP. */
  readonly maxSetSize: number;
  /** Units processed by one scheduler run before the rest of the queue is dropped. */
  readonly maxUnitVisits: number;
  /** Default number of processed units between progress callbacks. */
  readonly reportInterval: number;
}

export const DEFAULT_LIMITS: AnalysisLimits = {
  maxSetSize: 256,
  maxUnitVisits: 500_000,
  reportInterval: 1,
};

const LIMIT_KEYS = ["maxSetSize", "maxUnitVisits", "reportInterval"] as const satisfies readonly (keyof AnalysisLimits)[];

export function resolveLimits(partial?: Partial<AnalysisLimits>): AnalysisLimits {
  const limits: AnalysisLimits = { ...DEFAULT_LIMITS, ...partial };
  for (const key of LIMIT_KEYS) {
    const value = limits[key];
    if (!Number.isInteger(value) || value <= 0) {
      throw invalidArgument(`limits.${key}`, `expected a positive integer, got ${String(value)}`);
    }
  }
  return limits;
}
