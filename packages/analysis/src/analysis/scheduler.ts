import type { AnalysisLimits } from "../config/limits.js";
import type { Logger } from "../shared/logger.js";
import { AnalysisError, AnalysisErrorCode, isAnalysisError } from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import type { WorkQueue } from "./work-queue.js";

/** Progress callback: receives the number of units still queued. */
export type QueueReporter = (queueSize: number) => void;

export interface SchedulerRunOptions {
  /** Checked before each unit; once aborted the queue is dropped. */
  readonly signal?: AbortSignal;
  readonly report?: QueueReporter;
  /** Processed units between reports (default: `limits.reportInterval`). */
  readonly interval?: number;
}

export type SchedulerOutcome = "completed" | "cancelled" | "truncated";

export interface SchedulerResult {
  readonly outcome: SchedulerOutcome;
  /** Units actually analyzed (stale units are skipped, not counted). */
  readonly processed: number;
  /** Units whose analysis threw; the run continued past them. */
  readonly failed: number;
}

/**
 * Drives the work queue to a fixed point.
 *
 * Runs are not re-entrant: a unit that (indirectly) asks for another run gets
 * an `AnalysisError`.
 */
export class Scheduler {
  #running = false;

  constructor(
    private readonly limits: () => AnalysisLimits,
    private readonly logger: Logger,
  ) {}

  get isRunning(): boolean {
    return this.#running;
  }

  run(queue: WorkQueue, options: SchedulerRunOptions = {}): SchedulerResult {
    if (this.#running) {
      throw new AnalysisError("Analysis is already running", AnalysisErrorCode.REENTRANT_ANALYSIS);
    }
    this.#running = true;
    try {
      return this.#drain(queue, options);
    } finally {
      this.#running = false;
    }
  }

  #drain(queue: WorkQueue, { signal, report, interval }: SchedulerRunOptions): SchedulerResult {
    const { maxUnitVisits, reportInterval } = this.limits();
    const every = interval ?? reportInterval;
    let processed = 0;
    let failed = 0;
    let sinceReport = 0;
    debug.scheduler("run.start", { queued: queue.size });

    for (;;) {
      if (signal?.aborted) {
        debug.scheduler("run.cancelled", { processed, dropped: queue.size });
        queue.clear();
        report?.(0);
        return { outcome: "cancelled", processed, failed };
      }

      const unit = queue.popFront();
      if (!unit) break;
      if (unit.isStale) continue;

      if (processed >= maxUnitVisits) {
        this.logger.warn(
          `Analysis stopped after ${processed} units (maxUnitVisits); ${queue.size + 1} queued units dropped`,
        );
        queue.clear();
        report?.(0);
        return { outcome: "truncated", processed, failed };
      }

      try {
        unit.analyze();
      } catch (error) {
        if (isAnalysisError(error)) throw error;
        failed++;
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Analysis of ${unit.toString()} in '${unit.declaringModule.name}' failed: ${message}`);
      }
      processed++;

      if (report && ++sinceReport >= every) {
        sinceReport = 0;
        report(queue.size);
      }
    }

    if (report && sinceReport > 0) report(queue.size);
    debug.scheduler("run.done", { processed, failed });
    return { outcome: "completed", processed, failed };
  }
}
