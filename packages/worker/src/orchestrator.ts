// =============================================================================
// @postwatch/worker — Worker orchestrator
// =============================================================================
// Owns the polling loop and its lifecycle: stopped -> running ->
// stop-requested -> stopped. Every state transition is a synchronous
// check-and-set, so concurrent start() calls can never produce two loops and
// a stop() can never be lost between the loop's last check and its exit.
// Stops are cooperative: the loop honors them at cycle and sleep boundaries
// and never interrupts a cycle in flight.
// =============================================================================

import type {
  Logger,
  MarkerStore,
  PipelineStage,
} from "@postwatch/shared";
import {
  runPipeline,
  type PipelineDeps,
  type PipelineResult,
} from "./pipeline.js";
import { interruptibleSleep, type Sleep } from "./sleep.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type WorkerPhase = "stopped" | "running" | "stop-requested";

export type CycleOutcome = PipelineResult["kind"];

/** Read-only snapshot of the worker state */
export interface WorkerStatus {
  running: boolean;
  stopRequested: boolean;
  lastProcessedId: string | null;
  cycleCount: number;
  lastCycleAt: string | null;
  lastOutcome: CycleOutcome | null;
  /** Stage is null when the cycle failed outside the pipeline stages */
  lastError: { stage: PipelineStage | null; message: string } | null;
  consecutiveFailures: number;
}

export interface StartResult {
  started: boolean;
  phase: WorkerPhase;
}

export interface StopResult {
  stopping: boolean;
  phase: WorkerPhase;
}

export interface WorkerOptions {
  pipeline: PipelineDeps;
  markerStore: MarkerStore;
  intervalMs: number;
  logger: Logger;
  sleep?: Sleep;
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class WorkerOrchestrator {
  private phase: WorkerPhase = "stopped";
  private lastProcessedId: string | null = null;
  private cycleCount = 0;
  private lastCycleAt: string | null = null;
  private lastOutcome: CycleOutcome | null = null;
  private lastError: WorkerStatus["lastError"] = null;
  private consecutiveFailures = 0;

  private loop: Promise<void> | null = null;
  private restoring: Promise<string | null> | null = null;
  private wake: AbortController | null = null;

  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(private readonly options: WorkerOptions) {
    this.logger = options.logger.child({ component: "worker" });
    this.sleep = options.sleep ?? interruptibleSleep;
  }

  /**
   * Load the persisted marker. Call once before the first start(); a store
   * failure leaves the worker without a marker, so the current item will be
   * treated as new. A loop started while the load is pending waits for it
   * before its first cycle.
   */
  restore(): Promise<string | null> {
    const pending: Promise<string | null> = this.loadMarker().finally(() => {
      if (this.restoring === pending) this.restoring = null;
    });
    this.restoring = pending;
    return pending;
  }

  private async loadMarker(): Promise<string | null> {
    try {
      const marker = await this.options.markerStore.load();
      // A cycle may already have delivered something newer
      if (this.lastProcessedId === null) this.lastProcessedId = marker;
      this.logger.info("Restored last processed marker", {
        lastProcessedId: this.lastProcessedId,
      });
    } catch (err) {
      this.logger.error("Failed to restore last processed marker", {
        error: err instanceof Error ? err.message : String(err),
      });
    }
    return this.lastProcessedId;
  }

  start(): StartResult {
    if (this.phase !== "stopped") {
      return { started: false, phase: this.phase };
    }

    this.phase = "running";
    const wake = new AbortController();
    this.wake = wake;
    this.loop = this.runLoop(wake.signal);
    return { started: true, phase: this.phase };
  }

  stop(): StopResult {
    if (this.phase === "stopped") {
      return { stopping: false, phase: this.phase };
    }

    if (this.phase === "running") {
      this.phase = "stop-requested";
      this.logger.info("Stop requested", { cycleCount: this.cycleCount });
      // Cut the inter-cycle sleep short; an in-flight cycle is unaffected
      this.wake?.abort();
    }
    return { stopping: true, phase: this.phase };
  }

  status(): WorkerStatus {
    return {
      running: this.phase !== "stopped",
      stopRequested: this.phase === "stop-requested",
      lastProcessedId: this.lastProcessedId,
      cycleCount: this.cycleCount,
      lastCycleAt: this.lastCycleAt,
      lastOutcome: this.lastOutcome,
      lastError: this.lastError,
      consecutiveFailures: this.consecutiveFailures,
    };
  }

  /** Resolves once the current loop (if any) has exited. */
  whenStopped(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  // -------------------------------------------------------------------------
  // Loop
  // -------------------------------------------------------------------------

  private isStopRequested(): boolean {
    return this.phase !== "running";
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    this.logger.info("Worker loop started", {
      intervalMs: this.options.intervalMs,
      restorePending: this.restoring !== null,
    });

    try {
      if (this.restoring) await this.restoring;
      while (!this.isStopRequested()) {
        await this.runCycle();
        if (this.isStopRequested()) break;
        await this.sleep(this.options.intervalMs, signal);
      }
    } catch (err) {
      this.logger.fatal("Worker loop crashed", {
        error: err instanceof Error ? err.message : String(err),
      });
    } finally {
      this.phase = "stopped";
      this.wake = null;
      this.loop = null;
      this.logger.info("Worker loop stopped", { cycleCount: this.cycleCount });
    }
  }

  private async runCycle(): Promise<void> {
    const cycle = ++this.cycleCount;
    const start = performance.now();

    let result: PipelineResult;
    try {
      result = await runPipeline(this.options.pipeline, this.lastProcessedId);
    } catch (err) {
      this.recordFailure(cycle, null, err);
      return;
    }

    switch (result.kind) {
      case "new-content":
        await this.persist(result.newId);
        this.lastProcessedId = result.newId;
        this.recordSuccess(result.kind);
        this.logger.info("Cycle delivered new content", {
          cycle,
          identifier: result.newId,
          durationMs: Math.round(performance.now() - start),
        });
        break;
      case "no-change":
        this.recordSuccess(result.kind);
        this.logger.info("Cycle found no new content", {
          cycle,
          durationMs: Math.round(performance.now() - start),
        });
        break;
      case "failed":
        this.recordFailure(cycle, result.stage, result.error);
        break;
    }
  }

  private async persist(identifier: string): Promise<void> {
    try {
      await this.options.markerStore.save(identifier);
    } catch (err) {
      // Delivery already happened; the in-memory marker still advances
      this.logger.error("Failed to persist last processed marker", {
        identifier,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private recordSuccess(outcome: CycleOutcome): void {
    this.lastCycleAt = new Date().toISOString();
    this.lastOutcome = outcome;
    this.lastError = null;
    this.consecutiveFailures = 0;
  }

  private recordFailure(
    cycle: number,
    stage: PipelineStage | null,
    err: unknown,
  ): void {
    const message = err instanceof Error ? err.message : String(err);
    this.lastCycleAt = new Date().toISOString();
    this.lastOutcome = "failed";
    this.lastError = { stage, message };
    this.consecutiveFailures++;
    this.logger.error("Cycle failed, retrying next interval", {
      cycle,
      stage,
      error: message,
      consecutiveFailures: this.consecutiveFailures,
    });
  }
}
