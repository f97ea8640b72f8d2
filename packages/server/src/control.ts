// =============================================================================
// @postwatch/server — Control surface
// =============================================================================
// The four control operations. Each is a synchronous read or a lifecycle
// request forwarded to the orchestrator; none waits for cycle work.
// Lifecycle no-ops are ordinary answers, not errors.
// =============================================================================

import type { WorkerOrchestrator, WorkerStatus } from "@postwatch/worker";
import type { PingState } from "./self-ping.js";

/** What the control surface needs from the worker */
export type WorkerControl = Pick<WorkerOrchestrator, "start" | "stop" | "status">;

export interface StatusResponse {
  status: "ok";
  worker_active: boolean;
  ping_active: boolean;
  last_processed: string | null;
  stop_requested: boolean;
  cycle_count: number;
  last_cycle_at: string | null;
  last_outcome: WorkerStatus["lastOutcome"];
  last_error: WorkerStatus["lastError"];
  last_ping_at: string | null;
}

export interface HealthResponse {
  status: "healthy";
  /** Seconds since the epoch, fractional (millisecond precision) */
  timestamp: number;
}

export interface LifecycleResponse {
  status:
    | "worker started"
    | "worker already running"
    | "worker stopping - will finish current cycle"
    | "worker not running";
}

export interface ControlSurface {
  status(): StatusResponse;
  health(): HealthResponse;
  requestStart(): LifecycleResponse;
  requestStop(): LifecycleResponse;
}

export function createControlSurface(
  worker: WorkerControl,
  ping: () => PingState,
  now: () => number = Date.now,
): ControlSurface {
  return {
    status() {
      const snapshot = worker.status();
      const pingState = ping();
      return {
        status: "ok",
        worker_active: snapshot.running,
        ping_active: pingState.active,
        last_processed: snapshot.lastProcessedId,
        stop_requested: snapshot.stopRequested,
        cycle_count: snapshot.cycleCount,
        last_cycle_at: snapshot.lastCycleAt,
        last_outcome: snapshot.lastOutcome,
        last_error: snapshot.lastError,
        last_ping_at: pingState.lastPingAt,
      };
    },

    health() {
      return { status: "healthy", timestamp: now() / 1000 };
    },

    requestStart() {
      return worker.start().started
        ? { status: "worker started" }
        : { status: "worker already running" };
    },

    requestStop() {
      return worker.stop().stopping
        ? { status: "worker stopping - will finish current cycle" }
        : { status: "worker not running" };
    },
  };
}
