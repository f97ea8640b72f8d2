import { describe, it, expect, vi } from "vitest";
import type { StartResult, StopResult, WorkerStatus } from "@postwatch/worker";
import { createControlSurface, type WorkerControl } from "../control.js";
import type { PingState } from "../self-ping.js";

const IDLE: WorkerStatus = {
  running: false,
  stopRequested: false,
  lastProcessedId: null,
  cycleCount: 0,
  lastCycleAt: null,
  lastOutcome: null,
  lastError: null,
  consecutiveFailures: 0,
};

const PING: PingState = {
  active: true,
  lastPingAt: "2026-01-01T00:10:00.000Z",
  lastPingOk: true,
};

function fakeWorker(options?: {
  status?: Partial<WorkerStatus>;
  start?: StartResult;
  stop?: StopResult;
}) {
  return {
    start: vi.fn(
      (): StartResult => options?.start ?? { started: true, phase: "running" },
    ),
    stop: vi.fn(
      (): StopResult =>
        options?.stop ?? { stopping: true, phase: "stop-requested" },
    ),
    status: vi.fn((): WorkerStatus => ({ ...IDLE, ...options?.status })),
  } satisfies WorkerControl;
}

describe("createControlSurface", () => {
  it("should report worker and ping state without touching the worker", () => {
    const worker = fakeWorker({
      status: {
        running: true,
        lastProcessedId: "https://example.substack.com/p/first-post",
        cycleCount: 4,
        lastCycleAt: "2026-01-01T00:00:00.000Z",
        lastOutcome: "no-change",
      },
    });
    const control = createControlSurface(worker, () => PING);

    expect(control.status()).toEqual({
      status: "ok",
      worker_active: true,
      ping_active: true,
      last_processed: "https://example.substack.com/p/first-post",
      stop_requested: false,
      cycle_count: 4,
      last_cycle_at: "2026-01-01T00:00:00.000Z",
      last_outcome: "no-change",
      last_error: null,
      last_ping_at: "2026-01-01T00:10:00.000Z",
    });
    expect(worker.start).not.toHaveBeenCalled();
    expect(worker.stop).not.toHaveBeenCalled();
  });

  it("should answer health with the current epoch seconds", () => {
    const control = createControlSurface(
      fakeWorker(),
      () => PING,
      () => 1_700_000_000_500,
    );
    expect(control.health()).toEqual({
      status: "healthy",
      timestamp: 1_700_000_000.5,
    });
  });

  it("should map start results to status strings", () => {
    expect(createControlSurface(fakeWorker(), () => PING).requestStart()).toEqual(
      { status: "worker started" },
    );

    const running = fakeWorker({ start: { started: false, phase: "running" } });
    expect(createControlSurface(running, () => PING).requestStart()).toEqual({
      status: "worker already running",
    });
    expect(running.start).toHaveBeenCalledTimes(1);
  });

  it("should map stop results to status strings", () => {
    expect(createControlSurface(fakeWorker(), () => PING).requestStop()).toEqual({
      status: "worker stopping - will finish current cycle",
    });

    const stopped = fakeWorker({ stop: { stopping: false, phase: "stopped" } });
    expect(createControlSurface(stopped, () => PING).requestStop()).toEqual({
      status: "worker not running",
    });
  });
});
