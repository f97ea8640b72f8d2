// =============================================================================
// @postwatch/server — Self-ping scheduler
// =============================================================================
// Wraps node-cron to request this process's own /health endpoint on a fixed
// schedule so idle-sleeping hosts keep the process awake. Independent of the
// worker: a failed ping is logged and the schedule carries on.
// Controlled via SELF_PING_ENABLED (kill switch) and SELF_PING_CRON.
// =============================================================================

import cron, { type ScheduledTask } from "node-cron";
import { logExternalCall, type Config, type Logger } from "@postwatch/shared";

export interface PingState {
  active: boolean;
  lastPingAt: string | null;
  lastPingOk: boolean | null;
}

export interface SelfPingHandle {
  state(): PingState;
  stop(): void;
}

export interface SelfPingDependencies {
  config: Pick<
    Config,
    "APP_URL" | "SELF_PING_ENABLED" | "SELF_PING_CRON" | "REQUEST_TIMEOUT_MS"
  >;
  logger: Logger;
}

/**
 * Issue one GET against `url`. Resolves true on a 2xx answer and false on
 * anything else; never rejects.
 */
export async function pingSelf(
  url: string,
  timeoutMs: number,
  logger: Logger,
): Promise<boolean> {
  const start = performance.now();
  try {
    const response = await fetch(url, {
      signal: AbortSignal.timeout(timeoutMs),
    });
    const durationMs = Math.round(performance.now() - start);
    if (!response.ok) {
      logger.warn("Self-ping returned non-success status", {
        url,
        status: response.status,
        durationMs,
      });
      return false;
    }
    logExternalCall(logger, "self", "ping", durationMs);
    return true;
  } catch (err) {
    logger.warn("Self-ping failed", {
      url,
      durationMs: Math.round(performance.now() - start),
      error: err instanceof Error ? err.message : String(err),
    });
    return false;
  }
}

export function startSelfPing(deps: SelfPingDependencies): SelfPingHandle {
  const { config } = deps;
  const logger = deps.logger.child({ component: "self-ping" });
  const state: PingState = { active: false, lastPingAt: null, lastPingOk: null };

  if (!config.SELF_PING_ENABLED) {
    logger.info("Self-ping disabled (SELF_PING_ENABLED=false)");
    return {
      state: () => ({ ...state }),
      stop() {},
    };
  }

  const url = `${config.APP_URL}/health`;
  const task: ScheduledTask = cron.schedule(config.SELF_PING_CRON, async () => {
    state.lastPingOk = await pingSelf(url, config.REQUEST_TIMEOUT_MS, logger);
    state.lastPingAt = new Date().toISOString();
  });
  state.active = true;

  logger.info("Self-ping started", { url, schedule: config.SELF_PING_CRON });

  return {
    state: () => ({ ...state }),
    stop() {
      if (!state.active) return;
      task.stop();
      state.active = false;
      logger.info("Self-ping stopped");
    },
  };
}
