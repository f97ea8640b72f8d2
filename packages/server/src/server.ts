// =============================================================================
// @postwatch/server — Express app exposing the control surface
// =============================================================================
// GET / and GET /health are open (the self-ping depends on /health).
// POST /start and POST /stop are guarded by bearer keys when
// CONTROL_API_KEYS is configured. The factory returns the HTTP server and a
// shutdown function that stops the self-ping and worker before closing.
// =============================================================================

import { createServer, type Server as HttpServer } from "node:http";
import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import type { Config, Logger } from "@postwatch/shared";
import type { WorkerOrchestrator } from "@postwatch/worker";
import { createAuthMiddleware } from "./auth.js";
import { createControlSurface, type ControlSurface } from "./control.js";
import type { SelfPingHandle } from "./self-ping.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Long-lived collaborators constructed once at startup.
 */
export interface AppDependencies {
  config: Pick<Config, "CONTROL_API_KEYS">;
  logger: Logger;
  worker: Pick<WorkerOrchestrator, "start" | "stop" | "status" | "whenStopped">;
  selfPing: SelfPingHandle;
}

/**
 * Return value of createApp — gives callers access to the HTTP server,
 * Express app, control surface, and a shutdown function.
 */
export interface AppInstance {
  app: Express;
  httpServer: HttpServer;
  control: ControlSurface;
  /** Graceful shutdown: stop self-ping, request worker stop, close HTTP. */
  shutdown: () => Promise<void>;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createApp(deps: AppDependencies): AppInstance {
  const { config, worker, selfPing } = deps;
  const logger = deps.logger.child({ component: "http" });
  const control = createControlSurface(worker, () => selfPing.state());

  // --- Express app ---
  const app = express();

  app.get("/", (_req: Request, res: Response) => {
    res.json(control.status());
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json(control.health());
  });

  // --- Lifecycle routes ---
  const authMiddleware = createAuthMiddleware(config.CONTROL_API_KEYS);

  app.post("/start", authMiddleware, (req: Request, res: Response) => {
    const result = control.requestStart();
    logger.info("Start requested", {
      clientId: req.clientId,
      result: result.status,
    });
    res.json(result);
  });

  app.post("/stop", authMiddleware, (req: Request, res: Response) => {
    const result = control.requestStop();
    logger.info("Stop requested", {
      clientId: req.clientId,
      result: result.status,
    });
    res.json(result);
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  // Express recognizes error handlers by their four-parameter arity
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error("Request failed", {
      method: req.method,
      path: req.path,
      error: err instanceof Error ? err.message : String(err),
    });
    if (!res.headersSent) {
      res.status(500).json({ error: "Internal server error" });
    }
  });

  // --- HTTP server ---
  const httpServer = createServer(app);

  // --- Graceful shutdown ---
  let shuttingDown = false;

  async function shutdown(): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info("Shutting down gracefully...");

    selfPing.stop();
    worker.stop();

    // Close HTTP server (stop accepting new connections)
    if (httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    }

    // Let the current cycle finish
    await worker.whenStopped();

    logger.info("Shutdown complete");
  }

  return { app, httpServer, control, shutdown };
}
