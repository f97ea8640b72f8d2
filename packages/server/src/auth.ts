import type { RequestHandler, Request, Response, NextFunction } from "express";

// Module augmentation — attach clientId to Express requests
declare global {
  namespace Express {
    interface Request {
      clientId?: string;
    }
  }
}

/**
 * Bearer-key guard for the lifecycle routes. `apiKeys` maps key -> client ID.
 * Without keys configured every request passes.
 */
export function createAuthMiddleware(
  apiKeys: Record<string, string> | undefined,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!apiKeys) {
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader) {
      res.status(401).json({ error: "Missing Authorization header" });
      return;
    }

    const parts = authHeader.split(" ");
    if (parts.length !== 2 || parts[0] !== "Bearer" || !parts[1]) {
      res
        .status(401)
        .json({
          error: "Invalid Authorization format. Expected: Bearer <key>",
        });
      return;
    }

    const key = parts[1];
    const clientId = Object.hasOwn(apiKeys, key) ? apiKeys[key] : undefined;
    if (!clientId) {
      res.status(401).json({ error: "Invalid API key" });
      return;
    }

    req.clientId = clientId;
    next();
  };
}
