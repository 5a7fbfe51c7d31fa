import { Request, Response, Router } from "express";
import { BootState } from "./context";

export function createHealthRoutes(state: BootState): Router {
  const router = Router();

  // Liveness: the process is up
  router.get("/health", (req: Request, res: Response) => {
    res.status(200).json({
      status: "healthy",
      timestamp: new Date().toISOString(),
    });
  });

  // Readiness: indexes and migrations are in sync
  router.get("/ready", (req: Request, res: Response) => {
    if (!state.ready) {
      res.status(503).json({ ready: false });
      return;
    }
    res.status(200).json({
      ready: true,
      syncedAt: state.syncedAt?.toISOString() ?? null,
    });
  });

  return router;
}

export function create404Handler() {
  return (req: Request, res: Response) => {
    console.log(`[404] ${req.method} ${req.path} - Route not found`);
    res.status(404).json({
      error: "Route not found",
      method: req.method,
      path: req.path,
      availableRoutes: {
        health: "GET /health, GET /ready",
        models: "GET /v1/models",
        plan: "GET /v1/models/:collectionName/index-plan",
        sync: "POST /v1/models/:collectionName/sync",
      },
    });
  };
}
