import { Request, Response, Router } from "express";
import { MigrationError, ReconcileError } from "../errors";
import { planModelIndexes, syncModel } from "../models/model";
import { resolveDeclaredIndexes } from "../indexes/diff-engine";
import { AppContext } from "./context";

export function sendSyncError(res: Response, error: unknown): void {
  if (error instanceof ReconcileError || error instanceof MigrationError) {
    res.status(500).json({ error: error.message, kind: error.kind });
    return;
  }
  console.error("[MODELS] Unexpected error:", error);
  res.status(500).json({ error: "Internal server error" });
}

export function createModelRoutes(context: AppContext): Router {
  const router = Router();

  router.get("/v1/models", (req: Request, res: Response) => {
    try {
      const models = context.registry.list().map((model) => ({
        collectionName: model.collectionName,
        indexes: [...resolveDeclaredIndexes(model.indexes).keys()],
        migrations: model.migrations.map((migration) => ({
          name: migration.name,
          kind: migration.kind,
          threshold: migration.threshold.toISOString(),
        })),
      }));
      res.status(200).json({ models });
    } catch (error) {
      sendSyncError(res, error);
    }
  });

  router.get(
    "/v1/models/:collectionName/index-plan",
    async (req: Request, res: Response) => {
      const model = context.registry.get(req.params.collectionName);
      if (!model) {
        res.status(404).json({
          error: `No model is registered for collection '${req.params.collectionName}'`,
        });
        return;
      }

      try {
        const plan = await planModelIndexes(context.db, model);
        res.status(200).json({ collectionName: model.collectionName, plan });
      } catch (error) {
        sendSyncError(res, error);
      }
    }
  );

  router.post(
    "/v1/models/:collectionName/sync",
    async (req: Request, res: Response) => {
      const model = context.registry.get(req.params.collectionName);
      if (!model) {
        res.status(404).json({
          error: `No model is registered for collection '${req.params.collectionName}'`,
        });
        return;
      }

      try {
        console.log(`[MODELS] Manual sync requested for '${model.collectionName}'`);
        const result = await syncModel(context.db, model);
        res.status(200).json(result);
      } catch (error) {
        sendSyncError(res, error);
      }
    }
  );

  return router;
}
