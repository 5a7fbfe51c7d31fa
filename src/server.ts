import express, { Express, NextFunction, Request, Response } from "express";
import cors from "cors";
import { Server } from "http";
import { ServiceConfig, loadConfigFromEnvironment } from "./config";
import {
  DatabaseClient,
  closeConnection,
  connectToMongoDB,
} from "./database/connection";
import { ModelRegistry } from "./models/registry";
import { setupRoutes } from "./routes";
import { AppContext, BootState, createBootState } from "./routes/context";

export function createApp(context: AppContext): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  setupRoutes(app, context);

  // Global error handler
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (error instanceof SyntaxError && error.message.includes("JSON")) {
      res.status(400).json({
        error: "Invalid JSON format",
        suggestion: "Please check your request body contains valid JSON",
      });
      return;
    }

    console.error(`[ERROR] ${req.method} ${req.path}:`, error);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}

export interface RunningServer {
  app: Express;
  server: Server;
  client: DatabaseClient;
  state: BootState;
  close(): Promise<void>;
}

function listen(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => resolve(server));
    server.once("error", reject);
  });
}

/**
 * Boot sequence: connect, synchronize every registered model, then listen.
 * If synchronization fails the service never starts listening.
 */
export async function startServer(
  registry: ModelRegistry,
  config: ServiceConfig = loadConfigFromEnvironment(),
  connect: (config: ServiceConfig) => Promise<DatabaseClient> = connectToMongoDB
): Promise<RunningServer> {
  const client = await connect(config);
  const db = client.db(config.databaseName);
  const state = createBootState();

  try {
    if (config.syncOnBoot) {
      console.log(`[BOOT] Synchronizing ${registry.size} model(s)...`);
      state.results = await registry.syncAll(db);
      state.syncedAt = new Date();
      console.log("✅ Models synchronized");
    } else {
      console.log("[BOOT] SYNC_ON_BOOT is disabled, skipping model sync");
    }
    state.ready = true;
  } catch (error) {
    console.error("❌ Model sync failed, refusing to serve traffic:", error);
    await closeConnection(client);
    throw error;
  }

  const app = createApp({ db, registry, state });
  let server: Server;
  try {
    server = await listen(app, config.port);
  } catch (error) {
    console.error(`❌ Could not listen on port ${config.port}:`, error);
    await closeConnection(client);
    throw error;
  }
  console.log(`🚀 Server running on port ${config.port}`);

  const close = async (): Promise<void> => {
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve()))
    );
    await closeConnection(client);
  };

  return { app, server, client, state, close };
}

// Graceful shutdown on SIGINT / SIGTERM
export function handleShutdownSignals(running: RunningServer): void {
  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`\n🛑 Received ${signal}, shutting down server...`);
    running
      .close()
      .then(() => {
        console.log("✅ Server shutdown complete");
        process.exit(0);
      })
      .catch((error: unknown) => {
        console.error("❌ Shutdown failed:", error);
        process.exit(1);
      });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}
