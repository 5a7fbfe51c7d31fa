import { Express } from "express";
import { AppContext } from "./context";
import { create404Handler, createHealthRoutes } from "./health";
import { createModelRoutes } from "./models";

export function setupRoutes(app: Express, context: AppContext): void {
  app.use(createHealthRoutes(context.state));
  app.use(createModelRoutes(context));

  // 404 handler (must be last)
  app.use("*", create404Handler());
}
