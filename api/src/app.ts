import express from "express";
import cors from "cors";

import { config } from "./config.js";
import { createErrorHandler } from "./middleware/errorHandler.js";
import { recommend } from "./recommend.js";

export function createApp() {
  const app = express();

  app.use(express.json({ limit: "100kb" }));
  app.use(cors({ origin: config.corsOrigin }));

  // health/ping
  app.get("/health", (_req, res) => res.json({ ok: true }));
  app.get("/", (_req, res) => res.json({ ok: true }));

  app.use("/api", recommend);

  // error handler
  app.use(createErrorHandler(config.nodeEnv));

  return app;
}
