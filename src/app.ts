import express from "express";
import { getAppContainer } from "./runtime/appContainer";
import type { AppContainer } from "./runtime/appContainer";
import { createFlightsRouter } from "./api/routes/flights";
import { createMetaRouter } from "./api/routes/meta";

export function createApp(container: AppContainer = getAppContainer()): express.Express {
  const app = express();

  app.use(express.json());
  app.use("/api/meta", createMetaRouter(container));
  app.use("/v1/search", createFlightsRouter(container));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found." });
  });

  return app;
}
