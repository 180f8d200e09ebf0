import { Router } from "express";
import { describeError } from "../../core/errors";
import { FLIGHT_INTENTS } from "../../core/flightQuery";
import type { AppContainer } from "../../runtime/appContainer";

export function createMetaRouter(container: AppContainer): Router {
  const metaRouter = Router();

  metaRouter.get("/health", (_req, res) => {
    try {
      res.json({
        status: "ok",
        persistenceDriver: container.persistenceDriver,
        providers: container.getFlightSearchService().providerNames,
        resultsCacheEnabled: container.resultsCacheEnabled
      });
    } catch (error) {
      console.error(error);
      res.status(503).json({
        status: "degraded",
        persistenceDriver: container.persistenceDriver,
        error: describeError(error)
      });
    }
  });

  metaRouter.get("/intents", (_req, res) => {
    res.json({ intents: FLIGHT_INTENTS });
  });

  return metaRouter;
}
