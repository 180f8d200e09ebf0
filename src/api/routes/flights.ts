import { Router } from "express";
import { FlightQuerySchema } from "../../core/flightQuery";
import type { AppContainer } from "../../runtime/appContainer";

export function createFlightsRouter(container: AppContainer): Router {
  const flightsRouter = Router();

  flightsRouter.post("/flights", async (req, res) => {
    const parse = FlightQuerySchema.safeParse(req.body ?? {});
    if (!parse.success) {
      res.status(400).json({
        error: "Invalid flight query.",
        issues: parse.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message
        }))
      });
      return;
    }

    try {
      const query = parse.data;
      const results = container.resultsCacheEnabled
        ? await container.getFlightResultCache().getOrCompute(query, container.resultsTtlMs)
        : await container.getFlightSearchService().searchFlights(query);
      res.json(results);
    } catch (error) {
      console.error(error);
      res.status(500).json({ error: "Failed to search flights." });
    }
  });

  flightsRouter.delete("/token", async (_req, res) => {
    try {
      await container.getTokenProvider().invalidate();
      res.status(204).end();
    } catch (error) {
      console.error(error);
      res.status(500).json({ error: "Failed to clear provider token." });
    }
  });

  return flightsRouter;
}
