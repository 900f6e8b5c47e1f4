import express from "express";
import { createGeoController } from "./controllers/geo-controller";
import { AccessOptions, createGeoRoutes } from "./routes/geo-routes";
import { GeoLookupService } from "./services/geo-lookup-service";
import { logger } from "./utils/logger";

export function createApp(lookupService: GeoLookupService, access: AccessOptions) {
  const app = express();
  const controller = createGeoController(lookupService);

  app.disable("x-powered-by");

  // Health check endpoint, exempt from host and key checks
  app.get("/health", controller.health);

  // Routes
  app.use("/", createGeoRoutes(controller, access));

  // Error handling middleware
  app.use(
    (
      err: Error,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      logger.error(err.stack ?? err.message);
      res.status(500).json({ error: "Internal Server Error" });
    }
  );

  return app;
}
