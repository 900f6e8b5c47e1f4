import { Router } from "express";
import { GeoController } from "../controllers/geo-controller";
import { apiKeyAuth, hostAllowList } from "../middleware/access-control";

export interface AccessOptions {
  allowedHosts: string[];
  apiKey?: string;
}

/**
 * Lookup routes. The host allow-list runs before the API key check.
 */
export function createGeoRoutes(controller: GeoController, access: AccessOptions): Router {
  const router = Router();

  router.use(hostAllowList(access.allowedHosts));
  router.use(apiKeyAuth(access.apiKey));

  // GET /:ip
  router.get("/:ip", controller.lookup);

  return router;
}
