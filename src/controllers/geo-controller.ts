import { NextFunction, Request, Response } from "express";
import { GeoLookupService } from "../services/geo-lookup-service";
import { logger } from "../utils/logger";

const log = logger.child({ component: "http" });

export interface GeoController {
  lookup(req: Request, res: Response, next: NextFunction): void;
  health(req: Request, res: Response): void;
}

export function createGeoController(lookupService: GeoLookupService): GeoController {
  return {
    // GET /8.8.8.8 or /2001:db8::1
    lookup(req, res, next) {
      const ip = req.params.ip;

      try {
        const outcome = lookupService.lookup(ip);

        switch (outcome.status) {
          case "found":
            res.status(200).json(outcome.result);
            return;
          case "invalid":
            res.status(400).json({ error: "Invalid IP address format" });
            return;
          case "not_found":
            res.status(404).json({
              message: "No geolocation data found for the provided IP address",
              ip: outcome.ip,
            });
            return;
          case "unavailable":
            res.status(503).json({ error: "GeoIP database not loaded" });
            return;
        }
      } catch (error) {
        log.error("Error processing geolocation request", { ip, error });
        next(error);
      }
    },

    health(_req, res) {
      res.status(200).json({ status: "healthy" });
    },
  };
}
