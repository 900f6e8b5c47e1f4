import { NextFunction, Request, RequestHandler, Response } from "express";

/**
 * Strip the port from a Host header value ("example.com:8080",
 * "[::1]:3001").
 */
export function hostWithoutPort(host: string): string {
  if (host.startsWith("[")) {
    const end = host.indexOf("]");
    return end === -1 ? host : host.substring(1, end);
  }
  const colon = host.indexOf(":");
  return colon === -1 ? host : host.substring(0, colon);
}

/**
 * Entries are exact host names or "*suffix" wildcards, e.g.
 * "*.example.com". Comparison ignores case.
 */
export function isHostAllowed(host: string, allowedHosts: string[]): boolean {
  const name = host.toLowerCase();

  return allowedHosts.some((allowed) =>
    allowed.startsWith("*") ? name.endsWith(allowed.substring(1)) : name === allowed
  );
}

export function hostAllowList(allowedHosts: string[]): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const host = req.headers.host;

    if (!host || !isHostAllowed(hostWithoutPort(host), allowedHosts)) {
      return res.status(403).json({ error: "Forbidden" });
    }

    next();
  };
}

/**
 * Key from `Authorization: Bearer`, `x-api-key` or the `api_key` query
 * parameter, in that order.
 */
export function extractApiKey(req: Request): string | undefined {
  const authorization = req.headers.authorization;
  if (authorization?.startsWith("Bearer ")) {
    return authorization.substring("Bearer ".length);
  }

  const header = req.headers["x-api-key"];
  if (typeof header === "string") {
    return header;
  }

  const query = req.query.api_key;
  return typeof query === "string" ? query : undefined;
}

/**
 * Require the configured key. Without one, every request passes.
 */
export function apiKeyAuth(apiKey: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (apiKey && extractApiKey(req) !== apiKey) {
      return res.status(401).json({ error: "Unauthorized" });
    }

    next();
  };
}
