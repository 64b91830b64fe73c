import type { FastifyRequest } from "fastify";
import { ForbiddenError, UnauthorizedError } from "../errors.js";

/**
 * Route preHandler that admits a request only when its X-API-Key header is
 * one of the configured keys.
 */
export function requireApiKey(allowedKeys: readonly string[]) {
  const keys = new Set(allowedKeys);

  return async function apiKeyGuard(request: FastifyRequest): Promise<void> {
    const header = request.headers["x-api-key"];
    const apiKey = Array.isArray(header) ? header[0] : header;

    if (!apiKey) {
      throw new UnauthorizedError("Missing X-API-Key header");
    }
    if (!keys.has(apiKey)) {
      request.log.warn("Rejected request with an unknown API key");
      throw new ForbiddenError("Invalid API key");
    }
  };
}
