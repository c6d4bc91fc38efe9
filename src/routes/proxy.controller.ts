import express, { type Request, type Response, Router } from "express";
import type { Logger } from "../config/logger";
import { sendError } from "../http/error-response";
import type { ProxyMethod, UpstreamClient } from "../proxy/upstream.client";

interface ProxyControllerDeps {
  upstreamClient: UpstreamClient;
  logger: Logger;
}

const PROXIED_METHODS = new Set<string>(["GET", "POST", "PUT", "DELETE"]);

function isProxyMethod(method: string): method is ProxyMethod {
  return PROXIED_METHODS.has(method);
}

/** Mount before any JSON body parser: bodies are forwarded untouched. */
export function buildProxyController(deps: ProxyControllerDeps): Router {
  const router = Router();

  router.use(express.raw({ type: () => true, limit: "2mb" }));

  router.all("*", async (request: Request, response: Response) => {
    const method = request.method.toUpperCase();
    if (!isProxyMethod(method)) {
      response.status(405).json({ success: false, error: `Method ${method} is not proxied` });
      return;
    }

    // originalUrl keeps the query string; strip the mount point.
    const path = request.originalUrl.slice(request.baseUrl.length) || "/";
    deps.logger.info("Proxying request upstream", { method, path });

    try {
      const payload = await deps.upstreamClient.proxyRequest({
        method,
        path,
        headers: request.headers,
        body: Buffer.isBuffer(request.body) ? request.body : undefined,
      });
      response.status(200).json(payload);
    } catch (error) {
      sendError(response, error, deps.logger, "proxy");
    }
  });

  return router;
}
