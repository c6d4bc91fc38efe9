import type { NextFunction, Request, RequestHandler, Response } from "express";

/** Any origin, any method, any header. */
export function buildCorsMiddleware(): RequestHandler {
  return (request: Request, response: Response, next: NextFunction) => {
    response.setHeader("Access-Control-Allow-Origin", "*");
    response.setHeader("Access-Control-Allow-Methods", "*");
    response.setHeader(
      "Access-Control-Allow-Headers",
      request.header("access-control-request-headers") ?? "*",
    );
    if (request.method === "OPTIONS") {
      response.status(204).end();
      return;
    }
    next();
  };
}
