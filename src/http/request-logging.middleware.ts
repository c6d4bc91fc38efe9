import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { Logger } from "../config/logger";

const USER_AGENT_MAX_CHARS = 100;

/** Cuts by code point so a surrogate pair is never split. */
export function truncateUserAgent(userAgent: string): string {
  return Array.from(userAgent).slice(0, USER_AGENT_MAX_CHARS).join("");
}

export function buildRequestLoggingMiddleware(logger: Logger): RequestHandler {
  return (request: Request, response: Response, next: NextFunction) => {
    const startedAt = process.hrtime.bigint();
    const method = request.method;
    const path = request.path;
    const clientIp = request.header("x-forwarded-for") ?? request.header("x-real-ip") ?? "unknown";
    const userAgent = truncateUserAgent(request.header("user-agent") ?? "unknown");

    response.on("finish", () => {
      const elapsedSeconds = Number(process.hrtime.bigint() - startedAt) / 1e9;
      const status = response.statusCode;
      const line = `[REQUEST] ${method} ${path} | IP: ${clientIp} | Status: ${status} | Response Time: ${elapsedSeconds.toFixed(3)}s | User-Agent: ${userAgent}`;
      const meta = {
        method,
        path,
        client_ip: clientIp,
        status,
        response_time_s: Number(elapsedSeconds.toFixed(3)),
        user_agent: userAgent,
      };
      if (status >= 400) {
        logger.error(line, meta);
        return;
      }
      logger.info(line, meta);
    });

    next();
  };
}
