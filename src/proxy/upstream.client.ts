import fetch, { type Response } from "node-fetch";
import type { Logger } from "../config/logger";
import { UpstreamError, errorMessage } from "../shared/errors";

export type ProxyMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface UpstreamClientConfig {
  baseUrl: string;
  timeoutMs: number;
}

export interface ProxyRequest {
  method: ProxyMethod;
  path: string;
  headers: Record<string, string | string[] | undefined>;
  body?: Buffer;
}

const SKIPPED_HEADERS = new Set(["host", "content-length"]);

/** Forwards routes this gateway does not serve to the secondary API. */
export class UpstreamClient {
  constructor(
    private readonly config: UpstreamClientConfig,
    private readonly logger: Logger,
  ) {}

  async proxyRequest(request: ProxyRequest): Promise<unknown> {
    const url = `${this.config.baseUrl}${request.path.startsWith("/") ? "" : "/"}${request.path}`;
    const startedAt = Date.now();

    let response: Response;
    try {
      response = await fetch(url, {
        method: request.method,
        headers: forwardableHeaders(request.headers),
        body: request.body && request.body.length > 0 ? request.body : undefined,
        timeout: this.config.timeoutMs,
      });
    } catch (error) {
      this.logger.warn("proxy.request_failed", { method: request.method, path: request.path, error: errorMessage(error) });
      throw new UpstreamError(`Upstream request failed: ${errorMessage(error)}`);
    }

    this.logger.debug("proxy.response", {
      method: request.method,
      path: request.path,
      status: response.status,
      latency_ms: Date.now() - startedAt,
    });

    if (!response.ok) {
      throw new UpstreamError(`Upstream API returned error: ${response.status}`, response.status);
    }

    try {
      const payload: unknown = await response.json();
      return payload;
    } catch (error) {
      throw new UpstreamError(`Upstream API returned invalid JSON: ${errorMessage(error)}`, response.status);
    }
  }
}

export function forwardableHeaders(
  headers: Record<string, string | string[] | undefined>,
): Record<string, string> {
  const output: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (SKIPPED_HEADERS.has(name.toLowerCase()) || value === undefined) {
      continue;
    }
    output[name] = Array.isArray(value) ? value.join(", ") : value;
  }
  return output;
}
