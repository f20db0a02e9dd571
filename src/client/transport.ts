/**
 * HTTP transport boundary
 *
 * The client only depends on the Transport signature. The default
 * implementation POSTs with fetch and aborts after a timeout.
 */

import { PocketTransportError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

export interface TransportRequest {
  url: string;
  body: string;
  headers: Record<string, string>;
}

export interface RawResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Resolves with whatever response the server sent, any status.
 * Rejects only when no response was obtained.
 */
export type Transport = (request: TransportRequest) => Promise<RawResponse>;

export interface FetchTransportOptions {
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
}

export const DEFAULT_TIMEOUT_MS = 30000;

export function createFetchTransport(options: FetchTransportOptions = {}): Transport {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
  const log = logger.child("transport");

  return async ({ url, body, headers }) => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(url, {
        method: "POST",
        headers,
        body,
        signal: controller.signal,
      });

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        responseHeaders[name] = value;
      });

      return {
        statusCode: response.status,
        headers: responseHeaders,
        body: await response.text(),
      };
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        log.debug(`POST ${url} aborted after ${timeout}ms`);
        throw new PocketTransportError(`Request timed out after ${timeout}ms`, "timeout", error);
      }

      const cause = error instanceof Error ? error : undefined;
      throw new PocketTransportError(
        `Network error: ${cause?.message ?? String(error)}`,
        "network",
        cause
      );
    } finally {
      clearTimeout(timeoutId);
    }
  };
}
