/**
 * Response classification
 *
 * Turns a raw transport outcome into an ApiResult:
 * - no response            -> PocketTransportError
 * - 2xx, JSON body         -> success
 * - 2xx, undecodable body  -> PocketDecodeError
 * - anything else          -> PocketAPIError built from X-Error-Code / X-Error
 */

import { z } from "zod";
import type {
  ActionError,
  AddResponse,
  ApiResult,
  PocketItem,
  RetrieveResponse,
  SendResponse,
  StampedAction,
} from "./types.js";
import type { StampedBatch } from "./actions.js";
import type { RawResponse } from "./transport.js";
import {
  createAPIError,
  PocketDecodeError,
  PocketError,
  PocketTransportError,
  type RateLimitInfo,
} from "../utils/errors.js";

export const ERROR_CODE_HEADER = "X-Error-Code";
export const ERROR_MESSAGE_HEADER = "X-Error";

export type PayloadGuard<T> = (value: unknown) => value is T;

export function success<T>(value: T): ApiResult<T> {
  return { ok: true, value };
}

export function failure<T>(error: PocketError): ApiResult<T> {
  return { ok: false, error };
}

/**
 * Return the success value or throw the failure's error
 */
export function unwrap<T>(result: ApiResult<T>): T {
  if (result.ok) return result.value;
  throw result.error;
}

export function getHeader(headers: Record<string, string>, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

const DIGITS = /^\d+$/;

function parseIntHeader(headers: Record<string, string>, name: string): number | undefined {
  const raw = getHeader(headers, name)?.trim();
  if (raw === undefined || !DIGITS.test(raw)) return undefined;
  return parseInt(raw, 10);
}

export function parseRateLimit(headers: Record<string, string>): RateLimitInfo | undefined {
  const info: RateLimitInfo = {
    userLimit: parseIntHeader(headers, "X-Limit-User-Limit"),
    userRemaining: parseIntHeader(headers, "X-Limit-User-Remaining"),
    userReset: parseIntHeader(headers, "X-Limit-User-Reset"),
    keyLimit: parseIntHeader(headers, "X-Limit-Key-Limit"),
    keyRemaining: parseIntHeader(headers, "X-Limit-Key-Remaining"),
    keyReset: parseIntHeader(headers, "X-Limit-Key-Reset"),
  };
  return Object.values(info).some((value) => value !== undefined) ? info : undefined;
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

export function classifyResponse(raw: RawResponse): ApiResult<unknown>;
export function classifyResponse<T>(raw: RawResponse, guard: PayloadGuard<T>): ApiResult<T>;
export function classifyResponse<T>(
  raw: RawResponse,
  guard?: PayloadGuard<T>
): ApiResult<T> | ApiResult<unknown> {
  const { statusCode, headers, body } = raw;

  if (!isSuccessStatus(statusCode)) {
    return failure(
      createAPIError(statusCode, {
        errorCode: parseIntHeader(headers, ERROR_CODE_HEADER),
        errorMessage: getHeader(headers, ERROR_MESSAGE_HEADER),
        responseBody: body,
        rateLimit: parseRateLimit(headers),
      })
    );
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    return failure(
      new PocketDecodeError(
        "Failed to parse API response as JSON",
        statusCode,
        body,
        error instanceof Error ? error : undefined
      )
    );
  }

  if (!guard) return success(payload);
  if (guard(payload)) return success(payload);

  return failure(
    new PocketDecodeError("API response did not have the expected shape", statusCode, body)
  );
}

/**
 * Wrap a transport rejection. Errors already classified pass through.
 */
export function classifyTransportError<T>(error: unknown): ApiResult<T> {
  if (error instanceof PocketTransportError) return failure(error);
  const cause = error instanceof Error ? error : undefined;
  return failure(
    new PocketTransportError(
      `Transport failed: ${cause?.message ?? String(error)}`,
      "network",
      cause
    )
  );
}

// ============ Payload shapes ============

const itemMapSchema = z.union([z.record(z.unknown()), z.array(z.unknown())]);

const retrieveEnvelopeSchema = z
  .object({
    status: z.number(),
    list: itemMapSchema,
  })
  .passthrough();

const addEnvelopeSchema = z
  .object({
    status: z.number(),
    item: z.object({ item_id: z.string() }).passthrough(),
  })
  .passthrough();

const sendEnvelopeSchema = z
  .object({
    status: z.number(),
    action_results: z.array(
      z.union([z.boolean(), z.object({ item_id: z.string() }).passthrough()])
    ),
    action_errors: z
      .array(
        z.object({ message: z.string(), type: z.string(), code: z.number() }).passthrough().nullable()
      )
      .optional(),
  })
  .passthrough();

export function isRetrieveResponse(value: unknown): value is RetrieveResponse {
  return retrieveEnvelopeSchema.safeParse(value).success;
}

export function isAddResponse(value: unknown): value is AddResponse {
  return addEnvelopeSchema.safeParse(value).success;
}

export function isSendResponse(value: unknown): value is SendResponse {
  return sendEnvelopeSchema.safeParse(value).success;
}

// ============ Per-action outcomes ============

export interface ActionOutcome {
  action: Readonly<StampedAction>;
  ok: boolean;
  /** Item Pocket returned for an `add` action */
  item?: PocketItem;
  error?: ActionError;
}

/**
 * Line up a dispatched batch with /v3/send's per-action results.
 * A 200 response may still report individual actions as failed.
 */
export function pairActionResults(batch: StampedBatch, response: SendResponse): ActionOutcome[] {
  return batch.actions.map((action, index) => {
    const result = response.action_results[index];
    const error = response.action_errors?.[index] ?? undefined;
    const outcome: ActionOutcome = { action, ok: result !== undefined && result !== false };
    if (result !== null && typeof result === "object") outcome.item = result;
    if (error) outcome.error = error;
    return outcome;
  });
}
