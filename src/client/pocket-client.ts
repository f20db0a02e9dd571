/**
 * Pocket API Client
 * Facade over the v3 retrieve, add and modify endpoints
 */

import { ActionBatch, type StampedBatch } from "./actions.js";
import { createCredentials, type CredentialsInput } from "./credentials.js";
import {
  buildAddBody,
  buildRetrieveBody,
  buildSendBody,
  endpointUrl,
  type AddOptions,
  type Endpoint,
} from "./request.js";
import {
  classifyResponse,
  classifyTransportError,
  isAddResponse,
  isRetrieveResponse,
  isSendResponse,
  unwrap,
  type PayloadGuard,
} from "./response.js";
import { createFetchTransport, type RawResponse, type Transport } from "./transport.js";
import type {
  Action,
  AddResponse,
  ApiResult,
  Credentials,
  RetrieveOptions,
  RetrieveResponse,
  SendResponse,
} from "./types.js";
import type { PocketConfig } from "../config.js";
import { logger } from "../utils/logger.js";

export interface PocketClientOptions {
  /** Replaces the default fetch transport */
  transport?: Transport;
  /** Request timeout in milliseconds for the default transport (default: 30000) */
  timeout?: number;
  /** Clock used to stamp action batches */
  now?: () => Date;
}

export type SendInput = ActionBatch | Action | readonly Action[];

export interface SendOutcome {
  /** The exact snapshot that was sent */
  batch: StampedBatch;
  result: ApiResult<SendResponse>;
}

const REQUEST_HEADERS = {
  "Content-Type": "application/json; charset=UTF-8",
  "X-Accept": "application/json",
} as const;

export class PocketClient {
  readonly credentials: Credentials;
  private transport: Transport;
  private now: () => Date;
  private log = logger.child("client");
  private requestCounter = 0;

  constructor(credentials: CredentialsInput | Credentials, options: PocketClientOptions = {}) {
    this.credentials = createCredentials(credentials);
    this.transport = options.transport ?? createFetchTransport({ timeout: options.timeout });
    this.now = options.now ?? (() => new Date());
  }

  static fromConfig(config: PocketConfig, options: PocketClientOptions = {}): PocketClient {
    return new PocketClient(
      {
        consumerKey: config.consumerKey,
        accessToken: config.accessToken,
        siteBaseUrl: config.baseUrl,
      },
      { timeout: config.timeoutMs, ...options }
    );
  }

  /**
   * Generate a unique request ID for tracing
   */
  private generateRequestId(): string {
    this.requestCounter++;
    const timestamp = Date.now().toString(36);
    const counter = this.requestCounter.toString(36).padStart(4, "0");
    return `req_${timestamp}_${counter}`;
  }

  /**
   * One POST, one classification. No retries.
   */
  private async post<T>(endpoint: Endpoint, body: object, guard: PayloadGuard<T>): Promise<ApiResult<T>> {
    const url = endpointUrl(this.credentials, endpoint);
    const requestId = this.generateRequestId();
    const log = this.log.forRequest(requestId);

    log.debug(`POST ${url}`);

    let raw: RawResponse;
    try {
      raw = await this.transport({
        url,
        body: JSON.stringify(body),
        headers: { ...REQUEST_HEADERS, "X-Request-ID": requestId },
      });
    } catch (error) {
      const result = classifyTransportError<T>(error);
      log.error("Transport failed", error);
      return result;
    }

    const result = classifyResponse(raw, guard);
    if (result.ok) {
      log.debug("Request completed", { status: raw.statusCode });
    } else {
      log.warn("Request failed", {
        status: raw.statusCode,
        code: result.error.code,
        message: result.error.message,
      });
    }
    return result;
  }

  // ============ Retrieve ============

  /**
   * Fetch saved items. Options are sent verbatim; see buildRetrieveOptions
   * for a typed way to build them.
   * @endpoint POST /v3/get
   * @see https://getpocket.com/developer/docs/v3/retrieve
   */
  async retrieve(options: RetrieveOptions = {}): Promise<ApiResult<RetrieveResponse>> {
    return this.post("retrieve", buildRetrieveBody(this.credentials, options), isRetrieveResponse);
  }

  /**
   * Same as retrieve, but throws the failure's PocketError
   */
  async retrieveOrThrow(options: RetrieveOptions = {}): Promise<RetrieveResponse> {
    return unwrap(await this.retrieve(options));
  }

  // ============ Add ============

  /**
   * Save a new url. Only url, tags, title and tweet_id are sent.
   * @endpoint POST /v3/add
   * @see https://getpocket.com/developer/docs/v3/add
   */
  async add(options: AddOptions): Promise<ApiResult<AddResponse>> {
    return this.post("add", buildAddBody(this.credentials, options), isAddResponse);
  }

  // ============ Modify ============

  /**
   * Send a batch of actions. Plain actions are wrapped into a batch first.
   * Every action is stamped with the same timestamp at call time.
   * @endpoint POST /v3/send
   * @see https://getpocket.com/developer/docs/v3/modify
   */
  async send(input: SendInput): Promise<ApiResult<SendResponse>> {
    const { result } = await this.dispatch(input);
    return result;
  }

  /**
   * Like send, but also returns the stamped snapshot so results can be
   * paired with the actions that produced them.
   */
  async dispatch(input: SendInput): Promise<SendOutcome> {
    const batch = toBatch(input).stamp(this.now());
    this.log.debug(`Dispatching ${batch.actions.length} action(s)`, { timestamp: batch.timestamp });
    const result = await this.post("send", buildSendBody(this.credentials, batch), isSendResponse);
    return { batch, result };
  }
}

function toBatch(input: SendInput): ActionBatch {
  return input instanceof ActionBatch ? input : ActionBatch.from(input);
}
