import { Buffer } from "node:buffer";
import fetch, { type RequestInit } from "node-fetch";
import { missingCredentials } from "../config.js";
import { JiraToolError } from "../errors.js";
import type { Logger } from "../logging.js";
import { buildUrl, type ApiRequest, type ApiResponse, type Credentials, type Transport } from "./types.js";

export const REQUEST_TIMEOUT_MS = 30_000;

export type FetchFn = (
  url: string,
  init: RequestInit,
) => Promise<{ status: number; text(): Promise<string> }>;

export interface LiveTransportOptions {
  credentials: Credentials;
  logger: Logger;
  fetchFn?: FetchFn;
  timeoutMs?: number;
}

interface CompleteCredentials {
  baseUrl: string;
  email: string;
  apiToken: string;
}

function requireCredentials(credentials: Credentials): CompleteCredentials {
  const { baseUrl, email, apiToken } = credentials;
  if (baseUrl && email && apiToken) {
    return { baseUrl, email, apiToken };
  }

  throw new JiraToolError({ kind: "MissingCredentials", missing: missingCredentials(credentials) });
}

/**
 * Sends requests to the Jira REST API using Basic auth (email + API token).
 * Non-2xx statuses are returned as-is; only transport failures throw here.
 */
export class LiveTransport implements Transport {
  private credentials: Credentials;
  private logger: Logger;
  private fetchFn: FetchFn;
  private timeoutMs: number;

  constructor({ credentials, logger, fetchFn, timeoutMs }: LiveTransportOptions) {
    this.credentials = credentials;
    this.logger = logger;
    this.fetchFn = fetchFn ?? fetch;
    this.timeoutMs = timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async send(request: ApiRequest): Promise<ApiResponse> {
    const { baseUrl, email, apiToken } = requireCredentials(this.credentials);
    const url = buildUrl(baseUrl, request);
    const authorization = `Basic ${Buffer.from(`${email}:${apiToken}`).toString("base64")}`;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    this.logger.debug(`${request.method} ${url}`);

    try {
      const response = await this.fetchFn(url, {
        method: request.method,
        headers: {
          Authorization: authorization,
          Accept: "application/json",
          "Content-Type": "application/json",
        },
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        redirect: "follow",
        signal: controller.signal,
      });
      const body = await response.text();
      this.logger.debug(`${request.method} ${url} -> ${response.status}`);
      return { status: response.status, body };
    } catch (error) {
      const cause = controller.signal.aborted
        ? `timed out after ${this.timeoutMs / 1000}s`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new JiraToolError({ kind: "NetworkFailure", url, cause });
    } finally {
      clearTimeout(timer);
    }
  }
}
