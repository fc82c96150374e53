import type { Logger } from "../logging.js";
import {
  COMMENT_RESPONSE,
  ISSUE_RESPONSE,
  TRANSITIONS_RESPONSE,
  WORKLOG_RESPONSE,
} from "./simulation-responses.js";
import { buildUrl, type ApiRequest, type ApiResponse, type HttpMethod, type Transport } from "./types.js";

export const EXAMPLE_BASE_URL = "https://example.atlassian.net";

interface CannedRoute {
  method: HttpMethod;
  suffix: string;
  response: ApiResponse;
}

const ok = (body: unknown): ApiResponse => ({ status: 200, body: JSON.stringify(body) });

const ROUTES: readonly CannedRoute[] = [
  { method: "GET", suffix: "/transitions", response: ok(TRANSITIONS_RESPONSE) },
  { method: "POST", suffix: "/transitions", response: { status: 204, body: "" } },
  { method: "POST", suffix: "/comment", response: { status: 201, body: JSON.stringify(COMMENT_RESPONSE) } },
  { method: "POST", suffix: "/worklog", response: { status: 201, body: JSON.stringify(WORKLOG_RESPONSE) } },
];

const DEFAULT_RESPONSE = ok(ISSUE_RESPONSE);

/**
 * Stand-in for the network: answers from a fixed table keyed by method and
 * endpoint suffix and logs the request it would have made. Credentials are
 * never read, so the logged URL uses a placeholder host.
 */
export class SimulationTransport implements Transport {
  private logger: Logger;
  private sent: ApiRequest[] = [];

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /** Requests seen so far, oldest first */
  get requests(): readonly ApiRequest[] {
    return this.sent;
  }

  async send(request: ApiRequest): Promise<ApiResponse> {
    this.sent.push(request);

    this.logger.info("[TEST MODE] Would execute request:");
    this.logger.info(`Method: ${request.method}`);
    this.logger.info(`Endpoint: ${request.endpoint}`);
    this.logger.info(`Data: ${request.body === undefined ? "(none)" : JSON.stringify(request.body)}`);
    this.logger.info(`API Version: ${request.apiVersion}`);
    this.logger.info(`Full URL: ${buildUrl(EXAMPLE_BASE_URL, request)}`);

    return matchRoute(request);
  }
}

export function matchRoute(request: ApiRequest): ApiResponse {
  const [path = ""] = request.endpoint.split("?");
  const route = ROUTES.find((candidate) => candidate.method === request.method && path.endsWith(candidate.suffix));
  return route ? route.response : DEFAULT_RESPONSE;
}
