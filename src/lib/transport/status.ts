import { JiraToolError } from "../errors.js";
import { parseJson } from "../fields.js";
import type { ApiResponse } from "./types.js";

const STATUS_MESSAGES: Record<number, string> = {
  400: "Bad Request: Invalid request format or parameters",
  401: "Unauthorized: Invalid credentials or API token",
  403: "Forbidden: Insufficient permissions for this operation",
  404: "Not Found: Issue or resource does not exist",
  429: "Rate Limited: Too many requests, please try again later",
  500: "Internal Server Error: JIRA server error",
  503: "Service Unavailable: JIRA service temporarily unavailable",
};

export function fallbackMessage(status: number): string {
  return STATUS_MESSAGES[status] ?? `HTTP ${status}: Request failed`;
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value.trim() !== "" ? value : null;
}

// Jira reports field validation failures as { errors: { summary: "..." } }
function fieldErrors(value: unknown): string | null {
  if (typeof value === "string") {
    return nonEmptyString(value);
  }
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return null;
  }
  const parts = Object.entries(value).map(([field, message]) =>
    `${field}: ${typeof message === "string" ? message : JSON.stringify(message)}`,
  );
  return parts.length > 0 ? parts.join("; ") : null;
}

/**
 * Pulls the tracker's own error text out of an error body, trying the shapes
 * Jira and its proxies are known to return. Null when none applies.
 */
export function extractErrorMessage(body: string): string | null {
  const document = parseJson(body);
  if (document === null || typeof document !== "object" || Array.isArray(document)) {
    return null;
  }

  const errorBody = new Map(Object.entries(document));
  const errorMessages = errorBody.get("errorMessages");
  const candidates = [
    () => (Array.isArray(errorMessages) ? nonEmptyString(errorMessages[0]) : null),
    () => nonEmptyString(errorBody.get("message")),
    () => fieldErrors(errorBody.get("errors")),
    () => nonEmptyString(errorBody.get("error")),
    () => nonEmptyString(errorBody.get("detail")),
  ];

  for (const candidate of candidates) {
    const message = candidate();
    if (message !== null) {
      return message;
    }
  }
  return null;
}

/** Returns the body of a successful response, otherwise throws HTTPError. */
export function ensureSuccess(response: ApiResponse): string {
  if (response.status < 400) {
    return response.body;
  }

  const trackerMessage = extractErrorMessage(response.body);
  throw new JiraToolError(
    trackerMessage === null
      ? { kind: "HTTPError", status: response.status, message: fallbackMessage(response.status), source: "status" }
      : { kind: "HTTPError", status: response.status, message: trackerMessage, source: "tracker" },
  );
}
