/**
 * Failure taxonomy for the tool. Every failure raised by the core carries
 * exactly one of these kinds; only the CLI turns it into output and an exit code.
 */

export interface TransitionMatch {
  id: string;
  name: string;
}

export type ErrorKind =
  | { kind: "InvalidKey"; input: string }
  | { kind: "MissingCredentials"; missing: string[] }
  | { kind: "NetworkFailure"; url: string; cause: string }
  | { kind: "HTTPError"; status: number; message: string; source: "tracker" | "status" }
  | { kind: "InvalidResponse"; endpoint: string; message: string }
  | { kind: "InvalidDuration"; input: string; reason: "format" | "zero" | "range" }
  | { kind: "NoMatchingTransition"; desired: string; available: string[] }
  | { kind: "AmbiguousTransition"; desired: string; matches: TransitionMatch[] }
  | { kind: "PrerequisiteError"; message: string }
  | { kind: "UsageError"; message: string };

export type ErrorKindName = ErrorKind["kind"];

function describeDuration(input: string, reason: "format" | "zero" | "range"): string {
  switch (reason) {
    case "zero":
      return `Invalid or empty time duration: '${input}'`;
    case "range":
      return `Time duration is too large: '${input}'`;
    case "format":
      return `Invalid time format: '${input}'. Use format like '2h 30m', '1d 4h', '3w 2d 5h 15m'`;
  }
}

function describe(detail: ErrorKind): string {
  switch (detail.kind) {
    case "InvalidKey":
      return `Invalid JIRA key or URL format: ${detail.input}`;
    case "MissingCredentials":
      return `Missing required environment variables: ${detail.missing.join(", ")}`;
    case "NetworkFailure":
      return "Network error or timeout occurred. Check your JIRA_BASE_URL and internet connection.";
    case "HTTPError":
      return detail.source === "tracker" ? `API Error: ${detail.message}` : detail.message;
    case "InvalidResponse":
      return `Unexpected response from ${detail.endpoint}: ${detail.message}`;
    case "InvalidDuration":
      return describeDuration(detail.input, detail.reason);
    case "NoMatchingTransition":
      return `No transitions found for status '${detail.desired}'`;
    case "AmbiguousTransition":
      return `Multiple transitions found for status '${detail.desired}'`;
    case "PrerequisiteError":
    case "UsageError":
      return detail.message;
  }
}

export class JiraToolError extends Error {
  readonly detail: ErrorKind;

  constructor(detail: ErrorKind) {
    super(describe(detail));
    this.name = "JiraToolError";
    this.detail = detail;
  }

  get kind(): ErrorKindName {
    return this.detail.kind;
  }
}

export function isJiraToolError(error: unknown): error is JiraToolError {
  return error instanceof JiraToolError;
}

export function usageError(message: string): JiraToolError {
  return new JiraToolError({ kind: "UsageError", message });
}

/**
 * What the CLI prints for a failure: `errors` as ERROR lines, then `fatal`,
 * then `details` as plain lines. Transition failures list the candidates so
 * the user can retry.
 */
export interface ErrorReport {
  errors: string[];
  fatal: string;
  details: string[];
}

export function describeError(error: unknown): ErrorReport {
  const report = (fatal: string, details: string[] = [], errors: string[] = []): ErrorReport => ({
    errors,
    fatal,
    details,
  });

  if (!isJiraToolError(error)) {
    return report(error instanceof Error ? error.message : String(error));
  }

  const { detail } = error;
  switch (detail.kind) {
    case "NoMatchingTransition":
      return report(error.message, ["Available transitions:", ...detail.available.map((name) => `  - ${name}`)]);
    case "AmbiguousTransition":
      return report(
        error.message,
        detail.matches.map((match) => `  - ${match.name} (ID: ${match.id})`),
      );
    case "HTTPError":
      return report(error.message, [], [`JIRA API returned HTTP ${detail.status}`]);
    case "NetworkFailure":
      return report(error.message, [], [`JIRA API request failed (${detail.cause})`]);
    case "MissingCredentials":
      return report(error.message, [
        "Please either:",
        "  1. Create a .env file with the required variables (see .env.example)",
        "  2. Set the variables in your environment",
      ]);
    default:
      return report(error.message);
  }
}
