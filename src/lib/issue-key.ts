import { JiraToolError } from "./errors.js";

declare const issueKeyBrand: unique symbol;

/** A validated issue key such as PROJ-123. Only {@link normalizeKey} makes one. */
export type IssueKey = string & { readonly [issueKeyBrand]: true };

const KEY_PATTERN = /^[A-Z]+[A-Z0-9]*-[0-9]+$/;
const EMBEDDED_KEY_PATTERN = /[A-Z]+[A-Z0-9]*-[0-9]+/;

function isIssueKey(input: string): input is IssueKey {
  return KEY_PATTERN.test(input);
}

/**
 * Accepts a bare key or any text containing one (usually a browse URL like
 * https://company.atlassian.net/browse/PROJ-123) and returns the key.
 */
export function normalizeKey(input: string): IssueKey {
  if (isIssueKey(input)) {
    return input;
  }

  const match = input.match(EMBEDDED_KEY_PATTERN);
  if (match && isIssueKey(match[0])) {
    return match[0];
  }

  throw new JiraToolError({ kind: "InvalidKey", input });
}
