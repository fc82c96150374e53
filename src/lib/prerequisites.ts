import { JiraToolError } from "./errors.js";

export const MINIMUM_NODE_MAJOR = 20;

/** Null when the running Node.js is recent enough, otherwise the problem. */
export function checkPrerequisites(nodeVersion: string = process.versions.node): string | null {
  const major = Number.parseInt(nodeVersion.split(".")[0] ?? "", 10);
  if (Number.isNaN(major) || major < MINIMUM_NODE_MAJOR) {
    return `Node.js ${MINIMUM_NODE_MAJOR} or newer is required (found ${nodeVersion})`;
  }
  return null;
}

/** Throws a PrerequisiteError when the running Node.js is too old. */
export function assertPrerequisites(nodeVersion: string = process.versions.node): void {
  const problem = checkPrerequisites(nodeVersion);
  if (problem !== null) {
    throw new JiraToolError({ kind: "PrerequisiteError", message: problem });
  }
}
