import chalk from "chalk";
import { formatRemaining, parseDuration } from "../lib/duration.js";
import { extractValue, lookup } from "../lib/fields.js";
import { normalizeKey } from "../lib/issue-key.js";
import type { CommandContext } from "./context.js";
import { formatIssueSummary } from "./format.js";

/** Remaining estimate reported with a new worklog, when the tracker sends one. */
export function remainingEstimate(worklog: unknown): string | null {
  const seconds = lookup(worklog, ".issue.fields.timeestimate");
  return typeof seconds === "number" && seconds > 0 ? formatRemaining(seconds) : null;
}

export async function logTime(
  { client, logger }: CommandContext,
  input: string,
  duration: string,
  description: string,
): Promise<void> {
  const key = normalizeKey(input);

  logger.info(`Parsing duration: ${duration}`);
  const { seconds } = parseDuration(duration);

  logger.info(`Adding worklog to issue: ${key} (${seconds}s)`);
  const worklog = await client.addWorklog(key, seconds, description);
  const remaining = remainingEstimate(worklog);

  logger.success("Worklog added successfully!");
  logger.print();
  logger.print(chalk.bold("⏰ Worklog Details:"));
  logger.print(`🔑 Worklog ID:      ${extractValue(worklog, ".id")}`);
  logger.print(`📅 Created:         ${extractValue(worklog, ".created")}`);
  logger.print(`👤 Author:          ${extractValue(worklog, ".author.displayName")}`);
  logger.print(`⏱️ Time Spent:       ${extractValue(worklog, ".timeSpent")} (${seconds}s)`);
  logger.print(`📝 Description:     ${description}`);
  if (remaining !== null) {
    logger.print(`⏳ Remaining Est.:   ${remaining}`);
  }
  logger.print();

  logger.info("Fetching updated issue details...");
  const issue = await client.getIssue(key);
  for (const line of formatIssueSummary(key, issue)) {
    logger.print(line);
  }
}
