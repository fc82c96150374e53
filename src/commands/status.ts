import chalk from "chalk";
import { extract } from "../lib/fields.js";
import { normalizeKey } from "../lib/issue-key.js";
import { resolveTransition } from "../lib/transitions.js";
import type { CommandContext } from "./context.js";
import { formatIssueSummary } from "./format.js";

export interface StatusOptions {
  list?: boolean;
}

/**
 * Lists the transitions of an issue, or moves it to the status named by
 * `desiredStatus` and reports the status the tracker ends up with.
 */
export async function changeStatus(
  { client, logger }: CommandContext,
  input: string,
  desiredStatus: string | undefined,
  options: StatusOptions = {},
): Promise<void> {
  const key = normalizeKey(input);

  logger.info(`Getting transitions for issue: ${key}`);
  const transitions = await client.getTransitions(key);

  if (options.list || !desiredStatus) {
    const issue = await client.getIssue(key);

    logger.print(chalk.bold(`📋 Available Transitions for ${key}`));
    logger.print("================================");
    logger.print();
    logger.print(`🔄 Current Status: ${extract(issue, ".fields.status.name")}`);
    logger.print();

    if (transitions.length > 0) {
      logger.print("➡️ Available Transitions:");
      for (const transition of transitions) {
        logger.print(`  - ${transition.name} (ID: ${transition.id})`);
      }
    } else {
      logger.print("❌ No transitions available for this issue");
    }
    logger.print();
    return;
  }

  const transitionId = resolveTransition(transitions, desiredStatus);

  logger.info(`Transitioning ${key} to '${desiredStatus}' (transition ID: ${transitionId})`);
  await client.transitionIssue(key, transitionId);

  logger.info("Verifying transition...");
  const updated = await client.getIssue(key);

  logger.success(`Issue ${key} transitioned to: ${extract(updated, ".fields.status.name")}`);
  logger.print();
  for (const line of formatIssueSummary(key, updated)) {
    logger.print(line);
  }
}
