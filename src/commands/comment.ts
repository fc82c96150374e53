import chalk from "chalk";
import { extractValue } from "../lib/fields.js";
import { normalizeKey } from "../lib/issue-key.js";
import type { CommandContext } from "./context.js";

export async function addComment({ client, logger }: CommandContext, input: string, text: string): Promise<void> {
  const key = normalizeKey(input);

  logger.info(`Adding comment to issue: ${key}`);
  const comment = await client.addComment(key, text);

  logger.success("Comment added successfully!");
  logger.print();
  logger.print(chalk.bold("💬 Comment Details:"));
  logger.print(`🔑 Comment ID:  ${extractValue(comment, ".id")}`);
  logger.print(`📅 Created:     ${extractValue(comment, ".created")}`);
  logger.print(`👤 Author:      ${extractValue(comment, ".author.displayName")}`);
  logger.print(`📝 Text:        ${text}`);
  logger.print();
}
