import { normalizeKey } from "../lib/issue-key.js";
import type { CommandContext } from "./context.js";
import { formatIssue, formatRawJson } from "./format.js";

export interface GetOptions {
  raw?: boolean;
}

export async function getIssue({ client, logger }: CommandContext, input: string, options: GetOptions = {}): Promise<void> {
  const key = normalizeKey(input);
  logger.info(`Fetching issue: ${key}`);

  const body = await client.getIssue(key, { renderedFields: true });

  if (options.raw) {
    logger.print(formatRawJson(body));
    return;
  }

  for (const line of formatIssue(body)) {
    logger.print(line);
  }
}
