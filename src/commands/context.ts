import type { JiraClient } from "../lib/jira/client.js";
import type { Logger } from "../lib/logging.js";

export interface CommandContext {
  client: JiraClient;
  logger: Logger;
}
