import type { Config } from "../config.js";
import type { Logger } from "../logging.js";
import { LiveTransport, type FetchFn } from "./live.js";
import { SimulationTransport } from "./simulation.js";
import type { Transport } from "./types.js";

export * from "./types.js";
export { LiveTransport, REQUEST_TIMEOUT_MS, type FetchFn } from "./live.js";
export { SimulationTransport, matchRoute } from "./simulation.js";
export { ensureSuccess, extractErrorMessage, fallbackMessage } from "./status.js";

/**
 * Picks the transport for this run. Test mode never hands credentials to the
 * transport it builds.
 */
export function createTransport(config: Config, logger: Logger, fetchFn?: FetchFn): Transport {
  if (config.testMode) {
    logger.info("Running in test mode - no requests will reach JIRA");
    return new SimulationTransport(logger);
  }
  return new LiveTransport({ credentials: config.credentials, logger, fetchFn });
}
