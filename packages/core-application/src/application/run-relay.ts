import type { Logger } from "pino";

import type { RunMode } from "./config";
import type { Relay } from "./create-relay";

/**
 * Runs one cron pass or the trigger loop, then closes the relay. An error
 * escaping either is logged at fatal and turned into exit code 1.
 */
export async function runRelay(relay: Relay, runMode: RunMode, logger: Logger, signal?: AbortSignal): Promise<number> {
  try {
    if (runMode === "cron") {
      logger.info("cron mode: one pass, then exit");
      await relay.orchestrator.processOnce(true);
      logger.info("cron run finished");
    } else {
      logger.info("trigger mode");
      await relay.orchestrator.runTriggerLoop(signal);
    }
    return 0;
  } catch (err) {
    logger.fatal({ err }, "relay stopped on an unrecoverable error");
    return 1;
  } finally {
    await relay.close();
  }
}
