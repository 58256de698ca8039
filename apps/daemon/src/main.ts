import "dotenv/config";
import { destination, pino } from "pino";

import {
  ConfigError,
  InvalidRunModeError,
  createLogger,
  createRelay,
  loadRelayConfig,
  runRelay,
  type RelayConfig,
} from "@drop-relay/core-application";

// logging is not configured yet; report on stderr like any startup failure
function bootLogger() {
  return pino({ base: { app: "drop-relay" } }, destination(2));
}

function loadConfigOrExit(): RelayConfig {
  try {
    return loadRelayConfig(process.env);
  } catch (err) {
    const bootLog = bootLogger();
    if (err instanceof ConfigError) {
      bootLog.fatal({ issues: err.issues }, "invalid configuration");
    } else if (err instanceof InvalidRunModeError) {
      bootLog.fatal({ runMode: err.value }, err.message);
    } else {
      bootLog.fatal({ err }, "could not load configuration");
    }
    process.exit(1);
  }
}

async function main() {
  const config = loadConfigOrExit();
  const logger = createLogger({ level: config.logLevel, file: config.logFile });

  logger.info(
    {
      sourceDir: config.sourceDir,
      destination: config.destination,
      trigger: config.triggerFileName,
      runMode: config.runMode,
    },
    "starting"
  );

  const relay = createRelay(config, logger);

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "stopping after the current step");
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  process.exitCode = await runRelay(relay, config.runMode, logger, controller.signal);
  process.removeListener("SIGINT", stop);
  process.removeListener("SIGTERM", stop);
}

main().catch((err) => {
  bootLogger().fatal({ err }, "relay failed to start");
  process.exit(1);
});
