import type { Logger } from "pino";

import type { RelayConfig } from "./config";
import { fixedDelayRetryPolicy } from "./fixed-retry-policy";
import type { Clock } from "../ports/clock";
import type { DestinationWriter } from "../ports/destination-writer";
import type { RemoteShareClient } from "../ports/remote-share-client";
import type { Sleeper } from "../ports/retry-policy";
import type { TriggerWatcher } from "../ports/trigger-watcher";
import { parseDestination, type ShareDestination } from "../value-objects/destination-address";

import { NodeFileHasher } from "../adapters/node-file-hasher";
import { NodeSourceDirectory } from "../adapters/node-source-directory";
import { NodeManifestStore } from "../adapters/node-manifest-store";
import { LocalDestinationWriter } from "../adapters/local-destination-writer";
import { ShareDestinationWriter } from "../adapters/share-destination-writer";
import { Smb2ShareClient } from "../adapters/smb2-share-client";
import { PollingTriggerWatcher } from "../adapters/polling-trigger-watcher";
import { ChokidarTriggerWatcher } from "../adapters/chokidar-trigger-watcher";

import { StabilityDetector } from "../services/stability-detector";
import { ManifestBuilder } from "../services/manifest-builder";
import { HashedCopyEngine } from "../services/hashed-copy-engine";
import { RunOrchestrator } from "../services/run-orchestrator";

import { sleep as realSleep } from "../infra/sleep";
import { systemClock } from "../infra/system-clock";

export type RelayOverrides = {
  sleep?: Sleeper;
  clock?: Clock;
  shareClientFactory?: (dest: ShareDestination) => RemoteShareClient;
  triggers?: TriggerWatcher;
};

export type Relay = {
  orchestrator: RunOrchestrator;
  writer: DestinationWriter;
  close(): Promise<void>;
};

/**
 * Wires every component from one RelayConfig. The destination is parsed
 * here, once, and decides which writer the copy engine gets.
 */
export function createRelay(config: RelayConfig, logger: Logger, overrides: RelayOverrides = {}): Relay {
  const sleep = overrides.sleep ?? realSleep;
  const clock = overrides.clock ?? systemClock;
  const retryPolicy = fixedDelayRetryPolicy(config.retryCount, config.retryDelayMs);

  const destination = parseDestination(config.destination);
  let writer: DestinationWriter;
  if (destination.kind === "share") {
    const client = overrides.shareClientFactory?.(destination) ?? new Smb2ShareClient(destination, config.share);
    writer = new ShareDestinationWriter(destination, client, logger);
  } else {
    writer = new LocalDestinationWriter(destination);
  }

  const source = new NodeSourceDirectory(
    {
      rootDir: config.sourceDir,
      triggerFileName: config.triggerFileName,
      manifestPrefix: config.manifestPrefix,
    },
    logger
  );
  const hasher = new NodeFileHasher(config.hashChunkBytes);
  const detector = new StabilityDetector(
    {
      thresholdMs: config.stableThresholdMs,
      pollIntervalMs: config.pollIntervalMs,
      maxWaitMs: config.stableMaxWaitMs,
    },
    sleep,
    logger
  );

  const triggers =
    overrides.triggers ??
    (config.triggerWatcher === "watch"
      ? new ChokidarTriggerWatcher({ usePolling: config.watchUsePolling, pollIntervalMs: config.pollIntervalMs })
      : new PollingTriggerWatcher(config.pollIntervalMs, sleep));

  const builder = new ManifestBuilder({ source, detector, hasher, retryPolicy, sleep }, logger);
  const copier = new HashedCopyEngine(
    { source, detector, hasher, writer, retryPolicy, sleep, verifyAfterWrite: config.verifyAfterWrite },
    logger
  );

  const orchestrator = new RunOrchestrator(
    {
      sourceDir: config.sourceDir,
      triggerFileName: config.triggerFileName,
      pollIntervalMs: config.pollIntervalMs,
      builder,
      manifestStore: new NodeManifestStore(config.sourceDir, config.manifestPrefix),
      copier,
      detector,
      triggers,
      clock,
      sleep,
    },
    logger
  );

  return {
    orchestrator,
    writer,
    close: () => writer.close(),
  };
}
