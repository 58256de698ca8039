// Public API of the core-application package: ports, value objects,
// services, node adapters and the composition root used by the daemon.

// Ports (interfaces)
export type { Clock } from "./ports/clock";
export type { RetryContext, RetryHooks, RetryPolicy, Sleeper } from "./ports/retry-policy";
export type { FileHash, FileHasher } from "./ports/file-hasher";
export type { SourceDirectory } from "./ports/source-directory";
export type { ManifestStore } from "./ports/manifest-store";
export type { DestinationWriter, WriteReceipt } from "./ports/destination-writer";
export type { RemoteShareClient } from "./ports/remote-share-client";
export type { TriggerWatcher } from "./ports/trigger-watcher";

// Value objects
export * from "./value-objects/destination-address";

// Application
export * from "./application/config";
export * from "./application/errors";
export * from "./application/with-retry";
export * from "./application/fixed-retry-policy";
export * from "./application/create-relay";
export * from "./application/run-relay";

// Services
export * from "./services/stability-detector";
export * from "./services/manifest-builder";
export * from "./services/hashed-copy-engine";
export * from "./services/run-orchestrator";

// Node adapters
export * from "./adapters/node-file-hasher";
export * from "./adapters/node-source-directory";
export * from "./adapters/source-filter";
export * from "./adapters/node-manifest-store";
export * from "./adapters/local-destination-writer";
export * from "./adapters/share-destination-writer";
export * from "./adapters/smb2-share-client";
export * from "./adapters/polling-trigger-watcher";
export * from "./adapters/chokidar-trigger-watcher";

// Infra
export * from "./infra/sleep";
export * from "./infra/system-clock";
export * from "./infra/logger";
