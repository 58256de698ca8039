import path from "node:path";
import { z } from "zod";
import { ConfigError, InvalidDestinationError, InvalidRunModeError } from "./errors";
import { parseDestination, type DestinationAddress } from "../value-objects/destination-address";

export type RunMode = "cron" | "trigger";
export type TriggerWatcherKind = "poll" | "watch";

export type ShareCredentials = {
  username?: string;
  password?: string;
  domain?: string;
};

/**
 * Built once at startup and handed to every component.
 * Durations are milliseconds.
 */
export type RelayConfig = {
  sourceDir: string;
  destination: string;
  stableThresholdMs: number;
  stableMaxWaitMs?: number;
  pollIntervalMs: number;
  triggerFileName: string;
  triggerWatcher: TriggerWatcherKind;
  /** chokidar stats the directory every pollIntervalMs instead of using native events */
  watchUsePolling: boolean;
  retryCount: number;
  retryDelayMs: number;
  manifestPrefix: string;
  runMode: RunMode;
  verifyAfterWrite: boolean;
  hashChunkBytes: number;
  share: ShareCredentials;
  logLevel: string;
  logFile?: string;
};

export const DEFAULT_HASH_CHUNK_BYTES = 1024 * 1024;

const seconds = z.coerce.number().finite().nonnegative();

const booleanFlag = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((v) => v === "true" || v === "1" || v === "yes");

const envSchema = z.object({
  SOURCE_DIR: z.string({ required_error: "SOURCE_DIR is required" }),
  TARGET_DIR: z.string({ required_error: "TARGET_DIR is required" }),
  STABLE_SECONDS: seconds.default(3),
  STABLE_MAX_WAIT_SECONDS: seconds.optional(),
  POLL_INTERVAL: z.coerce.number().finite().positive().default(1),
  TRIGGER_FILE: z.string().default("trigger.txt"),
  TRIGGER_WATCHER: z.enum(["poll", "watch"]).default("poll"),
  TRIGGER_WATCH_POLLING: booleanFlag.default("false"),
  RETRY_COUNT: z.coerce.number().int().min(1).default(3),
  RETRY_DELAY: seconds.default(2),
  MANIFEST_PREFIX: z.string().default("manifest"),
  RUN_MODE: z.string().default("trigger"),
  VERIFY_COPY: booleanFlag.default("false"),
  HASH_CHUNK_BYTES: z.coerce.number().int().positive().default(DEFAULT_HASH_CHUNK_BYTES),
  SMB_USERNAME: z.string().optional(),
  SMB_PASSWORD: z.string().optional(),
  SMB_DOMAIN: z.string().optional(),
  LOG_LEVEL: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]))
    .default("info"),
  LOG_FILE: z.string().optional(),
});

type Env = Record<string, string | undefined>;

/** Unset and empty variables are treated the same. */
function withoutEmpty(env: Env): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value;
  }
  return out;
}

function parseRunMode(raw: string): RunMode {
  const mode = raw.trim().toLowerCase();
  if (mode === "cron" || mode === "trigger") return mode;
  throw new InvalidRunModeError(raw);
}

export function loadRelayConfig(env: Env): RelayConfig {
  const parsed = envSchema.safeParse(withoutEmpty(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) =>
      i.path.length > 0 && !i.message.startsWith(String(i.path[0]))
        ? `${i.path.join(".")}: ${i.message}`
        : i.message
    );
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues, parsed.error);
  }

  const e = parsed.data;
  let destination: DestinationAddress;
  try {
    destination = parseDestination(e.TARGET_DIR);
  } catch (err) {
    if (err instanceof InvalidDestinationError) {
      throw new ConfigError(`Invalid configuration: TARGET_DIR: ${err.message}`, [`TARGET_DIR: ${err.message}`], err);
    }
    throw err;
  }
  if (destination.kind === "local" && destination.root === path.resolve(e.SOURCE_DIR)) {
    const issue = "TARGET_DIR: must differ from SOURCE_DIR";
    throw new ConfigError(`Invalid configuration: ${issue}`, [issue]);
  }

  const toMs = (s: number) => Math.round(s * 1000);

  return {
    sourceDir: e.SOURCE_DIR,
    destination: e.TARGET_DIR,
    stableThresholdMs: toMs(e.STABLE_SECONDS),
    stableMaxWaitMs: e.STABLE_MAX_WAIT_SECONDS === undefined ? undefined : toMs(e.STABLE_MAX_WAIT_SECONDS),
    pollIntervalMs: toMs(e.POLL_INTERVAL),
    triggerFileName: e.TRIGGER_FILE,
    triggerWatcher: e.TRIGGER_WATCHER,
    watchUsePolling: e.TRIGGER_WATCH_POLLING,
    retryCount: e.RETRY_COUNT,
    retryDelayMs: toMs(e.RETRY_DELAY),
    manifestPrefix: e.MANIFEST_PREFIX,
    runMode: parseRunMode(e.RUN_MODE),
    verifyAfterWrite: e.VERIFY_COPY,
    hashChunkBytes: e.HASH_CHUNK_BYTES,
    share: {
      username: e.SMB_USERNAME,
      password: e.SMB_PASSWORD,
      domain: e.SMB_DOMAIN,
    },
    logLevel: e.LOG_LEVEL,
    logFile: e.LOG_FILE,
  };
}
