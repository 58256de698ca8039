import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Readable, Writable } from "node:stream";
import { pino, type Logger } from "pino";

import type { RelayConfig } from "../application/config";
import type { Clock } from "../ports/clock";
import type { RemoteShareClient } from "../ports/remote-share-client";
import type { Sleeper } from "../ports/retry-policy";

export async function makeTempDir(label = "relay"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `drop-relay-${label}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export const silentLogger: Logger = pino({ level: "silent" });

export type LogLine = { level: number; msg: string; component?: string } & Record<string, unknown>;

export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write: (msg: string) => {
        lines.push(JSON.parse(msg));
      },
    }
  );
  return { logger, lines };
}

/**
 * Resolves at once and records every requested delay. `onSleep` receives the
 * 1-based call number and may touch the filesystem to simulate a producer.
 */
export function recordingSleep(onSleep?: (call: number, ms: number) => void | Promise<void>): {
  sleep: Sleeper;
  calls: number[];
} {
  const calls: number[] = [];
  const sleep: Sleeper = async (ms) => {
    calls.push(ms);
    await onSleep?.(calls.length, ms);
  };
  return { sleep, calls };
}

export function fixedClock(ms: number): Clock {
  return { now: () => ms };
}

export function testConfig(overrides: Partial<RelayConfig> & Pick<RelayConfig, "sourceDir" | "destination">): RelayConfig {
  return {
    stableThresholdMs: 0,
    pollIntervalMs: 1000,
    triggerFileName: "trigger.txt",
    triggerWatcher: "poll",
    watchUsePolling: false,
    retryCount: 1,
    retryDelayMs: 0,
    manifestPrefix: "manifest",
    runMode: "cron",
    verifyAfterWrite: false,
    hashChunkBytes: 1024 * 1024,
    share: {},
    logLevel: "silent",
    ...overrides,
  };
}

function collisionError(p: string): Error {
  return Object.assign(new Error(`STATUS_OBJECT_NAME_COLLISION: ${p}`), { code: "STATUS_OBJECT_NAME_COLLISION" });
}

/** In-process stand-in for an SMB share. */
export class MemoryShareClient implements RemoteShareClient {
  readonly dirs = new Set<string>();
  readonly files = new Map<string, Buffer>();
  readonly mkdirCalls: string[] = [];
  closed = false;
  mkdirFailure: ((p: string) => Error | undefined) | undefined;

  async mkdir(pathOnShare: string): Promise<void> {
    this.mkdirCalls.push(pathOnShare);
    const failure = this.mkdirFailure?.(pathOnShare);
    if (failure) throw failure;
    if (this.dirs.has(pathOnShare)) throw collisionError(pathOnShare);
    this.dirs.add(pathOnShare);
  }

  async openWrite(pathOnShare: string): Promise<Writable> {
    const chunks: Buffer[] = [];
    return new Writable({
      write: (chunk: Buffer, _encoding, callback) => {
        chunks.push(Buffer.from(chunk));
        callback();
      },
      final: (callback) => {
        this.files.set(pathOnShare, Buffer.concat(chunks));
        callback();
      },
    });
  }

  async openRead(pathOnShare: string): Promise<Readable> {
    const data = this.files.get(pathOnShare);
    if (!data) throw new Error(`No such file on share: ${pathOnShare}`);
    return Readable.from([data]);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
