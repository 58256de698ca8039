import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import type { Readable } from "node:stream";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ManifestBuilder } from "./manifest-builder";
import { StabilityDetector } from "./stability-detector";
import { NodeSourceDirectory } from "../adapters/node-source-directory";
import { NodeFileHasher } from "../adapters/node-file-hasher";
import { fixedDelayRetryPolicy } from "../application/fixed-retry-policy";
import type { FileHash, FileHasher } from "../ports/file-hasher";
import type { Sleeper } from "../ports/retry-policy";
import { makeTempDir, recordingSleep, removeDir, silentLogger } from "../testing/helpers";

/** Fails the first `failures` hashFile calls, then hashes for real. */
class FlakyHasher implements FileHasher {
  calls = 0;
  private readonly real = new NodeFileHasher();

  constructor(private readonly failures: number) {}

  async hashFile(absolutePath: string): Promise<FileHash> {
    this.calls += 1;
    if (this.calls <= this.failures) throw new Error("EIO: read error");
    return this.real.hashFile(absolutePath);
  }

  hashStream(stream: Readable): Promise<FileHash> {
    return this.real.hashStream(stream);
  }
}

const sha256 = (s: string) => createHash("sha256").update(s).digest("hex");

describe("ManifestBuilder", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir("builder");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function builder(options: {
    sleep: Sleeper;
    thresholdMs?: number;
    hasher?: FileHasher;
    retryCount?: number;
    rootDir?: string;
  }) {
    const source = new NodeSourceDirectory(
      { rootDir: options.rootDir ?? dir, triggerFileName: "trigger.txt", manifestPrefix: "manifest" },
      silentLogger
    );
    const detector = new StabilityDetector(
      { thresholdMs: options.thresholdMs ?? 0, pollIntervalMs: 1000 },
      options.sleep,
      silentLogger
    );
    return new ManifestBuilder(
      {
        source,
        detector,
        hasher: options.hasher ?? new NodeFileHasher(),
        retryPolicy: fixedDelayRetryPolicy(options.retryCount ?? 3, 500),
        sleep: options.sleep,
      },
      silentLogger
    );
  }

  it("records name, size, mtime and digest for every file", async () => {
    const contents: Record<string, string> = { "a.csv": "1,2,3", "b.txt": "hello", "c.log": "" };
    for (const [name, body] of Object.entries(contents)) {
      await fs.writeFile(path.join(dir, name), body);
    }
    await fs.writeFile(path.join(dir, "trigger.txt"), "");

    const result = await builder({ sleep: recordingSleep().sleep }).build();

    expect(result.succeeded).toBe(3);
    expect(result.failed).toBe(0);
    expect(result.entries.map((e) => e.name)).toEqual(["a.csv", "b.txt", "c.log"]);
    for (const entry of result.entries) {
      const body = contents[entry.name] ?? "";
      const stat = await fs.stat(path.join(dir, entry.name));
      expect(entry).toEqual({
        name: entry.name,
        size: Buffer.byteLength(body),
        mtime: Math.floor(stat.mtimeMs / 1000),
        sha256: sha256(body),
      });
    }
  });

  it("returns zero counts for an empty or missing directory", async () => {
    const { sleep } = recordingSleep();
    await expect(builder({ sleep }).build()).resolves.toEqual({ succeeded: 0, failed: 0, entries: [] });
    await expect(builder({ sleep, rootDir: path.join(dir, "missing") }).build()).resolves.toEqual({
      succeeded: 0,
      failed: 0,
      entries: [],
    });
  });

  it("counts a file that vanishes while settling as failed, without retrying it", async () => {
    await fs.writeFile(path.join(dir, "a.csv"), "kept");
    await fs.writeFile(path.join(dir, "b.csv"), "removed");
    const { sleep, calls } = recordingSleep(async (call) => {
      if (call === 1) await fs.rm(path.join(dir, "b.csv"));
    });

    const result = await builder({ sleep, thresholdMs: 1000 }).build();

    expect(result.succeeded).toBe(1);
    expect(result.failed).toBe(1);
    expect(result.entries.map((e) => e.name)).toEqual(["a.csv"]);
    expect(calls).toEqual([1000]);
  });

  it("retries a read error after the fixed delay", async () => {
    await fs.writeFile(path.join(dir, "a.csv"), "data");
    const hasher = new FlakyHasher(1);
    const { sleep, calls } = recordingSleep();

    const result = await builder({ sleep, hasher }).build();

    expect(result.succeeded).toBe(1);
    expect(result.entries[0]?.sha256).toBe(sha256("data"));
    expect(hasher.calls).toBe(2);
    expect(calls).toEqual([500]);
  });

  it("gives up after the configured number of attempts", async () => {
    await fs.writeFile(path.join(dir, "a.csv"), "data");
    await fs.writeFile(path.join(dir, "b.csv"), "data");
    const hasher = new FlakyHasher(2);
    const { sleep, calls } = recordingSleep();

    const result = await builder({ sleep, hasher, retryCount: 2 }).build();

    // a.csv burns both failures, b.csv then hashes fine
    expect(result).toMatchObject({ succeeded: 1, failed: 1 });
    expect(result.entries.map((e) => e.name)).toEqual(["b.csv"]);
    expect(calls).toEqual([500]);
  });

  it("skips the stability wait when asked to", async () => {
    await fs.writeFile(path.join(dir, "a.csv"), "data");
    const sleep: Sleeper = async () => {
      throw new Error("should not sleep");
    };

    const result = await builder({ sleep, thresholdMs: 60_000 }).build(false);

    expect(result.succeeded).toBe(1);
  });
});
