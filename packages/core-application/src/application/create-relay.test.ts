import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { createRelay } from "./create-relay";
import {
  MemoryShareClient,
  fixedClock,
  makeTempDir,
  recordingSleep,
  removeDir,
  silentLogger,
  testConfig,
} from "../testing/helpers";
import type { ShareDestination } from "../value-objects/destination-address";

describe("createRelay", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir("wiring");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("picks the local writer for a plain path", () => {
    const relay = createRelay(testConfig({ sourceDir: dir, destination: path.join(dir, "out") }), silentLogger);
    expect(relay.writer.kind).toBe("local");
    expect(relay.writer.describe()).toBe(path.join(dir, "out"));
  });

  it("moves files onto a share through the share client", async () => {
    await fs.writeFile(path.join(dir, "scan.pdf"), "%PDF-1.7");
    const client = new MemoryShareClient();
    const seen: ShareDestination[] = [];
    const { sleep } = recordingSleep();

    const relay = createRelay(
      testConfig({ sourceDir: dir, destination: "smb://nas01/backup/incoming", verifyAfterWrite: true }),
      silentLogger,
      {
        sleep,
        clock: fixedClock(1_700_000_000_000),
        shareClientFactory: (dest) => {
          seen.push(dest);
          return client;
        },
      }
    );

    const summary = await relay.orchestrator.processOnce();
    await relay.close();

    expect(relay.writer.kind).toBe("share");
    expect(seen).toEqual([
      { kind: "share", host: "nas01", port: undefined, share: "backup", pathOnShare: "incoming" },
    ]);
    expect(summary.copy).toEqual({ found: 1, succeeded: 1, failed: 0 });
    expect(client.files.get("incoming/scan.pdf")?.toString("utf-8")).toBe("%PDF-1.7");
    expect(await fs.readdir(dir)).toEqual(["manifest-1700000000.json"]);
    expect(client.closed).toBe(true);
  });

  it("runs the trigger loop on the polling chokidar watcher", async () => {
    const sourceDir = path.join(dir, "in");
    const destDir = path.join(dir, "out");
    await fs.mkdir(sourceDir);
    await fs.writeFile(path.join(sourceDir, "a.csv"), "alpha");
    const controller = new AbortController();
    const { sleep } = recordingSleep(() => controller.abort());

    const relay = createRelay(
      testConfig({
        sourceDir,
        destination: destDir,
        triggerWatcher: "watch",
        watchUsePolling: true,
        pollIntervalMs: 50,
      }),
      silentLogger,
      { sleep, clock: fixedClock(1_700_000_000_000) }
    );

    const loop = relay.orchestrator.runTriggerLoop(controller.signal);
    await new Promise((r) => setTimeout(r, 150));
    await fs.writeFile(path.join(sourceDir, "trigger.txt"), "");
    await loop;

    expect(await fs.readFile(path.join(destDir, "a.csv"), "utf-8")).toBe("alpha");
    expect(await fs.readdir(sourceDir)).toEqual(["manifest-1700000000.json"]);
  });
});
