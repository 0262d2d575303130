import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { JsonlMetricsSink } from "../../../src/infrastructure/persistence/jsonl-metrics.sink.js";
import { InMemoryMetricsStore } from "../../../src/infrastructure/stores/in-memory-metrics.store.js";
import { IDEAL_SHOT, recordFor } from "../../helpers.js";

describe("JsonlMetricsSink", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "espresso-jsonl-"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("names the file after the basename and session id", async () => {
    const sink = new JsonlMetricsSink(join(dir, "nested"), "metrics.jsonl", "SESSION_test");
    expect(sink.path).toBe(join(dir, "nested", "metrics_SESSION_test.jsonl"));
    await sink.close();
  });

  it("appends one JSON line per record", async () => {
    const sink = new JsonlMetricsSink(dir, "metrics.jsonl", "SESSION_test");
    const first = recordFor(1, IDEAL_SHOT);
    const second = recordFor(2, { temperature: 95, pressure: 9.5, timeSeconds: 27 });

    await sink.write(first);
    await sink.write(second);
    await sink.close();

    const lines = readFileSync(sink.path, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual(first);
    expect(JSON.parse(lines[1]).id).toBe(2);
  });

  it("rejects writes after close", async () => {
    const sink = new JsonlMetricsSink(dir, "metrics.jsonl", "SESSION_test");
    await sink.close();
    await expect(sink.write(recordFor(1, IDEAL_SHOT))).rejects.toThrow(
      `Sink ${sink.path} is closed`,
    );
  });

  it("closes more than once without error", async () => {
    const sink = new JsonlMetricsSink(dir, "metrics.jsonl", "SESSION_test");
    await sink.close();
    await expect(sink.close()).resolves.toBeUndefined();
  });

  it("logs an unwritable path and keeps the store serving", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const notADir = join(dir, "file");
    writeFileSync(notADir, "");
    const sink = new JsonlMetricsSink(notADir, "metrics.jsonl", "S");
    const store = new InMemoryMetricsStore(sink);

    expect(store.append(recordFor(0, IDEAL_SHOT))).toBe(1);
    await store.flush();
    await vi.waitFor(() => {
      expect(errorSpy.mock.calls.map((c) => c[0])).toContain(
        `[JsonlMetricsSink] ${sink.path} failed:`,
      );
    });

    expect(store.all().map((r) => r.id)).toEqual([1]);
    await expect(sink.write(recordFor(2, IDEAL_SHOT))).rejects.toThrow(
      "ENOTDIR",
    );
    await expect(store.close()).resolves.toBeUndefined();
  });
});
