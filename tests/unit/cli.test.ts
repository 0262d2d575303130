import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { resolve } from "node:path";
import { buildProgram, type CliIO } from "../../src/cli.js";

const CONFIG = resolve("config", "config.yaml");

function fakeIO() {
  const io = {
    out: [] as string[],
    err: [] as string[],
    exitCode: 0,
  };
  const cli: CliIO = {
    out: (line) => io.out.push(line),
    err: (line) => io.err.push(line),
    setExitCode: (code) => {
      io.exitCode = code;
    },
  };
  return { io, cli };
}

async function run(args: string[]) {
  const { io, cli } = fakeIO();
  await buildProgram(cli).parseAsync(["node", "espresso-sim", "-c", CONFIG, ...args]);
  return io;
}

describe("espresso-sim CLI", () => {
  beforeEach(() => {
    vi.stubEnv("PORT", "");
    vi.stubEnv("METRICS_PERSISTENCE", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe("simulate", () => {
    it("prints the validated parameters and outcome as JSON", async () => {
      const io = await run([
        "simulate",
        "--temperature",
        "95",
        "--pressure",
        "9.5",
        "--time-seconds",
        "27",
      ]);

      expect(io.err).toEqual([]);
      expect(io.exitCode).toBe(0);
      expect(io.out).toHaveLength(1);
      const printed: unknown = JSON.parse(io.out[0]);
      expect(printed).toMatchObject({
        parameters: { temperature: 95, pressure: 9.5, timeSeconds: 27 },
        outcome: {
          qualityScore: 76.9,
          classification: "perfect",
          label: "Perfect Extraction",
        },
      });
    });

    it("falls back to the configured defaults", async () => {
      const io = await run(["simulate"]);
      expect(JSON.parse(io.out[0])).toMatchObject({
        parameters: { temperature: 93, pressure: 9, timeSeconds: 25 },
        outcome: { qualityScore: 100 },
      });
    });

    it("reports an out-of-range parameter and exits non-zero", async () => {
      const io = await run(["simulate", "--temperature", "200"]);
      expect(io.out).toEqual([]);
      expect(io.err).toEqual([
        "temperature must be between 85 and 100 (received 200)",
      ]);
      expect(io.exitCode).toBe(1);
    });
  });

  describe("serve", () => {
    it("rejects a non-numeric port before starting", async () => {
      const io = await run(["serve", "--port", "abc"]);
      expect(io.err).toEqual(["Invalid port: abc"]);
      expect(io.exitCode).toBe(1);
    });
  });

  it("reports a missing config file", async () => {
    const { io, cli } = fakeIO();
    await buildProgram(cli).parseAsync([
      "node",
      "espresso-sim",
      "-c",
      "/nonexistent/config.yaml",
      "simulate",
    ]);
    expect(io.exitCode).toBe(1);
    expect(io.err[0]).toMatch(
      /^Simulate failed: Failed to load config from \/nonexistent\/config\.yaml\./,
    );
  });
});
