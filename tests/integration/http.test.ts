import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { connect } from "node:net";
import { startServer, type RunningServer } from "../../src/server.js";
import { parseConfig } from "../../src/infrastructure/services/config.service.js";

interface StartedShot {
  id: number;
  parameters: { timeSeconds: number };
}

function isStartedShot(value: unknown): value is StartedShot {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "number" &&
    "parameters" in value &&
    typeof value.parameters === "object" &&
    value.parameters !== null &&
    "timeSeconds" in value.parameters &&
    typeof value.parameters.timeSeconds === "number"
  );
}

function shots(body: unknown): StartedShot[] {
  if (!Array.isArray(body)) throw new Error("expected a JSON array");
  return body.filter(isStartedShot);
}

/** Sends raw bytes and resolves with whatever the server answers before closing. */
function rawRequest(url: string, request: string): Promise<string> {
  const { hostname, port } = new URL(url);
  return new Promise((resolve, reject) => {
    const socket = connect(Number(port), hostname, () => socket.write(request));
    let response = "";
    socket.setEncoding("utf8");
    socket.on("data", (chunk: string) => {
      response += chunk;
    });
    socket.on("end", () => resolve(response));
    socket.on("error", reject);
  });
}

describe("HTTP API", () => {
  let running: RunningServer;

  beforeEach(async () => {
    vi.stubEnv("PORT", "");
    vi.stubEnv("METRICS_PERSISTENCE", "");
    running = await startServer(parseConfig({ server: { port: 0 } }), {
      accessLog: false,
      sink: null,
    });
  });

  afterEach(async () => {
    await running.stop();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  const call = (path: string, method = "GET") =>
    fetch(`${running.url}${path}`, { method });

  describe("POST /start", () => {
    it("runs the default shot", async () => {
      const res = await call("/start", "POST");
      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("application/json");
      expect(await res.json()).toMatchObject({
        id: 1,
        parameters: { temperature: 93, pressure: 9, timeSeconds: 25 },
        outcome: { qualityScore: 100, classification: "perfect" },
      });
    });

    it("appends the started shot to the end of the history", async () => {
      await call("/start", "POST");
      const res = await call(
        "/start?temperature=95&pressure=9.5&time_seconds=27",
        "POST",
      );
      const started: unknown = await res.json();
      expect(started).toMatchObject({
        id: 2,
        parameters: { temperature: 95, pressure: 9.5, timeSeconds: 27 },
        outcome: { qualityScore: 76.9 },
      });

      const history: unknown = await (await call("/metrics")).json();
      expect(history).toHaveLength(2);
      expect(Array.isArray(history) && history[1]).toEqual(started);
    });

    it("answers 400 for an out-of-range value and records nothing", async () => {
      await call("/start", "POST");
      const before: unknown = await (await call("/metrics")).json();

      const res = await call("/start?temperature=200", "POST");
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "temperature must be between 85 and 100 (received 200)",
        kind: "out_of_range",
        field: "temperature",
        value: 200,
        allowedRange: { min: 85, max: 100 },
      });

      expect(await (await call("/metrics")).json()).toEqual(before);
    });

    it("answers 400 for a malformed value", async () => {
      const res = await call("/start?pressure=strong", "POST");
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'pressure must be a number (received "strong")',
        kind: "malformed",
        field: "pressure",
        value: "strong",
      });
    });

    it("gives concurrent starts gap-free ids in history order", async () => {
      const responses = await Promise.all(
        Array.from({ length: 20 }, (_, i) =>
          call(`/start?time_seconds=${15 + i}`, "POST").then((r) => r.json()),
        ),
      );
      const started = responses.filter(isStartedShot);
      expect(started).toHaveLength(20);
      expect(started.map((s) => s.id).sort((a, b) => a - b)).toEqual(
        Array.from({ length: 20 }, (_, i) => i + 1),
      );

      const history = shots(await (await call("/metrics")).json());
      expect(history.map((s) => s.id)).toEqual(
        Array.from({ length: 20 }, (_, i) => i + 1),
      );
      for (const shot of started) {
        expect(history[shot.id - 1]).toEqual(shot);
      }
      expect(
        history.map((s) => s.parameters.timeSeconds).sort((a, b) => a - b),
      ).toEqual(Array.from({ length: 20 }, (_, i) => 15 + i));
    });

    it("rejects other methods", async () => {
      const res = await call("/start");
      expect(res.status).toBe(405);
      expect(res.headers.get("allow")).toBe("POST");
    });
  });

  describe("GET /metrics", () => {
    it("returns an empty list before any shot", async () => {
      const res = await call("/metrics");
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual([]);
    });

    it("ignores a trailing slash", async () => {
      expect((await call("/metrics/")).status).toBe(200);
    });

    it("rejects other methods", async () => {
      const res = await call("/metrics", "POST");
      expect(res.status).toBe(405);
      expect(res.headers.get("allow")).toBe("GET");
    });
  });

  describe("GET /metrics/trends", () => {
    it("summarizes recent shots", async () => {
      await call("/start", "POST");
      await call("/start?temperature=95&pressure=9.5&time_seconds=27", "POST");

      const res = await call("/metrics/trends?period=weekly");
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        period: "weekly",
        count: 2,
        perfectExtractionRate: 100,
        trendDirection: "improving",
      });
    });

    it("defaults to the daily period", async () => {
      const body: unknown = await (await call("/metrics/trends")).json();
      expect(body).toMatchObject({ period: "daily", count: 0 });
    });

    it("rejects other methods", async () => {
      const res = await call("/metrics/trends", "POST");
      expect(res.status).toBe(405);
      expect(res.headers.get("allow")).toBe("GET");
    });

    it("rejects an unknown period", async () => {
      const res = await call("/metrics/trends?period=hourly");
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "period must be one of: daily, weekly, monthly, yearly",
      });
    });
  });

  it("lists alerts raised by started shots", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    await call("/start?temperature=97", "POST");

    const alerts: unknown = await (await call("/alerts")).json();
    expect(alerts).toHaveLength(1);
    expect(alerts).toMatchObject([
      { rule: "temperature_deviation", severity: "critical", recordId: 1 },
    ]);
  });

  it("rejects writes to the alert list", async () => {
    const res = await call("/alerts", "POST");
    expect(res.status).toBe(405);
    expect(res.headers.get("allow")).toBe("GET");
  });

  it("answers 400 to a request target URL cannot parse and keeps serving", async () => {
    const response = await rawRequest(
      running.url,
      "GET //[ HTTP/1.1\r\nHost: localhost\r\nConnection: close\r\n\r\n",
    );
    expect(response.startsWith("HTTP/1.1 400")).toBe(true);
    expect(response).toContain('{"error":"Malformed request URL"}');

    const res = await call("/metrics");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual([]);
  });

  it("answers ping and health checks", async () => {
    expect(await (await call("/api/ping")).json()).toEqual({ status: "pong" });
    expect(await (await call("/api/health")).json()).toMatchObject({
      status: "ok",
      records: 0,
    });
  });

  it("answers 404 for unknown routes", async () => {
    const res = await call("/espresso");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not Found" });
  });
});
