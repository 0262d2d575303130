import type { IncomingMessage, ServerResponse } from "node:http";
import type { ExtractionController } from "./controllers/extraction.controller.js";
import type { MetricsController } from "./controllers/metrics.controller.js";
import type { ProjectController } from "./controllers/project.controller.js";
import { sendJson } from "./http.utils.js";

export interface RouterOptions {
  /** Set to false to silence the `[HTTP]` access log. */
  accessLog?: boolean;
}

export class Router {
  private accessLog: boolean;

  constructor(
    private extractionController: ExtractionController,
    private metricsController: MetricsController,
    private projectController: ProjectController,
    options: RouterOptions = {},
  ) {
    this.accessLog = options.accessLog ?? true;
  }

  // ──────────────────────────────────────────────
  // Access logger
  // ──────────────────────────────────────────────
  private logAccess(
    method: string,
    path: string,
    status: number,
    durationMs: number,
  ) {
    if (!this.accessLog) return;
    // Liveness probes would drown out the interesting traffic
    if (path === "/api/ping" || path === "/api/health") return;

    const ts = new Date().toISOString();
    console.log(`[HTTP] ${ts} ${method} ${path} → ${status} (${durationMs}ms)`);
  }

  // ──────────────────────────────────────────────
  // Request handler
  // ──────────────────────────────────────────────
  handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const target = req.url || "/";
    const pathname = target.split("?")[0] || "/";
    const method = req.method || "GET";
    const start = Date.now();

    res.on("finish", () => {
      this.logAccess(method, pathname, res.statusCode, Date.now() - start);
    });

    // The HTTP parser lets through targets that URL cannot parse (e.g. "//[")
    if (!URL.canParse(target, "http://localhost")) {
      sendJson(res, 400, { error: "Malformed request URL" });
      return;
    }

    try {
      this.route(method, new URL(target, "http://localhost"), res);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[Router] ${method} ${pathname} failed:`, err);
      if (!res.writableEnded) {
        sendJson(res, 500, { error: message });
      }
    }
  }

  private route(method: string, url: URL, res: ServerResponse) {
    const path = url.pathname.replace(/\/+$/, "") || "/";

    // 1. Liveness
    if (method === "GET" && path === "/api/ping") {
      return this.projectController.ping(res);
    }
    if (method === "GET" && path === "/api/health") {
      return this.projectController.getHealth(res);
    }

    // 2. Extraction
    if (path === "/start") {
      if (method !== "POST") return this.methodNotAllowed(res, "POST");
      return this.extractionController.start(url.searchParams, res);
    }

    // 3. History & analytics
    if (path === "/metrics") {
      if (method !== "GET") return this.methodNotAllowed(res, "GET");
      return this.metricsController.getHistory(res);
    }
    if (path === "/metrics/trends") {
      if (method !== "GET") return this.methodNotAllowed(res, "GET");
      return this.metricsController.getTrends(url.searchParams, res);
    }
    if (path === "/alerts") {
      if (method !== "GET") return this.methodNotAllowed(res, "GET");
      return this.metricsController.getAlerts(res);
    }

    // 404 Fallback
    sendJson(res, 404, { error: "Not Found" });
  }

  private methodNotAllowed(res: ServerResponse, allow: string) {
    res.setHeader("Allow", allow);
    sendJson(res, 405, { error: "Method Not Allowed" });
  }
}
