import type { ServerResponse } from "node:http";
import { sendJson } from "../http.utils.js";

export class ProjectController {
  constructor(
    private recordCount: () => number,
    private startedAt: Date = new Date(),
  ) {}

  ping(res: ServerResponse) {
    sendJson(res, 200, { status: "pong" });
  }

  getHealth(res: ServerResponse) {
    sendJson(res, 200, {
      status: "ok",
      startedAt: this.startedAt.toISOString(),
      uptimeSeconds: Math.round((Date.now() - this.startedAt.getTime()) / 1000),
      records: this.recordCount(),
    });
  }
}
