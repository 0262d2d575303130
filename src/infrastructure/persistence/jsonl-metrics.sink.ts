import { createWriteStream, mkdirSync, existsSync, WriteStream } from "node:fs";
import { join } from "node:path";
import type { ExtractionRecord } from "../../core/domain/entities/extraction-record.entity.js";
import type { IMetricsSink } from "../../core/domain/repositories/metrics-store.repository.js";

/**
 * Appends one JSON object per record to `<dir>/<basename>_<sessionId>.jsonl`.
 */
export class JsonlMetricsSink implements IMetricsSink {
  readonly name = "JsonlMetricsSink";
  readonly path: string;
  private stream: WriteStream | null;
  private failure: Error | null = null;

  constructor(dir: string, basename: string, sessionId: string) {
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    const filename = basename.replace(/\.[^.]+$/, "") + `_${sessionId}.jsonl`;
    this.path = join(dir, filename);
    this.stream = createWriteStream(this.path, { flags: "a" });
    this.stream.on("error", (err) => {
      this.failure = err;
      console.error(`[JsonlMetricsSink] ${this.path} failed:`, err);
    });
  }

  write(record: ExtractionRecord): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);
    const stream = this.stream;
    if (!stream?.writable) {
      return Promise.reject(new Error(`Sink ${this.path} is closed`));
    }
    return new Promise((resolve, reject) => {
      stream.write(JSON.stringify(record) + "\n", (err) =>
        err ? reject(err) : resolve(),
      );
    });
  }

  close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream || stream.destroyed) return Promise.resolve();
    return new Promise((resolve) => stream.end(() => resolve()));
  }
}
