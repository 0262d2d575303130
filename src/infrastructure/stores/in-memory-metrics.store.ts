import PQueue from "p-queue";
import type {
  ExtractionRecord,
  ExtractionRecordDraft,
  RecordId,
} from "../../core/domain/entities/extraction-record.entity.js";
import type {
  IMetricsSink,
  IMetricsStore,
} from "../../core/domain/repositories/metrics-store.repository.js";

/**
 * Process-wide extraction history. Id assignment and insertion happen in one
 * synchronous step, so appends from concurrent requests never interleave.
 * When a sink is attached, records are written through a single-writer
 * queue so the sink sees them in id order.
 */
export class InMemoryMetricsStore implements IMetricsStore {
  private records: ExtractionRecord[] = [];
  private nextId: RecordId = 1;
  private writeQueue = new PQueue({ concurrency: 1 });

  constructor(private sink?: IMetricsSink) {}

  get size(): number {
    return this.records.length;
  }

  append(draft: ExtractionRecordDraft): RecordId {
    const record: ExtractionRecord = Object.freeze({
      id: this.nextId++,
      createdAt: draft.createdAt,
      parameters: Object.freeze({ ...draft.parameters }),
      outcome: draft.outcome,
    });
    this.records.push(record);

    const sink = this.sink;
    if (sink) {
      void this.writeQueue.add(async () => {
        try {
          await sink.write(record);
        } catch (err) {
          console.error(
            `[InMemoryMetricsStore] ${sink.name} failed to write record ${record.id}:`,
            err,
          );
        }
      });
    }

    return record.id;
  }

  all(): readonly ExtractionRecord[] {
    return this.records.slice();
  }

  async flush(): Promise<void> {
    await this.writeQueue.onIdle();
  }

  async close(): Promise<void> {
    await this.flush();
    await this.sink?.close();
  }
}
