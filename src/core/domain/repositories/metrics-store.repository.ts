import type {
  ExtractionRecord,
  ExtractionRecordDraft,
  RecordId,
} from "../entities/extraction-record.entity.js";

/**
 * Append-only log of extraction records. Ids are gap-free and increase
 * with insertion order; there is no update or delete.
 */
export interface IMetricsStore {
  append(draft: ExtractionRecordDraft): RecordId;
  /** Snapshot of every record in insertion order. */
  all(): readonly ExtractionRecord[];
  readonly size: number;
  /** Resolves once every record handed to the flush sink has been written. */
  flush(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Durable destination for appended records (one JSON document each).
 * Writes arrive one at a time, in id order.
 */
export interface IMetricsSink {
  readonly name: string;
  write(record: ExtractionRecord): Promise<void>;
  close(): Promise<void>;
}
