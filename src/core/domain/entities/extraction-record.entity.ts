import type { ExtractionParameters } from "./extraction-parameters.entity.js";

export type ExtractionClassification = "perfect" | "good" | "suboptimal";

export type YieldBand = "under" | "ideal" | "over";

export interface ExtractionOutcome {
  readonly qualityScore: number;
  readonly classification: ExtractionClassification;
  readonly label: string;
  readonly extractionYieldPercent: number;
  readonly yieldBand: YieldBand;
  readonly beverageMassGrams: number;
  readonly brewRatio: number;
  /** Signed distance from the ideal, in tolerance units. */
  readonly deviations: Readonly<ExtractionParameters>;
}

export type RecordId = number;

export interface ExtractionRecord {
  readonly id: RecordId;
  readonly createdAt: string;
  readonly parameters: ExtractionParameters;
  readonly outcome: ExtractionOutcome;
}

/** A record before the store has assigned its id. */
export type ExtractionRecordDraft = Omit<ExtractionRecord, "id">;
