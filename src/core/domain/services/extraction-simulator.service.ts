import type { ExtractionParameters } from "../entities/extraction-parameters.entity.js";
import type {
  ExtractionClassification,
  ExtractionOutcome,
  YieldBand,
} from "../entities/extraction-record.entity.js";

/**
 * Constants of the extraction model.
 *
 * Quality is a weighted squared deviation from the ideal shot, where each
 * parameter's deviation is measured in tolerance units:
 *
 *   deviation = (value - ideal) / tolerance
 *   penalty   = Σ weight · deviation²
 *   quality   = 100 / (1 + penalty)
 *
 * A shot whose every deviation is within ±1 tolerance is "perfect".
 */
export interface SimulationModel {
  ideal: ExtractionParameters;
  tolerance: ExtractionParameters;
  weights: ExtractionParameters;
  /** Minimum quality score for a non-perfect shot to count as "good". */
  goodScoreThreshold: number;
  /** Extraction yield (% of dissolved coffee solids) at the ideal shot. */
  baseYieldPercent: number;
  /** Yield percentage points gained per unit above the ideal. */
  yieldSlope: ExtractionParameters;
  idealYieldRange: { min: number; max: number };
  /** Flow rate in g/s at the ideal pressure; scales linearly with pressure. */
  baseFlowRate: number;
  doseGrams: number;
}

export const DEFAULT_SIMULATION_MODEL: SimulationModel = {
  ideal: { temperature: 93, pressure: 9, timeSeconds: 25 },
  tolerance: { temperature: 3, pressure: 1, timeSeconds: 5 },
  weights: { temperature: 0.4, pressure: 0.3, timeSeconds: 0.3 },
  goodScoreThreshold: 30,
  baseYieldPercent: 20,
  yieldSlope: { temperature: 0.25, pressure: 0.5, timeSeconds: 0.2 },
  idealYieldRange: { min: 18, max: 22 },
  baseFlowRate: 1.5,
  doseGrams: 18,
};

const LABELS: Record<ExtractionClassification, string> = {
  perfect: "Perfect Extraction",
  good: "Good Extraction",
  suboptimal: "Suboptimal Extraction",
};

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Derives the outcome of one shot. Pure and total over validated parameters. */
export function simulateExtraction(
  params: ExtractionParameters,
  model: SimulationModel = DEFAULT_SIMULATION_MODEL,
): ExtractionOutcome {
  const deviation = (field: keyof ExtractionParameters) =>
    (params[field] - model.ideal[field]) / model.tolerance[field];

  const deviations = {
    temperature: deviation("temperature"),
    pressure: deviation("pressure"),
    timeSeconds: deviation("timeSeconds"),
  };

  const penalty =
    model.weights.temperature * deviations.temperature ** 2 +
    model.weights.pressure * deviations.pressure ** 2 +
    model.weights.timeSeconds * deviations.timeSeconds ** 2;
  const qualityScore = round(100 / (1 + penalty), 1);

  const withinTolerance = Object.values(deviations).every(
    (d) => Math.abs(d) <= 1,
  );
  const classification: ExtractionClassification = withinTolerance
    ? "perfect"
    : qualityScore >= model.goodScoreThreshold
      ? "good"
      : "suboptimal";

  const extractionYieldPercent = round(
    model.baseYieldPercent +
      model.yieldSlope.temperature *
        (params.temperature - model.ideal.temperature) +
      model.yieldSlope.pressure * (params.pressure - model.ideal.pressure) +
      model.yieldSlope.timeSeconds *
        (params.timeSeconds - model.ideal.timeSeconds),
    2,
  );
  let yieldBand: YieldBand = "ideal";
  if (extractionYieldPercent < model.idealYieldRange.min) yieldBand = "under";
  else if (extractionYieldPercent > model.idealYieldRange.max)
    yieldBand = "over";

  const beverageMass =
    (model.baseFlowRate * params.pressure * params.timeSeconds) /
    model.ideal.pressure;

  return Object.freeze({
    qualityScore,
    classification,
    label: LABELS[classification],
    extractionYieldPercent,
    yieldBand,
    beverageMassGrams: round(beverageMass, 1),
    brewRatio: round(beverageMass / model.doseGrams, 2),
    deviations: Object.freeze({
      temperature: round(deviations.temperature, 3),
      pressure: round(deviations.pressure, 3),
      timeSeconds: round(deviations.timeSeconds, 3),
    }),
  });
}

export class ExtractionSimulator {
  constructor(private model: SimulationModel = DEFAULT_SIMULATION_MODEL) {}

  simulate(params: ExtractionParameters): ExtractionOutcome {
    return simulateExtraction(params, this.model);
  }
}
