export type ParameterField = "temperature" | "pressure" | "timeSeconds";

export const PARAMETER_FIELDS: readonly ParameterField[] = [
  "temperature",
  "pressure",
  "timeSeconds",
];

/** Validated brewing parameters. Every value lies inside its configured range. */
export interface ExtractionParameters {
  readonly temperature: number; // °C
  readonly pressure: number; // bar
  readonly timeSeconds: number;
}

export type RawParameterValue = string | number | null | undefined;

/** Parameters as they arrive from a caller, before defaults and parsing. */
export type RawExtractionParameters = Partial<
  Record<ParameterField, RawParameterValue>
>;

export interface NumericRange {
  min: number;
  max: number;
}

export type ParameterBounds = Record<ParameterField, NumericRange>;
