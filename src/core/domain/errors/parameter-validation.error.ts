import type {
  NumericRange,
  ParameterField,
  RawParameterValue,
} from "../entities/extraction-parameters.entity.js";

export type ParameterValidationKind = "malformed" | "out_of_range";

/**
 * Rejection of a single brewing parameter. Returned as a value by the
 * validator rather than thrown.
 */
export class ParameterValidationError extends Error {
  private constructor(
    readonly kind: ParameterValidationKind,
    readonly field: ParameterField,
    readonly value: RawParameterValue,
    message: string,
    readonly allowedRange?: NumericRange,
  ) {
    super(message);
    this.name = "ParameterValidationError";
  }

  static malformed(
    field: ParameterField,
    value: RawParameterValue,
  ): ParameterValidationError {
    return new ParameterValidationError(
      "malformed",
      field,
      value,
      `${field} must be a number (received ${JSON.stringify(value)})`,
    );
  }

  static outOfRange(
    field: ParameterField,
    value: number,
    allowedRange: NumericRange,
  ): ParameterValidationError {
    return new ParameterValidationError(
      "out_of_range",
      field,
      value,
      `${field} must be between ${allowedRange.min} and ${allowedRange.max} (received ${value})`,
      allowedRange,
    );
  }

  toJSON() {
    return {
      error: this.message,
      kind: this.kind,
      field: this.field,
      value: this.value ?? null,
      ...(this.allowedRange ? { allowedRange: this.allowedRange } : {}),
    };
  }
}
