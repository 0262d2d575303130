import { z } from "zod";
import {
  PARAMETER_FIELDS,
  type ExtractionParameters,
  type ParameterField,
  type RawExtractionParameters,
} from "../entities/extraction-parameters.entity.js";
import type { ExtractionConfig } from "../entities/config.entity.js";
import { ParameterValidationError } from "../errors/parameter-validation.error.js";
import { fail, ok, type Result } from "../types.js";

// Plain decimal notation only; hex, binary and exponent forms are malformed
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

const NumericInputSchema = z
  .union([z.number(), z.string().trim().regex(DECIMAL).transform(Number)])
  .pipe(z.number().finite());

/**
 * Merges raw brewing parameters with the configured defaults, parses them
 * and checks each against its inclusive range.
 */
export class ParameterValidator {
  constructor(private config: ExtractionConfig) {}

  validate(
    raw: RawExtractionParameters = {},
  ): Result<ExtractionParameters, ParameterValidationError> {
    const values: Record<ParameterField, number> = {
      ...this.config.defaults,
    };

    for (const field of PARAMETER_FIELDS) {
      const input = raw[field];
      if (input === undefined || input === null) continue;

      const parsed = NumericInputSchema.safeParse(input);
      if (!parsed.success) {
        return fail(ParameterValidationError.malformed(field, input));
      }

      const range = this.config.bounds[field];
      if (parsed.data < range.min || parsed.data > range.max) {
        return fail(
          ParameterValidationError.outOfRange(field, parsed.data, {
            ...range,
          }),
        );
      }
      values[field] = parsed.data;
    }

    return ok(Object.freeze(values));
  }
}
