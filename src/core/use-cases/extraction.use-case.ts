import type { RawExtractionParameters } from "../domain/entities/extraction-parameters.entity.js";
import type { ExtractionRecord } from "../domain/entities/extraction-record.entity.js";
import type { ParameterValidationError } from "../domain/errors/parameter-validation.error.js";
import type { IMetricsStore } from "../domain/repositories/metrics-store.repository.js";
import type { ExtractionSimulator } from "../domain/services/extraction-simulator.service.js";
import type { ParameterValidator } from "../domain/services/parameter-validator.service.js";
import { fail, ok, type Result } from "../domain/types.js";
import type { AlertMonitor } from "./alert-monitor.use-case.js";

export interface ExtractionServiceOptions {
  clock?: () => Date;
  alertMonitor?: AlertMonitor;
}

/**
 * Validator → simulator → store for each extraction request. A rejected
 * request leaves the store untouched.
 */
export class ExtractionService {
  private clock: () => Date;
  private alertMonitor?: AlertMonitor;

  constructor(
    private validator: ParameterValidator,
    private simulator: ExtractionSimulator,
    private store: IMetricsStore,
    options: ExtractionServiceOptions = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.alertMonitor = options.alertMonitor;
  }

  start(
    raw: RawExtractionParameters = {},
  ): Result<ExtractionRecord, ParameterValidationError> {
    const validated = this.validator.validate(raw);
    if (!validated.success) return fail(validated.error);

    const parameters = validated.data;
    const outcome = this.simulator.simulate(parameters);
    const createdAt = this.clock().toISOString();

    const id = this.store.append({ createdAt, parameters, outcome });
    const record: ExtractionRecord = Object.freeze({
      id,
      createdAt,
      parameters,
      outcome,
    });

    this.alertMonitor?.observe(record, this.store.all());
    return ok(record);
  }

  history(): readonly ExtractionRecord[] {
    return this.store.all();
  }
}
