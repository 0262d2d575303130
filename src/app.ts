import { createServer, type Server } from "node:http";
import { resolve } from "node:path";
import type { Config } from "./core/domain/entities/config.entity.js";
import type {
  IMetricsSink,
  IMetricsStore,
} from "./core/domain/repositories/metrics-store.repository.js";
import type { INotificationService } from "./core/domain/services/notification.service.js";
import { ParameterValidator } from "./core/domain/services/parameter-validator.service.js";
import { ExtractionSimulator } from "./core/domain/services/extraction-simulator.service.js";
import { AlertGenerator } from "./core/domain/services/alert-generator.service.js";
import { ExtractionService } from "./core/use-cases/extraction.use-case.js";
import { GetTrendsUseCase } from "./core/use-cases/trends.use-case.js";
import { AlertMonitor } from "./core/use-cases/alert-monitor.use-case.js";
import { ExtractionController } from "./adapters/controllers/extraction.controller.js";
import { MetricsController } from "./adapters/controllers/metrics.controller.js";
import { ProjectController } from "./adapters/controllers/project.controller.js";
import { Router } from "./adapters/router.js";
import { InMemoryMetricsStore } from "./infrastructure/stores/in-memory-metrics.store.js";
import { InMemoryAlertStore } from "./infrastructure/stores/in-memory-alert.store.js";
import { JsonlMetricsSink } from "./infrastructure/persistence/jsonl-metrics.sink.js";
import { SqliteMetricsSink } from "./infrastructure/database/sqlite-metrics.sink.js";
import { NodemailerAlertService } from "./infrastructure/services/nodemailer-alert.service.js";
import { sessionId } from "./infrastructure/utils/id.utils.js";

export interface AppOptions {
  /** Base directory for relative persistence paths. Defaults to cwd. */
  rootDir?: string;
  clock?: () => Date;
  /** Overrides the configured persistence sink (tests pass their own). */
  sink?: IMetricsSink | null;
  /** Overrides the nodemailer notifier. */
  notifier?: INotificationService;
  accessLog?: boolean;
}

export interface App {
  config: Config;
  store: IMetricsStore;
  extractionService: ExtractionService;
  alertMonitor?: AlertMonitor;
  router: Router;
  /** Waits for pending flushes and notifications, then closes the sink. */
  close(): Promise<void>;
}

function createSink(config: Config, rootDir: string): IMetricsSink | undefined {
  const { persistence } = config;
  switch (persistence.driver) {
    case "jsonl":
      return new JsonlMetricsSink(
        resolve(rootDir, persistence.dir),
        persistence.basename,
        sessionId(),
      );
    case "sqlite":
      return new SqliteMetricsSink(resolve(rootDir, persistence.sqlitePath));
    case "none":
      return undefined;
  }
}

/** Composition root: wires stores, services, controllers and the router. */
export function createApp(config: Config, options: AppOptions = {}): App {
  const rootDir = options.rootDir ?? process.cwd();
  const clock = options.clock ?? (() => new Date());

  // 1. Store
  const sink =
    options.sink === undefined
      ? createSink(config, rootDir)
      : (options.sink ?? undefined);
  const store = new InMemoryMetricsStore(sink);

  // 2. Alerts
  let alertMonitor: AlertMonitor | undefined;
  if (config.alerts.enabled) {
    const email = config.notifications.email;
    const notifier =
      options.notifier ??
      (email.enabled ? new NodemailerAlertService(email) : undefined);
    alertMonitor = new AlertMonitor(
      new AlertGenerator(config.alerts, clock),
      new InMemoryAlertStore(),
      notifier ? { notifier, minSeverity: email.minSeverity } : undefined,
    );
  }

  // 3. Use cases
  const extractionService = new ExtractionService(
    new ParameterValidator(config.extraction),
    new ExtractionSimulator(),
    store,
    { clock, alertMonitor },
  );
  const getTrendsUseCase = new GetTrendsUseCase(store, clock);

  // 4. Controllers & router
  const router = new Router(
    new ExtractionController(extractionService),
    new MetricsController(extractionService, getTrendsUseCase, alertMonitor),
    new ProjectController(() => store.size),
    { accessLog: options.accessLog },
  );

  return {
    config,
    store,
    extractionService,
    alertMonitor,
    router,
    async close() {
      await alertMonitor?.drain();
      await store.close();
    },
  };
}

export function createHttpServer(app: App): Server {
  return createServer((req, res) => app.router.handleRequest(req, res));
}
