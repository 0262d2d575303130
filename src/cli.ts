import { Command } from "commander";
import { ConfigService } from "./infrastructure/services/config.service.js";
import { ParameterValidator } from "./core/domain/services/parameter-validator.service.js";
import { ExtractionSimulator } from "./core/domain/services/extraction-simulator.service.js";
import { startServer } from "./server.js";

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
}

const processIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

interface SimulateOptions {
  temperature?: string;
  pressure?: string;
  timeSeconds?: string;
}

interface ServeOptions {
  port?: string;
}

export function buildProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name("espresso-sim")
    .description("Espresso extraction simulator")
    .option("-c, --config <path>", "Config file path (default: config/config.yaml)");

  const loadConfig = () =>
    new ConfigService(program.opts<{ config?: string }>().config).getConfig();

  // ─── serve ──────────────────────────────────────────────────────────────────

  program
    .command("serve")
    .description("Start the HTTP server")
    .option("-p, --port <n>", "Port to listen on (overrides config)")
    .action(async (opts: ServeOptions) => {
      try {
        const config = loadConfig();
        if (opts.port !== undefined) {
          const port = Number.parseInt(opts.port, 10);
          if (Number.isNaN(port)) {
            io.err(`Invalid port: ${opts.port}`);
            io.setExitCode(1);
            return;
          }
          config.server.port = port;
        }

        const running = await startServer(config);
        io.out(`Espresso extraction simulator: ${running.url}/`);
        console.log(
          `[server] persistence=${config.persistence.driver} alerts=${config.alerts.enabled ? "on" : "off"}`,
        );

        const shutdown = (signal: string) => {
          console.log(`[server] ${signal} received, shutting down...`);
          running.stop().then(
            () => process.exit(0),
            (err: unknown) => {
              console.error("[server] Shutdown failed:", err);
              process.exit(1);
            },
          );
        };
        process.once("SIGINT", () => shutdown("SIGINT"));
        process.once("SIGTERM", () => shutdown("SIGTERM"));
      } catch (e) {
        io.err(`Serve failed: ${e instanceof Error ? e.message : String(e)}`);
        io.setExitCode(1);
      }
    });

  // ─── simulate ───────────────────────────────────────────────────────────────

  program
    .command("simulate")
    .description("Validate and simulate a single extraction; prints JSON")
    .option("--temperature <celsius>", "Brew temperature in °C")
    .option("--pressure <bar>", "Brew pressure in bar")
    .option("--time-seconds <s>", "Extraction time in seconds")
    .action((opts: SimulateOptions) => {
      try {
        const config = loadConfig();
        const validated = new ParameterValidator(config.extraction).validate({
          temperature: opts.temperature,
          pressure: opts.pressure,
          timeSeconds: opts.timeSeconds,
        });
        if (!validated.success) {
          io.err(validated.error.message);
          io.setExitCode(1);
          return;
        }
        const outcome = new ExtractionSimulator().simulate(validated.data);
        io.out(
          JSON.stringify({ parameters: validated.data, outcome }, null, 2),
        );
      } catch (e) {
        io.err(`Simulate failed: ${e instanceof Error ? e.message : String(e)}`);
        io.setExitCode(1);
      }
    });

  return program;
}
