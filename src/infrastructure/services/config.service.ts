import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { PARAMETER_FIELDS } from "../../core/domain/entities/extraction-parameters.entity.js";
import type { Config } from "../../core/domain/entities/config.entity.js";

const RangeSchema = z
  .object({ min: z.number(), max: z.number() })
  .refine((r) => r.min < r.max, { message: "min must be less than max" });

const ParametersSchema = z.object({
  temperature: z.number(),
  pressure: z.number(),
  timeSeconds: z.number(),
});

const ConfigSchema = z
  .object({
    server: z
      .object({
        host: z.string().min(1).default("127.0.0.1"),
        port: z.coerce.number().int().min(0).max(65535).default(3000),
      })
      .default({}),
    extraction: z
      .object({
        defaults: ParametersSchema.default({
          temperature: 93.0,
          pressure: 9.0,
          timeSeconds: 25,
        }),
        bounds: z
          .object({
            temperature: RangeSchema.default({ min: 85, max: 100 }),
            pressure: RangeSchema.default({ min: 6, max: 12 }),
            timeSeconds: RangeSchema.default({ min: 15, max: 40 }),
          })
          .default({}),
      })
      .default({}),
    persistence: z
      .object({
        driver: z.enum(["none", "jsonl", "sqlite"]).default("none"),
        dir: z.string().min(1).default("output/metrics"),
        basename: z.string().min(1).default("metrics.jsonl"),
        sqlitePath: z.string().min(1).default("output/metrics/metrics.db"),
      })
      .default({}),
    alerts: z
      .object({
        enabled: z.boolean().default(true),
        temperatureRange: RangeSchema.default({ min: 90, max: 96 }),
        pressureRange: RangeSchema.default({ min: 8, max: 10 }),
        perfectRateThreshold: z.number().min(0).max(1).default(0.4),
        minSampleSize: z.number().int().min(1).default(5),
      })
      .default({}),
    notifications: z
      .object({
        email: z
          .object({
            enabled: z.boolean().default(false),
            senderEmail: z.string().email().optional(),
            appPassword: z.string().optional(),
            recipientEmail: z.string().email().optional(),
            minSeverity: z.enum(["info", "warning", "critical"]).default("critical"),
          })
          .default({}),
      })
      .default({}),
  })
  .superRefine((c, ctx) => {
    for (const field of PARAMETER_FIELDS) {
      const value = c.extraction.defaults[field];
      const { min, max } = c.extraction.bounds[field];
      if (value < min || value > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["extraction", "defaults", field],
          message: `default ${value} outside bounds ${min}–${max}`,
        });
      }
    }
    const email = c.notifications.email;
    if (email.enabled && (!email.senderEmail || !email.recipientEmail)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["notifications", "email"],
        message: "senderEmail and recipientEmail are required when enabled",
      });
    }
  });

/** Replaces `${VAR}` string values with the environment variable's value. */
function substituteEnv(value: unknown): unknown {
  if (typeof value === "string" && value.startsWith("${") && value.endsWith("}")) {
    const key = value.slice(2, -1);
    return process.env[key] ?? value;
  }
  if (Array.isArray(value)) return value.map(substituteEnv);
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v);
    return out;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function applyEnvOverrides(raw: Record<string, unknown>): void {
  if (process.env.PORT) {
    const server = isRecord(raw.server) ? raw.server : {};
    raw.server = { ...server, port: process.env.PORT };
  }
  if (process.env.METRICS_PERSISTENCE) {
    const persistence = isRecord(raw.persistence) ? raw.persistence : {};
    raw.persistence = { ...persistence, driver: process.env.METRICS_PERSISTENCE };
  }
}

/**
 * Validates a raw (already YAML-decoded) config object. `source` names the
 * origin in error messages.
 */
export function parseConfig(raw: unknown, source = "<inline>"): Config {
  const withEnv = substituteEnv(raw ?? {});
  if (!isRecord(withEnv)) {
    throw new Error(`Config at ${source} must be a YAML object.`);
  }
  const root = { ...withEnv };
  applyEnvOverrides(root);

  const parsed = ConfigSchema.safeParse(root);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"} (${i.message})`)
      .join(", ");
    throw new Error(`Invalid config at ${source}. Missing or invalid: ${problems}.`);
  }
  return parsed.data;
}

export class ConfigService {
  private config: Config;
  readonly configPath: string;

  constructor(configPath?: string) {
    loadEnv();
    this.configPath =
      configPath ||
      process.env.CONFIG_PATH ||
      resolve(process.cwd(), "config", "config.yaml");
    this.config = this.loadConfig(this.configPath);
  }

  private loadConfig(path: string): Config {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new Error(`Failed to load config from ${path}. ${msg}`, { cause: e });
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(raw);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new Error(`Invalid YAML in ${path}. ${msg}`, { cause: e });
    }
    return parseConfig(parsed, path);
  }

  getConfig(): Config {
    return this.config;
  }
  getServerConfig(): Config["server"] {
    return this.config.server;
  }
  getExtractionConfig(): Config["extraction"] {
    return this.config.extraction;
  }
  getPersistenceConfig(): Config["persistence"] {
    return this.config.persistence;
  }
  getAlertsConfig(): Config["alerts"] {
    return this.config.alerts;
  }
}
