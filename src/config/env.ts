import "dotenv/config";
import type { Config, LogFormat, LogLevel, OutputFormat } from "./types.js";

export const OUTPUT_FORMATS = ["text", "html", "yaml"] as const satisfies readonly OutputFormat[];

function opt(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

export function enumOf<T extends string>(name: string, allowed: readonly T[], value: string | undefined, def: T): T {
  if (!value) return def;
  const match = allowed.find((candidate) => candidate === value);
  if (match) return match;
  throw new Error(`Invalid value for ${name}: ${value}. Allowed: ${allowed.join(", ")}`);
}

function envEnum<T extends string>(name: string, allowed: readonly T[], def: T): T {
  return enumOf(name, allowed, opt(name), def);
}

export function loadConfig(): Config {
  return {
    catalog: {
      path: opt("CATALOG_PATH") ?? "./data/DATABASE.md",
    },

    generation: {
      seed: opt("DOSSIER_SEED"),
      format: envEnum<OutputFormat>("DOSSIER_FORMAT", OUTPUT_FORMATS, "text"),
    },

    logging: {
      level: envEnum<LogLevel>("LOG_LEVEL", ["error", "warn", "info", "debug"] as const, "info"),
      scopes: opt("LOG_SCOPES")?.split(",").map((s) => s.trim()).filter(Boolean),
      format: envEnum<LogFormat>("LOG_FORMAT", ["pretty", "json"] as const, "pretty"),
    },
  };
}

export function configSnapshot(cfg: Config): Record<string, string | undefined> {
  return {
    CATALOG_PATH: cfg.catalog.path,
    DOSSIER_SEED: cfg.generation.seed,
    DOSSIER_FORMAT: cfg.generation.format,
    LOG_LEVEL: cfg.logging.level,
    LOG_SCOPES: cfg.logging.scopes?.join(",") ?? "",
    LOG_FORMAT: cfg.logging.format,
  };
}

export function printConfigSnapshot(cfg: Config): void {
  console.log("=== DOSSIER CONFIG SNAPSHOT ===");
  console.log(JSON.stringify(configSnapshot(cfg), null, 2));
  console.log("===============================");
}
