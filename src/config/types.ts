export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFormat = "pretty" | "json";

export type OutputFormat = "text" | "html" | "yaml";

export interface Config {
  catalog: {
    path: string;
  };

  generation: {
    seed?: string; // undefined => auto-seeded
    format: OutputFormat;
  };

  logging: {
    level: LogLevel;
    scopes?: string[]; // empty/undefined => all
    format: LogFormat;
  };
}
