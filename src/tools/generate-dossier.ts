import fs from "node:fs";
import path from "node:path";
import { enumOf, loadConfig, printConfigSnapshot, OUTPUT_FORMATS } from "../config/env.js";
import type { OutputFormat } from "../config/types.js";
import { generateDossier } from "../dossier.js";
import { log } from "../utils/logger.js";

/**
 * Roll a character and print (or save) the dossier.
 *
 * Usage:
 *   npx tsx src/tools/generate-dossier.ts --seed 42 --format html --out ./out/dossier.html
 *   npx tsx src/tools/generate-dossier.ts --catalog ./data/DATABASE.md --showConfig
 */

const cliLog = log.withScope("cli");

/**
 * Parse command-line arguments (dependency-free).
 */
function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--")) {
      const key = arg.slice(2);
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        args[key] = next;
        i++;
      } else {
        args[key] = true;
      }
    }
  }
  return args;
}

function stringArg(args: Record<string, string | boolean>, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

function main(): void {
  const cfg = loadConfig();
  log.configure(cfg.logging);

  const args = parseArgs(process.argv.slice(2));
  if (args.showConfig === true) printConfigSnapshot(cfg);

  const catalogPath = stringArg(args, "catalog") ?? cfg.catalog.path;
  const seed = stringArg(args, "seed") ?? cfg.generation.seed;
  const format = enumOf<OutputFormat>("--format", OUTPUT_FORMATS, stringArg(args, "format"), cfg.generation.format);
  const outPath = stringArg(args, "out");

  const { sheet, output } = generateDossier({ seed, catalogPath, format });
  cliLog.debug(`Rolled ${sheet.name}`, { seed: seed ?? "<random>", format });

  if (!outPath) {
    console.log(output);
    return;
  }

  const resolved = path.resolve(outPath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, output, "utf8");
  cliLog.info(`Wrote dossier to ${resolved}`);
}

try {
  main();
} catch (err: unknown) {
  cliLog.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}
