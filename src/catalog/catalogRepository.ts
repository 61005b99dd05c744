import path from "node:path";
import { log } from "../utils/logger.js";
import { CATALOG_SECTIONS } from "./categories.js";
import { RuleCatalog } from "./ruleCatalog.js";
import { parseTables, readCatalogSource } from "./tableStore.js";

const catalogLog = log.withScope("catalog");

/**
 * Parse catalog text into a RuleCatalog. Rows with a wrong cell count are
 * dropped (logged at debug); a non-integer ID throws MalformedCatalogError.
 * A missing section is only a warning: its pools are empty.
 */
export function parseCatalog(text: string, source = "<inline>"): RuleCatalog {
  let skipped = 0;
  const tables = parseTables(text, {
    onSkippedRow: (row) => {
      skipped++;
      catalogLog.debug(`Skipped malformed row in ${source}`, row);
    },
  });

  for (const section of Object.values(CATALOG_SECTIONS)) {
    if (!tables.has(section)) {
      catalogLog.warn(`Catalog section missing in ${source}`, { section });
    }
  }

  const catalog = RuleCatalog.fromTables(tables);
  catalogLog.info(`Loaded rule catalog from ${source}`, { ...catalog.counts(), skipped });
  return catalog;
}

/**
 * Read and parse the catalog at `filePath`. Not cached; see CatalogRepository.
 */
export function loadCatalog(filePath: string): RuleCatalog {
  return parseCatalog(readCatalogSource(filePath), filePath);
}

/**
 * Parse-once store of catalogs keyed by resolved source path.
 *
 * The same path always yields the same instance; edits to the file after the
 * first load are not observed until the entry is evicted.
 */
export class CatalogRepository {
  private readonly cache = new Map<string, RuleCatalog>();

  constructor(private readonly loader: (filePath: string) => RuleCatalog = loadCatalog) {}

  load(filePath: string): RuleCatalog {
    const key = path.resolve(filePath);
    const cached = this.cache.get(key);
    if (cached) return cached;

    const catalog = this.loader(key);
    this.cache.set(key, catalog);
    return catalog;
  }

  has(filePath: string): boolean {
    return this.cache.has(path.resolve(filePath));
  }

  evict(filePath: string): boolean {
    return this.cache.delete(path.resolve(filePath));
  }

  clear(): void {
    this.cache.clear();
  }
}
