export class CatalogNotFoundError extends Error {
  readonly code = "CATALOG_NOT_FOUND";

  constructor(
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`Rule catalog not found or unreadable: ${path}`, options);
    this.name = "CatalogNotFoundError";
  }
}

export class MalformedCatalogError extends Error {
  readonly code = "CATALOG_MALFORMED";

  constructor(
    readonly section: string,
    readonly field: string,
    readonly value: string
  ) {
    super(`Malformed catalog: ${section} has invalid integer ${field} "${value}"`);
    this.name = "MalformedCatalogError";
  }
}

/**
 * Raised when a mandatory sheet field has nothing to pick from.
 * Optional fields never raise; they come back as null or [].
 */
export class NoCandidatesError extends Error {
  readonly code = "NO_CANDIDATES";

  constructor(readonly category: string) {
    super(`No candidates in catalog category "${category}"`);
    this.name = "NoCandidatesError";
  }
}

export type CatalogError = CatalogNotFoundError | MalformedCatalogError;
