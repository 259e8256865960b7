/**
 * Errors that abort loading. They are thrown inside the pipeline and surface as the error of
 * the `loadAll` Result.
 */

export class SymbolGraphDecodingError extends Error {
  readonly location: string;
  /** JSON path of the offending value, when validation failed */
  readonly path?: string;

  constructor(location: string, message: string, path?: string) {
    super(path ? `${location}: ${path}: ${message}` : `${location}: ${message}`);
    this.name = "SymbolGraphDecodingError";
    this.location = location;
    this.path = path;
  }
}

export class MixedExtensionFormatsError extends Error {
  readonly locations: string[];

  constructor(locations: string[]) {
    super(
      `Symbol graphs mix the extension block format and the extended type format: ${locations.join(", ")}`
    );
    this.name = "MixedExtensionFormatsError";
    this.locations = locations;
  }
}

export class InvalidSymbolReferencePathError extends Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Invalid symbol reference path '${path}': ${reason}`);
    this.name = "InvalidSymbolReferencePathError";
    this.path = path;
  }
}

export class DataProviderError extends Error {
  readonly location: string;

  constructor(location: string, message: string) {
    super(`${location}: ${message}`);
    this.name = "DataProviderError";
    this.location = location;
  }
}
