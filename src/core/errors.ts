/**
 * Raised when a filter request names a key the engine does not know, or
 * carries a value of the wrong shape. Callers treat it as a configuration
 * mistake, not as an empty result.
 */
export class FilterConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = "FilterConfigError";
    this.key = key;
  }
}

/** The dataset source could not be read at all (as opposed to bad rows). */
export class DatasetLoadError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = "DatasetLoadError";
    this.source = source;
  }
}
