/** Operator input that cannot be acted upon. Fatal for the run. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class UnknownDatasetError extends ConfigurationError {
  constructor(public readonly dataset: string) {
    super(`Dataset not registered: ${dataset}`);
    this.name = "UnknownDatasetError";
  }
}

export class VariantError extends ConfigurationError {
  constructor(
    message: string,
    public readonly dataset: string,
    public readonly variant: string | undefined,
  ) {
    super(message);
    this.name = "VariantError";
  }
}

export class UnknownSourceError extends ConfigurationError {
  constructor(public readonly source: string) {
    super(`Source not found: ${source}`);
    this.name = "UnknownSourceError";
  }
}

export class FetchTimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "FetchTimeoutError";
  }
}

/** Provider-side failure: HTTP status, malformed payload, provider error code. */
export class SourceError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = "SourceError";
  }
}

/** Raw input that is not a batch of rows at all. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}
