// errors.ts
//
// The only errors provkit throws. Everything that can fail per component, per
// asset or per repository is reported inline as a value instead.

/** Orchestration failed; no report could be assembled. */
export class ProvenanceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProvenanceError";
  }
}

/** The config file exists but cannot be read or does not hold a JSON object. */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly configPath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function errorText(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
