export class PolicyQaError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Rejected before chunking: the file is not a pdf or docx document. */
export class UnsupportedInputError extends PolicyQaError {
  constructor(readonly extension: string) {
    super(`Unsupported file format: ${extension || "(none)"}. Only PDF and DOCX files are allowed.`);
  }
}

export class ExternalServiceError extends PolicyQaError {
  constructor(
    readonly service: string,
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(`${service} request failed: ${message}`, options);
  }
}

export class MalformedServiceResponseError extends PolicyQaError {
  constructor(readonly service: string, detail: string) {
    super(`${service} returned a malformed response: ${detail}`);
  }
}

export class ConfigError extends PolicyQaError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
