export class HttpError extends Error {
  readonly status: number;
  readonly url: string;
  readonly responseBody?: string;

  constructor(options: { url: string; status: number; statusText?: string; body?: string }) {
    super(`GET ${options.url} failed: ${options.status} ${options.statusText ?? ""}`.trim());
    this.name = "HttpError";
    this.status = options.status;
    this.url = options.url;
    this.responseBody = options.body;
  }
}

export class MalformedResponseError extends Error {
  readonly url: string;

  constructor(url: string, detail: string) {
    super(`Malformed response from ${url}: ${detail}`);
    this.name = "MalformedResponseError";
    this.url = url;
  }
}

export class StateWriteError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StateWriteError";
  }
}

export class ArchiveWriteError extends Error {
  readonly locationId: number;

  constructor(locationId: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ArchiveWriteError";
    this.locationId = locationId;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
