// Gateway error types: each carries the HTTP status and the message written to the caller
export class GatewayError extends Error {
  readonly status: number;

  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

// Route document missing, unreadable or invalid. The detail stays in logs, never in the response body.
export class ConfigLoadError extends GatewayError {
  readonly file: string;

  constructor(file: string, detail: string, options?: { cause?: unknown }) {
    super(500, `Cannot load route document ${file}: ${detail}`, options);
    this.file = file;
  }
}

export class BackendUnreachableError extends GatewayError {
  readonly target: string;

  constructor(target: string, options?: { cause?: unknown }) {
    super(502, `Backend ${target} is not reachable`, options);
    this.target = target;
  }
}

export class BackendTimeoutError extends GatewayError {
  readonly target: string;

  constructor(target: string, options?: { cause?: unknown }) {
    super(504, `Backend ${target} did not respond in time`, options);
    this.target = target;
  }
}
