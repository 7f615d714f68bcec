export class HarnessError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends HarnessError {}

/** The derived image could not be built. Raised before any container starts. */
export class ProvisioningError extends HarnessError {
  constructor(
    readonly tag: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The container runtime answered 404 for a container or image. */
export class RuntimeNotFoundError extends HarnessError {
  constructor(readonly resource: string, options?: { cause?: unknown }) {
    super(`No such resource: ${resource}`, options);
  }
}

/**
 * The endpoint could not be reached at all (refused, reset, closed mid-response).
 * During start-up this only means the server is not listening yet.
 */
export class ServiceUnavailableError extends HarnessError {
  constructor(
    readonly url: string,
    readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(`Service at ${url} is unavailable (${code})`, options);
  }
}

/** The endpoint answered, but not with a usable generation response. */
export class GenerationRequestError extends HarnessError {
  constructor(
    readonly status: number,
    message: string,
    readonly errorType?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type HealthCheckFailureKind = "crashed" | "timed-out" | "failed";

export class HealthCheckError extends HarnessError {
  constructor(
    readonly serviceName: string,
    readonly kind: HealthCheckFailureKind,
    readonly elapsedSeconds: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
