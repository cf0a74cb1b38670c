export interface ServiceErrorOptions {
  code?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ServiceError extends Error {
  readonly code?: string;
  readonly details?: Record<string, unknown>;

  constructor(name: string, message: string, options: ServiceErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = name;
    this.code = options.code;
    this.details = options.details;
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
