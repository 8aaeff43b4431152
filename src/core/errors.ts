export type RelayErrorOptions = {
  cause?: unknown;
};

export class RelayError extends Error {
  constructor(message: string, options?: RelayErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class StorageError extends RelayError {
  constructor(
    public readonly store: string,
    message: string,
    options?: RelayErrorOptions,
  ) {
    super(`[store:${store}] ${message}`, options);
  }
}

export class TransientDeliveryError extends RelayError {
  constructor(message: string, options?: RelayErrorOptions) {
    super(message, options);
  }
}

export class PermanentDeliveryError extends RelayError {
  constructor(message: string, options?: RelayErrorOptions) {
    super(message, options);
  }
}

export class ConnectivityError extends RelayError {
  constructor(message: string, options?: RelayErrorOptions) {
    super(message, options);
  }
}

export class ConfigurationError extends RelayError {
  constructor(message: string, public readonly key?: string) {
    super(key ? `[${key}] ${message}` : message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
