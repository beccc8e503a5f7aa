export class DiskWatchError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'DiskWatchError';
    this.code = code;
  }
}

export class ConfigValidationError extends DiskWatchError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export class SourceUnavailableError extends DiskWatchError {
  public readonly source: string;

  constructor(source: string, reason: string) {
    super(`Volume source "${source}" unavailable: ${reason}`, 'SOURCE_UNAVAILABLE');
    this.name = 'SourceUnavailableError';
    this.source = source;
  }
}

export class DeliveryTimeoutError extends DiskWatchError {
  constructor(subscriberId: string, timeoutMs: number) {
    super(
      `Delivery to subscriber ${subscriberId} timed out after ${timeoutMs}ms`,
      'DELIVERY_TIMEOUT',
    );
    this.name = 'DeliveryTimeoutError';
  }
}

export class ApiRequestError extends DiskWatchError {
  public readonly status: number;

  constructor(status: number, message: string) {
    super(message, 'API_REQUEST_FAILED');
    this.name = 'ApiRequestError';
    this.status = status;
  }
}
