export type DomainErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'NOT_FOUND'
  | 'SERIALIZATION_ERROR'
  | 'THROTTLED'
  | 'STORAGE_ERROR'
  | 'INVOCATION_ERROR'
  | 'ANALYZER_TIMEOUT'
  | 'UNKNOWN_ERROR';

export type DomainErrorDetails = Record<string, unknown>;

export class DomainError extends Error {
  readonly code: DomainErrorCode;
  readonly details?: DomainErrorDetails;
  readonly cause?: unknown;
  readonly retryable: boolean;

  constructor(args: {
    code: DomainErrorCode;
    message: string;
    details?: DomainErrorDetails;
    retryable?: boolean;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = 'DomainError';
    this.code = args.code;
    this.details = args.details;
    this.cause = args.cause;
    this.retryable = args.retryable ?? false;
  }
}

export const isDomainError = (err: unknown): err is DomainError => err instanceof DomainError;

export const asDomainError = (err: unknown): DomainError => {
  if (isDomainError(err)) return err;
  const message = err instanceof Error ? err.message : 'Unexpected error.';
  return new DomainError({
    code: 'UNKNOWN_ERROR',
    message,
    retryable: false,
    cause: err,
  });
};

export const httpStatusFor = (code: DomainErrorCode): 400 | 404 | 429 | 500 | 502 | 504 => {
  switch (code) {
    case 'VALIDATION_ERROR':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'THROTTLED':
      return 429;
    case 'STORAGE_ERROR':
    case 'INVOCATION_ERROR':
      return 502;
    case 'ANALYZER_TIMEOUT':
      return 504;
    case 'CONFIGURATION_ERROR':
    case 'SERIALIZATION_ERROR':
    case 'UNKNOWN_ERROR':
    default:
      return 500;
  }
};
