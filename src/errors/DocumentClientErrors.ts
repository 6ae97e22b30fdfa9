// Typed failures surfaced by the document client.
// Every rejection from submit() is one of these.

export class DocumentClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DocumentClientError';
  }
}

// Bad input - nothing was sent, caller can fix and resubmit
export class ValidationError extends DocumentClientError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// Outbound request could not be serialized
export class EncodingError extends DocumentClientError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'EncodingError';
  }
}

// Network or IO failure before a response arrived
export class TransportError extends DocumentClientError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TransportError';
  }
}

export interface ApiErrorDetails {
  statusCode?: number;
  responseBody?: string;
  errorCode?: string;
  errorDescription?: string;
  cause?: unknown;
}

// Non-200 status, malformed 200 body, or an error reported by the service
export class ApiError extends DocumentClientError {
  public readonly statusCode?: number;
  public readonly responseBody?: string;
  public readonly errorCode?: string;
  public readonly errorDescription?: string;

  constructor(message: string, details: ApiErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.name = 'ApiError';
    this.statusCode = details.statusCode;
    this.responseBody = details.responseBody;
    this.errorCode = details.errorCode;
    this.errorDescription = details.errorDescription;
  }
}

export class ClientClosedError extends DocumentClientError {
  constructor(message: string = 'Document client is closed') {
    super(message);
    this.name = 'ClientClosedError';
  }
}

// Caller aborted through its AbortSignal
export class OperationAbortedError extends DocumentClientError {
  constructor(message: string = 'Operation was aborted', cause?: unknown) {
    super(message, { cause });
    this.name = 'OperationAbortedError';
  }
}
