import {
  AcquireResult,
  DocumentRequest,
  HonestMarkDocument,
  SubmitOptions,
  TransportRequest,
  TransportResponse
} from '../types/domain';
import { DocumentResponse } from '../models/DocumentResponse';

// Public entry point of the client
export interface IDocumentService {
  submit(document: HonestMarkDocument, signature: string, options?: SubmitOptions): Promise<DocumentResponse>;
  close(): Promise<void>;
}

// Permit bookkeeping for one fixed window
export interface IQuotaTracker {
  tryAcquire(): AcquireResult;
  getRemainingPermits(): number;
}

// Admission gate interface
export interface IRateLimiter {
  execute<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T>;
  getRemainingPermits(): number;
}

// HTTP communication interface
export interface IHttpTransport {
  send(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse>;
  close(): Promise<void>;
}

// Wire format interface
export interface IDocumentSerializer {
  encode(request: DocumentRequest): string;
  decode(body: string): DocumentResponse;
}

// Logging interface
export interface ILogger {
  info(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: unknown): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

// Configuration interface
export interface IConfiguration {
  get(key: string): string | undefined;
  getNumber(key: string, defaultValue?: number): number;
  getBoolean(key: string, defaultValue?: boolean): boolean;
}
