// Core domain types for the document creation endpoint
export const DEFAULT_API_URL = 'https://ismp.crpt.ru/api/v3/lk/documents/create';

export enum ProductGroup {
  CLOTHES = 'CLOTHES',
  SHOES = 'SHOES',
  TOBACCO = 'TOBACCO',
  PERFUMES = 'PERFUMES',
  TIRES = 'TIRES',
  ELECTRONICS = 'ELECTRONICS',
  DAIRY = 'DAIRY'
}

export enum DocumentFormat {
  MANUAL = 'MANUAL',
  CSV = 'CSV',
  XML = 'XML'
}

export enum DocumentType {
  LP_INTRODUCE_GOODS = 'LP_INTRODUCE_GOODS'
}

export enum TimeUnit {
  MILLISECONDS = 'MILLISECONDS',
  SECONDS = 'SECONDS',
  MINUTES = 'MINUTES',
  HOURS = 'HOURS',
  DAYS = 'DAYS'
}

const TIME_UNIT_MS: Record<TimeUnit, number> = {
  [TimeUnit.MILLISECONDS]: 1,
  [TimeUnit.SECONDS]: 1000,
  [TimeUnit.MINUTES]: 60 * 1000,
  [TimeUnit.HOURS]: 60 * 60 * 1000,
  [TimeUnit.DAYS]: 24 * 60 * 60 * 1000
};

export function toMillis(unit: TimeUnit): number {
  return TIME_UNIT_MS[unit];
}

// Fields are nullable because documents also arrive from untyped callers
export interface HonestMarkDocument {
  readonly productDocument: string;
  readonly productGroup: ProductGroup | null;
  readonly documentFormat: DocumentFormat | null;
  readonly type: DocumentType | null;
}

// Exactly what goes over the wire
export interface DocumentRequest {
  readonly productDocument: string;
  readonly productGroup: string;
  readonly documentFormat: DocumentFormat;
  readonly type: DocumentType;
  readonly signature: string;
}

export interface DocumentResponseFields {
  value?: string;
  errorCode?: string;
  errorMessage?: string;
  errorDescription?: string;
}

export interface TransportRequest {
  method: 'POST';
  url: string;
  headers: Record<string, string>;
  body: string;
}

export interface TransportResponse {
  status: number;
  body: string;
}

export interface AcquireResult {
  granted: boolean;
  waitMs: number;
}

export interface DocumentClientOptions {
  timeUnit: TimeUnit;
  requestLimit: number;
  authToken: string;
  apiUrl?: string;
}

export interface SubmitOptions {
  signal?: AbortSignal;
}
