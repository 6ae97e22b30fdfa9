import { v4 as uuidv4 } from 'uuid';
import {
  IDocumentSerializer,
  IDocumentService,
  IHttpTransport,
  ILogger,
  IRateLimiter
} from '../interfaces/services';
import {
  DEFAULT_API_URL,
  DocumentClientOptions,
  DocumentRequest,
  HonestMarkDocument,
  SubmitOptions,
  TimeUnit,
  TransportResponse,
  toMillis
} from '../types/domain';
import { DocumentResponse } from '../models/DocumentResponse';
import {
  ApiError,
  ClientClosedError,
  DocumentClientError,
  EncodingError,
  OperationAbortedError,
  TransportError,
  ValidationError
} from '../errors/DocumentClientErrors';
import { DocumentRequestFactory } from './DocumentRequestFactory';
import { JsonDocumentSerializer } from './JsonDocumentSerializer';
import { AxiosHttpTransport } from './AxiosHttpTransport';
import { FixedWindowQuotaTracker, Clock } from './QuotaTracker';
import { WindowRateLimiter } from './RateLimiter';

export interface DocumentClientDependencies {
  transport?: IHttpTransport;
  serializer?: IDocumentSerializer;
  rateLimiter?: IRateLimiter;
  requestFactory?: DocumentRequestFactory;
  logger?: ILogger;
  clock?: Clock;
}

/**
 * Rate-limited client for the document creation endpoint.
 *
 * One instance owns one quota window and one transport; share it between callers
 * so they all draw from the same request limit.
 *
 * @example
 * ```typescript
 * const client = new HonestMarkClient({
 *   timeUnit: TimeUnit.MINUTES,
 *   requestLimit: 5,
 *   authToken: 'test-token'
 * });
 * const response = await client.submit(document, signature);
 * await client.close();
 * ```
 */
export class HonestMarkClient implements IDocumentService {
  private readonly apiUrl: string;
  private readonly authorization: string;
  private readonly transport: IHttpTransport;
  private readonly serializer: IDocumentSerializer;
  private readonly rateLimiter: IRateLimiter;
  private readonly requestFactory: DocumentRequestFactory;
  private readonly logger?: ILogger;
  private closed = false;
  // Aborted by close() so waiters don't sleep out their windows
  private readonly lifecycle = new AbortController();

  constructor(options: DocumentClientOptions, dependencies: DocumentClientDependencies = {}) {
    if (!Object.values<string>(TimeUnit).includes(options.timeUnit)) {
      throw new ValidationError(`Unknown time unit: ${options.timeUnit}`);
    }
    if (!Number.isInteger(options.requestLimit) || options.requestLimit <= 0) {
      throw new ValidationError(`Request limit must be a positive integer, got ${options.requestLimit}`);
    }
    if (!options.authToken) {
      throw new ValidationError('Auth token must be a non-empty string');
    }

    this.apiUrl = options.apiUrl ?? DEFAULT_API_URL;
    this.authorization = `Bearer ${options.authToken}`;
    this.logger = dependencies.logger;
    this.rateLimiter =
      dependencies.rateLimiter ??
      new WindowRateLimiter(
        new FixedWindowQuotaTracker(options.requestLimit, toMillis(options.timeUnit), dependencies.clock),
        this.logger
      );
    this.transport = dependencies.transport ?? new AxiosHttpTransport({ logger: this.logger });
    this.serializer = dependencies.serializer ?? new JsonDocumentSerializer();
    this.requestFactory = dependencies.requestFactory ?? new DocumentRequestFactory();
  }

  async submit(document: HonestMarkDocument, signature: string, options: SubmitOptions = {}): Promise<DocumentResponse> {
    this.ensureOpen();

    const request = this.requestFactory.createRequest(document, signature);
    const body = this.encode(request);
    const requestId = uuidv4();

    this.logger?.info('Submitting document', {
      requestId,
      productGroup: request.productGroup,
      documentFormat: request.documentFormat
    });

    const { signal, release } = this.linkSignal(options.signal);
    return this.rateLimiter.execute(() => this.send(body, requestId, signal), signal).finally(release);
  }

  // Same operation under the name the service uses
  createDocument(document: HonestMarkDocument, signature: string, options?: SubmitOptions): Promise<DocumentResponse> {
    return this.submit(document, signature, options);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.lifecycle.abort(new ClientClosedError());
    await this.transport.close();
    this.logger?.info('Document client closed');
  }

  isClosed(): boolean {
    return this.closed;
  }

  getRemainingPermits(): number {
    return this.rateLimiter.getRemainingPermits();
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new ClientClosedError();
    }
  }

  // One signal that fires on the caller's abort or on close(), whichever comes first
  private linkSignal(callerSignal?: AbortSignal): { signal: AbortSignal; release: () => void } {
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(callerSignal?.reason);
    const onClose = () => controller.abort(this.lifecycle.signal.reason);

    if (callerSignal?.aborted) {
      onCallerAbort();
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    }
    this.lifecycle.signal.addEventListener('abort', onClose, { once: true });

    return {
      signal: controller.signal,
      release: () => {
        callerSignal?.removeEventListener('abort', onCallerAbort);
        this.lifecycle.signal.removeEventListener('abort', onClose);
      }
    };
  }

  private encode(request: DocumentRequest): string {
    try {
      return this.serializer.encode(request);
    } catch (error) {
      throw new EncodingError('Failed to serialize document request', error);
    }
  }

  private async send(body: string, requestId: string, signal?: AbortSignal): Promise<DocumentResponse> {
    // A waiter that wakes after close() must not reach the transport
    this.ensureOpen();
    if (signal?.aborted) {
      throw new OperationAbortedError('Operation was aborted before the request was sent', signal.reason);
    }

    let response: TransportResponse;
    try {
      response = await this.transport.send(
        {
          method: 'POST',
          url: this.apiUrl,
          headers: {
            Authorization: this.authorization,
            'Content-Type': 'application/json',
            'X-Request-ID': requestId
          },
          body
        },
        signal
      );
    } catch (error) {
      if (this.closed) {
        throw new ClientClosedError('Document client was closed while the request was in flight');
      }
      // Typed failures were already logged by the transport
      if (error instanceof DocumentClientError) throw error;
      this.logger?.error(`Document request ${requestId} failed in transport`, error);
      throw new TransportError('Transport failure', error);
    }

    this.logger?.info(`Document service responded for request ${requestId}`, { status: response.status });
    return this.classify(response, requestId);
  }

  private classify(response: TransportResponse, requestId: string): DocumentResponse {
    const { status, body } = response;
    if (status !== 200) {
      this.logger?.warn('Document request rejected', { requestId, status });
      throw new ApiError(`Request failed with status: ${status}, body: ${body}`, {
        statusCode: status,
        responseBody: body
      });
    }

    let parsed: DocumentResponse;
    try {
      parsed = this.serializer.decode(body);
    } catch (error) {
      this.logger?.warn('Document response could not be parsed', { requestId });
      throw new ApiError('Failed to parse response', {
        statusCode: status,
        responseBody: body,
        cause: error
      });
    }

    if (parsed.hasError()) {
      this.logger?.warn('Document service reported an error', {
        requestId,
        errorCode: parsed.errorCode,
        errorMessage: parsed.errorMessage
      });
      throw new ApiError(parsed.errorMessage || `Document service returned error ${parsed.errorCode}`, {
        statusCode: status,
        responseBody: body,
        errorCode: parsed.errorCode,
        errorDescription: parsed.errorDescription
      });
    }

    return parsed;
  }
}
