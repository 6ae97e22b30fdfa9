import http from 'node:http';
import https from 'node:https';
import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { IHttpTransport, ILogger } from '../interfaces/services';
import { TransportRequest, TransportResponse } from '../types/domain';
import { ClientClosedError, OperationAbortedError, TransportError } from '../errors/DocumentClientErrors';

export interface AxiosHttpTransportOptions {
  timeout?: number;
  adapter?: AxiosAdapter;
  logger?: ILogger;
}

/**
 * Plain HTTP over axios. Every status code is handed back to the caller;
 * only failures without a response are turned into errors here.
 */
export class AxiosHttpTransport implements IHttpTransport {
  private readonly client: AxiosInstance;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private readonly logger?: ILogger;
  private closed = false;

  constructor(options: AxiosHttpTransportOptions = {}) {
    this.logger = options.logger;
    // Keep-alive sockets are what close() releases
    this.httpAgent = new http.Agent({ keepAlive: true });
    this.httpsAgent = new https.Agent({ keepAlive: true });

    this.client = axios.create({
      timeout: options.timeout ?? 30000,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      adapter: options.adapter,
      responseType: 'text',
      // Status classification belongs to the caller, not the transport
      validateStatus: () => true,
      transformResponse: [(data: unknown) => data]
    });
  }

  async send(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse> {
    if (this.closed) {
      throw new ClientClosedError('HTTP transport is closed');
    }

    try {
      const response = await this.client.request<unknown>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.body,
        signal
      });

      return {
        status: response.status,
        body: this.bodyAsText(response.data)
      };
    } catch (error) {
      if (axios.isCancel(error) || signal?.aborted) {
        throw new OperationAbortedError('HTTP request was aborted', error);
      }

      let errorMessage = 'HTTP request failed';
      if (axios.isAxiosError(error)) {
        errorMessage = error.code ? `${error.message} (${error.code})` : error.message;
      } else if (error instanceof Error) {
        errorMessage = error.message;
      }

      this.logger?.warn('HTTP transport failure', { url: request.url, error: errorMessage });
      throw new TransportError(`Transport failure: ${errorMessage}`, error);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
    this.logger?.debug('HTTP transport closed');
  }

  isClosed(): boolean {
    return this.closed;
  }

  private bodyAsText(data: unknown): string {
    if (data === undefined || data === null) return '';
    if (typeof data === 'string') return data;
    if (Buffer.isBuffer(data)) return data.toString('utf8');
    return JSON.stringify(data);
  }
}
