/**
 * Fetcher Types
 * Contract of the page fetcher and of the HTTP transport it wraps
 */

export enum FetchFailureType {
  TIMEOUT = 'TIMEOUT',
  HTTP_ERROR = 'HTTP_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  CANCELLED = 'CANCELLED',
}

export interface FetchFailure {
  type: FetchFailureType;
  message: string;
  statusCode?: number;
}

export interface FetchSuccess {
  ok: true;
  url: string;
  finalUrl: string;
  statusCode: number;
  contentType: string;
  body: string;
  fetchedAt: Date;
  duration: number;
}

export interface FetchError {
  ok: false;
  url: string;
  error: FetchFailure;
  duration: number;
}

export type FetchResult = FetchSuccess | FetchError;

export interface FetchOptions {
  timeoutMs?: number;
  /**
   * Job-level cancellation; aborts the in-flight request
   */
  signal?: AbortSignal;
}

/**
 * Minimal response shape the fetcher needs from a transport
 */
export interface TransportResponse {
  status: number;
  url: string;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
  /**
   * Stream handle used to drop a body that will not be read
   */
  body?: { cancel(): Promise<void> } | null;
}

export interface TransportRequest {
  headers: Record<string, string>;
  signal: AbortSignal;
}

/**
 * The external HTTP collaborator. Defaults to the global fetch.
 */
export type HttpTransport = (url: string, request: TransportRequest) => Promise<TransportResponse>;

export interface PageFetcherOptions {
  timeoutMs: number;
  perDomainConcurrency: number;
  userAgent: string;
  transport?: HttpTransport;
}
