import { z } from 'zod';
import { debug } from '../debug.js';
import { DEFAULT_RETRY_POLICY, withRetry } from './retry.js';
import type { RetryPolicy } from './retry.js';

const SamplePairSchema = z.tuple([z.number(), z.string()]);

const InstantVectorSchema = z.array(
  z.object({
    metric: z.record(z.string()).default({}),
    value: SamplePairSchema,
  }),
);

const RangeMatrixSchema = z.array(
  z.object({
    metric: z.record(z.string()).default({}),
    values: z.array(SamplePairSchema).default([]),
  }),
);

const ApiEnvelopeSchema = z.object({
  status: z.string(),
  data: z.object({ resultType: z.string(), result: z.unknown() }).optional(),
  errorType: z.string().optional(),
  error: z.string().optional(),
});

export type InstantVector = z.infer<typeof InstantVectorSchema>;
export type RangeMatrix = z.infer<typeof RangeMatrixSchema>;

export class PrometheusError extends Error {
  readonly status: number;
  readonly retryable: boolean;

  constructor(message: string, status: number, retryable: boolean) {
    super(message);
    this.name = 'PrometheusError';
    this.status = status;
    this.retryable = retryable;
  }
}

export const isRetryableStatus = (status: number): boolean => status === 429 || status >= 500;

export interface PrometheusClientOptions {
  token?: string;
  timeoutMs?: number;
  retry?: RetryPolicy;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export interface RangeQuery {
  /** Unix seconds. */
  start: number;
  end: number;
  step: string;
}

export class PrometheusClient {
  private readonly endpoint: string;
  private readonly token?: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(endpoint: string, options: PrometheusClientOptions = {}) {
    this.endpoint = endpoint.replace(/\/$/, '');
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep;
    debug('PrometheusClient initialized', { endpoint: this.endpoint, timeoutMs: this.timeoutMs });
  }

  private async requestOnce(path: string, params: URLSearchParams): Promise<unknown> {
    const url = `${this.endpoint}${path}?${params.toString()}`;
    const startedAt = Date.now();
    debug('prometheus api request start', { method: 'GET', path, query: params.get('query') });

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, { headers, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      debug('prometheus api request failed', { path, elapsedMs: Date.now() - startedAt, error: message });
      throw new PrometheusError(`Prometheus request failed: ${message}`, 0, true);
    }
    const elapsedMs = Date.now() - startedAt;

    if (!response.ok) {
      const body = await response.text();
      debug('prometheus api request failed', {
        status: response.status,
        statusText: response.statusText,
        elapsedMs,
        bodyPreview: body.slice(0, 500),
      });
      throw new PrometheusError(
        `Prometheus API error ${response.status}: ${body.slice(0, 500)}`,
        response.status,
        isRetryableStatus(response.status),
      );
    }

    const parsed = ApiEnvelopeSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new PrometheusError(`Unexpected Prometheus response for ${path}`, response.status, false);
    }
    const envelope = parsed.data;
    if (envelope.status !== 'success' || envelope.data === undefined) {
      throw new PrometheusError(
        `Prometheus query failed: ${envelope.errorType ?? 'error'}: ${envelope.error ?? 'no data'}`,
        response.status,
        false,
      );
    }
    debug('prometheus api request end', { status: response.status, elapsedMs, resultType: envelope.data.resultType });
    return envelope.data.result;
  }

  private request(path: string, params: URLSearchParams): Promise<unknown> {
    return withRetry(this.retry, () => this.requestOnce(path, params), {
      sleep: this.sleep,
      isRetryable: (error) => error instanceof PrometheusError && error.retryable,
    });
  }

  async queryInstant(query: string, time?: number): Promise<InstantVector> {
    const params = new URLSearchParams({ query });
    if (time !== undefined) params.set('time', String(time));
    const result = InstantVectorSchema.safeParse(await this.request('/api/v1/query', params));
    if (!result.success) {
      throw new PrometheusError(`Expected an instant vector for query ${query}`, 200, false);
    }
    return result.data;
  }

  async queryRange(query: string, range: RangeQuery): Promise<RangeMatrix> {
    const params = new URLSearchParams({
      query,
      start: String(range.start),
      end: String(range.end),
      step: range.step,
    });
    const result = RangeMatrixSchema.safeParse(await this.request('/api/v1/query_range', params));
    if (!result.success) {
      throw new PrometheusError(`Expected a range matrix for query ${query}`, 200, false);
    }
    return result.data;
  }
}
