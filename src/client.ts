/**
 * DocumentStack SDK Client
 */

import type {
  DocumentStackConfig,
  ResolvedConfig,
  GenerateRequest,
  GenerateResponse,
  RequestOptions,
  DebugEvent,
  DebugSink,
} from './types';

import {
  ConfigurationError,
  ValidationError,
  NetworkError,
  TimeoutError,
  errorFromResponse,
} from './errors';
import { parseFilename, parseIntegerHeader } from './headers';
import { consoleDebugSink } from './debug';

const DEFAULT_BASE_URL = 'https://api.documentstack.dev';
const DEFAULT_TIMEOUT = 30;
const SDK_VERSION = '0.1.0';
// setTimeout fires after 1ms for delays above this
const MAX_TIMER_DELAY = 2 ** 31 - 1;

/**
 * DocumentStack API Client
 *
 * @example
 * ```typescript
 * import { DocumentStack } from '@documentstack/sdk';
 *
 * const client = new DocumentStack({ apiKey: 'your-api-key' });
 *
 * const result = await client.generate('template-id', {
 *   data: { name: 'Jane Doe', amount: 100 },
 *   options: { filename: 'invoice' },
 * });
 *
 * await writeFile(result.filename, result.pdf);
 * ```
 */
export class DocumentStack {
  /** Configuration with defaults applied */
  readonly config: ResolvedConfig;
  private readonly fetchFn: typeof fetch;
  private readonly onDebug: DebugSink;

  constructor(config: DocumentStackConfig) {
    if (!config.apiKey) {
      throw new ConfigurationError('API key is required');
    }

    const fetchFn: typeof fetch | undefined = config.fetch ?? globalThis.fetch;
    if (typeof fetchFn !== 'function') {
      throw new ConfigurationError(
        'fetch is not available. Please provide a fetch implementation or use Node.js 18+'
      );
    }

    this.config = Object.freeze({
      apiKey: config.apiKey,
      baseUrl: (config.baseUrl || DEFAULT_BASE_URL).replace(/\/$/, ''),
      timeout: config.timeout !== undefined && config.timeout > 0 ? config.timeout : DEFAULT_TIMEOUT,
      headers: Object.freeze({ ...config.headers }),
      debug: config.debug ?? false,
    });
    this.fetchFn = fetchFn;
    this.onDebug = config.onDebug ?? consoleDebugSink;
  }

  /**
   * Generate a PDF from a template
   *
   * @param templateId - ID of the template to render
   * @param request - Template data and generation options
   * @param options - Per-call options; `signal` cancels the request
   * @returns The PDF bytes and response metadata
   *
   * @example
   * ```typescript
   * const result = await client.generate(
   *   'invoice-template',
   *   { data: { customer: 'Acme' } },
   *   { signal: AbortSignal.timeout(10_000) },
   * );
   * ```
   */
  async generate(
    templateId: string,
    request: GenerateRequest = {},
    options: RequestOptions = {}
  ): Promise<GenerateResponse> {
    if (!templateId) {
      throw new ValidationError('Template ID is required');
    }

    const url = `${this.config.baseUrl}/api/v1/generate/${encodeURIComponent(templateId)}`;
    const body = this.serialize(request);

    this.debug({ type: 'request', method: 'POST', url, body });

    const { signal } = options;
    if (signal?.aborted) {
      throw this.dispatchFailure(signal.reason, signal);
    }

    // One controller for both the configured timeout and the caller's signal
    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(),
      Math.min(this.config.timeout * 1000, MAX_TIMER_DELAY)
    );
    const forwardAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const fetchFn = this.fetchFn;
      let response: Response;
      try {
        response = await fetchFn(url, {
          method: 'POST',
          headers: this.buildHeaders(),
          body,
          signal: controller.signal,
        });
      } catch (error) {
        throw this.dispatchFailure(error, signal);
      }

      if (response.status !== 200) {
        throw await errorFromResponse(response);
      }

      let pdf: Uint8Array;
      try {
        pdf = new Uint8Array(await response.arrayBuffer());
      } catch (error) {
        throw new NetworkError('failed to read response body', error);
      }

      const filename = parseFilename(response.headers.get('Content-Disposition'));
      const generationTimeMs = parseIntegerHeader(response.headers.get('X-Generation-Time-Ms'));
      let contentLength = parseIntegerHeader(response.headers.get('Content-Length'));
      if (contentLength === 0) {
        contentLength = pdf.byteLength;
      }

      this.debug({ type: 'response', filename, generationTimeMs, contentLength });

      return { pdf, filename, generationTimeMs, contentLength };
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  // ============ Internal Methods ============

  /**
   * Encode the request body, leaving out empty data and absent options
   */
  private serialize(request: GenerateRequest): string {
    const payload: GenerateRequest = {};
    if (request.data && Object.keys(request.data).length > 0) {
      payload.data = request.data;
    }
    if (request.options) {
      payload.options = request.options.filename ? { filename: request.options.filename } : {};
    }

    try {
      return JSON.stringify(payload);
    } catch (error) {
      throw new NetworkError('failed to serialize request body', error);
    }
  }

  private buildHeaders(): Headers {
    const headers = new Headers({
      'Content-Type': 'application/json',
      'Authorization': `Bearer ${this.config.apiKey}`,
    });

    // Only set User-Agent outside browsers (browsers forbid this header)
    if (typeof window === 'undefined') {
      headers.set('User-Agent', `documentstack-sdk-js/${SDK_VERSION}`);
    }

    for (const [name, value] of Object.entries(this.config.headers)) {
      headers.set(name, value);
    }

    return headers;
  }

  private dispatchFailure(
    error: unknown,
    signal: AbortSignal | undefined
  ): TimeoutError | NetworkError {
    // Only the caller's deadline is a timeout; the transport timer is a network failure
    if (isDeadlineExceeded(signal)) {
      return new TimeoutError(this.config.timeout);
    }
    return new NetworkError('request failed', error);
  }

  private debug(event: DebugEvent): void {
    if (this.config.debug) {
      this.onDebug(event);
    }
  }
}

/**
 * True when the caller's signal fired because its deadline passed,
 * e.g. one created with AbortSignal.timeout()
 */
function isDeadlineExceeded(signal: AbortSignal | undefined): boolean {
  if (!signal?.aborted) {
    return false;
  }
  const reason: unknown = signal.reason;
  return (
    typeof reason === 'object' &&
    reason !== null &&
    'name' in reason &&
    reason.name === 'TimeoutError'
  );
}
