/**
 * DocumentStack SDK Types
 */

// ============ Configuration ============

export interface DocumentStackConfig {
  /** API key for authentication (sent as a Bearer token) */
  apiKey: string;
  /** Base URL for the API (default: https://api.documentstack.dev) */
  baseUrl?: string;
  /** Request timeout in seconds (default: 30) */
  timeout?: number;
  /** Custom headers sent with every request */
  headers?: Record<string, string>;
  /** Emit request/response events to `onDebug` (default: false) */
  debug?: boolean;
  /** Receiver for debug events (default: writes to console.debug) */
  onDebug?: DebugSink;
  /** Custom fetch implementation */
  fetch?: typeof fetch;
}

/**
 * Configuration after defaults have been applied
 */
export interface ResolvedConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly timeout: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly debug: boolean;
}

// ============ Template Data ============

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type TemplateData = Record<string, JsonValue>;

// ============ Generation ============

export interface GenerateOptions {
  /** Custom filename for the generated PDF (without the .pdf extension) */
  filename?: string;
}

export interface GenerateRequest {
  /** Template data for variable substitution */
  data?: TemplateData;
  /** Generation options */
  options?: GenerateOptions;
}

export interface RequestOptions {
  /** Cancels the request, or times it out when aborted with a TimeoutError reason */
  signal?: AbortSignal;
}

export interface GenerateResponse {
  /** PDF binary data */
  pdf: Uint8Array;
  /** Filename from the Content-Disposition header */
  filename: string;
  /** Server-side generation time in milliseconds */
  generationTimeMs: number;
  /** Content length in bytes */
  contentLength: number;
}

// ============ Debug ============

export type DebugEvent =
  | { type: 'request'; method: 'POST'; url: string; body: string }
  | { type: 'response'; filename: string; generationTimeMs: number; contentLength: number };

export type DebugSink = (event: DebugEvent) => void;

// ============ Errors ============

export interface ApiErrorBody {
  error: string;
  message: string;
  details?: unknown;
}
