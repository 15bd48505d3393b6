/**
 * DocumentStack SDK - TypeScript/JavaScript client for the DocumentStack PDF generation API
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { DocumentStack } from '@documentstack/sdk';
 *
 * const client = new DocumentStack({ apiKey: 'your-api-key' });
 *
 * // Generate a PDF
 * const result = await client.generate('invoice-template', {
 *   data: { customer: 'Acme Corp', total: 1250 },
 * });
 *
 * console.log(result.filename, result.contentLength);
 * ```
 */

// Main client
export { DocumentStack } from './client';

// Debug output
export { consoleDebugSink } from './debug';

// Types
export type {
  // Configuration
  DocumentStackConfig,
  ResolvedConfig,

  // Template data
  JsonValue,
  TemplateData,

  // Generation
  GenerateOptions,
  GenerateRequest,
  GenerateResponse,
  RequestOptions,

  // Debug
  DebugEvent,
  DebugSink,

  // Errors
  ApiErrorBody,
} from './types';

export type { ErrorKind, StatusCategory, DocumentStackFailure } from './errors';

// Error classes and helpers
export {
  DocumentStackError,
  ConfigurationError,
  ValidationError,
  NetworkError,
  TimeoutError,
  ApiError,
  RateLimitError,
  isDocumentStackError,
  errorFromResponse,
  statusCategory,
  isValidationStatus,
  isAuthenticationStatus,
  isForbiddenStatus,
  isNotFoundStatus,
  isRateLimitStatus,
  isServerErrorStatus,
} from './errors';
