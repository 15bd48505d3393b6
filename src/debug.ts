import type { DebugEvent } from './types';

const PREFIX = '[DocumentStack]';

/**
 * Default debug sink: writes request and response lines to console.debug
 */
export function consoleDebugSink(event: DebugEvent): void {
  switch (event.type) {
    case 'request':
      console.debug(`${PREFIX} Request: ${event.method} ${event.url}`);
      console.debug(`${PREFIX} Body: ${event.body}`);
      break;
    case 'response':
      console.debug(
        `${PREFIX} Response: filename=${event.filename}, time=${event.generationTimeMs}ms, size=${event.contentLength}`
      );
      break;
  }
}
