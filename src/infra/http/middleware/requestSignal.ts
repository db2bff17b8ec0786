import type { ServerResponse } from 'http';

/**
 * Signal that fires when the client goes away before the response is
 * written. Passed down to adapters so in-flight backend calls get cancelled.
 */
export function requestSignal(res: ServerResponse): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}
