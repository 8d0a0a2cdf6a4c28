import { ConnectionError } from '../errors';
import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

/**
 * fetch-based HTTP transport.
 * Uses the global fetch API and converts the Response to a RawHttpResponse.
 */
export const fetchTransport: HttpTransport = async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
  let response: Response;
  try {
    response = await fetch(req.url, {
      method: req.method,
      headers: req.headers,
      signal,
    });
  } catch (error) {
    throw toTransportError(error);
  }

  let body: ArrayBuffer;
  try {
    body = await response.arrayBuffer();
  } catch (error) {
    throw toTransportError(error);
  }

  // Convert Headers object to plain object
  const headers: HttpHeaders = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });

  return {
    status: response.status,
    headers,
    body,
  };
};

// undici reports every network-level failure as TypeError('fetch failed') or
// 'terminated' with the socket error attached as `cause`.
function toTransportError(error: unknown): unknown {
  if (error instanceof Error && error.name === 'AbortError') {
    return error;
  }
  if (error instanceof TypeError && (error.message === 'fetch failed' || error.message === 'terminated')) {
    const detail = error.cause instanceof Error ? error.cause.message : error.message;
    return new ConnectionError(`Connection failed: ${detail}`, { cause: error });
  }
  return error;
}
