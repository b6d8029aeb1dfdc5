import { HttpClientPort, HttpProbeRequest, HttpProbeResponse } from '../../application/ports/HttpClientPort';
import { PROBE } from '../../application/config/DiagnosticDefaults';
import { NetworkError, errorMessage } from '../../domain/errors/AppErrors';
import { NAME_NOT_FOUND_CODES, RESOLVER_TIMEOUT_CODES, TLS_ERROR_CODES, systemErrorCode } from './errorCodes';

/**
 * HTTP probe client on the runtime's fetch. One request, redirects
 * reported as-is, body drained so the latency covers the full transfer.
 */
export class FetchHttpClient implements HttpClientPort {
  constructor(private readonly userAgent: string = PROBE.USER_AGENT) {}

  async get(request: HttpProbeRequest): Promise<HttpProbeResponse> {
    try {
      const response = await fetch(request.url, {
        method: 'GET',
        redirect: 'manual',
        headers: { 'User-Agent': this.userAgent, ...request.headers },
        signal: request.signal,
      });
      const body = await response.arrayBuffer();

      return {
        status: response.status,
        statusText: response.statusText,
        contentType: response.headers.get('content-type') ?? undefined,
        bodyBytes: body.byteLength,
      };
    } catch (error) {
      throw this.toNetworkError(request, error);
    }
  }

  private toNetworkError(request: HttpProbeRequest, error: unknown): NetworkError {
    if (request.signal.aborted || (error instanceof Error && error.name === 'AbortError')) {
      return new NetworkError('TIMEOUT', `Request to ${request.url} aborted`);
    }

    const cause = error instanceof Error ? error.cause : undefined;
    const code = systemErrorCode(cause) ?? systemErrorCode(error);
    const reason = cause instanceof Error ? cause.message : errorMessage(error);

    if (code === 'ECONNREFUSED') {
      return new NetworkError('CONNECTION_REFUSED', `Connection refused by ${request.url}`, code);
    }
    if (code && NAME_NOT_FOUND_CODES.has(code)) {
      return new NetworkError('DNS_FAILURE', `Host of ${request.url} does not resolve (${code})`, code);
    }
    if (code && TLS_ERROR_CODES.has(code)) {
      return new NetworkError('TLS_FAILURE', `TLS handshake with ${request.url} failed: ${reason}`, code);
    }
    if (code === 'ETIMEDOUT' || code === 'UND_ERR_CONNECT_TIMEOUT' || (code && RESOLVER_TIMEOUT_CODES.has(code))) {
      return new NetworkError('TIMEOUT', `Connection to ${request.url} timed out (${code})`, code);
    }
    return new NetworkError('CONNECTION_FAILURE', `Request to ${request.url} failed: ${reason}`, code);
  }
}
