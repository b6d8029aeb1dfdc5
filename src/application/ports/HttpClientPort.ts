/**
 * A single GET request issued by a probe.
 */
export interface HttpProbeRequest {
  url: string;
  headers?: Readonly<Record<string, string>>;
  /** Aborted when the probe times out or the run deadline passes */
  signal: AbortSignal;
}

/**
 * What a probe needs to know about the response.
 */
export interface HttpProbeResponse {
  status: number;
  statusText: string;
  contentType?: string;
  bodyBytes: number;
}

/**
 * Port for issuing HTTP probe requests. Redirects are not followed.
 *
 * Any response, whatever its status, resolves. Connection failures throw
 * `NetworkError` (`CONNECTION_REFUSED`, `TLS_FAILURE`, `DNS_FAILURE`,
 * `CONNECTION_FAILURE`); an aborted signal throws kind `TIMEOUT`.
 */
export interface HttpClientPort {
  get(request: HttpProbeRequest): Promise<HttpProbeResponse>;
}
