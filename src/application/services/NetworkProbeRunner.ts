import { NetworkError, errorMessage } from '../../domain/errors/AppErrors';
import { DnsProbeSpec, HttpProbeSpec, NetworkProbeSpec, probeHost } from '../../domain/probes/ProbeSpec';
import { ProbeOutcome, ProbeResult, createProbeResult } from '../../domain/probes/ProbeResult';
import { StatusPattern } from '../../domain/probes/StatusPattern';
import { getLogger } from '../../infrastructure/logging';
import { DnsResolverPort } from '../ports/DnsResolverPort';
import { HttpClientPort } from '../ports/HttpClientPort';

const logger = getLogger('Probe');

export interface ProbeRunOptions {
  /** Caps the spec timeout, e.g. with the time left before the run deadline */
  timeoutMs?: number;
  /** Run-level cancellation */
  signal?: AbortSignal;
}

/**
 * Executes DNS and HTTP probes through the resolver and HTTP ports and
 * normalizes every outcome into a ProbeResult. Never throws for network
 * conditions.
 */
export class NetworkProbeRunner {
  constructor(
    private readonly dns: DnsResolverPort,
    private readonly http: HttpClientPort
  ) {}

  async run(spec: NetworkProbeSpec, options: ProbeRunOptions = {}): Promise<ProbeResult> {
    const timeoutMs = Math.max(0, Math.min(spec.timeoutMs, options.timeoutMs ?? spec.timeoutMs));
    const started = Date.now();

    logger.debug(`Running ${spec.id}`, { kind: spec.kind, target: spec.target, timeoutMs });

    let outcome: ProbeOutcome;
    try {
      outcome = await this.withTimeout(timeoutMs, options.signal, signal =>
        spec.kind === 'DNS_RESOLUTION'
          ? this.probeDns(spec, signal)
          : this.probeHttp(spec, signal)
      );
    } catch (error) {
      outcome = this.toFailureOutcome(spec, error, timeoutMs);
    }

    const result = createProbeResult(spec, {
      ...outcome,
      latencyMs: Date.now() - started,
    });

    const context = { status: result.status, latencyMs: result.latencyMs };
    if (result.status === 'SUCCESS') {
      logger.info(`${spec.id} ok`, context);
    } else {
      logger.warn(`${spec.id} ${result.status}`, { ...context, errorKind: result.errorKind, detail: result.detail });
    }
    return result;
  }

  private async probeDns(spec: DnsProbeSpec, signal: AbortSignal): Promise<ProbeOutcome> {
    const host = probeHost(spec);
    const addresses = await this.dns.resolve(host, signal);
    if (addresses.length === 0) {
      return {
        status: 'FAILURE',
        errorKind: 'DNS_FAILURE',
        detail: `${host} resolved to no addresses`,
      };
    }
    return { status: 'SUCCESS', detail: `Resolved to ${addresses.join(', ')}` };
  }

  private async probeHttp(spec: HttpProbeSpec, signal: AbortSignal): Promise<ProbeOutcome> {
    const response = await this.http.get({ url: spec.target, headers: spec.headers, signal });
    const status = response.status;

    const expected = spec.expectedStatus !== undefined ? StatusPattern.parse(spec.expectedStatus) : undefined;
    const statusOk = expected ? expected.matches(status) : status >= 200 && status < 400;

    if (!statusOk) {
      const wanted = expected ? expected.toString() : '2xx/3xx';
      return {
        status: 'FAILURE',
        httpStatus: status,
        errorKind: 'HTTP_STATUS',
        detail: `HTTP ${status} ${response.statusText}`.trim() + `, expected ${wanted}`,
      };
    }

    if (spec.expectedContentType !== undefined) {
      const contentType = response.contentType ?? '';
      if (!contentType.toLowerCase().includes(spec.expectedContentType.toLowerCase())) {
        return {
          status: 'FAILURE',
          httpStatus: status,
          errorKind: 'UNEXPECTED_CONTENT',
          detail: `Content type '${contentType || 'none'}' does not contain '${spec.expectedContentType}'`,
        };
      }
    }

    return {
      status: 'SUCCESS',
      httpStatus: status,
      detail: `${response.bodyBytes} bytes${response.contentType ? ` (${response.contentType})` : ''}`,
    };
  }

  /**
   * Runs `task` with a signal that aborts after `timeoutMs` or when the
   * run signal aborts. Rejects with a TIMEOUT NetworkError in either case,
   * even if the port ignores the signal.
   */
  private withTimeout<T>(
    timeoutMs: number,
    external: AbortSignal | undefined,
    task: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
      let settled = false;
      const finish = (fn: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        external?.removeEventListener('abort', onExternalAbort);
        fn();
      };

      const onTimeout = (): void => {
        controller.abort();
        finish(() => reject(new NetworkError('TIMEOUT', `No answer within ${timeoutMs}ms`)));
      };
      const onExternalAbort = (): void => {
        controller.abort();
        finish(() => reject(new NetworkError('TIMEOUT', 'Run deadline reached before the probe completed')));
      };

      const timer = setTimeout(onTimeout, timeoutMs);
      if (external?.aborted) {
        onExternalAbort();
        return;
      }
      external?.addEventListener('abort', onExternalAbort, { once: true });

      task(controller.signal).then(
        value => finish(() => resolve(value)),
        (error: unknown) => finish(() => reject(error))
      );
    });
  }

  private toFailureOutcome(spec: NetworkProbeSpec, error: unknown, timeoutMs: number): ProbeOutcome {
    if (error instanceof NetworkError) {
      if (error.kind === 'TIMEOUT') {
        return { status: 'TIMEOUT', errorKind: 'TIMEOUT', detail: error.message };
      }
      if (error.kind === 'DNS_FAILURE') {
        // Name does not exist: a definite answer for DNS probes, a setup error for HTTP ones.
        return {
          status: spec.kind === 'DNS_RESOLUTION' ? 'FAILURE' : 'ERROR',
          errorKind: 'DNS_FAILURE',
          detail: error.message,
        };
      }
      return {
        status: 'ERROR',
        errorKind: error.kind,
        detail: error.message,
        ...(error.statusCode !== undefined && { httpStatus: error.statusCode }),
      };
    }

    logger.error(`${spec.id} raised an unexpected error`, { error: errorMessage(error), timeoutMs });
    return {
      status: 'ERROR',
      errorKind: spec.kind === 'DNS_RESOLUTION' ? 'RESOLVER_FAILURE' : 'CONNECTION_FAILURE',
      detail: errorMessage(error),
    };
  }
}
