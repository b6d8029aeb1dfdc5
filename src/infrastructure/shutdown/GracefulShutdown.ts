import { EXIT_CODES } from '../../application/config/DiagnosticDefaults';
import { errorMessage } from '../../domain/errors/AppErrors';
import { getLogger } from '../logging';

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';
export type CleanupTask = () => Promise<void>;

const SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

export function exitCodeForSignal(signal: ShutdownSignal): number {
  return signal === 'SIGINT' ? EXIT_CODES.INTERRUPTED : EXIT_CODES.TERMINATED;
}

/**
 * Runs cleanup tasks once on SIGINT/SIGTERM, newest first, then exits
 * with the signal's conventional code.
 */
export class GracefulShutdown {
  private readonly logger = getLogger('Shutdown');
  private readonly tasks: CleanupTask[] = [];
  private stopping = false;

  constructor(private readonly exit: (code: number) => void = code => process.exit(code)) {}

  listen(): void {
    for (const signal of SIGNALS) {
      process.once(signal, () => void this.shutdown(signal));
    }
  }

  onShutdown(task: CleanupTask): void {
    this.tasks.unshift(task);
  }

  async shutdown(signal: ShutdownSignal): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    this.logger.info(`Received ${signal}, cleaning up`);

    for (const task of this.tasks) {
      try {
        await task();
      } catch (error) {
        this.logger.warn(`Cleanup failed: ${errorMessage(error)}`);
      }
    }

    this.exit(exitCodeForSignal(signal));
  }
}
