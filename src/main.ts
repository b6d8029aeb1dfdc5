#!/usr/bin/env node
import { exitCodeForStatus } from './application/config/DiagnosticDefaults';
import { ConfigurationError, errorMessage } from './domain/errors/AppErrors';
import { CLIInputParser } from './infrastructure/cli/CLIInputParser';
import { CompositionRoot } from './infrastructure/di/CompositionRoot';
import { getLogger } from './infrastructure/logging';
import { GracefulShutdown } from './infrastructure/shutdown/GracefulShutdown';

/**
 * Main entry point for the vessel overlay diagnostic.
 */
async function main(): Promise<void> {
  const options = CLIInputParser.parse(process.argv.slice(2));
  const logger = getLogger('Run');

  if (options.help) {
    // eslint-disable-next-line no-console
    console.log(CLIInputParser.getHelpText());
    process.exit(0);
  }

  if (options.unknown.length > 0) {
    // eslint-disable-next-line no-console
    console.error(`Unknown arguments: ${options.unknown.join(', ')}\n${CLIInputParser.getHelpText()}`);
    process.exit(exitCodeForStatus('SETUP_FAILURE'));
  }

  const shutdown = new GracefulShutdown();
  shutdown.listen();

  try {
    const container = CompositionRoot.initialize(options);
    shutdown.onShutdown(container.closeBrowser);

    const outcome = await container.diagnosticService.run();
    if (outcome.status === 'SETUP_FAILURE') {
      logger.error(`Setup failed, no report written: ${outcome.error.message}`);
    } else {
      const location = await container.reportSink.write(outcome.report);
      logger.info(`Verdict: ${outcome.report.verdict.label}`, { status: outcome.status, report: location });
    }
    process.exit(exitCodeForStatus(outcome.status));
  } catch (error) {
    const message = error instanceof ConfigurationError ? error.message : `Diagnostic failed: ${errorMessage(error)}`;
    logger.error(message);
    process.exit(exitCodeForStatus('SETUP_FAILURE'));
  }
}

main().catch(error => {
  // eslint-disable-next-line no-console
  console.error('Error:', error);
  process.exit(1);
});
