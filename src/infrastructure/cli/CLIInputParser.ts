import { CLIConfigOverrides } from '../config/ConfigFactory';

/**
 * Interface for parsed CLI options.
 */
export interface CLIOptions extends CLIConfigOverrides {
  help?: boolean;
  verbose?: boolean;
  /** Flags that were not recognized */
  unknown: string[];
}

const VALUE_FLAGS: Record<string, 'catalog' | 'format' | 'output' | 'logLevel'> = {
  '--catalog': 'catalog',
  '--format': 'format',
  '--output': 'output',
  '--log-level': 'logLevel',
};

const NUMBER_FLAGS: Record<string, 'settleWindowMs' | 'deadlineMs' | 'concurrency'> = {
  '--settle': 'settleWindowMs',
  '--deadline': 'deadlineMs',
  '--concurrency': 'concurrency',
};

/**
 * Handles parsing of command line arguments into configuration overrides.
 * Values are validated later, together with the environment.
 */
export class CLIInputParser {
  /**
   * Parse command line arguments.
   * @param args - Arguments array (usually process.argv.slice(2))
   */
  static parse(args: string[]): CLIOptions {
    const options: CLIOptions = { unknown: [] };

    for (let i = 0; i < args.length; i++) {
      const [flag, inlineValue] = CLIInputParser.splitFlag(args[i]);

      if (flag === '--help' || flag === '-h') {
        options.help = true;
        return options;
      }

      if (flag === '--headed') {
        options.headless = false;
      } else if (flag === '--headless') {
        options.headless = true;
      } else if (flag === '--verbose' || flag === '-v') {
        options.verbose = true;
      } else if (flag in VALUE_FLAGS || flag in NUMBER_FLAGS) {
        let value = inlineValue;
        if (value === undefined) {
          const next = args[i + 1];
          if (next !== undefined && !next.startsWith('--')) {
            value = next;
            i++;
          }
        }
        if (value === undefined) {
          options.unknown.push(`${flag} (missing value)`);
          continue;
        }

        if (flag in NUMBER_FLAGS) {
          options[NUMBER_FLAGS[flag]] = Number(value);
        } else {
          options[VALUE_FLAGS[flag]] = value;
        }
      } else {
        options.unknown.push(args[i]);
      }
    }

    return options;
  }

  private static splitFlag(arg: string): [string, string | undefined] {
    const eq = arg.indexOf('=');
    if (arg.startsWith('--') && eq > 0) {
      return [arg.slice(0, eq), arg.slice(eq + 1)];
    }
    return [arg, undefined];
  }

  /**
   * Generate help text for the CLI.
   */
  static getHelpText(): string {
    return `
Vessel Overlay Diagnostics

Probes the AIS data providers, the map service backend and the live page,
then reports which link in the chain is broken.

Usage:
  overlay-diagnose [options]

Options:
  --catalog <path>       Probe catalog JSON (default: config/probes.json)
  --headed               Show the browser window
  --headless             Run the browser without a window (default)
  --settle <ms>          Observation window after activating the overlay
  --deadline <ms>        Global deadline for the whole run
  --concurrency <n>      Network probes in flight at once
  --format <json|markdown>  Report format (default: json)
  --output <dir|->       Report directory, or - for stdout (default: ./reports)
  --log-level <level>    debug, info, warn or error
  --verbose, -v          Log every probe result
  --help, -h             Show this help message

Exit codes:
  0  every probe succeeded and no tracked request failed
  2  failures detected (see the report)
  1  setup failure, no report written
  130  interrupted

Examples:
  overlay-diagnose --format markdown --output ./reports
  overlay-diagnose --headed --settle 30000
`;
  }
}
