import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { BROWSER } from '../../application/config/DiagnosticDefaults';
import { ConfigurationError, errorMessage } from '../../domain/errors/AppErrors';
import { ProbeSpec } from '../../domain/probes/ProbeSpec';
import { AppConfig, AppConfigSchema, ProbeCatalogSchema } from './ConfigSchema';

// Load env vars
dotenv.config();

/**
 * Overrides taken from the command line; they win over the environment.
 */
export interface CLIConfigOverrides {
  catalog?: string;
  headless?: boolean;
  settleWindowMs?: number;
  deadlineMs?: number;
  concurrency?: number;
  format?: string;
  output?: string;
  logLevel?: string;
}

/**
 * Validated configuration together with the probe catalog it points at.
 */
export interface LoadedConfig extends AppConfig {
  probes: ProbeSpec[];
}

type Env = Record<string, string | undefined>;

function envValue(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function envInt(env: Env, name: string): number | undefined {
  const value = envValue(env, name);
  return value !== undefined ? parseInt(value, 10) : undefined;
}

function formatIssues(error: z.ZodError, source: string): string {
  const lines = error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `  - ${where}: ${issue.message}`;
  });
  return `Invalid ${source}:\n${lines.join('\n')}`;
}

export class ConfigFactory {
  /**
   * Builds the run configuration from CLI overrides, the environment
   * (including `.env`) and defaults, then loads the probe catalog.
   */
  static load(cliOptions: CLIConfigOverrides = {}, env: Env = process.env): LoadedConfig {
    const rawConfig = {
      catalogPath: cliOptions.catalog ?? envValue(env, 'PROBE_CATALOG'),
      run: {
        deadlineMs: cliOptions.deadlineMs ?? envInt(env, 'RUN_DEADLINE_MS'),
        concurrency: cliOptions.concurrency ?? envInt(env, 'PROBE_CONCURRENCY'),
        defaultTimeoutMs: envInt(env, 'PROBE_TIMEOUT_MS'),
      },
      browser: {
        headless: cliOptions.headless ?? envValue(env, 'HEADLESS'),
        settleWindowMs: cliOptions.settleWindowMs ?? envInt(env, 'SETTLE_WINDOW_MS'),
        navigationTimeoutMs: envInt(env, 'NAVIGATION_TIMEOUT_MS'),
        readyTimeoutMs: envInt(env, 'READY_TIMEOUT_MS'),
        triggerTimeoutMs: envInt(env, 'TRIGGER_TIMEOUT_MS'),
        captureConsoleErrors: envValue(env, 'CAPTURE_CONSOLE_ERRORS'),
        screenshotDir: envValue(env, 'SCREENSHOT_DIR'),
      },
      tracking: {
        hosts: envValue(env, 'TRACKED_HOSTS')
          ?.split(',')
          .map(h => h.trim())
          .filter(Boolean),
      },
      report: {
        format: cliOptions.format ?? envValue(env, 'REPORT_FORMAT'),
        output: cliOptions.output ?? envValue(env, 'REPORT_OUTPUT'),
      },
      logging: {
        level: cliOptions.logLevel ?? envValue(env, 'LOG_LEVEL'),
        json: envValue(env, 'LOG_JSON'),
      },
    };

    // Parse and validate
    const result = AppConfigSchema.safeParse(rawConfig);
    if (!result.success) {
      throw new ConfigurationError(formatIssues(result.error, 'configuration'));
    }

    const config = result.data;
    return {
      ...config,
      probes: ConfigFactory.loadCatalog(config.catalogPath, config.run.defaultTimeoutMs),
    };
  }

  /**
   * Reads and validates a probe catalog file. Network probes without a
   * timeout get `defaultTimeoutMs`; browser probes get a session-length default.
   */
  static loadCatalog(catalogPath: string, defaultTimeoutMs: number): ProbeSpec[] {
    const resolved = path.resolve(catalogPath);

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Cannot read probe catalog '${resolved}': ${errorMessage(error)}`);
    }

    return ConfigFactory.parseCatalog(raw, defaultTimeoutMs, `probe catalog '${resolved}'`);
  }

  /**
   * Validates an already-parsed catalog document.
   */
  static parseCatalog(raw: unknown, defaultTimeoutMs: number, source = 'probe catalog'): ProbeSpec[] {
    const result = ProbeCatalogSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigurationError(formatIssues(result.error, source));
    }

    return result.data.probes.map(probe => ({
      ...probe,
      timeoutMs:
        probe.timeoutMs ??
        (probe.kind === 'BROWSER_LAYER_TRIGGER' ? BROWSER.DEFAULT_SESSION_TIMEOUT_MS : defaultTimeoutMs),
    }));
  }
}
