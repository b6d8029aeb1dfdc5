import { z } from 'zod';
import { BROWSER, PROBE, REPORT, RUN, TRACKING } from '../../application/config/DiagnosticDefaults';
import { StatusPattern } from '../../domain/probes/StatusPattern';

const FLAG_VALUES = new Map<string, boolean>([
  ['true', true],
  ['1', true],
  ['yes', true],
  ['on', true],
  ['false', false],
  ['0', false],
  ['no', false],
  ['off', false],
]);

/**
 * A boolean from the CLI, or its spelling in an environment variable.
 */
export const FlagSchema = z.union([z.boolean(), z.string()]).transform((value, ctx) => {
  if (typeof value === 'boolean') return value;
  const flag = FLAG_VALUES.get(value.toLowerCase());
  if (flag === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected one of ${[...FLAG_VALUES.keys()].join(', ')}, received '${value}'`,
    });
    return z.NEVER;
  }
  return flag;
});

export const RunSchema = z.object({
  deadlineMs: z.number().int().positive().default(RUN.DEFAULT_DEADLINE_MS),
  concurrency: z.number().int().min(1).max(RUN.MAX_CONCURRENCY).default(RUN.DEFAULT_CONCURRENCY),
  defaultTimeoutMs: z.number().int().positive().default(PROBE.DEFAULT_TIMEOUT_MS),
});

export const BrowserSchema = z.object({
  headless: FlagSchema.default(true),
  width: z.number().int().positive().default(BROWSER.DEFAULT_VIEWPORT_WIDTH),
  height: z.number().int().positive().default(BROWSER.DEFAULT_VIEWPORT_HEIGHT),
  settleWindowMs: z.number().int().nonnegative().default(BROWSER.DEFAULT_SETTLE_WINDOW_MS),
  navigationTimeoutMs: z.number().int().positive().default(BROWSER.DEFAULT_NAVIGATION_TIMEOUT_MS),
  readyTimeoutMs: z.number().int().positive().default(BROWSER.DEFAULT_READY_TIMEOUT_MS),
  triggerTimeoutMs: z.number().int().positive().default(BROWSER.DEFAULT_TRIGGER_TIMEOUT_MS),
  captureConsoleErrors: FlagSchema.default(false),
  screenshotDir: z.string().min(1).optional(),
});

export const TrackingSchema = z.object({
  hosts: z.array(z.string().min(1)).min(1).default([...TRACKING.DEFAULT_HOSTS]),
});

export const ReportSchema = z.object({
  format: z.enum(['json', 'markdown']).default(REPORT.DEFAULT_FORMAT),
  /** Output directory, or `-` for stdout */
  output: z.string().min(1).default(REPORT.DEFAULT_OUTPUT_DIR),
});

export const LoggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  json: FlagSchema.default(false),
});

export const AppConfigSchema = z.object({
  catalogPath: z.string().min(1).default(PROBE.DEFAULT_CATALOG_PATH),
  run: RunSchema.default({}),
  browser: BrowserSchema.default({}),
  tracking: TrackingSchema.default({}),
  report: ReportSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

const ProbeBaseSchema = z.object({
  id: z.string().regex(/^[A-Za-z0-9._-]+$/, 'Probe ids may only contain letters, digits, dot, dash and underscore'),
  role: z.enum(['provider', 'service']),
  timeoutMs: z.number().int().positive().optional(),
  description: z.string().optional(),
});

const UrlSchema = z
  .string()
  .url()
  .refine(value => /^https?:\/\//i.test(value), 'Only http and https URLs can be probed');

export const DnsProbeSchema = ProbeBaseSchema.extend({
  kind: z.literal('DNS_RESOLUTION'),
  target: z.string().regex(/^[A-Za-z0-9.-]+$/, 'DNS targets must be bare hostnames'),
});

export const HttpProbeSchema = ProbeBaseSchema.extend({
  kind: z.literal('HTTP_GET'),
  target: UrlSchema,
  expectedStatus: z
    .string()
    .optional()
    .superRefine((value, ctx) => {
      const problem = value === undefined ? null : StatusPattern.validate(value);
      if (problem) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
      }
    }),
  expectedContentType: z.string().min(1).optional(),
  headers: z.record(z.string()).optional(),
});

export const BrowserProbeSchema = ProbeBaseSchema.extend({
  kind: z.literal('BROWSER_LAYER_TRIGGER'),
  target: UrlSchema,
  trigger: z.object({
    selectors: z.array(z.string().min(1)).min(1),
    revealSelector: z.string().min(1).optional(),
    readySelector: z.string().min(1).optional(),
  }),
});

export const ProbeCatalogSchema = z.object({
  probes: z
    .array(z.discriminatedUnion('kind', [DnsProbeSchema, HttpProbeSchema, BrowserProbeSchema]))
    .min(1),
});

export type ProbeCatalog = z.infer<typeof ProbeCatalogSchema>;
