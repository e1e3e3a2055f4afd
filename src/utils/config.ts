import { z } from 'zod';
import type { ReportOptions } from '../shared/report';

export const DEFAULT_STORE_FILE = 'trace-profile.json';

export const profilerOptionsSchema = z
  .object({
    trace: z.string().min(1).optional(),
    storeFile: z.string().min(1).default(DEFAULT_STORE_FILE),
    threshold: z.coerce.number().min(0, 'Threshold must not be negative').default(0),
    depth: z.coerce.number().int().min(0, 'Depth must not be negative').default(0),
    ignoreNesting: z.boolean().default(false),
    traceInfoWidth: z.coerce.number().int().positive('Trace info width must be positive').optional(),
    sort: z.boolean().default(false),
    reportOnly: z.boolean().default(false),
    one: z.boolean().default(false),
    verbose: z.boolean().default(false)
  })
  .superRefine((o, ctx) => {
    // report-only replays the store; anything that shapes collection is a mistake
    if (o.reportOnly && o.trace) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['reportOnly'],
        message: '--report-only cannot be combined with a trace file'
      });
    }
    if (o.reportOnly && o.ignoreNesting) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['reportOnly'],
        message: '--report-only cannot be combined with --ignore-nesting'
      });
    }
  });

// Flag values exactly as they appear on the command line
export type RawProfilerOptions = {
  trace?: string;
  storeFile?: string;
  threshold?: string;
  depth?: string;
  ignoreNesting?: boolean;
  traceInfoWidth?: string;
  sort?: boolean;
  reportOnly?: boolean;
  one?: boolean;
  verbose?: boolean;
};

export type ProfilerOptions = z.output<typeof profilerOptionsSchema>;

export type ResolvedOptions = { options: ProfilerOptions; error?: undefined } | { options?: undefined; error: string };

export function resolveOptions(input: RawProfilerOptions): ResolvedOptions {
  const parsed = profilerOptionsSchema.safeParse(input);
  if (!parsed.success) {
    return { error: parsed.error.issues.map(issue => issue.message).join('; ') };
  }
  return { options: parsed.data };
}

export function toReportOptions(options: ProfilerOptions): ReportOptions {
  return {
    threshold: options.threshold,
    maxDepth: options.depth,
    sort: options.sort,
    singlePath: options.one,
    traceInfoWidth: options.traceInfoWidth
  };
}
