#!/usr/bin/env node
import { promises as fs } from 'fs';
import process from 'process';
import { loadForest, removeStore, saveForest } from './services/treeStore';
import { buildCallForest } from './shared/callTree/build';
import { callCount, wholeDuration } from './shared/callTree/forest';
import type { CallForest } from './shared/callTree/types';
import { renderReport } from './shared/report';
import { parseTraceEvents, splitTraceLines } from './shared/traceParser';
import { DEFAULT_STORE_FILE, resolveOptions, toReportOptions } from './utils/config';
import type { ProfilerOptions, RawProfilerOptions, ResolvedOptions } from './utils/config';
import { getErrorMessage } from './utils/error';
import { logError, logTrace, setTraceEnabled } from './utils/logger';

export type CliParseResult = {
  options: RawProfilerOptions;
  showHelp?: boolean;
  showVersion?: boolean;
  error?: string;
};

type ValueFlag = 'storeFile' | 'threshold' | 'depth' | 'traceInfoWidth';
type SwitchFlag = 'ignoreNesting' | 'sort' | 'reportOnly' | 'one' | 'verbose';

const valueFlags = new Map<string, ValueFlag>([
  ['-f', 'storeFile'],
  ['--store-file', 'storeFile'],
  ['-t', 'threshold'],
  ['--threshold', 'threshold'],
  ['-d', 'depth'],
  ['--depth', 'depth'],
  ['-w', 'traceInfoWidth'],
  ['--trace-info-width', 'traceInfoWidth']
]);

const switchFlags = new Map<string, SwitchFlag>([
  ['--ignore-nesting', 'ignoreNesting'],
  ['-s', 'sort'],
  ['--sort', 'sort'],
  ['-r', 'reportOnly'],
  ['--report-only', 'reportOnly'],
  ['-1', 'one'],
  ['--one', 'one'],
  ['--verbose', 'verbose']
]);

export function parseArgs(argv: string[]): CliParseResult {
  const options: RawProfilerOptions = {};

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? '';

    if (arg === '--help' || arg === '-h') {
      return { options, showHelp: true };
    }
    if (arg === '--version' || arg === '-v') {
      return { options, showVersion: true };
    }

    const valueKey = valueFlags.get(arg);
    if (valueKey) {
      const value = argv[index + 1];
      if (value === undefined || value === '') {
        return { options, error: `Missing value for ${arg}` };
      }
      options[valueKey] = value;
      index += 1;
      continue;
    }

    const switchKey = switchFlags.get(arg);
    if (switchKey) {
      options[switchKey] = true;
      continue;
    }

    // a lone "-" means stdin, same as no trace argument
    if (arg.startsWith('-') && arg !== '-') {
      return { options, error: `Unknown argument: ${arg}` };
    }
    if (options.trace !== undefined) {
      return { options, error: `Unexpected argument: ${arg}` };
    }
    options.trace = arg;
  }

  if (options.trace === '-') {
    delete options.trace;
  }
  return { options };
}

export function formatUsage(): string {
  return [
    'Usage: trace-profile-stat [options] [trace]',
    '',
    'Reads a timestamped build-system trace (or stdin) and reports cumulative',
    'time per traced call. Each report line reads:',
    '  [nesting]file(line):  code (seconds sec)(percent %)',
    'Unrecognised input lines are echoed to stderr prefixed with "Ignored: ".',
    '',
    'Options:',
    `  -f, --store-file <path>        Saved call tree (default: ${DEFAULT_STORE_FILE})`,
    '  -t, --threshold <ratio>        Skip calls below this share of the whole time, e.g. 0.01',
    '  -d, --depth <n>                Skip calls nested deeper than n (0 = unlimited)',
    '      --ignore-nesting           Ignore the nesting field of the trace',
    '  -w, --trace-info-width <n>     Fixed width of the nesting, file and line columns',
    '  -s, --sort                     Order sibling calls by descending time',
    '  -r, --report-only              Report from the saved call tree, do not read a trace',
    '  -1, --one                      Report only the first top-level call',
    '      --verbose                  Enable trace logging',
    '  -h, --help                     Show this help text',
    '  -v, --version                  Show version'
  ].join('\n');
}

export function formatVersion(): string {
  const version = process.env.npm_package_version ?? '0.0.0';
  return `trace-profile-stat ${version}`;
}

export type CliDeps = {
  readInput: (file: string | undefined) => Promise<string>;
  out: (line: string) => void;
  err: (line: string) => void;
  exit: (code: number) => void;
};

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

const defaultDeps: CliDeps = {
  readInput: file => (file === undefined ? readStdin() : fs.readFile(file, 'utf8')),
  out: line => {
    process.stdout.write(`${line}\n`);
  },
  err: line => {
    process.stderr.write(`${line}\n`);
  },
  exit: code => process.exit(code)
};

/**
 * Parse the trace, rebuild the call forest and replace the store with it.
 * An unreadable trace leaves the store alone; once the trace is read, the
 * store is removed if anything fails so no partial tree is replayed later.
 */
async function collect(options: ProfilerOptions, deps: CliDeps): Promise<CallForest> {
  const text = await deps.readInput(options.trace);
  await removeStore(options.storeFile);
  try {
    const events = parseTraceEvents(splitTraceLines(text), {
      ignoreNesting: options.ignoreNesting,
      onIgnored: line => deps.err(`Ignored: ${line}`)
    });
    const forest = buildCallForest(events);
    logTrace('Reconstructed', callCount(forest), 'calls from', options.trace ?? 'stdin');
    await saveForest(options.storeFile, forest);
    return forest;
  } catch (e) {
    await removeStore(options.storeFile);
    throw e;
  }
}

export async function runCli(argv: string[], deps: CliDeps = defaultDeps): Promise<number> {
  const parsed = parseArgs(argv);

  if (parsed.showHelp) {
    deps.err(formatUsage());
    return 0;
  }

  if (parsed.showVersion) {
    deps.err(formatVersion());
    return 0;
  }

  const resolved: ResolvedOptions = parsed.error ? { error: parsed.error } : resolveOptions(parsed.options);
  if (resolved.error !== undefined) {
    deps.err(resolved.error);
    deps.err(formatUsage());
    return 1;
  }
  const options = resolved.options;
  setTraceEnabled(options.verbose);

  const forest = options.reportOnly ? await loadForest(options.storeFile) : await collect(options, deps);
  logTrace('Whole duration', wholeDuration(forest), 'sec');

  for (const line of renderReport(forest, toReportOptions(options))) {
    deps.out(line);
  }
  return 0;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then(code => defaultDeps.exit(code))
    .catch((error: unknown) => {
      logError(getErrorMessage(error));
      defaultDeps.exit(1);
    });
}
