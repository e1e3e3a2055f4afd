export type LogSink = {
  appendLine(line: string): void;
};

const stderrSink: LogSink = {
  appendLine: line => {
    process.stderr.write(`${line}\n`);
  }
};

let sink: LogSink = stderrSink;
let traceEnabled = false;

// Stacks are noise in a normal run; --verbose brings them back
function renderPart(part: unknown): string {
  if (part instanceof Error) {
    return traceEnabled && part.stack ? part.stack : `${part.name}: ${part.message}`;
  }
  if (typeof part !== 'object' || part === null) {
    return String(part);
  }
  try {
    return JSON.stringify(part);
  } catch {
    return String(part);
  }
}

function write(level: string, parts: unknown[]): void {
  const elapsed = process.uptime().toFixed(3);
  sink.appendLine(`[+${elapsed}s] ${level.padEnd(5)} ${parts.map(renderPart).join(' ')}`);
}

export function setLogSink(next: LogSink | undefined): void {
  sink = next ?? stderrSink;
}

export function logInfo(...parts: unknown[]): void {
  write('INFO', parts);
}

export function logWarn(...parts: unknown[]): void {
  write('WARN', parts);
}

export function logError(...parts: unknown[]): void {
  write('ERROR', parts);
}

export function setTraceEnabled(enabled: boolean): void {
  traceEnabled = enabled;
  if (traceEnabled) {
    write('INFO', ['Trace logging enabled']);
  }
}

export function isTraceEnabled(): boolean {
  return traceEnabled;
}

export function logTrace(...parts: unknown[]): void {
  if (traceEnabled) {
    write('TRACE', parts);
  }
}
