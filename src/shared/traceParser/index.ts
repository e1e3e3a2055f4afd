// Streaming parser for timestamped build-system trace logs, e.g.
//   (1712345678.123456) (2) /src/CMakeLists.txt(12):  include(utils.cmake )
// The nesting field in the second pair of parentheses is optional.

import type { CallSite, ParsedTraceLine, ParseOptions, RawEvent } from './types';

export type { CallSite, ParsedTraceLine, ParseOptions, RawEvent } from './types';

// Literal backslash-n, so a multi-line statement still prints on one report line
export const CONTINUATION_MARKER = '\\n';

const reTraceLine =
  /^\((?<timestamp>[^)]*)\)\s*(?:\((?<depth>[^)]*)\)\s*)?(?<file>[^(]*)\((?<line>[^)]*)\):\s*(?<code>.*)$/;

// Some producers report else()/elseif() one level shallower than the
// surrounding if() block.
const reUnderReportedDepth = /^\s*(?:else|elseif)\s*\(/i;

const reInteger = /^[+-]?\d+$/;

function parseInteger(text: string): number | undefined {
  const s = text.trim();
  return reInteger.test(s) ? Number(s) : undefined;
}

function parseTimestamp(text: string): number | undefined {
  const s = text.trim();
  if (!s) return undefined;
  const n = Number(s);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Match one physical line against the trace grammar.
 * Returns undefined for anything that is not a well-formed trace line.
 */
export function parseTraceLine(line: string): ParsedTraceLine | undefined {
  const m = reTraceLine.exec(line);
  if (!m?.groups) return undefined;
  const { timestamp: rawTimestamp, depth: rawDepth, file, line: rawLine, code } = m.groups;
  const timestamp = parseTimestamp(rawTimestamp ?? '');
  const lineNo = parseInteger(rawLine ?? '');
  if (timestamp === undefined || lineNo === undefined) return undefined;
  let depth: number | undefined;
  if (rawDepth !== undefined) {
    depth = parseInteger(rawDepth);
    if (depth === undefined) return undefined;
  }
  return { timestamp, depth, file: file ?? '', line: lineNo, code: code ?? '' };
}

export function parensBalanced(code: string): boolean {
  let nesting = 0;
  for (const c of code) {
    if (c === '(') nesting++;
    else if (c === ')') nesting--;
  }
  return nesting === 0;
}

export function splitTraceLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

type PendingEvent = {
  depth?: number;
  timestamp: number;
  file: string;
  line: number;
  code: string;
};

function toEvent(p: PendingEvent): RawEvent {
  const site: CallSite = { file: p.file, line: p.line, code: p.code };
  return { depth: p.depth, timestamp: p.timestamp, site };
}

/**
 * Turn trace lines into call events.
 * An event is held back until the next trace line arrives because following
 * lines may still continue its code; the last one is flushed at end of input.
 */
export function* parseTraceEvents(lines: Iterable<string>, options: ParseOptions = {}): Generator<RawEvent, void, undefined> {
  let nestingKnown = !options.ignoreNesting;
  let pending: PendingEvent | undefined;

  for (const raw of lines) {
    const line = raw.trimEnd();
    const parsed = parseTraceLine(line);
    if (!parsed) {
      if (!pending || parensBalanced(pending.code)) {
        options.onIgnored?.(line);
      } else {
        pending.code += `${CONTINUATION_MARKER}${line}`;
      }
      continue;
    }

    if (pending) yield toEvent(pending);

    if (parsed.depth === undefined) nestingKnown = false;
    let depth = nestingKnown ? parsed.depth : undefined;
    if (depth !== undefined && reUnderReportedDepth.test(parsed.code)) {
      depth += 1;
    }
    pending = { depth, timestamp: parsed.timestamp, file: parsed.file, line: parsed.line, code: parsed.code };
  }

  if (pending) yield toEvent(pending);
}
