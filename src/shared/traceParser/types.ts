export type CallSite = {
  readonly file: string; // script path as printed by the trace producer
  readonly line: number; // 1-based
  readonly code: string; // continuation lines joined with CONTINUATION_MARKER
};

export type RawEvent = {
  depth?: number; // undefined when the stream carries no usable nesting
  timestamp: number; // seconds
  site: CallSite;
};

export type ParsedTraceLine = {
  timestamp: number;
  depth?: number;
  file: string;
  line: number;
  code: string;
};

export type ParseOptions = {
  // Treat the stream as if no line carried a nesting field
  ignoreNesting?: boolean;
  // Receives every line that is neither a trace line nor a continuation
  onIgnored?: (line: string) => void;
};
