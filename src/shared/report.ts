import { getNode, wholeDuration } from './callTree/forest';
import type { CallForest, CallNodeId } from './callTree/types';
import { formatCallSite, formatPercent, formatSeconds } from './format';

export const INDENT_STEP = 2;

export type ReportOptions = {
  threshold: number; // minimal fraction of the whole duration, 0 disables
  maxDepth: number; // 0 = unlimited
  sort: boolean; // order siblings by descending duration
  singlePath: boolean; // only the first top-level call
  traceInfoWidth?: number;
};

export const defaultReportOptions: ReportOptions = {
  threshold: 0,
  maxDepth: 0,
  sort: false,
  singlePath: false
};

/**
 * Walk the forest depth-first and produce one line per reported call:
 *   [nesting]file(line):  code (seconds sec)(percent %)
 * The first sibling that is too deep or too cheap ends its level, so with
 * `sort` the threshold keeps exactly the most expensive calls.
 */
export function renderReport(forest: CallForest, options: Partial<ReportOptions> = {}): string[] {
  const opts: ReportOptions = { ...defaultReportOptions, ...options };
  const whole = wholeDuration(forest);
  const fraction = (duration: number) => (whole > 0 ? duration / whole : 0);
  const lines: string[] = [];

  const visit = (ids: readonly CallNodeId[], indent: number): void => {
    const nodes = ids.map(id => getNode(forest, id));
    const ordered = opts.sort ? nodes.slice().sort((a, b) => b.duration - a.duration) : nodes;

    for (const node of ordered) {
      if (opts.maxDepth && indent + 1 > opts.maxDepth) break;
      const share = fraction(node.duration);
      if (share < opts.threshold) break;
      if (node.site) {
        const site = formatCallSite(node.site, String(indent + 1), opts.traceInfoWidth);
        lines.push(
          `${' '.repeat(indent * INDENT_STEP)}${site} (${formatSeconds(node.duration)}sec)(${formatPercent(share * 100)}%)`
        );
      }
      visit(node.children, indent + 1);
      if (opts.singlePath && indent === 0) break;
    }
  };

  visit(forest.roots, 0);
  return lines;
}
