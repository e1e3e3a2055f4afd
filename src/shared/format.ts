import type { CallSite } from './traceParser/types';

const ELLIPSIS = '...';
const MIN_FILE_WIDTH = 5;

function formatFixed(value: number, digits: number): string {
  const n = typeof value === 'number' && isFinite(value) ? value : 0;
  // Number() drops the trailing zeros toFixed leaves behind
  return String(Number(n.toFixed(digits)));
}

export function formatSeconds(seconds: number): string {
  return formatFixed(seconds, 6);
}

export function formatPercent(percent: number): string {
  return formatFixed(percent, 2);
}

/**
 * Shorten a path to `width` characters by cutting out its middle.
 * Paths that already fit are padded with dots instead.
 */
export function fitFilePath(file: string, width: number): string {
  let fitted = file;
  if (width < file.length) {
    if (width < MIN_FILE_WIDTH) {
      throw new RangeError(`Trace info width leaves ${width} characters for file paths, at least ${MIN_FILE_WIDTH} are needed`);
    }
    const half = Math.floor(width / 2);
    fitted = `${file.slice(0, half - 1)}${ELLIPSIS}${file.slice(file.length + 2 - half)}`;
  }
  return fitted.padEnd(width, '.');
}

/**
 * Render a call site as `[nesting]file(line):  code`.
 * With `width`, file path, line number and nesting together take exactly
 * that many characters.
 */
export function formatCallSite(site: CallSite, nesting: string, width?: number): string {
  const line = String(site.line);
  const file = width === undefined ? site.file : fitFilePath(site.file, width - (line.length + nesting.length));
  return `[${nesting}]${file}(${line}):  ${site.code}`;
}
