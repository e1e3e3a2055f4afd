export function getErrorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === 'string') return e;
  try {
    return JSON.stringify(e) ?? String(e);
  } catch {
    return String(e);
  }
}

// Nesting in the trace cannot describe a call stack
export class TraceStructureError extends Error {
  override name = 'TraceStructureError';
}

// Saved tree is unreadable or inconsistent
export class TreeStoreError extends Error {
  override name = 'TreeStoreError';
}
