/**
 * Diagnostic types and formatting for the Lox resolver.
 */

export interface Diagnostic {
  severity: 'error';
  message: string;
  /** 1-based line number */
  line: number;
  /** 1-based column */
  column: number;
}

/**
 * Format a single diagnostic as a human-readable string.
 */
export function formatDiagnostic(d: Diagnostic): string {
  return `ERROR [${d.line}:${d.column}] ${d.message}`;
}

/**
 * Format an array of diagnostics, sorted by line then column.
 */
export function formatDiagnostics(ds: Diagnostic[]): string {
  if (ds.length === 0) return '';
  const sorted = [...ds].sort((a, b) => a.line - b.line || a.column - b.column);
  return sorted.map(formatDiagnostic).join('\n');
}
