/**
 * Logging redaction utilities to prevent identifier exposure
 */

export function redactId(id?: string): string {
  if (!id) return 'unknown';
  // keep last 6 for correlation
  return id.length <= 6 ? id : `…${id.slice(-6)}`;
}
