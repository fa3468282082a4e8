/**
 * Best-effort message extraction for values caught from third-party clients.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null) {
    if ('reason' in error && typeof error.reason === 'string') {
      return error.reason;
    }
    return JSON.stringify(error);
  }
  return String(error);
}
