import { isAxiosError } from 'axios';

export function getErrorStatus(error: unknown): number | undefined {
  if (isAxiosError(error)) return error.response?.status;
  if (!error || typeof error !== 'object' || !('status' in error)) return undefined;
  return typeof error.status === 'number' ? error.status : undefined;
}

/**
 * One-line description of a failure, for logs and status messages.
 */
export function describeError(error: unknown): string {
  if (isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      return `HTTP ${status}${error.response?.statusText ? ` ${error.response.statusText}` : ''}`;
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}
