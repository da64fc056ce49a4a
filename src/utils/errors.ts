import axios from 'axios';

/**
 * Render any thrown value as a single log-friendly string.
 * Axios errors carry their code (ECONNABORTED, ENOTFOUND, ...) and HTTP status.
 */
export function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const parts = [error.message];
    if (error.code) parts.push(`code=${error.code}`);
    if (error.response) parts.push(`status=${error.response.status}`);
    return parts.join(' ');
  }
  if (error instanceof Error) return error.message;
  return String(error);
}

export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}
