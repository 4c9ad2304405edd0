import type { Lookup } from './types.js';

const ACCESS_DENIED_NAMES = new Set([
  'AccessDenied',
  'AccessDeniedException',
  'UnauthorizedOperation',
  'AuthorizationError',
]);

export class AccessDeniedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AccessDenied';
  }
}

export function isAccessDenied(error: unknown): boolean {
  if (error instanceof AccessDeniedError) return true;
  return error instanceof Error && ACCESS_DENIED_NAMES.has(error.name);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

/**
 * Runs a lookup for a single sub-item. A failure is reported as `found: false` so the caller
 * can skip that item and keep going.
 */
export async function lookup<T>(task: () => Promise<T>): Promise<Lookup<T>> {
  try {
    return { found: true, value: await task() };
  } catch (error) {
    return { found: false, reason: describeError(error) };
  }
}
