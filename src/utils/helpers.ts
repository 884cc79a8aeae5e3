/**
 * Querywise - Utility Helper Functions
 * Common utility functions used throughout the service
 */

import { v4 as uuidv4 } from 'uuid';

import { RequestCancelledError } from './types.js';

/**
 * Generate a unique identifier (request and conversation ids)
 */
export function generateId(): string {
  return uuidv4();
}

/**
 * Rough prompt-token estimate: four characters per token
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Throw if the caller's signal has been aborted
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RequestCancelledError();
  }
}

/**
 * Get client IP address from request headers
 */
export function getClientIp(headers: Record<string, string | string[] | undefined>): string {
  const forwardedFor = headers['x-forwarded-for'];
  if (forwardedFor) {
    const ips = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor;
    return ips?.split(',')[0]?.trim() ?? 'unknown';
  }

  const realIp = headers['x-real-ip'];
  if (realIp) {
    return Array.isArray(realIp) ? (realIp[0] ?? 'unknown') : realIp;
  }

  return 'unknown';
}

// =============================================================================
// Keyed Mutex
// =============================================================================

/**
 * Serializes async work per key while different keys run concurrently.
 * Each key holds the tail of a promise chain; the entry is dropped once
 * the last waiter finishes.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  public async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  public isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  public get size(): number {
    return this.tails.size;
  }
}
