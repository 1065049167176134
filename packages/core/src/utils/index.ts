/**
 * Utility classes and functions for the snippet library
 */

export { CircularBuffer } from './circular-buffer.js';
export { consoleLogger, silentLogger, type Logger } from './logger.js';

export interface Debounced<A extends unknown[]> {
  (...args: A): void;
  /** Drop the pending call, if any. */
  cancel(): void;
}

/**
 * Debounce a function call.
 * The function will only be called after `wait` ms have passed
 * since the last invocation.
 */
export function debounce<A extends unknown[]>(
  fn: (...args: A) => void,
  wait: number
): Debounced<A> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const debounced = (...args: A): void => {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
    timeoutId = setTimeout(() => {
      timeoutId = undefined;
      fn(...args);
    }, wait);
  };

  return Object.assign(debounced, {
    cancel(): void {
      if (timeoutId !== undefined) {
        clearTimeout(timeoutId);
        timeoutId = undefined;
      }
    },
  });
}

/**
 * Returns the value unless it is missing or only whitespace.
 */
export function nonBlank(value: string | null | undefined): string | undefined {
  return value !== null && value !== undefined && value.trim() !== '' ? value : undefined;
}
