import { TimeoutError } from '../errors';

/** Largest delay `setTimeout` honours; anything above fires after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Race a promise against a timer. When the timer wins the returned promise
 * rejects with `TimeoutError` and `onTimeout` runs, so the caller can abort
 * whatever the losing promise still holds.
 */
export function withTimeout<T>(p: Promise<T>, ms: number, onTimeout?: () => void): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const t = setTimeout(() => {
      onTimeout?.();
      reject(new TimeoutError(ms));
    }, ms);
    p.then(
      (v) => { clearTimeout(t); resolve(v); },
      (e) => { clearTimeout(t); reject(e); },
    );
  });
}
