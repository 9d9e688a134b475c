import { Errors } from '../errors.js';

/**
 * Runs `task` with a bounded wait. The task receives an AbortSignal that fires
 * when the deadline passes; the returned promise then rejects with a TIMEOUT error.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // reject first so the race settles with TIMEOUT, not the task's abort error
      reject(Errors.TIMEOUT(label, ms));
      controller.abort();
    }, ms);
  });
  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
