import { TransientFetchError, errorMessage, err, ok, type Result } from '@cinefeed/shared';

/** A render that stops its work when the signal aborts. */
export type AbortableTask<T> = (signal: AbortSignal) => Promise<T>;

/**
 * Runs `task` with a deadline. On expiry the task's signal is aborted and the
 * call rejects with a TransientFetchError, but only once the task has
 * settled, so a caller holding a pool slot keeps it until the work is gone.
 */
export async function withTimeout<T>(task: AbortableTask<T>, ms: number, label: string): Promise<T> {
  const controller = new AbortController();
  const running = task(controller.signal);

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), ms);
  });

  try {
    const winner = await Promise.race([running.then((value) => ({ value })), expired]);
    if (winner !== 'timeout') return winner.value;
  } finally {
    clearTimeout(timer);
  }

  const error = new TransientFetchError(label, `Timeout: ${label} exceeded ${ms}ms`);
  controller.abort(error);
  await Promise.allSettled([running]);
  throw error;
}

/**
 * Runs a render call with a timeout. Any failure becomes a TransientFetchError.
 */
export async function attemptFetch<T>(
  label: string,
  timeoutMs: number,
  task: AbortableTask<T>
): Promise<Result<T, TransientFetchError>> {
  try {
    return ok(await withTimeout(task, timeoutMs, label));
  } catch (error) {
    if (error instanceof TransientFetchError) {
      return err(error);
    }
    return err(new TransientFetchError(label, errorMessage(error), { cause: error }));
  }
}
