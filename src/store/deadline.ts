/**
 * Settles with `work`, or rejects with `expired()` once `deadline` (epoch ms)
 * has passed. The timer is cleared as soon as either side settles.
 */
export function withDeadline<T>(work: Promise<T>, deadline: number, expired: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(expired()), Math.max(0, deadline - Date.now()));
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Waits for a pool client before the deadline. A client that arrives after
 * the deadline has passed is destroyed instead of going back to the pool.
 */
export async function acquireBefore<C extends { release(err?: Error | boolean): void }>(
  connecting: Promise<C>,
  deadline: number,
  expired: () => Error,
): Promise<C> {
  try {
    return await withDeadline(connecting, deadline, expired);
  } catch (err) {
    void connecting.then(
      (late) => late.release(true),
      () => undefined,
    );
    throw err;
  }
}
