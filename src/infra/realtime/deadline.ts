/**
 * Settles with `task`, or rejects with `onTimeout()` when `timeoutMs` passes first.
 * The task itself is not cancelled.
 */
export function withDeadline<T>(
  task: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  return Promise.race([task, deadline]).finally(() => clearTimeout(timer));
}
