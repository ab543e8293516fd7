/**
 * Settles with `work` unless `timeoutMs` passes first, in which case it
 * rejects with the error built by `onTimeout`. The timer never outlives the race.
 */
export function raceTimeout<T>(work: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}
