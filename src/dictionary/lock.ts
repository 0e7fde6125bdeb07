/**
 * Per-key write queues. Mutations of one language's word lists run one after
 * another; different languages never wait on one another.
 */

const queues = new Map<string, Promise<void>>();

const settle = () => undefined;

export function withWriteLock<T>(key: string, task: () => Promise<T>): Promise<T> {
  const previous = queues.get(key) ?? Promise.resolve();
  const run = previous.then(task);
  const tail: Promise<void> = run.then(settle, settle).then(() => {
    // Last writer out drops the key.
    if (queues.get(key) === tail) queues.delete(key);
  });
  queues.set(key, tail);
  return run;
}

/** Hold the key until the returned release is called. Releasing twice is a no-op. */
export function acquireWriteLock(key: string): Promise<() => void> {
  return new Promise((granted) => {
    void withWriteLock(key, () => new Promise<void>((release) => granted(() => release())));
  });
}
