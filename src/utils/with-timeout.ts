export class CollaboratorTimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'CollaboratorTimeoutError';
  }
}

/**
 * Races `task` against a timer. The timer is always cleared, so a finished
 * call never keeps the process alive.
 */
export function withTimeout<T>(task: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new CollaboratorTimeoutError(operation, timeoutMs)), timeoutMs);
    task.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}
