export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const ABORTED_MESSAGE = 'Aborted';

export const isAbortError = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'AbortError' || error.message === ABORTED_MESSAGE);

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error(ABORTED_MESSAGE));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error(ABORTED_MESSAGE));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
