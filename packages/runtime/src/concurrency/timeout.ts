// Deadline helper

/**
 * Race `work` against a timer. On expiry the controller is aborted (so the
 * work can stop cooperatively) and the promise rejects with `onTimeout()`,
 * whether or not the work honours the signal.
 */
export function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  options: {
    timeoutMs: number;
    onTimeout: () => Error;
    /** Outer signal, e.g. request cancellation */
    signal?: AbortSignal;
  }
): Promise<T> {
  const controller = new AbortController();
  const { signal: outer } = options;

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      outer?.removeEventListener('abort', onOuterAbort);
      fn();
    };

    const timeoutId = setTimeout(() => {
      const error = options.onTimeout();
      controller.abort(error);
      finish(() => reject(error));
    }, options.timeoutMs);

    const onOuterAbort = () => {
      const reason: unknown = outer?.reason;
      controller.abort(reason);
      finish(() => reject(reason));
    };

    if (outer?.aborted) {
      onOuterAbort();
      return;
    }
    outer?.addEventListener('abort', onOuterAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = work(controller.signal);
    } catch (error) {
      finish(() => reject(error));
      return;
    }
    pending.then(
      (value) => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error))
    );
  });
}
