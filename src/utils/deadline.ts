// =============================================================================
// Deadline — Race work against a hard time budget
// =============================================================================

export type Settled<T> =
  | { status: "fulfilled"; value: T }
  | { status: "rejected"; error: unknown }
  | { status: "pending" };

/**
 * Observe a promise without awaiting it: `current()` reports its state at
 * the moment of the call. Attaching the handlers also marks rejections as
 * handled.
 */
export function track<T>(promise: Promise<T>): { current(): Settled<T>; done: Promise<void> } {
  let state: Settled<T> = { status: "pending" };
  const done = promise.then(
    (value) => {
      state = { status: "fulfilled", value };
    },
    (error: unknown) => {
      state = { status: "rejected", error };
    },
  );
  return { current: () => state, done };
}

/**
 * Resolve true when every promise settled within `ms`, false when the
 * deadline passed first. The timer never outlives the call.
 */
export async function settleWithin(promises: Promise<unknown>[], ms: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([
      Promise.allSettled(promises).then((): true => true),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
  }
}
