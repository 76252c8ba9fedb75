/** Result tuple type for tryFn */
export type TryResult<T> = [ok: true, err: null, data: T] | [ok: false, err: Error, data: undefined];

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * tryFn - settles an asynchronous call into a result tuple.
 *
 * Both a synchronous throw from `fn` and a rejection of the returned promise
 * end up as `[false, err, undefined]`; the returned promise never rejects.
 *
 * @example
 * const [ok, err, result] = await tryFn(() => client.getData('/leader'));
 */
export function tryFn<T>(fn: () => Promise<T>): Promise<TryResult<T>> {
  let pending: Promise<T>;
  try {
    pending = fn();
  } catch (error: unknown) {
    return Promise.resolve<TryResult<T>>([false, toError(error), undefined]);
  }

  return Promise.resolve(pending)
    .then((data): TryResult<T> => [true, null, data])
    .catch((error: unknown): TryResult<T> => [false, toError(error), undefined]);
}

/**
 * Synchronous version of tryFn for cases where you know the function is synchronous
 */
export function tryFnSync<T>(fn: () => T): TryResult<T> {
  try {
    const result = fn();
    return [true, null, result];
  } catch (err: unknown) {
    return [false, toError(err), undefined];
  }
}

export default tryFn;
