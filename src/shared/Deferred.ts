export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

/** 由外部決定何時 resolve 的 promise */
export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
