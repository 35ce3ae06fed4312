// Typed deferred utility — own module to keep runtime code out of the type barrel (src/types.ts)
// Lets tests hold a transport response open and settle it in a chosen order

import type { Deferred } from "../types.js";

export function createDeferred<T>(): Deferred<T> {
  let resolve!: (value: T) => void;
  let reject!: (reason: unknown) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
