/**
 * Async helpers shared by the test suites
 */

/**
 * Drain an async iterable into an array
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

/**
 * Await a promise that must reject with a given error class
 *
 * Returns the error, typed, so tests can assert on its fields.
 */
export async function expectRejection<E extends Error>(
  promise: Promise<unknown>,
  errorClass: new (...args: never[]) => E
): Promise<E> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof errorClass) {
      return error;
    }
    throw new Error(`Expected ${errorClass.name}, got ${String(error)}`);
  }
  throw new Error(`Expected ${errorClass.name} to be thrown`);
}

/**
 * Call a function that must throw a given error class
 */
export function expectThrow<E extends Error>(
  fn: () => unknown,
  errorClass: new (...args: never[]) => E
): E {
  try {
    fn();
  } catch (error) {
    if (error instanceof errorClass) {
      return error;
    }
    throw new Error(`Expected ${errorClass.name}, got ${String(error)}`);
  }
  throw new Error(`Expected ${errorClass.name} to be thrown`);
}

/**
 * Build a byte stream that delivers the given chunks in order
 */
export function streamOf(chunks: readonly (string | Uint8Array)[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(typeof chunk === "string" ? encoder.encode(chunk) : chunk);
      }
      controller.close();
    },
  });
}
