import { YoinkError } from '../src/errors';

export const ISO_MILLIS = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

/** Await a promise that must reject with a YoinkError and hand the error back. */
export async function rejection(promise: Promise<unknown>): Promise<YoinkError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof YoinkError) return err;
    throw err;
  }
  throw new Error('expected a YoinkError rejection');
}

/** Same as `rejection` for code that throws synchronously. */
export function thrownBy(run: () => unknown): YoinkError {
  try {
    run();
  } catch (err) {
    if (err instanceof YoinkError) return err;
    throw err;
  }
  throw new Error('expected a YoinkError to be thrown');
}

export function params(entries: Record<string, string | string[]>): Map<string, string[]> {
  return new Map(Object.entries(entries).map(([k, v]) => [k, Array.isArray(v) ? v : [v]]));
}
