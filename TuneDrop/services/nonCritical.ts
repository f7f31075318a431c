/**
 * Side effects that must never affect the outcome the user sees (promo
 * banner, temp-file removal, status-message cleanup) run through here: the
 * error is logged and dropped, and `undefined` is returned instead.
 *
 * Anything the user has to hear about belongs on the critical path and must
 * not be wrapped.
 */
export async function runNonCritical<T>(label: string, task: () => Promise<T> | T): Promise<T | undefined> {
  try {
    return await task();
  } catch (err) {
    console.warn(`[nonCritical] ${label} failed`, err);
    return undefined;
  }
}
