/**
 * Waits for the given number of milliseconds.
 *
 * @example
 * await sleep(250);
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
