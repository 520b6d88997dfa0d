/** Longest delay one timer takes; Node fires longer ones after 1 ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

export async function sleep(ms: number): Promise<void> {
  let remaining = ms;
  do {
    const step = Math.min(remaining, MAX_TIMER_MS);
    await new Promise<void>((resolve) => setTimeout(resolve, step));
    remaining -= step;
  } while (remaining > 0);
}

/** Emit `text` one character at a time with a fixed pause after each. */
export async function typeWithDelay(
  sendFn: (char: string) => Promise<void>,
  text: string,
  intervalMs: number,
): Promise<void> {
  for (const char of text) {
    await sendFn(char);
    if (intervalMs > 0) {
      await sleep(intervalMs);
    }
  }
}

/** Local-time `YYYYMMDD-HHMMSS`. */
export function timestampSlug(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
