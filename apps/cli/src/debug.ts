const DEBUG =
  process.env.PASSGAUGE_DEBUG === "1" ||
  process.env.PASSGAUGE_DEBUG === "true";

export function debug(tag: string, ...args: unknown[]): void {
  if (DEBUG) console.error(`[DEBUG:${tag}]`, ...args);
}
