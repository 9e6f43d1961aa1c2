import { config } from '../config';

// One-time warning utility; silent unless config.warnings is enabled.
const seen = new Set<string>();

export function warnOnce(key: string, message: string): void {
  if (!config.warnings || seen.has(key)) return;
  // eslint-disable-next-line no-console
  console.warn(message);
  seen.add(key);
}

/** Forget previously emitted keys (tests). */
export function resetWarnings(): void {
  seen.clear();
}
