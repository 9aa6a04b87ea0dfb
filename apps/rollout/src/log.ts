let quiet = false;

/** Silences `log` (errors still print); set from ROLLOUT_QUIET. */
export function setQuiet(value: boolean): void {
  quiet = value;
}

export function log(msg: string): void {
  if (quiet) return;
  const ts = new Date().toISOString();
  console.log(`[${ts}] [rollout] ${msg}`);
}

export function logError(msg: string, err?: unknown): void {
  const ts = new Date().toISOString();
  const errStr = err instanceof Error ? err.message : String(err ?? "");
  console.error(`[${ts}] [rollout] ERROR: ${msg}${errStr ? ` - ${errStr}` : ""}`);
}
