const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";
const DEV_MODE = NODE_ENV !== "production";

const warnedKeys = new Set<string>();

export function warnDev(message: string): void {
  if (!DEV_MODE) return;
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

/** Like `warnDev`, but at most once per `key` for the life of the process. */
export function warnDevOnce(key: string, message: string): void {
  if (!DEV_MODE) return;
  if (warnedKeys.has(key)) return;
  warnedKeys.add(key);
  warnDev(message);
}
