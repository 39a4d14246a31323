/**
 * packages/core/src/perf/layoutAudit.ts — Optional layout-pass audit logging.
 *
 * Purpose:
 * - Emit one NDJSON record per engine measure/place call, only when enabled.
 * - Never influence the computed layout.
 *
 * Enable with:
 *   TESSERA_LAYOUT_AUDIT=1
 *
 * A host (or a test) can capture lines by installing
 * `globalThis.__tesseraLayoutAuditSink`; otherwise lines go to stderr.
 */

type AuditGlobals = {
  __tesseraLayoutAuditSink?: (line: string) => void;
  process?: {
    pid?: number;
    env?: { TESSERA_LAYOUT_AUDIT?: string };
    stderr?: { write?: (text: string) => void };
  };
  console?: { error?: (msg?: unknown) => void };
};

function envFlag(name: "TESSERA_LAYOUT_AUDIT"): boolean {
  try {
    const g = globalThis as AuditGlobals;
    const raw = g.process?.env?.[name];
    if (raw === undefined) return false;
    const value = raw.trim().toLowerCase();
    return value === "1" || value === "true" || value === "yes" || value === "on";
  } catch {
    return false;
  }
}

let auditEnabled = envFlag("TESSERA_LAYOUT_AUDIT");

export function isLayoutAuditEnabled(): boolean {
  return auditEnabled;
}

/** Override the environment flag at runtime. */
export function setLayoutAuditEnabled(enabled: boolean): void {
  auditEnabled = enabled;
}

type AuditFields = Readonly<Record<string, unknown>>;

export function emitLayoutAudit(engine: string, stage: string, fields: AuditFields): void {
  if (!auditEnabled) return;
  try {
    const g = globalThis as AuditGlobals;
    const pid = g.process?.pid;
    const line = JSON.stringify({
      ts: new Date().toISOString(),
      pid: typeof pid === "number" && Number.isInteger(pid) ? pid : undefined,
      layer: "layout",
      engine,
      stage,
      ...fields,
    });
    if (typeof g.__tesseraLayoutAuditSink === "function") {
      g.__tesseraLayoutAuditSink(line);
      return;
    }
    if (typeof g.process?.stderr?.write === "function") {
      g.process.stderr.write(`${line}\n`);
      return;
    }
    g.console?.error?.(line);
  } catch {
    // Diagnostics must never break a layout pass.
  }
}
