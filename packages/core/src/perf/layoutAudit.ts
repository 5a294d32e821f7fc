/**
 * packages/core/src/perf/layoutAudit.ts — Optional layout audit logging.
 *
 * Purpose:
 * - Emit lightweight NDJSON records describing finished layout passes.
 * - Stay silent unless explicitly enabled.
 *
 * Enable with:
 *   BARKIT_LAYOUT_AUDIT=1
 *
 * Records go to the installed sink when there is one, else to stderr.
 */

import { readEnvFlag } from "./env.js";

export type LayoutAuditSink = (line: string) => void;

type AuditFields = Readonly<Record<string, unknown>>;

export const LAYOUT_AUDIT_ENABLED = readEnvFlag("BARKIT_LAYOUT_AUDIT");

let sink: LayoutAuditSink | null = null;
let forced = false;

/**
 * Install (or clear, with null) the audit sink. `force` turns auditing on
 * for this sink even when BARKIT_LAYOUT_AUDIT is unset.
 */
export function setLayoutAuditSink(next: LayoutAuditSink | null, force = false): void {
  sink = next;
  forced = next !== null && force;
}

export function isLayoutAuditActive(): boolean {
  return LAYOUT_AUDIT_ENABLED || forced;
}

export function emitLayoutAudit(scope: string, stage: string, fields: AuditFields): void {
  if (!isLayoutAuditActive()) return;
  try {
    const line = JSON.stringify({
      ts: new Date().toISOString(),
      tMs: performance.now(),
      pid: process.pid,
      layer: "core",
      scope,
      stage,
      ...fields,
    });
    if (sink !== null) {
      sink(line);
      return;
    }
    process.stderr.write(`${line}\n`);
  } catch {
    // Diagnostics never break layout.
  }
}
