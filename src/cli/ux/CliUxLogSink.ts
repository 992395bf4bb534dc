/**
 * Log sink that prints build log entries for humans.
 *
 * - step notices (`stepIndex`/`stepTotal`): `[i/n] Name`
 * - the `build.end` notice: success line
 * - other notices: info lines
 * - info entries: verbose lines, with their fields
 * - debug entries: debug lines, with their fields
 * - warnings and errors: stderr
 *
 * @module
 */

import type { LogEntry, LogSink } from "../../core/logging/ContextualLogger.js";
import type { CliUx } from "./CliUx.js";

const ENVELOPE_KEYS = new Set(["ts", "level", "msg", "correlationId", "step", "event"]);

export class CliUxLogSink implements LogSink {
  constructor(private readonly ux: CliUx) {}

  write(entry: LogEntry): void {
    switch (entry.level) {
      case "error":
        this.ux.error(entry.msg, { code: typeof entry.errorCode === "string" ? entry.errorCode : undefined });
        return;
      case "warn":
        this.ux.warn(entry.msg);
        return;
      case "notice":
        if (typeof entry.stepIndex === "number" && typeof entry.stepTotal === "number") {
          this.ux.step(entry.stepIndex, entry.stepTotal, entry.msg);
        } else if (entry.event === "build.end") {
          this.ux.success(entry.msg);
        } else {
          this.ux.info(entry.msg);
        }
        return;
      case "info":
        this.ux.verbose(withFields(entry));
        return;
      case "debug":
        this.ux.debug(withFields(entry));
        return;
    }
  }
}

/**
 * `msg key=value ...`, without the envelope fields.
 */
function withFields(entry: LogEntry): string {
  const fields: string[] = [];
  for (const [key, value] of Object.entries(entry)) {
    if (ENVELOPE_KEYS.has(key) || value === undefined) {
      continue;
    }
    fields.push(`${key}=${typeof value === "string" ? value : JSON.stringify(value)}`);
  }
  return fields.length > 0 ? `${entry.msg} ${fields.join(" ")}` : entry.msg;
}
