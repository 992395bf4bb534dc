/**
 * Tests for the BuildTrace observability module.
 *
 * @module
 */

import { describe, it, expect, beforeEach } from "vitest";
import { BuildTrace } from "../src/core/observability/BuildTrace.js";
import { formatBytes, formatDuration } from "../src/core/utils/format.js";
import { FakeClock } from "./helpers.js";

describe("BuildTrace", () => {
  let trace: BuildTrace;

  beforeEach(() => {
    trace = new BuildTrace(new FakeClock());
  });

  describe("start and end", () => {
    it("records duration and heap delta", () => {
      trace.start("Loading pages");
      trace.end("Loading pages");

      const [entry] = trace.toArray();

      expect(entry.name).toBe("Loading pages");
      expect(entry.status).toBe("completed");
      expect(entry.durationMs).toBe(250);
      expect(entry.memoryDelta).toBe(1024);
      expect(entry.end).toBeInstanceOf(Date);
    });

    it("records steps in execution order", () => {
      for (const name of ["Loading pages", "Creating pages", "Rendering pages"]) {
        trace.start(name);
        trace.end(name);
      }

      expect(trace.toArray().map((e) => e.name)).toEqual([
        "Loading pages",
        "Creating pages",
        "Rendering pages",
      ]);
      expect(trace.totalDurationMs()).toBe(750);
    });

    it("marks failed steps", () => {
      trace.start("Saving pages");
      trace.fail("Saving pages");

      expect(trace.toArray()[0].status).toBe("failed");
    });

    it("ignores end without a matching start", () => {
      trace.end("Unknown");

      expect(trace.toArray()).toEqual([]);
    });

    it("leaves unfinished steps running", () => {
      trace.start("Rendering pages");

      const [entry] = trace.toArray();
      expect(entry.status).toBe("running");
      expect(entry.durationMs).toBeUndefined();
      expect(trace.totalDurationMs()).toBe(0);
    });
  });

  describe("output", () => {
    it("serializes to JSON", () => {
      trace.start("Loading pages");
      trace.end("Loading pages");

      const json = trace.toJSON();

      expect(json.totalDurationMs).toBe(250);
      expect(json.trace[0]).toMatchObject({ name: "Loading pages", status: "completed", durationMs: 250 });
      expect(typeof json.trace[0].start).toBe("string");
    });

    it("formats a human-readable table", () => {
      trace.start("Loading pages");
      trace.end("Loading pages");
      trace.start("Rendering pages");
      trace.fail("Rendering pages");

      expect(trace.toHumanString()).toBe(
        [
          "  Loading pages    250ms  1 KB",
          "  Rendering pages  250ms  1 KB  FAILED",
          `  ${"─".repeat(27)}`,
          "  Total 500ms",
        ].join("\n")
      );
    });

    it("returns an empty string without entries", () => {
      expect(trace.toHumanString()).toBe("");
    });
  });
});

describe("format helpers", () => {
  it("formats bytes", () => {
    expect(formatBytes(0)).toBe("0 B");
    expect(formatBytes(512)).toBe("512 B");
    expect(formatBytes(1536)).toBe("1.5 KB");
    expect(formatBytes(-2048)).toBe("-2 KB");
    expect(formatBytes(5 * 1024 * 1024)).toBe("5 MB");
  });

  it("formats durations", () => {
    expect(formatDuration(42.4)).toBe("42ms");
    expect(formatDuration(1234)).toBe("1.23s");
  });
});
