import { describe, test, expect } from "vitest";
import { pino } from "pino";
import { ErrWarningPromoted } from "../errors.js";
import { promoteWarnings } from "../warnings.js";

function recordingLogger() {
  const lines: string[] = [];
  const logger = pino({ level: "warn" }, { write: (line: string) => void lines.push(line) });
  return { logger, lines };
}

describe("promoteWarnings", () => {
  test("a warning during a command throws", () => {
    const { logger } = recordingLogger();
    const restore = promoteWarnings({ isExecuting: () => true, logger });
    try {
      process.emitWarning("careful", "CustomWarning");
      throw new Error("expected a throw");
    } catch (err) {
      if (!ErrWarningPromoted.is(err)) throw err;
      expect(err.message).toBe("CustomWarning: careful");
    } finally {
      restore();
    }
  });

  test("a warning between commands is logged, not thrown", () => {
    const { logger, lines } = recordingLogger();
    const restore = promoteWarnings({ isExecuting: () => false, logger });
    try {
      expect(() => process.emitWarning("late", "LateWarning")).not.toThrow();
    } finally {
      restore();
    }
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "")).toMatchObject({
      level: 40,
      msg: "warning outside a command",
      warningName: "LateWarning",
      warningMessage: "late",
    });
  });

  test("a late warning from a timer does not escape", async () => {
    const { logger, lines } = recordingLogger();
    let executing = true;
    const restore = promoteWarnings({ isExecuting: () => executing, logger });
    try {
      const late = new Promise<void>((resolve) => {
        setTimeout(() => {
          process.emitWarning("late", "LateWarning");
          resolve();
        }, 0);
      });
      executing = false;
      await late;
    } finally {
      restore();
    }
    expect(lines).toHaveLength(1);
  });

  test("restore puts the original back", () => {
    const original = process.emitWarning;
    const { logger } = recordingLogger();
    const restore = promoteWarnings({ isExecuting: () => false, logger });
    expect(process.emitWarning).not.toBe(original);
    restore();
    expect(process.emitWarning).toBe(original);
  });
});
