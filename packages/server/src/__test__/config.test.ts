import { describe, test, expect } from "vitest";
import { ServerConfig } from "../config.js";
import { ErrInvalidConfig } from "../errors.js";

describe("ServerConfig", () => {
  test("defaults", () => {
    const config = new ServerConfig({ cwd: "/srv" }, {});
    expect(config.input).toBeNull();
    expect(config.output).toBeNull();
    expect(config.logFile).toBeNull();
    expect(config.logLevel).toBe("warn");
    expect(config.promoteWarnings).toBe(true);
    expect(config.preload).toEqual([]);
    expect(config.reprDepth).toBe(2);
  });

  test("reads the environment when options are absent", () => {
    const config = new ServerConfig(
      { cwd: "/srv" },
      {
        CROSSLINE_INPUT: "requests.jsonl",
        CROSSLINE_LOG_LEVEL: "debug",
        CROSSLINE_PROMOTE_WARNINGS: "no",
        CROSSLINE_REPR_DEPTH: "4",
      },
    );
    expect(config.input).toBe("/srv/requests.jsonl");
    expect(config.logLevel).toBe("debug");
    expect(config.promoteWarnings).toBe(false);
    expect(config.reprDepth).toBe(4);
  });

  test("options win over the environment", () => {
    const config = new ServerConfig(
      { cwd: "/srv", logLevel: "error", promoteWarnings: true, output: "/tmp/out.jsonl" },
      { CROSSLINE_LOG_LEVEL: "trace", CROSSLINE_PROMOTE_WARNINGS: "0", CROSSLINE_OUTPUT: "ignored.jsonl" },
    );
    expect(config.logLevel).toBe("error");
    expect(config.promoteWarnings).toBe(true);
    expect(config.output).toBe("/tmp/out.jsonl");
  });

  test("ignores unrelated variables", () => {
    expect(() => new ServerConfig({}, { PATH: "/usr/bin", HOME: "/root" })).not.toThrow();
  });

  test("rejects invalid values", () => {
    try {
      new ServerConfig({}, { CROSSLINE_REPR_DEPTH: "0" });
      throw new Error("expected a throw");
    } catch (err) {
      if (!ErrInvalidConfig.is(err)) throw err;
      expect(err.data.reason).toBe("CROSSLINE_REPR_DEPTH: Number must be greater than or equal to 1");
    }
  });
});
