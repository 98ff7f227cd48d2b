/**
 * Tests for config.ts — loadConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("defaults the log level to warn", () => {
    expect(loadConfig({})).toEqual({ LOG_LEVEL: "warn" });
  });

  it("reads LOG_LEVEL", () => {
    expect(loadConfig({ LOG_LEVEL: "debug" }).LOG_LEVEL).toBe("debug");
  });

  it("accepts silent", () => {
    expect(loadConfig({ LOG_LEVEL: "silent" }).LOG_LEVEL).toBe("silent");
  });

  it("ignores unrelated variables", () => {
    expect(loadConfig({ HOME: "/tmp", LOG_LEVEL: "info" })).toEqual({ LOG_LEVEL: "info" });
  });

  it("throws on an unknown level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });
});
