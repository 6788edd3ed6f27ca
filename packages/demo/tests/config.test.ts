/**
 * Tests for config.ts — loadConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      LOG_LEVEL: "warn",
      LOG_PRETTY: false,
      PROTOCOL_FEE_BPS: 1000,
      DEMO_DELAY_MS: 0,
    });
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({ PROTOCOL_FEE_BPS: "250", DEMO_DELAY_MS: "400" });
    expect(config.PROTOCOL_FEE_BPS).toBe(250);
    expect(config.DEMO_DELAY_MS).toBe(400);
  });

  it("reads LOG_PRETTY as a flag", () => {
    expect(loadConfig({ LOG_PRETTY: "true" }).LOG_PRETTY).toBe(true);
    expect(loadConfig({ LOG_PRETTY: "yes" }).LOG_PRETTY).toBe(false);
  });

  it("rejects a protocol fee above the ceiling", () => {
    expect(() => loadConfig({ PROTOCOL_FEE_BPS: "2001" })).toThrow(ZodError);
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });

  it("rejects a negative delay", () => {
    expect(() => loadConfig({ DEMO_DELAY_MS: "-1" })).toThrow(ZodError);
  });
});
