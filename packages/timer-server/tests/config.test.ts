import { describe, expect, it } from "vitest";

import { loadServerConfig } from "../src/config.js";
import { InvalidArgumentError } from "../src/core.js";

describe("loadServerConfig", () => {
  it("falls back to defaults", () => {
    expect(loadServerConfig({})).toEqual({ port: 8787, tickIntervalMs: 50 });
  });

  it("reads values from the environment", () => {
    expect(loadServerConfig({ PORT: "9000", TICK_INTERVAL_MS: " 16 " })).toEqual({
      port: 9000,
      tickIntervalMs: 16,
    });
  });

  it("rejects values that are not positive integers", () => {
    expect(() => loadServerConfig({ PORT: "abc", TICK_INTERVAL_MS: "0" })).toThrow(
      new InvalidArgumentError(
        'Invalid argument: PORT must be a positive integer, got "abc"; TICK_INTERVAL_MS must be a positive integer, got "0"',
        [],
      ),
    );
    expect(() => loadServerConfig({ TICK_INTERVAL_MS: "-5" })).toThrow(InvalidArgumentError);
  });
});
