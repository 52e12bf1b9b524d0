import { describe, expect, it } from "vitest";

import { DEFAULTS, resolveApiKey, resolveMargins, squareCanvas, todayIsoDate } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

const SQUARE = { width: 1000, height: 1000 };

describe("resolveApiKey", () => {
  it("prefers the flag over the environment", () => {
    expect(resolveApiKey(" from-flag ", { REMOVE_BG_API_KEY: "from-env" })).toBe("from-flag");
  });

  it("falls back to REMOVE_BG_API_KEY", () => {
    expect(resolveApiKey(undefined, { REMOVE_BG_API_KEY: "test-secret\n" })).toBe("test-secret");
  });

  it("fails without a key", () => {
    expect(() => resolveApiKey(undefined, {})).toThrow(ConfigError);
    expect(() => resolveApiKey(undefined, { REMOVE_BG_API_KEY: "  " })).toThrow(
      "No remove.bg API key: pass --api-key or set REMOVE_BG_API_KEY",
    );
  });
});

describe("resolveMargins", () => {
  it("uses one margin for every side by default", () => {
    expect(resolveMargins({}, SQUARE)).toEqual({ left: 111, right: 111, top: 111, bottom: 111 });
    expect(DEFAULTS.margin).toBe(111);
  });

  it("lets each side override the shared margin", () => {
    expect(resolveMargins({ margin: 20, marginLeft: 0, marginBottom: 50 }, SQUARE)).toEqual({
      left: 0,
      right: 20,
      top: 20,
      bottom: 50,
    });
  });

  it("rejects negative or fractional margins", () => {
    expect(() => resolveMargins({ marginLeft: -1 }, SQUARE)).toThrow(
      "margin-left must be a non-negative integer, got -1",
    );
    expect(() => resolveMargins({ margin: 1.5 }, SQUARE)).toThrow(ConfigError);
  });

  it("rejects margins that leave no room for the subject", () => {
    expect(() => resolveMargins({ margin: 500 }, SQUARE)).toThrow(
      "Margins leave 0x0 px inside a 1000x1000 canvas",
    );
  });
});

describe("squareCanvas", () => {
  it("builds a square of the requested size", () => {
    expect(squareCanvas(DEFAULTS.outSize)).toEqual({ width: 1000, height: 1000 });
  });

  it("rejects sizes that are not positive integers", () => {
    expect(() => squareCanvas(0)).toThrow(ConfigError);
    expect(() => squareCanvas(12.5)).toThrow("out-size must be a positive integer, got 12.5");
  });
});

describe("todayIsoDate", () => {
  it("formats the local date", () => {
    expect(todayIsoDate(new Date(2024, 0, 5, 23, 59))).toBe("2024-01-05");
  });
});
