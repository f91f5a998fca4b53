import { describe, it, expect } from "vitest";

import { createLogger } from "../src/logging/logger";

describe("createLogger", () => {
  it("defaults to debug in development and info in production", () => {
    expect(createLogger({ isDev: true }).level).toBe("debug");
    expect(createLogger({ isDev: false }).level).toBe("info");
  });

  it("honours an explicit level", () => {
    expect(createLogger({ isDev: true, level: "warn" }).level).toBe("warn");
  });
});
