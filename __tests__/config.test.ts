import { describe, it, expect } from "vitest";
import { parseConfig } from "../src/config";
import { ConfigError } from "../src/errors";

describe("parseConfig", () => {
  it("applies defaults", () => {
    const config = parseConfig({});

    expect(config).toMatchObject({
      port: 8080,
      host: "0.0.0.0",
      fetchTimeoutMs: 10000,
      maxRetries: 2,
      retryDelayMs: 1000,
      logLevel: "info",
      apiUrl: "http://localhost:8080",
    });
    expect(config.userAgent).toContain("Mozilla/5.0");
  });

  it("reads values from the environment", () => {
    const config = parseConfig({
      PORT: "3000",
      MAX_RETRIES: "0",
      LOG_LEVEL: "debug",
      SCRAPE_API_URL: "http://api.test",
      USER_AGENT: "test-agent",
    });

    expect(config.port).toBe(3000);
    expect(config.maxRetries).toBe(0);
    expect(config.logLevel).toBe("debug");
    expect(config.apiUrl).toBe("http://api.test");
    expect(config.userAgent).toBe("test-agent");
  });

  it("treats blank values as unset", () => {
    expect(parseConfig({ PORT: "", FETCH_TIMEOUT_MS: "  " }).port).toBe(8080);
  });

  it("rejects invalid values", () => {
    expect(() => parseConfig({ PORT: "abc" })).toThrow(ConfigError);
    expect(() => parseConfig({ LOG_LEVEL: "verbose" })).toThrow(/LOG_LEVEL/);
    expect(() => parseConfig({ FETCH_TIMEOUT_MS: "10" })).toThrow(ConfigError);
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(parseConfig({}))).toBe(true);
  });
});
