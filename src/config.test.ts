import { describe, expect, it } from "vitest";
import { loadConfig, parseAdminIds } from "./config.js";

describe("loadConfig", () => {
  it("fills defaults around the token", () => {
    expect(loadConfig({ TELEGRAM_BOT_TOKEN: "test-token" })).toEqual({
      telegramToken: "test-token",
      port: 3000,
      dbPath: "./data/tastings.sqlite",
      adminIds: [],
      analyticsEnabled: true,
      appEnv: "production",
      timeZone: "Europe/Amsterdam",
      logLevel: "info",
      albumQuietMs: 2000,
      moreThrottleMs: 1000
    });
  });

  it("reads flags and numbers from strings", () => {
    const config = loadConfig({
      TELEGRAM_BOT_TOKEN: "test-token",
      PORT: "8080",
      ANALYTICS_ENABLED: " No ",
      ADMIN_IDS: "1, 2"
    });

    expect(config.port).toBe(8080);
    expect(config.analyticsEnabled).toBe(false);
    expect(config.adminIds).toEqual([1, 2]);
  });

  it("requires a bot token", () => {
    expect(() => loadConfig({})).toThrow();
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadConfig({ TELEGRAM_BOT_TOKEN: "test-token", PORT: "70000" })).toThrow();
  });
});

describe("parseAdminIds", () => {
  it("keeps numeric ids only", () => {
    expect(parseAdminIds(" 1, 22 ,abc,,-3, 4")).toEqual([1, 22, 4]);
  });
});
