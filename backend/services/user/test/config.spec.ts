// backend/services/user/test/config.spec.ts
import { describe, expect, it } from "vitest";
import { loadUserConfig } from "../src/config";

describe("loadUserConfig", () => {
  it("uses local-development defaults", () => {
    expect(loadUserConfig({})).toEqual({
      env: undefined,
      port: 8080,
      mongoUri: "mongodb://localhost:27017",
      mongoDb: "TTTN",
      storeTimeoutMs: 5000,
      logLevel: "info",
    });
  });

  it("reads overrides", () => {
    const cfg = loadUserConfig({
      NODE_ENV: "production",
      PORT: "9000",
      MONGO_URI: "mongodb://db:27017",
      MONGO_DB: "records",
      STORE_TIMEOUT_MS: "250",
      LOG_LEVEL: "debug",
    });
    expect(cfg).toMatchObject({
      env: "production",
      port: 9000,
      mongoUri: "mongodb://db:27017",
      mongoDb: "records",
      storeTimeoutMs: 250,
      logLevel: "debug",
    });
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadUserConfig({ PORT: "http" })).toThrow(/PORT/);
  });

  it("rejects a zero store timeout", () => {
    expect(() => loadUserConfig({ STORE_TIMEOUT_MS: "0" })).toThrow(/STORE_TIMEOUT_MS/);
  });

  it("rejects an unknown log level", () => {
    expect(() => loadUserConfig({ LOG_LEVEL: "loud" })).toThrow(/LOG_LEVEL/);
  });
});
