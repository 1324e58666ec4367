import path from "path";
import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../../src/config/env.js";

const BASE = { PORT: "4000", AUTH_SECRET: "test-secret" };

describe("loadConfig", () => {
  it("loads required values and applies defaults", () => {
    const cfg = loadConfig({ ...BASE });
    expect(cfg).toEqual({
      port: 4000,
      authSecret: "test-secret",
      nonceSecret: "test-secret",
      nonceLifetimeSeconds: 86400,
      noticeStore: "memory",
      databaseUrl: null,
      noticesFile: path.resolve("config/notices.json"),
      dismissUrl: "/notices/dismiss"
    });
  });

  it("reads optional overrides", () => {
    const cfg = loadConfig({
      ...BASE,
      NONCE_SECRET: "nonce-secret",
      NONCE_LIFETIME_SECONDS: "3600",
      NOTICE_STORE: "PG",
      DATABASE_URL: "postgres://localhost/notices",
      NOTICES_FILE: "/etc/notices.json",
      NOTICE_DISMISS_URL: "/admin/ajax"
    });
    expect(cfg.nonceSecret).toBe("nonce-secret");
    expect(cfg.nonceLifetimeSeconds).toBe(3600);
    expect(cfg.noticeStore).toBe("pg");
    expect(cfg.databaseUrl).toBe("postgres://localhost/notices");
    expect(cfg.noticesFile).toBe("/etc/notices.json");
    expect(cfg.dismissUrl).toBe("/admin/ajax");
  });

  it("throws when required vars are missing", () => {
    expect(() => loadConfig({ PORT: "", AUTH_SECRET: "test-secret" })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: "4000", AUTH_SECRET: "" })).toThrow(ConfigError);
  });

  it("validates numeric and enum settings", () => {
    expect(() => loadConfig({ ...BASE, PORT: "not-a-number" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...BASE, PORT: "-1" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...BASE, NONCE_LIFETIME_SECONDS: "1" })).toThrow(
      "NONCE_LIFETIME_SECONDS must be at least 2"
    );
    expect(() => loadConfig({ ...BASE, NOTICE_STORE: "redis" })).toThrow(ConfigError);
  });

  it("requires DATABASE_URL for the pg store", () => {
    expect(() => loadConfig({ ...BASE, NOTICE_STORE: "pg" })).toThrow(
      "DATABASE_URL is required when NOTICE_STORE=pg"
    );
  });
});
