/**
 * Tests for JIDConfig.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { JIDConfig } from "../../src/sdk/config.js";

describe("JIDConfig", () => {
  // Save and restore env vars
  const savedEnv: Record<string, string | undefined> = {};
  const envKeys = [
    "JID_NODE_CACHE_SIZE",
    "JID_DOMAIN_CACHE_SIZE",
    "JID_RESOURCE_CACHE_SIZE",
    "JID_LENGTH_MODE",
  ];

  beforeEach(() => {
    for (const key of envKeys) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of envKeys) {
      if (savedEnv[key] !== undefined) {
        process.env[key] = savedEnv[key];
      } else {
        delete process.env[key];
      }
    }
  });

  it("uses the default cache sizes", () => {
    const cfg = new JIDConfig();
    expect(cfg.nodeCacheSize).toBe(10000);
    expect(cfg.domainCacheSize).toBe(500);
    expect(cfg.resourceCacheSize).toBe(10000);
  });

  it("counts UTF-8 bytes by default", () => {
    expect(new JIDConfig().lengthMode).toBe("utf8");
  });

  it("reads cache sizes from env vars", () => {
    process.env["JID_NODE_CACHE_SIZE"] = "20";
    process.env["JID_DOMAIN_CACHE_SIZE"] = "5";
    process.env["JID_RESOURCE_CACHE_SIZE"] = "30";
    const cfg = new JIDConfig();
    expect(cfg.nodeCacheSize).toBe(20);
    expect(cfg.domainCacheSize).toBe(5);
    expect(cfg.resourceCacheSize).toBe(30);
  });

  it("ignores blank env vars", () => {
    process.env["JID_DOMAIN_CACHE_SIZE"] = "  ";
    expect(new JIDConfig().domainCacheSize).toBe(500);
  });

  it("constructor arg overrides env var", () => {
    process.env["JID_DOMAIN_CACHE_SIZE"] = "5";
    process.env["JID_LENGTH_MODE"] = "utf16";
    const cfg = new JIDConfig({ domainCacheSize: 7, lengthMode: "utf8" });
    expect(cfg.domainCacheSize).toBe(7);
    expect(cfg.lengthMode).toBe("utf8");
  });

  it("reads the length mode from env var", () => {
    process.env["JID_LENGTH_MODE"] = "utf16";
    expect(new JIDConfig().lengthMode).toBe("utf16");
  });

  it("rejects an unknown length mode", () => {
    expect(() => new JIDConfig({ lengthMode: "bytes" })).toThrow(
      `Invalid lengthMode 'bytes'. Must be one of: ["utf8","utf16"]`
    );
  });

  it("rejects invalid cache sizes", () => {
    expect(() => new JIDConfig({ nodeCacheSize: 0 })).toThrow(
      "Invalid nodeCacheSize '0'. Must be a positive integer"
    );
    process.env["JID_RESOURCE_CACHE_SIZE"] = "lots";
    expect(() => new JIDConfig()).toThrow(
      "Invalid resourceCacheSize 'NaN'. Must be a positive integer"
    );
  });
});
